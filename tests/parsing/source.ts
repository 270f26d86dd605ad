import test from "ava";
import {SourceBuffer} from "../../src/parsing";

test("cursor movement", t => {
    const src = new SourceBuffer("x \t\n y");
    t.is(src.peek(), "x");
    t.is(src.advance(), "x");
    t.is(src.offset, 1);

    src.skipWhitespace();
    t.is(src.offset, 5);
    t.false(src.finished());

    t.is(src.advance(), "y");
    t.true(src.finished());
    t.is(src.peek(), undefined);
    t.is(src.advance(), undefined);
    t.is(src.offset, 6);
});

test("skipWhitespace stops at the end", t => {
    const src = new SourceBuffer("   ");
    src.skipWhitespace();
    t.true(src.finished());
    t.is(src.offset, 3);
});

test("empty source", t => {
    const src = new SourceBuffer("");
    t.true(src.finished());
    t.is(src.peek(), undefined);
    t.deepEqual(src.positionOf(0), {line: 1, column: 1});
    t.is(src.lineText(1), "");
});

test("positions are 1-based and count preceding newlines", t => {
    const src = new SourceBuffer("ab\ncd\n\nef");
    t.deepEqual(src.positionOf(0), {line: 1, column: 1});
    t.deepEqual(src.positionOf(1), {line: 1, column: 2});
    t.deepEqual(src.positionOf(2), {line: 1, column: 3}); // the newline itself
    t.deepEqual(src.positionOf(3), {line: 2, column: 1});
    t.deepEqual(src.positionOf(4), {line: 2, column: 2});
    t.deepEqual(src.positionOf(6), {line: 3, column: 1});
    t.deepEqual(src.positionOf(7), {line: 4, column: 1});
    t.deepEqual(src.positionOf(8), {line: 4, column: 2});
    t.deepEqual(src.positionOf(9), {line: 4, column: 3});
    t.deepEqual(src.positionOf(100), {line: 4, column: 3});
});

test("line text", t => {
    const src = new SourceBuffer("ab\ncd\n\nef");
    t.is(src.lineText(1), "ab");
    t.is(src.lineText(2), "cd");
    t.is(src.lineText(3), "");
    t.is(src.lineText(4), "ef");
    t.is(src.lineText(5), "");
    t.is(src.lineText(0), "");
});

test("trailing newline starts an empty line", t => {
    const src = new SourceBuffer("return 1;\n");
    t.is(src.lineText(1), "return 1;");
    t.is(src.lineText(2), "");
    t.deepEqual(src.positionOf(10), {line: 2, column: 1});
});

test("offsets count code points", t => {
    const src = new SourceBuffer("é😀x");
    t.is(src.length, 3);
    t.is(src.slice(1, 3), "😀x");
    t.deepEqual(src.positionOf(2), {line: 1, column: 3});
});
