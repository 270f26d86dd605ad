import test from "ava";
import {callEntry} from "../../src/compile";
import {ModuleBuilder, Instructions, i64Type} from "../../src/wasm";

test("i64 square through a local", async t => {
    const m = new ModuleBuilder();
    const fn = m.function([], [i64Type], "square", "square");
    const x = fn.addLocal(i64Type, "x");
    fn.body.push(
        Instructions.i64.const(12n),
        Instructions.local.set(x),
        Instructions.local.get(x),
        Instructions.local.get(x),
        Instructions.i64.mul(),
        Instructions.return([i64Type])
    );

    t.is(await callEntry(m, "square"), 144n);
});

test("i64 arithmetic wraps", async t => {
    const m = new ModuleBuilder();
    const fn = m.function([], [i64Type], "wrap", "wrap");
    fn.body.push(
        Instructions.i64.const(2n ** 64n - 1n),
        Instructions.i64.const(2n),
        Instructions.i64.add(),
        Instructions.return([i64Type])
    );

    t.is(await callEntry(m, "wrap"), 1n);
});

test("functions with the same signature share a type", async t => {
    const m = new ModuleBuilder();
    const a = m.function([], [i64Type], "a", "a");
    const b = m.function([], [i64Type], "b", "b");
    a.body.push(Instructions.i64.const(1n), Instructions.return([i64Type]));
    b.body.push(Instructions.i64.const(2n), Instructions.i64.const(5n), Instructions.i64.sub(), Instructions.return([i64Type]));

    t.is(Number(m._typeIndex(a.type)), 0);
    t.is(Number(m._typeIndex(b.type)), 0);
    t.is(Number(b.getIndex()), 1);
    t.is(await callEntry(m, "a"), 1n);
    t.is(await callEntry(m, "b"), -3n);
});

test("local indices", t => {
    const fn = new ModuleBuilder().function([], [i64Type], "f");
    const locals = [fn.addLocal(i64Type), fn.addLocal(i64Type), fn.addLocal(i64Type)];
    t.deepEqual(locals.map(x => Number(x.index)), [0, 1, 2]);
    // locals of one type are stored as a single run
    t.deepEqual(fn.toBytes(), [0x04, 0x01, 0x03, 0x7E, 0x0B]);
});

test("stack checking", t => {
    const fn = new ModuleBuilder().function([], [i64Type], "f");
    t.throws(() => fn.body.push(Instructions.i64.add()), {
        message: "Stack does not match Wasm instruction (i64.add) parameters, found empty stack for i64\nPrevious instructions: "
    });

    fn.body.push(Instructions.i64.const(1n), Instructions.i64.const(2n));
    t.deepEqual(fn.body.stack, [i64Type, i64Type]);
    fn.body.push(Instructions.i64.add());
    t.deepEqual(fn.body.stack, [i64Type]);
});

test("stack is polymorphic after return", t => {
    const fn = new ModuleBuilder().function([], [i64Type], "f");
    fn.body.push(Instructions.i64.const(1n), Instructions.return([i64Type]));
    t.notThrows(() => fn.body.push(Instructions.i64.mul(), Instructions.return([i64Type])));
    t.is(fn.body.get(-1)?.name, "return");
    t.is(fn.body.get(0)?.immediate, 1n);
});
