import test from "ava";
import {generate, GenError, UndefinedVariableError} from "../../src/generation";
import {lex, parse} from "../../src/parsing";
import {ReturnStatement, Variable} from "../../src/parsing/ast";
import {RecordingBackend} from "../helpers/recording_backend";

const options = {moduleName: "main", entryName: "main"};

function calls(source: string, opts = options): string[] {
    const backend = new RecordingBackend();
    generate(parse(lex(source)), backend, opts);
    return backend.calls;
}

test("operands are generated left to right", t => {
    t.deepEqual(calls("return 1 + 2 * 3;"), [
        "module main",
        "function main.main",
        "block main.entry",
        "position entry",
        "v0 = const 1",
        "v1 = const 2",
        "v2 = const 3",
        "v3 = mul v1 v2",
        "v4 = add v0 v3",
        "ret v4",
        "verify main",
    ]);
});

test("variables are stored and loaded", t => {
    t.deepEqual(calls("var a = 4; var b = a - 1; return a * b;").slice(4), [
        "v0 = const 4",
        "alloca a.0",
        "store v0 a.0",
        "v1 = load a.0",
        "v2 = const 1",
        "v3 = sub v1 v2",
        "alloca b.1",
        "store v3 b.1",
        "v4 = load a.0",
        "v5 = load b.1",
        "v6 = mul v4 v5",
        "ret v6",
        "verify main",
    ]);
});

test("redeclaration gets fresh storage", t => {
    t.deepEqual(calls("var a = 1; var a = a + 1; return a;").slice(4), [
        "v0 = const 1",
        "alloca a.0",
        "store v0 a.0",
        "v1 = load a.0",
        "v2 = const 1",
        "v3 = add v1 v2",
        "alloca a.1",
        "store v3 a.1",
        "v4 = load a.1",
        "ret v4",
        "verify main",
    ]);
});

test("module and function names", t => {
    t.deepEqual(calls("return 0;", {moduleName: "calc", entryName: "run"}).slice(0, 4), [
        "module calc",
        "function calc.run",
        "block run.entry",
        "position entry",
    ]);
});

test("undefined variable is reported, not fatal", t => {
    const backend = new RecordingBackend();
    const error = t.throws<UndefinedVariableError>(
        () => generate([new ReturnStatement(0, new Variable(7, "x"))], backend, options),
        {instanceOf: UndefinedVariableError});

    t.is(error?.message, "In function 'main': Undefined variable 'x'");
    t.deepEqual(error?.span, {offset: 7, length: 1});
    // nothing after the failing expression reaches the backend
    t.deepEqual(backend.calls, ["module main", "function main.main", "block main.entry", "position entry"]);
});

test("variable declared after its use", t => {
    t.throws<UndefinedVariableError>(() => calls("var a = b; var b = 1; return a;"), {instanceOf: UndefinedVariableError});
});

test("verification failures propagate", t => {
    const error = t.throws<GenError>(() => calls("var a = 1;"), {instanceOf: GenError});
    t.is(error?.kind, "verification");
});

test("empty program", t => {
    t.throws<GenError>(() => calls(""), {instanceOf: GenError, message: "block is not terminated"});
});
