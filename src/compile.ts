import {performance} from "perf_hooks";
import {CompilerOptions, getOptions} from "./options";
import {lex, parse, SourceBuffer, Statement, Token} from "./parsing";
import {generate, WasmBackend} from "./generation";
import type {WasmTypes} from "./generation";
import type {ModuleBuilder} from "./wasm";

export type Phase = "lex" | "parse" | "generate" | "emit";

export type PhaseHooks = {
    phaseStart?(phase: Phase): void,
    phaseEnd?(phase: Phase, milliseconds: number): void,
};

export type CompileResult = {
    tokens: Token[],
    program: Statement[],
    module: ModuleBuilder,
    binary: Uint8Array,
};

function timed<T>(phase: Phase, hooks: PhaseHooks, fn: () => T): T {
    hooks.phaseStart?.(phase);
    const start = performance.now();
    const result = fn();
    hooks.phaseEnd?.(phase, performance.now() - start);
    return result;
}

/**
 * Lex, parse, generate and emit a program. The first error of any phase is thrown as a CompileError subclass
 * and the later phases do not run.
 */
export function compile(source: SourceBuffer | string, overrides: Partial<CompilerOptions> = {},
                        hooks: PhaseHooks = {}): CompileResult {
    const options = {...getOptions(), ...overrides};
    const backend = new WasmBackend();

    const tokens = timed("lex", hooks, () => lex(source));
    const program = timed("parse", hooks, () => parse(tokens));
    const module = timed("generate", hooks, () => generate<WasmTypes>(program, backend, options));
    const binary = timed("emit", hooks, () => backend.emitObject(module, options.triple));

    return {tokens, program, module, binary};
}

/** Compile and run a program, returning the value of its `return` statement */
export async function run(source: SourceBuffer | string, overrides: Partial<CompilerOptions> = {}): Promise<bigint> {
    const options = {...getOptions(), ...overrides};
    const {module} = compile(source, options);
    return callEntry(module, options.entryName);
}

export async function callEntry(module: ModuleBuilder, entryName: string): Promise<bigint> {
    const exports = await module.execute({});
    const entry = exports[entryName];
    if (typeof entry !== "function") throw new Error(`Module does not export a function named '${entryName}'`);

    const value: unknown = entry();
    if (typeof value !== "bigint") throw new Error(`Function '${entryName}' did not return a 64-bit integer`);
    return value;
}
