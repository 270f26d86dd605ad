import type {Expression, Statement} from "../parsing/ast";
import type {BackendTypes, CodegenBackend} from "./backend";
import {expressionGeneration} from "./expressions";
import {statementGeneration} from "./statements";

export type GeneratorOptions = {
    moduleName: string,
    entryName: string,
};

/** Translates a whole program into a module holding a single entry function */
export class Generator<T extends BackendTypes> {
    constructor(readonly backend: CodegenBackend<T>, readonly options: GeneratorOptions) {
    }

    /** Drive the backend for every statement in order, then verify the module */
    generate(program: ReadonlyArray<Statement>): T["module"] {
        const {backend, options} = this;

        const module = backend.createModule(options.moduleName);
        const fn = backend.createFunction(module, options.entryName);
        backend.positionAtEnd(backend.appendBlock(fn, "entry"));

        const fnGenerator = new FnGenerator(this, options.entryName);
        for (const s of program) fnGenerator.statement(s);

        // a program without a return leaves the block unterminated, which verification rejects
        backend.verifyModule(module);
        return module;
    }
}

export class FnGenerator<T extends BackendTypes> {
    /** storage of each declared variable, a redeclaration replaces the previous entry */
    readonly variables = new Map<string, T["slot"]>();

    constructor(readonly gen: Generator<T>, readonly fnName: string) {
    }

    get backend(): CodegenBackend<T> {
        return this.gen.backend;
    }

    statement(s: Statement): void {
        statementGeneration(this, s);
    }

    expression(e: Expression): T["value"] {
        return expressionGeneration(this, e);
    }
}

export function generate<T extends BackendTypes>(program: ReadonlyArray<Statement>, backend: CodegenBackend<T>,
                                                 options: GeneratorOptions): T["module"] {
    return new Generator(backend, options).generate(program);
}
