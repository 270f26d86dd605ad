import {CompileError, Span} from "../compile_error";

export type GenErrorKind = "ir-build" | "verification" | "target" | "emit" | "undefined-variable";

/** The part of a function generator an error reports */
type ErrorContext = {readonly fnName: string};

export class GenError extends CompileError {
    name = "GenerationError";
    readonly phase = "Codegen failure";

    constructor(readonly kind: GenErrorKind, message: string, ctx?: ErrorContext, span?: Span) {
        super(ctx !== undefined ? `In function '${ctx.fnName}': ${message}` : message, span);
    }
}

export class UndefinedVariableError extends GenError {
    name = "UndefinedVariableError";

    constructor(readonly variable: string, ctx?: ErrorContext, span?: Span) {
        super("undefined-variable", `Undefined variable '${variable}'`, ctx, span);
    }
}
