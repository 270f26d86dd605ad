export {compile, run, callEntry} from "./compile";
export type {CompileResult, Phase, PhaseHooks} from "./compile";
export {getOptions, setOptions} from "./options";
export type {CompilerOptions} from "./options";
export {CompileError, formatDiagnostic, formatDiagnosticWithSource} from "./compile_error";
export type {Diagnostic, Span} from "./compile_error";
export {SourceBuffer, lex, parse, LexError, NumberLexError, ParseError} from "./parsing";
export {GenError, UndefinedVariableError, WasmBackend} from "./generation";
export type {CodegenBackend, BackendTypes} from "./generation";
export {toWat, validateWasm} from "./wasm";
