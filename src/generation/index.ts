export {Generator, FnGenerator, generate} from "./generator";
export type {GeneratorOptions} from "./generator";
export type {BackendTypes, CodegenBackend} from "./backend";
export {WasmBackend, WasmBlock, WasmValue, WASM_TRIPLE} from "./wasm_backend";
export type {WasmTypes} from "./wasm_backend";
export {GenError, UndefinedVariableError} from "./gen_error";
export type {GenErrorKind} from "./gen_error";
