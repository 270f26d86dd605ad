export {i64Type} from "./wtypes";
export type {ValueType, ResultType, FunctionType} from "./wtypes";
export {Instructions} from "./instructions";
export type {WInstruction} from "./instructions";
export {WExpression} from "./expression";
export {ModuleBuilder} from "./module";
export {WFunction, WLocal} from "./functions";
export {toWat, validateWasm} from "./wabt";
