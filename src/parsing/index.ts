export * as ast from "./ast";
export type {Statement, Expression} from "./ast";
export {SourceBuffer} from "./source";
export type {Position} from "./source";
export {lex, Lexer, LexError, NumberLexError} from "./lexer";
export type {LexErrorKind} from "./lexer";
export {parse, Parser, ParseError} from "./parser";
export type {ParseErrorKind} from "./parser";
export * from "./tokens";
