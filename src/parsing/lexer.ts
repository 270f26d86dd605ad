import {CompileError, Span} from "../compile_error";
import {SourceBuffer} from "./source";
import {Token, keywords, isSymbol} from "./tokens";

const U64_MAX = 2n ** 64n - 1n;

const isDigit = (c: string | undefined): boolean => c !== undefined && c >= "0" && c <= "9";
const isAsciiLetter = (c: string | undefined): boolean => c !== undefined && /^[a-zA-Z]$/.test(c);
const isIdentStart = (c: string | undefined): boolean => c !== undefined && /^[\p{L}_]$/u.test(c);
const isIdentPart = (c: string | undefined): boolean => c !== undefined && /^[\p{L}\p{N}_]$/u.test(c);

export type LexErrorKind = "unexpected-char" | "unexpected-eof" | "number-letter" | "number-overflow";

export class LexError extends CompileError {
    name = "LexError";
    readonly phase = "Lexer failed";

    constructor(readonly kind: LexErrorKind, message: string, span: Span) {
        super(message, span);
    }
}

export class NumberLexError extends LexError {
    name = "NumberLexError";

    constructor(kind: "number-letter" | "number-overflow", message: string, span: Span) {
        super(kind, message, span);
    }
}

export class Lexer {
    private readonly src: SourceBuffer;

    // always starts at the beginning, a buffer passed in is never advanced
    constructor(source: SourceBuffer | string) {
        this.src = new SourceBuffer(typeof source === "string" ? source : source.text);
    }

    /**
     * Lex the whole input, stopping at the first error. Whitespace at the end of the input is not an error,
     * only calling next() with nothing left raises unexpected-eof.
     */
    tokenize(): Token[] {
        const tokens: Token[] = [];
        for (this.src.skipWhitespace(); !this.src.finished(); this.src.skipWhitespace()) {
            tokens.push(this.next());
        }
        return tokens;
    }

    /** Lex exactly one token, the cursor must be at the start of it */
    next(): Token {
        const at = this.src.offset;
        const c = this.src.peek();

        if (c === undefined) {
            throw new LexError("unexpected-eof", "Unexpected EOF", {offset: at, length: 1});
        } else if (isDigit(c)) {
            return this.number();
        } else if (isSymbol(c)) {
            this.src.advance();
            return {type: c, at};
        } else if (isIdentStart(c)) {
            return this.identifier();
        } else {
            throw new LexError("unexpected-char", `Unexpected char: ${c}`, {offset: at, length: 1});
        }
    }

    private number(): Token {
        const at = this.src.offset;
        while (isDigit(this.src.peek())) this.src.advance();

        const len = this.src.offset - at;
        if (isAsciiLetter(this.src.peek())) {
            throw new NumberLexError("number-letter", "Numbers must be separated from letters", {offset: at, length: len});
        }

        const text = this.src.slice(at, this.src.offset);
        const value = BigInt(text);
        if (value > U64_MAX) {
            throw new NumberLexError("number-overflow", `Number ${text} does not fit in 64 bits`, {offset: at, length: len});
        }
        return {type: "CONSTANT_INT", value, at, len};
    }

    private identifier(): Token {
        const at = this.src.offset;
        this.src.advance();
        while (isIdentPart(this.src.peek())) this.src.advance();

        const text = this.src.slice(at, this.src.offset);
        const keyword = keywords.get(text);
        if (keyword !== undefined) return {type: keyword, at};
        return {type: "IDENTIFIER", value: text, at};
    }
}

export function lex(source: SourceBuffer | string): Token[] {
    return new Lexer(source).tokenize();
}
