import {CompileError, Span} from "../compile_error";
import {Expression, Statement, BinaryExpression, NumberLiteral, Variable, ReturnStatement, VarDeclaration} from "./ast";
import {Token, TokenType, IdentifierToken, describeTokenType, tokenLength, tokenText} from "./tokens";

export type ParseErrorKind = "unexpected-eof" | "unexpected-token";

export class ParseError extends CompileError {
    name = "ParseError";
    readonly phase = "Ast parsing failed";

    /**
     * @param expected one token type that would have been valid, even where the grammar allows several
     * @param got the offending token, undefined at the end of the input
     */
    constructor(readonly kind: ParseErrorKind, readonly expected: TokenType, readonly got: Token | undefined, span: Span) {
        super(got === undefined
            ? `Unexpected EOF found, expected ${describeTokenType(expected)}`
            : `Unexpected token. Got: '${tokenText(got)}', expected: ${describeTokenType(expected)}`, span);
    }
}

/*
 * program     := statement*
 * statement   := return_stmt | var_decl
 * return_stmt := 'return' expr ';'
 * var_decl    := 'var' IDENTIFIER '=' expr ';'
 * expr        := term (('+' | '-') term)*
 * term        := primary ('*' primary)*
 * primary     := NUMBER | IDENTIFIER | '(' expr ')'
 */
export class Parser {
    private index = 0;

    constructor(private readonly tokens: ReadonlyArray<Token>) {
    }

    parse(): Statement[] {
        const statements: Statement[] = [];
        while (this.index < this.tokens.length) {
            statements.push(this.statement());
        }
        return statements;
    }

    private statement(): Statement {
        const token = this.next("RETURN");
        if (token.type === "RETURN") {
            const value = this.expression();
            this.expect(";");
            return new ReturnStatement(token.at, value);
        } else if (token.type === "VAR") {
            const name = this.identifier();
            this.expect("=");
            const value = this.expression();
            this.expect(";");
            return new VarDeclaration(token.at, name.value, value);
        }
        throw this.unexpected(token, "RETURN");
    }

    // left associative, + and - have the same precedence
    private expression(): Expression {
        let lhs = this.term();
        for (let op = this.peek(); op !== undefined && (op.type === "+" || op.type === "-"); op = this.peek()) {
            this.index++;
            lhs = new BinaryExpression(lhs, op, this.term());
        }
        return lhs;
    }

    private term(): Expression {
        let lhs = this.primary();
        for (let op = this.peek(); op !== undefined && op.type === "*"; op = this.peek()) {
            this.index++;
            lhs = new BinaryExpression(lhs, op, this.primary());
        }
        return lhs;
    }

    private primary(): Expression {
        const token = this.next("CONSTANT_INT");
        switch (token.type) {
            case "CONSTANT_INT":
                return new NumberLiteral(token.at, token.value, token.len);
            case "IDENTIFIER":
                return new Variable(token.at, token.value);
            case "(": {
                const inner = this.expression();
                this.expect(")");
                return inner;
            }
            default:
                throw this.unexpected(token, "CONSTANT_INT");
        }
    }

    private identifier(): IdentifierToken {
        const token = this.next("IDENTIFIER");
        if (token.type !== "IDENTIFIER") throw this.unexpected(token, "IDENTIFIER");
        return token;
    }

    private expect(type: TokenType): Token {
        const token = this.next(type);
        if (token.type !== type) throw this.unexpected(token, type);
        return token;
    }

    private peek(): Token | undefined {
        return this.index < this.tokens.length ? this.tokens[this.index] : undefined;
    }

    /** consume the next token, `expected` is reported if the input has ended */
    private next(expected: TokenType): Token {
        const token = this.peek();
        if (token === undefined) {
            // point just past the last token
            const last = this.tokens.length > 0 ? this.tokens[this.tokens.length - 1] : undefined;
            const offset = last === undefined ? 0 : last.at + tokenLength(last);
            throw new ParseError("unexpected-eof", expected, undefined, {offset, length: 1});
        }
        this.index++;
        return token;
    }

    private unexpected(token: Token, expected: TokenType): ParseError {
        return new ParseError("unexpected-token", expected, token, {offset: token.at, length: tokenLength(token)});
    }
}

export function parse(tokens: ReadonlyArray<Token>): Statement[] {
    return new Parser(tokens).parse();
}
