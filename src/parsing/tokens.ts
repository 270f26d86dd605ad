export type OperatorType = "+" | "-" | "*";
export type PunctuationType = "=" | ";" | "(" | ")" | "{" | "}";
export type KeywordType = "RETURN" | "VAR";
export type TokenType = "CONSTANT_INT" | "IDENTIFIER" | KeywordType | OperatorType | PunctuationType;

export type NumberToken = {readonly type: "CONSTANT_INT", readonly value: bigint, readonly at: number, readonly len: number};
export type IdentifierToken = {readonly type: "IDENTIFIER", readonly value: string, readonly at: number};
export type KeywordToken = {readonly type: KeywordType, readonly at: number};
export type OperatorToken = {readonly type: OperatorType, readonly at: number};
export type PunctuationToken = {readonly type: PunctuationType, readonly at: number};

export type Token = NumberToken | IdentifierToken | KeywordToken | OperatorToken | PunctuationToken;

const keywordText: {readonly [k in KeywordType]: string} = {
    RETURN: "return",
    VAR: "var",
};

export const keywords: ReadonlyMap<string, KeywordType> = new Map<string, KeywordType>([
    [keywordText.RETURN, "RETURN"],
    [keywordText.VAR, "VAR"],
]);

// `{` and `}` are lexed but not used by the grammar yet
const symbols: ReadonlyArray<string> = ["+", "-", "*", "=", ";", "(", ")", "{", "}"];

export function isSymbol(c: string): c is OperatorType | PunctuationType {
    return symbols.includes(c);
}

/** Canonical source text of a token, lexing it again gives back a token of the same type */
export function tokenText(t: Token): string {
    switch (t.type) {
        case "CONSTANT_INT":
            return t.value.toString();
        case "IDENTIFIER":
            return t.value;
        case "RETURN":
        case "VAR":
            return keywordText[t.type];
        default:
            return t.type;
    }
}

export function tokenLength(t: Token): number {
    if (t.type === "CONSTANT_INT") return t.len;
    return Array.from(tokenText(t)).length;
}

/** Token type as shown in error messages */
export function describeTokenType(type: TokenType): string {
    switch (type) {
        case "CONSTANT_INT":
            return "a number";
        case "IDENTIFIER":
            return "an identifier";
        case "RETURN":
        case "VAR":
            return `'${keywordText[type]}'`;
        default:
            return `'${type}'`;
    }
}
