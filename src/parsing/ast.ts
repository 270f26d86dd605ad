import type {OperatorToken} from "./tokens";

// Classes used to build up the syntax tree - simple objects storing the relevant fields. Children are owned by
// their parent node and never shared.

export abstract class AstNode {
    abstract readonly type: string;

    /** offset of the first character of the node in the source */
    constructor(readonly at: number) {
    }
}

// Expressions

export abstract class ExpressionNode extends AstNode {
    // typescript does structural equality when type checking, so for this class to be different from
    // the base AstNode add a simple private field.
    private readonly _expression: boolean = true;
}

export class NumberLiteral extends ExpressionNode {
    readonly type = "number";

    constructor(at: number, readonly value: bigint, readonly len: number) {
        super(at);
    }

    toString(): string {
        return this.value.toString();
    }
}

export class Variable extends ExpressionNode {
    readonly type = "variable";

    constructor(at: number, readonly name: string) {
        super(at);
    }

    toString(): string {
        return this.name;
    }
}

export class BinaryExpression extends ExpressionNode {
    readonly type = "binary";

    constructor(readonly lhs: Expression, readonly operator: OperatorToken, readonly rhs: Expression) {
        super(lhs.at);
    }

    toString(): string {
        return `(${this.lhs} ${this.operator.type} ${this.rhs})`;
    }
}

export type Expression = NumberLiteral | Variable | BinaryExpression;

// Statements

export abstract class StatementNode extends AstNode {
    private readonly _statement: boolean = true;
}

export class ReturnStatement extends StatementNode {
    readonly type = "return";

    constructor(at: number, readonly value: Expression) {
        super(at);
    }

    toString(): string {
        return `return ${this.value};`;
    }
}

export class VarDeclaration extends StatementNode {
    readonly type = "var";

    constructor(at: number, readonly name: string, readonly value: Expression) {
        super(at);
    }

    toString(): string {
        return `var ${this.name} = ${this.value};`;
    }
}

export type Statement = ReturnStatement | VarDeclaration;
