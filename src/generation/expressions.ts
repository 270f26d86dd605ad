import {Expression, NumberLiteral, Variable, BinaryExpression} from "../parsing/ast";
import type {BackendTypes} from "./backend";
import {UndefinedVariableError} from "./gen_error";
import type {FnGenerator} from "./generator";

function number<T extends BackendTypes>(ctx: FnGenerator<T>, e: NumberLiteral): T["value"] {
    return ctx.backend.constInt(e.value);
}

function variable<T extends BackendTypes>(ctx: FnGenerator<T>, e: Variable): T["value"] {
    const slot = ctx.variables.get(e.name);
    if (slot === undefined) {
        throw new UndefinedVariableError(e.name, ctx, {offset: e.at, length: Array.from(e.name).length});
    }
    return ctx.backend.load(slot, e.name);
}

function binary<T extends BackendTypes>(ctx: FnGenerator<T>, e: BinaryExpression): T["value"] {
    // left operand is always generated first
    const lhs = expressionGeneration(ctx, e.lhs);
    const rhs = expressionGeneration(ctx, e.rhs);

    switch (e.operator.type) {
        case "+":
            return ctx.backend.add(lhs, rhs);
        case "-":
            return ctx.backend.sub(lhs, rhs);
        case "*":
            return ctx.backend.mul(lhs, rhs);
    }
}

export function expressionGeneration<T extends BackendTypes>(ctx: FnGenerator<T>, e: Expression): T["value"] {
    if (e instanceof NumberLiteral) return number(ctx, e);
    else if (e instanceof Variable) return variable(ctx, e);
    else return binary(ctx, e);
}
