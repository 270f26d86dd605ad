import {Statement, ReturnStatement, VarDeclaration} from "../parsing/ast";
import type {BackendTypes} from "./backend";
import type {FnGenerator} from "./generator";

function _varDeclaration<T extends BackendTypes>(ctx: FnGenerator<T>, s: VarDeclaration): void {
    // the value is evaluated before the new slot exists, so `var a = a + 1;` reads the previous `a`
    const value = ctx.expression(s.value);
    const slot = ctx.backend.allocateSlot(s.name);
    ctx.backend.store(value, slot);
    ctx.variables.set(s.name, slot);
}

function _return<T extends BackendTypes>(ctx: FnGenerator<T>, s: ReturnStatement): void {
    ctx.backend.ret(ctx.expression(s.value));
}

export function statementGeneration<T extends BackendTypes>(ctx: FnGenerator<T>, s: Statement): void {
    if (s instanceof VarDeclaration) _varDeclaration(ctx, s);
    else _return(ctx, s);
}
