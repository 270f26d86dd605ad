import type {byte, funcidx, localidx} from "./base_types";
import {encodeU32} from "./encoding";
import {WExpression} from "./expression";
import type {ModuleBuilder} from "./module";
import {ValueType, FunctionType, encodeVec} from "./wtypes";

export class WFunction {
    private readonly _locals: WLocal[] = [];
    readonly body = new WExpression();

    constructor(readonly parent: ModuleBuilder, readonly type: FunctionType, readonly name: string,
                readonly exportName?: string) {
    }

    getIndex(): funcidx {
        return this.parent._funcIndex(this);
    }

    addLocal(type: ValueType, name?: string): WLocal {
        // locals are numbered after the parameters
        const index = BigInt(this.type[0].length + this._locals.length) as localidx;
        const local = new WLocal(index, type, name);
        this._locals.push(local);
        return local;
    }

    get locals(): ReadonlyArray<WLocal> {
        return this._locals;
    }

    toBytes(): byte[] {
        // runs of locals with the same type are stored as (count, type) pairs
        const runs: [count: number, type: ValueType][] = [];
        for (const local of this._locals) {
            const last = runs[runs.length - 1];
            if (last !== undefined && last[1] === local.type) {
                last[0]++;
            } else {
                runs.push([1, local.type]);
            }
        }

        const code: byte[] = encodeVec(runs.map(([count, type]) => [...encodeU32(count), type]));
        code.push(...this.body.encoded);
        return [...encodeU32(code.length), ...code];
    }
}

export class WLocal {
    constructor(readonly index: localidx, readonly type: ValueType, readonly name?: string) {
    }
}
