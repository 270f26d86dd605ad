import type {byte, funcidx, typeidx} from "./base_types";
import {encodeU32, encodeName} from "./encoding";
import {WFunction} from "./functions";
import {encodeVec, ResultType, encodeFunctionType, FunctionType, sameFunctionType} from "./wtypes";

export class ModuleBuilder {
    private _functions: WFunction[] = [];
    private _functionTypes: FunctionType[] = [];

    constructor(readonly name: string = "main") {
    }

    function(params: ResultType, returnValue: ResultType, name: string, exportName?: string): WFunction {
        const type: FunctionType = [params, returnValue];
        this._typeIndex(type);
        const fn = new WFunction(this, type, name, exportName);
        this._functions.push(fn);
        return fn;
    }

    private byteList(): byte[] {
        const funcTypes = this._functions.map(x => encodeU32(this._typeIndex(x.type)));
        const code = this._functions.map(x => x.toBytes());

        return [
            0x00, 0x61, 0x73, 0x6D, // magic
            0x01, 0x00, 0x00, 0x00, // version
            ...encodeSection(1, this._functionTypes.map(encodeFunctionType)), // type section
            ...encodeSection(3, funcTypes), // function section
            ...encodeSection(7, this._encodeExports()), // export section
            ...encodeSection(10, code), // code section
        ] as byte[];
    }

    toBytes(): Uint8Array {
        return new Uint8Array(this.byteList());
    }

    async execute(imports: WebAssembly.Imports): Promise<WebAssembly.Exports> {
        const module = await WebAssembly.instantiate(new Uint8Array(this.byteList()), imports);
        return module.instance.exports;
    }

    private _encodeExports(): byte[][] {
        const exports: byte[][] = [];
        for (const fn of this._functions) {
            if (fn.exportName !== undefined) exports.push([...encodeName(fn.exportName), 0x00 as byte, ...encodeU32(fn.getIndex())]);
        }
        return exports;
    }

    _funcIndex(fn: WFunction): funcidx {
        const idx = this._functions.indexOf(fn);
        if (idx < 0) throw new Error("Function not found?");
        return BigInt(idx) as funcidx;
    }

    _typeIndex(x: FunctionType): typeidx {
        const idx = this._functionTypes.findIndex(t => sameFunctionType(t, x));
        if (idx >= 0) return BigInt(idx) as typeidx;
        return BigInt(this._functionTypes.push(x) - 1) as typeidx;
    }

    get functions(): ReadonlyArray<WFunction> {
        return this._functions;
    }
}

function encodeSection(id: number, vec: byte[][]): byte[] {
    if (vec.length === 0) return [];

    const contents = encodeVec(vec);
    return [id as byte, ...encodeU32(contents.length), ...contents];
}
