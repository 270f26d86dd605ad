import type {byte} from "./base_types";
import {encodeU32} from "./encoding";

export type ValueType = byte & { __type_value_type__: void };
export const i64Type = 0x7E as ValueType;

export function valueTypeName(t: ValueType): string {
    return t === i64Type ? "i64" : `0x${t.toString(16)}`;
}


export type ResultType = ReadonlyArray<ValueType>;

export function encodeResultType(r: ResultType): byte[] {
    return encodeVec(r.map(x => [x]));
}


export type FunctionType = readonly [parameters: ResultType, results: ResultType];

export function encodeFunctionType(f: FunctionType): byte[] {
    return [0x60 as byte, ...encodeResultType(f[0]), ...encodeResultType(f[1])];
}

export function sameFunctionType(a: FunctionType, b: FunctionType): boolean {
    return a[0].length === b[0].length && a[0].every((v, i) => v === b[0][i]) &&
        a[1].length === b[1].length && a[1].every((v, i) => v === b[1][i]);
}


export function encodeVec(values: ReadonlyArray<ReadonlyArray<byte>>): byte[] {
    return [...encodeU32(values.length), ...values.flat()];
}
