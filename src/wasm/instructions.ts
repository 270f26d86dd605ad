import type {byte} from "./base_types";
import {encodeInt64Constant, encodeU32} from "./encoding";
import type {WLocal} from "./functions";
import {i64Type, ResultType, ValueType} from "./wtypes";

export interface WInstruction {
    readonly name: string;
    /* Instruction as bytes */
    readonly encoded: ReadonlyArray<byte>;
    /* Values consumed from stack, parameters[n-1] being top of the stack */
    readonly parameters: ReadonlyArray<ValueType>;
    /* Value pushed onto stack if any */
    readonly result: ValueType | null;
    /* Control never continues to the following instruction */
    readonly terminator: boolean;
    /* Immediate operand, for constants and local accesses */
    readonly immediate?: bigint;
}

function zeroArgs(name: string, opcode: number, parameters: ResultType, result: ValueType | null): () => WInstruction {
    const instr: WInstruction = {name, encoded: [opcode as byte], parameters, result, terminator: false};
    return () => instr;
}

export const Instructions = {
    // control instructions
    return: (results: ResultType): WInstruction => ({
        name: "return", encoded: [0x0F as byte],
        parameters: results, result: null,
        terminator: true
    }),


    // variable instructions
    local: {
        get: (local: WLocal): WInstruction => ({
            name: "local.get", encoded: [0x20 as byte, ...encodeU32(local.index)],
            parameters: [], result: local.type,
            terminator: false, immediate: local.index
        }),
        set: (local: WLocal): WInstruction => ({
            name: "local.set", encoded: [0x21 as byte, ...encodeU32(local.index)],
            parameters: [local.type], result: null,
            terminator: false, immediate: local.index
        }),
    } as const,


    i64: {
        const: (value: bigint): WInstruction => ({
            name: "i64.const", encoded: [0x42 as byte, ...encodeInt64Constant(value)],
            parameters: [], result: i64Type,
            terminator: false, immediate: value
        }),

        add: zeroArgs("i64.add", 0x7C, [i64Type, i64Type], i64Type),
        sub: zeroArgs("i64.sub", 0x7D, [i64Type, i64Type], i64Type),
        mul: zeroArgs("i64.mul", 0x7E, [i64Type, i64Type], i64Type),
    } as const,
} as const;
