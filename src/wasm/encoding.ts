import type {byte} from "./base_types";

const U32_MAX = 2n ** 32n - 1n;
const I64_MIN = -(2n ** 63n);
const U64_MAX = 2n ** 64n - 1n;

// unsigned 32 bit integer, used for counts, sizes and indices in the module format
export function encodeU32(n: bigint | number): byte[] {
    const value = BigInt(n);
    if (value < 0n || value > U32_MAX) {
        throw new Error(`Value ${value} outside of range for u32`);
    }
    return unsignedLeb128(value);
}

/**
 * i64.const immediates are "uninterpreted": the same 64 bits may be read as signed or unsigned. Values above
 * 2^63 - 1 are stored as their two's complement signed equivalent.
 */
export function encodeInt64Constant(n: bigint): byte[] {
    if (n < I64_MIN || n > U64_MAX) {
        throw new Error(`Value ${n} outside of range for 64bit uninterpreted int`);
    }
    return signedLeb128(BigInt.asIntN(64, n));
}

export function encodeName(str: string): byte[] {
    const utf8 = [...new TextEncoder().encode(str)] as byte[];
    return [...encodeU32(utf8.length), ...utf8];
}

export function unsignedLeb128(n: bigint): byte[] {
    const result: byte[] = [];
    let more = true;
    while (more) {
        let group = Number(n & 0x7Fn);
        n >>= 7n;
        more = n !== 0n;
        if (more) group |= 0x80;
        result.push(group as byte);
    }
    return result;
}

export function signedLeb128(n: bigint): byte[] {
    const result: byte[] = [];
    let more = true;
    while (more) {
        let group = Number(n & 0x7Fn);
        n >>= 7n; // arithmetic shift, keeps the sign
        const signBitClear = (group & 0x40) === 0;
        more = !((n === 0n && signBitClear) || (n === -1n && !signBitClear));
        if (more) group |= 0x80;
        result.push(group as byte);
    }
    return result;
}
