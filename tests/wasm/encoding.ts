import test from "ava";
import {encodeInt64Constant, encodeName, encodeU32, signedLeb128, unsignedLeb128} from "../../src/wasm/encoding";

test("unsigned LEB128", t => {
    t.deepEqual(unsignedLeb128(0n), [0x00]);
    t.deepEqual(unsignedLeb128(127n), [0x7F]);
    t.deepEqual(unsignedLeb128(128n), [0x80, 0x01]);
    t.deepEqual(unsignedLeb128(624485n), [0xE5, 0x8E, 0x26]);
});

test("signed LEB128", t => {
    t.deepEqual(signedLeb128(0n), [0x00]);
    t.deepEqual(signedLeb128(-1n), [0x7F]);
    t.deepEqual(signedLeb128(63n), [0x3F]);
    t.deepEqual(signedLeb128(64n), [0xC0, 0x00]);
    t.deepEqual(signedLeb128(-123456n), [0xC0, 0xBB, 0x78]);
});

test("u32 range", t => {
    t.deepEqual(encodeU32(2 ** 32 - 1), [0xFF, 0xFF, 0xFF, 0xFF, 0x0F]);
    t.throws(() => encodeU32(2n ** 32n), {message: "Value 4294967296 outside of range for u32"});
    t.throws(() => encodeU32(-1), {message: "Value -1 outside of range for u32"});
});

test("64 bit constants keep their bit pattern", t => {
    t.deepEqual(encodeInt64Constant(2n ** 64n - 1n), [0x7F]);
    t.deepEqual(encodeInt64Constant(2n ** 63n), encodeInt64Constant(-(2n ** 63n)));
    t.deepEqual(encodeInt64Constant(2n ** 63n), [0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x80, 0x7F]);
    t.throws(() => encodeInt64Constant(2n ** 64n), {message: "Value 18446744073709551616 outside of range for 64bit uninterpreted int"});
    t.throws(() => encodeInt64Constant(-(2n ** 63n) - 1n));
});

test("names are length prefixed UTF-8", t => {
    t.deepEqual(encodeName("main"), [0x04, 0x6D, 0x61, 0x69, 0x6E]);
    t.deepEqual(encodeName("é"), [0x02, 0xC3, 0xA9]);
});
