/** Handle types of a backend, each opaque to the generator */
export interface BackendTypes {
    module: unknown;
    function: unknown;
    block: unknown;
    slot: unknown;
    value: unknown;
}

/**
 * IR construction interface driven by the generator. Calls are made in order from a single caller:
 * module and function creation, then instructions at the current block, then verification and emission.
 * Failures are thrown as {@link GenError}s.
 */
export interface CodegenBackend<T extends BackendTypes> {
    createModule(name: string): T["module"];
    /** function taking no parameters and returning a 64-bit integer */
    createFunction(module: T["module"], name: string): T["function"];
    appendBlock(fn: T["function"], name: string): T["block"];
    positionAtEnd(block: T["block"]): void;

    /** storage for one 64-bit integer in the function of the current block */
    allocateSlot(name: string): T["slot"];
    load(slot: T["slot"], name: string): T["value"];
    store(value: T["value"], slot: T["slot"]): void;

    constInt(value: bigint): T["value"];
    add(lhs: T["value"], rhs: T["value"]): T["value"];
    sub(lhs: T["value"], rhs: T["value"]): T["value"];
    mul(lhs: T["value"], rhs: T["value"]): T["value"];
    ret(value: T["value"]): void;

    verifyModule(module: T["module"]): void;
    emitObject(module: T["module"], triple: string): Uint8Array;
}
