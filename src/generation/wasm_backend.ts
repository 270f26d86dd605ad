import {ModuleBuilder, WFunction, WLocal, Instructions, WInstruction, i64Type} from "../wasm";
import type {BackendTypes, CodegenBackend} from "./backend";
import {GenError} from "./gen_error";

export const WASM_TRIPLE = "wasm32-unknown-unknown";

/** Straight-line code ending in a terminator, stored as the body of its function */
export class WasmBlock {
    constructor(readonly fn: WFunction, readonly name: string) {
    }
}

/**
 * Values hold the instructions that push them onto the operand stack, emitted where the value is consumed.
 * Constants and arithmetic are pure so deferring them is safe; a load is copied into its own local when it
 * happens, and the value reads that copy.
 */
export class WasmValue {
    constructor(readonly instructions: ReadonlyArray<WInstruction>) {
    }
}

export interface WasmTypes extends BackendTypes {
    module: ModuleBuilder;
    function: WFunction;
    block: WasmBlock;
    slot: WLocal;
    value: WasmValue;
}

export class WasmBackend implements CodegenBackend<WasmTypes> {
    private readonly blocks = new Map<WFunction, WasmBlock>();
    private current?: WasmBlock;

    createModule(name: string): ModuleBuilder {
        return new ModuleBuilder(name);
    }

    createFunction(module: ModuleBuilder, name: string): WFunction {
        if (module.functions.some(f => f.name === name)) {
            throw new GenError("ir-build", `Function '${name}' is already defined in module '${module.name}'`);
        }
        return module.function([], [i64Type], name, name);
    }

    appendBlock(fn: WFunction, name: string): WasmBlock {
        // no branch instructions exist, so a function never needs more than its entry block
        if (this.blocks.has(fn)) {
            throw new GenError("ir-build", `Function '${fn.name}' already has an entry block, only one block per function is supported`);
        }
        const block = new WasmBlock(fn, name);
        this.blocks.set(fn, block);
        return block;
    }

    positionAtEnd(block: WasmBlock): void {
        this.current = block;
    }

    allocateSlot(name: string): WLocal {
        return this.block().fn.addLocal(i64Type, name);
    }

    load(slot: WLocal, name: string): WasmValue {
        const copy = this.block().fn.addLocal(i64Type, name);
        this.emit(Instructions.local.get(slot), Instructions.local.set(copy));
        return new WasmValue([Instructions.local.get(copy)]);
    }

    store(value: WasmValue, slot: WLocal): void {
        this.emit(...value.instructions, Instructions.local.set(slot));
    }

    constInt(value: bigint): WasmValue {
        return this.build(() => new WasmValue([Instructions.i64.const(value)]));
    }

    add(lhs: WasmValue, rhs: WasmValue): WasmValue {
        return new WasmValue([...lhs.instructions, ...rhs.instructions, Instructions.i64.add()]);
    }

    sub(lhs: WasmValue, rhs: WasmValue): WasmValue {
        return new WasmValue([...lhs.instructions, ...rhs.instructions, Instructions.i64.sub()]);
    }

    mul(lhs: WasmValue, rhs: WasmValue): WasmValue {
        return new WasmValue([...lhs.instructions, ...rhs.instructions, Instructions.i64.mul()]);
    }

    ret(value: WasmValue): void {
        const fn = this.block().fn;
        this.emit(...value.instructions, Instructions.return(fn.type[1]));
    }

    /** Every block must end in exactly one terminator, as its last instruction */
    verifyModule(module: ModuleBuilder): void {
        for (const fn of module.functions) {
            const block = this.blocks.get(fn);
            if (block === undefined) {
                throw new GenError("verification", `IR verification failed: function '${fn.name}' has no entry block`);
            }

            const instructions = fn.body.instructions;
            if (instructions.slice(0, -1).some(x => x.terminator)) {
                throw new GenError("verification",
                    `IR verification failed: terminator found in the middle of basic block '${block.name}' in function '${fn.name}'`);
            }
            const last = instructions[instructions.length - 1];
            if (last === undefined || !last.terminator) {
                throw new GenError("verification",
                    `IR verification failed: basic block '${block.name}' in function '${fn.name}' does not have a terminator`);
            }
        }
    }

    emitObject(module: ModuleBuilder, triple: string): Uint8Array {
        if (triple !== WASM_TRIPLE) {
            throw new GenError("target", `Failed to create target: unsupported triple '${triple}', expected '${WASM_TRIPLE}'`);
        }
        try {
            return module.toBytes();
        } catch (e) {
            throw new GenError("emit", `Failed to output module '${module.name}': ${errorMessage(e)}`);
        }
    }

    private block(): WasmBlock {
        if (this.current === undefined) throw new GenError("ir-build", "Builder is not positioned at a block");
        return this.current;
    }

    private emit(...instructions: WInstruction[]): void {
        const body = this.block().fn.body;
        this.build(() => body.push(...instructions));
    }

    // errors from the Wasm layer are wrapped, not reinterpreted
    private build<R>(fn: () => R): R {
        try {
            return fn();
        } catch (e) {
            if (e instanceof GenError) throw e;
            throw new GenError("ir-build", `Something during building IR failed: ${errorMessage(e)}`);
        }
    }
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
