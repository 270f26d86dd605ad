import type {byte} from "./base_types";
import type {WInstruction} from "./instructions";
import {ValueType, valueTypeName} from "./wtypes";

/** A sequence of instructions with the operand stack tracked as instructions are pushed */
export class WExpression {
    private _stack: ValueType[] = [];
    private _instructions: WInstruction[] = [];
    private _unreachable = false;

    push(...items: WInstruction[]): void {
        for (const instr of items) {
            this.stackManipulation(instr);
            this._instructions.push(instr);
        }
    }

    get(index: number): WInstruction | undefined {
        if (index < 0) index += this._instructions.length;
        return this._instructions[index];
    }

    private stackManipulation(instr: WInstruction) {
        // check stack parameters
        for (let i = instr.parameters.length - 1; i >= 0; i--) {
            const top = this._stack.pop();
            if (top === undefined && this._unreachable) continue; // stack is polymorphic after a terminator
            if (instr.parameters[i] !== top) {
                const found = top === undefined ? "empty stack" : valueTypeName(top);
                throw new Error(`Stack does not match Wasm instruction (${instr.name}) parameters, found ${found} ` +
                    `for ${valueTypeName(instr.parameters[i])}\nPrevious instructions: ` +
                    this._instructions.map(x => x.name).reverse().join(", "));
            }
        }
        if (instr.terminator) {
            this._stack = [];
            this._unreachable = true;
        }
        // push result if any
        if (instr.result) this._stack.push(instr.result);
    }

    get instructions(): ReadonlyArray<WInstruction> {
        return this._instructions;
    }

    get stack(): ReadonlyArray<ValueType> {
        return this._stack;
    }

    get encoded(): byte[] {
        const encoded = this._instructions.flatMap(x => x.encoded);
        encoded.push(0x0B as byte);
        return encoded;
    }
}
