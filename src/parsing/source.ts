const WHITESPACE = /^\s$/u;

export type Position = {
    readonly line: number,
    readonly column: number,
};

/**
 * Program text as a sequence of characters (code points) with a cursor used by the lexer.
 * Offsets used everywhere else in the compiler index into this sequence.
 */
export class SourceBuffer {
    private readonly chars: ReadonlyArray<string>;
    // offset of the first character of each line, lineStarts[0] is always 0
    private readonly lineStarts: number[] = [0];
    private _offset = 0;

    constructor(readonly text: string) {
        this.chars = Array.from(text);
        this.chars.forEach((c, i) => {
            if (c === "\n") this.lineStarts.push(i + 1);
        });
    }

    get offset(): number {
        return this._offset;
    }

    get length(): number {
        return this.chars.length;
    }

    peek(): string | undefined {
        return this._offset < this.chars.length ? this.chars[this._offset] : undefined;
    }

    advance(): string | undefined {
        const c = this.peek();
        if (c !== undefined) this._offset++;
        return c;
    }

    finished(): boolean {
        return this._offset >= this.chars.length;
    }

    skipWhitespace(): void {
        for (let c = this.peek(); c !== undefined && WHITESPACE.test(c); c = this.peek()) {
            this.advance();
        }
    }

    /** Characters in [start, end) */
    slice(start: number, end: number): string {
        return this.chars.slice(start, end).join("");
    }

    /** 1-based line and column of an offset, offsets past the end map to the end of the text */
    positionOf(offset: number): Position {
        offset = Math.max(0, Math.min(offset, this.chars.length));

        // last line starting at or before offset
        let low = 0, high = this.lineStarts.length - 1;
        while (low < high) {
            const mid = Math.ceil((low + high) / 2);
            if (this.lineStarts[mid] <= offset) {
                low = mid;
            } else {
                high = mid - 1;
            }
        }
        return {line: low + 1, column: offset - this.lineStarts[low] + 1};
    }

    /** Text of a 1-based line without its newline, or "" if there is no such line */
    lineText(line: number): string {
        if (!Number.isInteger(line) || line < 1 || line > this.lineStarts.length) return "";

        const start = this.lineStarts[line - 1];
        const end = line < this.lineStarts.length ? this.lineStarts[line] - 1 : this.chars.length;
        return this.slice(start, end);
    }
}
