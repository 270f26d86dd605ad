import type {SourceBuffer} from "./parsing/source";

/** Half-open range of characters in the source, by offset */
export type Span = {
    readonly offset: number,
    readonly length: number,
};

export type Diagnostic = {
    file?: string,
    line: number,
    column: number,
    message: string,
};

export abstract class CompileError extends Error {
    name = "CompileError";
    /** Printed by the driver before the diagnostic */
    abstract readonly phase: string;

    constructor(message: string, readonly span?: Span) {
        super(message);
    }

    /** Render the error against the source it was raised for */
    diagnostic(source: SourceBuffer, file?: string): string {
        if (this.span === undefined) return this.message;

        const {line, column} = source.positionOf(this.span.offset);
        return formatDiagnosticWithSource({file, line, column, message: this.message},
            source.lineText(line), this.span.length);
    }
}

export function formatDiagnostic(d: Diagnostic): string {
    return `${d.file ?? "<input>"}:${d.line}:${d.column}\n${d.message}`;
}

/**
 * Diagnostic followed by the offending line and a ^^^ marker under the span. The marker is at least one
 * character wide so positions at the end of a line are still visible.
 */
export function formatDiagnosticWithSource(d: Diagnostic, lineText: string, length: number): string {
    const prefix = `L${d.line}: `;
    const marker = " ".repeat(prefix.length + d.column - 1) + "^".repeat(Math.max(1, length));
    return `${formatDiagnostic(d)}\n${prefix}${lineText}\n${marker}`;
}
