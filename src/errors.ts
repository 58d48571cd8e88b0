/**
 * Malformed input reported with the byte offset where the grammar broke.
 */

import type { ParseState, ValueNode } from './types.js';

type ConstructorOptions = { byte?: number | null; state?: ParseState | null; cause?: unknown };

export class MalformedInputError extends Error {
    override readonly name = 'MalformedInputError';
    readonly byteOffset: number;

    /** Offending byte, null at end of input */
    readonly byte: number | null;

    /** State of the innermost open node when the byte arrived */
    readonly state: ParseState | null;

    /** Values the failing push had already completed, in order */
    readonly completed: ValueNode[] = [];

    constructor(message: string, byteOffset: number, options?: ConstructorOptions) {
        super(message);
        this.byteOffset = byteOffset;
        this.byte = options?.byte ?? null;
        this.state = options?.state ?? null;
        if (options?.cause !== undefined) this.cause = options.cause;
        Object.setPrototypeOf(this, MalformedInputError.prototype);
    }

    get location(): string {
        return `byte offset ${this.byteOffset}`;
    }

    override toString(): string {
        return `${this.message} (${this.location})`;
    }
}

/** Printable form of a byte for error messages */
export function describeByte(byte: number | null): string {
    if (byte === null) return 'end of input';
    if (byte > 0x20 && byte < 0x7f) return `'${String.fromCharCode(byte)}'`;
    return `0x${byte.toString(16).padStart(2, '0')}`;
}
