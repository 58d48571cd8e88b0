import type { FeederOptions, JsonValue, ParsedValue, ResyncPolicy, StreamOptions, ValueNode } from './types.js';
import { type AllocatorOptions, NodeAllocator } from './core/node.js';
import { currentState, feed, isValueStart, isWhitespace } from './core/statemachine.js';
import { toValue } from './core/render.js';
import { MalformedInputError, describeByte } from './errors.js';
import log from './util/logging.js';

const SPACE = 0x20;

const encoder = new TextEncoder();

/**
 * Synchronous driver: takes bytes in any grouping and hands back every
 * top-level value they complete.
 */
export class ByteFeeder {
    private readonly allocator: NodeAllocator;
    private readonly resync: ResyncPolicy;
    private readonly onError?: (error: MalformedInputError) => void;
    private node: ValueNode | null = null;
    private skipping = false;
    private count = 0;
    private errors: MalformedInputError[] = [];

    constructor(options: FeederOptions = {}) {
        this.allocator = options.allocator ?? new NodeAllocator({ maxNodes: options.maxNodes });
        this.resync = options.resync ?? 'restart';
        this.onError = options.onError;
    }

    /** Bytes fed so far */
    get offset(): number {
        return this.count;
    }

    /** Whether a value is in progress */
    get pending(): boolean {
        return this.node !== null;
    }

    get failures(): readonly MalformedInputError[] {
        return this.errors;
    }

    /**
     * Feed a byte, a chunk of bytes or text (encoded as UTF-8).
     * Returns the values completed by this input, in order. With resync
     * 'throw', values completed before the failure ride on the error.
     */
    push(input: number | string | Uint8Array): ValueNode[] {
        const completed: ValueNode[] = [];
        try {
            this.write(input, (node) => completed.push(node));
        } catch (err) {
            if (err instanceof MalformedInputError) err.completed.push(...completed);
            throw err;
        }
        return completed;
    }

    /**
     * Like push(), reporting each completed value with the offset of its last byte.
     */
    write(input: number | string | Uint8Array, onValue: (node: ValueNode, offset: number) => void): void {
        for (const byte of toBytes(input)) {
            const offset = this.count++;
            const node = this.feedByte(byte, offset);
            if (node !== null) {
                onValue(node, offset);
            }
        }
    }

    /**
     * End of input. A bare top-level number still open is closed and returned;
     * any other value still in progress is malformed.
     */
    end(): ValueNode[] {
        if (this.node === null) return [];

        const state = currentState(this.node);

        // Only whitespace can close a number, so end of input stands in for one
        if (this.node.state === 'NUMBER') {
            const { node, signal } = feed({ node: this.node, byte: SPACE, allocator: this.allocator });
            this.node = null;
            if (signal === 'COMPLETE' && node !== null) {
                this.allocator.detach(node);
                return [node];
            }
        } else {
            this.allocator.release(this.node);
            this.node = null;
        }

        this.fail(new MalformedInputError('Unexpected end of input', this.count, { byte: null, state }));
        return [];
    }

    /**
     * Drop any value in progress and forget past failures.
     */
    reset(): void {
        if (this.node !== null) {
            this.allocator.release(this.node);
            this.node = null;
        }
        this.skipping = false;
        this.errors = [];
    }

    private feedByte(byte: number, offset: number): ValueNode | null {
        if (this.node === null) {
            if (isWhitespace(byte)) return null;

            if (this.skipping) {
                if (!isValueStart(byte)) return null;
                this.skipping = false;
            }
        }

        const state = currentState(this.node);
        const { node, signal } = feed({ node: this.node, byte, allocator: this.allocator });

        switch (signal) {
            case 'CONTINUE':
                this.node = node;
                return null;
            case 'COMPLETE':
                this.node = null;
                if (node !== null) this.allocator.detach(node);
                return node;
            case 'FAIL':
                this.node = null;
                this.fail(new MalformedInputError(`Unexpected ${describeByte(byte)} in ${state}`, offset, { byte, state }));
                return null;
        }
    }

    private fail(error: MalformedInputError): void {
        this.errors.push(error);
        log('parse', error.toString());
        this.onError?.(error);

        if (this.resync === 'throw') {
            throw error;
        }
        this.skipping = this.resync === 'skip';
    }
}

/**
 * Async driver over a byte stream, yielding each top-level value as it completes.
 */
export class Bytewise implements AsyncIterable<ParsedValue> {
    private stream: AsyncIterable<Uint8Array | string>;
    private feeder: ByteFeeder;

    constructor(options: StreamOptions) {
        const { stream, ...feederOptions } = options;
        this.stream = stream;
        this.feeder = new ByteFeeder(feederOptions);
    }

    get failures(): readonly MalformedInputError[] {
        return this.feeder.failures;
    }

    async *[Symbol.asyncIterator](): AsyncIterator<ParsedValue> {
        for await (const chunk of this.stream) {
            const completed: ParsedValue[] = [];
            try {
                this.feeder.write(chunk, (node, offset) => {
                    completed.push({ value: toValue(node), node, offset });
                });
            } catch (err) {
                yield* completed;
                throw err;
            }
            yield* completed;
        }

        const offset = this.feeder.offset;
        for (const node of this.feeder.end()) {
            yield { value: toValue(node), node, offset };
        }
    }
}

/**
 * Parse one complete JSON document.
 * Whitespace may surround the value; anything else after it is malformed.
 */
export function parse(input: string | Uint8Array, options: AllocatorOptions = {}): JsonValue {
    const allocator = new NodeAllocator(options);
    const bytes = toBytes(input);
    let node: ValueNode | null = null;
    let result: ValueNode | null = null;

    // One trailing space closes a bare top-level number
    for (let offset = 0; offset <= bytes.length; offset++) {
        const byte = offset < bytes.length ? bytes[offset] : SPACE;

        if (node === null && isWhitespace(byte)) continue;

        if (result !== null) {
            allocator.release(result);
            throw new MalformedInputError(`Unexpected ${describeByte(byte)} after value`, offset, { byte });
        }

        const state = currentState(node);
        const next = feed({ node, byte, allocator });

        if (next.signal === 'FAIL') {
            throw new MalformedInputError(`Unexpected ${describeByte(byte)} in ${state}`, offset, { byte, state });
        }

        if (next.signal === 'COMPLETE') {
            result = next.node;
            node = null;

            // A number swallows its terminator, which must not be a separator here
            if (result !== null && result.kind === 'number' && !isWhitespace(byte)) {
                allocator.release(result);
                throw new MalformedInputError(`Unexpected ${describeByte(byte)} after value`, offset, { byte });
            }
        } else {
            node = next.node;
        }
    }

    if (result === null) {
        const state = currentState(node);
        if (node !== null) allocator.release(node);
        throw new MalformedInputError('Unexpected end of input', bytes.length, { byte: null, state });
    }

    return toValue(result);
}

function toBytes(input: number | string | Uint8Array): Uint8Array {
    if (typeof input === 'string') {
        return encoder.encode(input);
    }

    if (typeof input === 'number') {
        if (!Number.isInteger(input) || input < 0 || input > 0xff) {
            throw new RangeError(`${input} is not a byte`);
        }
        return Uint8Array.of(input);
    }

    return input;
}
