import { feed } from '../src/core/statemachine.js';
import { NodeAllocator } from '../src/core/node.js';
import { toValue } from '../src/core/render.js';
import type { JsonValue, Signal, ValueNode } from '../src/types.js';

const encoder = new TextEncoder();

/**
 * UTF-8 bytes of a string
 */
export function bytes(text: string): number[] {
    return Array.from(encoder.encode(text));
}

export interface Run {
    signals: Signal[];
    node: ValueNode | null;
    allocator: NodeAllocator;
}

/**
 * Feed text one byte at a time, stopping at the first COMPLETE or FAIL
 */
export function run(text: string, allocator: NodeAllocator = new NodeAllocator()): Run {
    let node: ValueNode | null = null;
    const signals: Signal[] = [];

    for (const byte of bytes(text)) {
        const result = feed({ node, byte, allocator });
        signals.push(result.signal);
        node = result.node;
        if (result.signal !== 'CONTINUE') break;
    }

    return { signals, node, allocator };
}

/**
 * Feed text and convert the completed tree, failing the test otherwise
 */
export function valueOf(text: string): JsonValue {
    const { signals, node } = run(text);
    if (signals[signals.length - 1] !== 'COMPLETE' || node === null) {
        throw new Error(`${JSON.stringify(text)} did not complete: ${signals.join(',')}`);
    }
    return toValue(node);
}

/**
 * Signals expected for n-1 CONTINUEs followed by a final signal
 */
export function signalsEndingWith(length: number, last: Signal): Signal[] {
    return [...Array<Signal>(length - 1).fill('CONTINUE'), last];
}

/**
 * Helper to create an async iterable from chunks
 */
export async function* toStream<T>(chunks: T[]): AsyncIterable<T> {
    for (const chunk of chunks) {
        yield chunk;
    }
}

/**
 * Every node of a tree, depth first
 */
export function walk(node: ValueNode): ValueNode[] {
    return [node, ...node.children.flatMap(walk)];
}
