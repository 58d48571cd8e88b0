/**
 * Byte-at-a-time JSON State Machine
 *
 * Every node runs its own machine. A container in a value state hands each
 * byte to its open child and only looks at the byte itself when no child is
 * open.
 *
 * ┌─────────────────────────────────────────────────────────────────────────────┐
 * │                           STATE DIAGRAM                                     │
 * └─────────────────────────────────────────────────────────────────────────────┘
 *
 *                               ┌──────────┐
 *                               │   ITEM   │
 *                               └────┬─────┘
 *                                    │
 *        ┌───────────┬───────────────┼──────────────┬───────────────┐
 *        │ {         │ [             │ "            │ 0-9/-         │ t/f/n
 *        ▼           ▼               ▼              ▼               ▼
 *  ┌───────────┐ ┌───────────┐  ┌──────────┐  ┌──────────┐  ┌──────────────┐
 *  │OBJECT_KEY │ │ARRAY_VALUE│  │  STRING  │  │  NUMBER  │  │TRUE/FALSE/   │
 *  └─────┬─────┘ └─────┬─────┘  └────┬─────┘  └────┬─────┘  │NULL          │
 *        │ key done    │ child done  │ "           │ delim   └──────┬───────┘
 *        ▼             ▼             ▼             ▼ (not          │ length
 *  ┌─────────────┐ ┌──────────────┐ DONE          DONE  consumed)  ▼ reached
 *  │OBJECT_KEY_  │ │ARRAY_VALUE_  │                               DONE
 *  │PARSED       │ │PARSED        │──── , ───▶ ARRAY_VALUE
 *  └─────┬───────┘ └──────┬───────┘
 *        │ :              │ ]
 *        ▼                ▼
 *  ┌─────────────┐       DONE
 *  │OBJECT_VALUE │
 *  └─────┬───────┘
 *        │ child done
 *        ▼
 *  ┌──────────────┐
 *  │OBJECT_VALUE_ │──── , ───▶ OBJECT_KEY
 *  │PARSED        │
 *  └──────┬───────┘
 *         │ }
 *         ▼
 *        DONE
 *
 *   ┌──────────┐  \   ┌──────────┐  b f n r t " \ /  ┌──────────┐
 *   │  STRING  │────▶ │  ESCAPE  │──────────────────▶│  STRING  │
 *   └──────────┘      └──────────┘                   └──────────┘
 *
 * A number only knows it has ended when it sees the byte after it. That byte
 * also belongs to the enclosing container (separator, closer or whitespace),
 * so the container feeds it to itself again once the number completes.
 */

import type { FeedResult, ParseState, Signal, ValueNode } from '../types.js';
import { NodeAllocator } from './node.js';

// ============ Feed Function ============

export interface FeedInput {
    /** Node returned by the previous call, or null to start a new value */
    node: ValueNode | null;
    byte: number;
    /** Defaults to a private allocator for this one value */
    allocator?: NodeAllocator;
}

// Roots started without an allocator keep their own until they complete or fail
const privateAllocators = new WeakMap<ValueNode, NodeAllocator>();

/**
 * Advance the parse by exactly one byte.
 * On 'FAIL' the whole tree has been released and node is null.
 */
export function feed({ node, byte, allocator }: FeedInput): FeedResult {
    const pool = allocator ?? (node === null ? undefined : privateAllocators.get(node)) ?? new NodeAllocator();
    const root = node ?? pool.allocate();
    if (root === null) {
        return { node: null, signal: 'FAIL' };
    }

    const signal = isByte(byte) ? putByte(root, byte, pool) : 'FAIL';

    if (signal === 'FAIL') {
        pool.release(root);
        privateAllocators.delete(root);
        return { node: null, signal };
    }

    if (allocator === undefined) {
        if (signal === 'COMPLETE') {
            pool.detach(root);
            privateAllocators.delete(root);
        } else {
            privateAllocators.set(root, pool);
        }
    }

    return { node: root, signal };
}

/**
 * State of the innermost node that would receive the next byte.
 */
export function currentState(node: ValueNode | null): ParseState {
    if (node === null) return 'ITEM';

    let current = node;
    let child = activeChild(current);
    while (child !== null && isContainerState(current.state)) {
        current = child;
        child = activeChild(current);
    }
    return current.state;
}

/**
 * Walk down the open children to the node that takes the byte, then pass a
 * completion back up one container at a time. A loop rather than recursion,
 * so nesting depth is bounded by memory and not by the call stack.
 */
function putByte(root: ValueNode, byte: number, allocator: NodeAllocator): Signal {
    const path: ValueNode[] = [];
    let node = root;
    let step = route(node, byte, allocator);

    while (typeof step !== 'string') {
        path.push(node);
        node = step;
        step = route(node, byte, allocator);
    }

    let signal = step;
    let child = node;
    for (let i = path.length - 1; i >= 0 && signal === 'COMPLETE'; i--) {
        const parent = path[i];
        signal = settle(parent, child, byte);
        child = parent;
    }
    return signal;
}

/**
 * Either the child the byte belongs to, or the outcome of handling it here.
 */
function route(node: ValueNode, byte: number, allocator: NodeAllocator): ValueNode | Signal {
    switch (node.state) {
        case 'ITEM':
            return handleItem(node, byte);
        case 'OBJECT_KEY':
            return handleObjectKey(node, byte, allocator);
        case 'OBJECT_KEY_PARSED':
            return handleObjectKeyParsed(node, byte);
        case 'OBJECT_VALUE':
        case 'ARRAY_VALUE':
            return handleValue(node, byte, allocator);
        case 'OBJECT_VALUE_PARSED':
        case 'ARRAY_VALUE_PARSED':
            return handleValueParsed(node, byte);
        case 'STRING':
            return handleString(node, byte);
        case 'ESCAPE':
            return handleEscape(node, byte);
        case 'NUMBER':
            return handleNumber(node, byte);
        case 'TRUE':
            return handleKeyword(node, byte, TRUE_BYTES);
        case 'FALSE':
            return handleKeyword(node, byte, FALSE_BYTES);
        case 'NULL':
            return handleKeyword(node, byte, NULL_BYTES);
        case 'DONE':
            return 'FAIL';  // A finished value takes no more bytes
    }
}

/**
 * A container's open child has just completed on this byte.
 */
function settle(node: ValueNode, child: ValueNode, byte: number): Signal {
    if (node.state === 'OBJECT_KEY') {
        // The member parsed its own key; kind stays untyped until its value starts
        child.key = child.textValue;
        child.textValue = null;
        child.state = 'ITEM';
        node.state = 'OBJECT_KEY_PARSED';
        return 'CONTINUE';
    }

    node.state = node.state === 'ARRAY_VALUE' ? 'ARRAY_VALUE_PARSED' : 'OBJECT_VALUE_PARSED';

    // The number consumed its terminator without owning it: replay it here
    if (child.kind === 'number') {
        return handleValueParsed(node, byte);
    }

    return 'CONTINUE';
}

// ============ Byte Classes ============

const QUOTE = 0x22;         // "
const BACKSLASH = 0x5c;     // \
const COMMA = 0x2c;         // ,
const COLON = 0x3a;         // :
const OPEN_BRACE = 0x7b;    // {
const CLOSE_BRACE = 0x7d;   // }
const OPEN_BRACKET = 0x5b;  // [
const CLOSE_BRACKET = 0x5d; // ]
const MINUS = 0x2d;         // -
const PLUS = 0x2b;          // +
const DOT = 0x2e;           // .
const LOWER_T = 0x74;       // t
const LOWER_F = 0x66;       // f
const LOWER_N = 0x6e;       // n

const TRUE_BYTES = bytesOf('true');
const FALSE_BYTES = bytesOf('false');
const NULL_BYTES = bytesOf('null');

const ESCAPES: Record<number, number> = {
    0x62: 0x08, // b
    0x66: 0x0c, // f
    0x6e: 0x0a, // n
    0x72: 0x0d, // r
    0x74: 0x09, // t
    [QUOTE]: QUOTE,
    [BACKSLASH]: BACKSLASH,
    0x2f: 0x2f, // /
};

const NUMBER_PATTERN = /^-?(0|[1-9][0-9]*)(\.[0-9]+)?([eE][+-]?[0-9]+)?$/;

const decoder = new TextDecoder();

export function isWhitespace(byte: number): boolean {
    return byte <= 0x20;
}

function isDigit(byte: number): boolean {
    return byte >= 0x30 && byte <= 0x39;
}

function isNumberByte(byte: number): boolean {
    return isDigit(byte) || byte === DOT || byte === 0x65 || byte === 0x45 || byte === MINUS || byte === PLUS;
}

function isNumberDelimiter(byte: number): boolean {
    return isWhitespace(byte) || byte === COMMA || byte === CLOSE_BRACE || byte === CLOSE_BRACKET;
}

/**
 * True for every byte that can open a JSON value.
 */
export function isValueStart(byte: number): boolean {
    return byte === OPEN_BRACE
        || byte === OPEN_BRACKET
        || byte === QUOTE
        || byte === LOWER_T
        || byte === LOWER_F
        || byte === LOWER_N
        || byte === MINUS
        || isDigit(byte);
}

function isByte(byte: number): boolean {
    return Number.isInteger(byte) && byte >= 0 && byte <= 0xff;
}

function isContainerState(state: ParseState): boolean {
    return state === 'OBJECT_KEY' || state === 'OBJECT_VALUE' || state === 'ARRAY_VALUE';
}

// ============ State Handlers ============

function handleItem(node: ValueNode, byte: number): Signal {
    switch (byte) {
        case OPEN_BRACE:
            node.kind = 'object';
            node.state = 'OBJECT_KEY';
            return 'CONTINUE';
        case OPEN_BRACKET:
            node.kind = 'array';
            node.state = 'ARRAY_VALUE';
            return 'CONTINUE';
        case QUOTE:
            node.kind = 'string';
            node.state = 'STRING';
            node.scratch = [];
            return 'CONTINUE';
        case LOWER_T:
            node.kind = 'bool';
            node.state = 'TRUE';
            node.scratch = [byte];
            return 'CONTINUE';
        case LOWER_F:
            node.kind = 'bool';
            node.state = 'FALSE';
            node.scratch = [byte];
            return 'CONTINUE';
        case LOWER_N:
            node.kind = 'null';
            node.state = 'NULL';
            node.scratch = [byte];
            return 'CONTINUE';
    }

    if (byte === MINUS || isDigit(byte)) {
        node.kind = 'number';
        node.state = 'NUMBER';
        node.scratch = [byte];
        return 'CONTINUE';
    }

    return 'FAIL';
}

function handleObjectKey(node: ValueNode, byte: number, allocator: NodeAllocator): ValueNode | Signal {
    const member = activeChild(node);
    if (member !== null) {
        return member;
    }

    if (isWhitespace(byte)) {
        return 'CONTINUE';
    }

    if (byte === CLOSE_BRACE && node.children.length === 0) {
        node.state = 'DONE';
        return 'COMPLETE';
    }

    if (byte === QUOTE) {
        const child = allocator.allocate();
        if (child === null) return 'FAIL';

        child.state = 'STRING';
        child.scratch = [];
        node.children.push(child);
        return 'CONTINUE';
    }

    return 'FAIL';
}

function handleObjectKeyParsed(node: ValueNode, byte: number): Signal {
    if (isWhitespace(byte)) {
        return 'CONTINUE';
    }

    if (byte === COLON) {
        node.state = 'OBJECT_VALUE';
        return 'CONTINUE';
    }

    return 'FAIL';
}

function handleValue(node: ValueNode, byte: number, allocator: NodeAllocator): ValueNode | Signal {
    let child = activeChild(node);

    if (child === null || child.state === 'ITEM') {
        if (isWhitespace(byte)) {
            return 'CONTINUE';
        }

        if (child === null) {
            // Only an array with no elements yet may close here: [1,] stays an error
            if (byte === CLOSE_BRACKET && node.state === 'ARRAY_VALUE' && node.children.length === 0) {
                node.state = 'DONE';
                return 'COMPLETE';
            }

            child = allocator.allocate();
            if (child === null) return 'FAIL';
            node.children.push(child);
        }
    }

    return child;
}

function handleValueParsed(node: ValueNode, byte: number): Signal {
    if (isWhitespace(byte)) {
        return 'CONTINUE';
    }

    const inArray = node.state === 'ARRAY_VALUE_PARSED';

    if (byte === COMMA) {
        node.state = inArray ? 'ARRAY_VALUE' : 'OBJECT_KEY';
        return 'CONTINUE';
    }

    if ((inArray && byte === CLOSE_BRACKET) || (!inArray && byte === CLOSE_BRACE)) {
        node.state = 'DONE';
        return 'COMPLETE';
    }

    return 'FAIL';
}

function handleString(node: ValueNode, byte: number): Signal {
    if (byte === QUOTE) {
        node.textValue = takeScratch(node);
        node.state = 'DONE';
        return 'COMPLETE';
    }

    if (byte === BACKSLASH) {
        node.state = 'ESCAPE';
        return 'CONTINUE';
    }

    append(node, byte);
    return 'CONTINUE';
}

function handleEscape(node: ValueNode, byte: number): Signal {
    // \u is not supported and fails with every other unknown escape
    const escaped = ESCAPES[byte];
    if (escaped === undefined) {
        return 'FAIL';
    }

    append(node, escaped);
    node.state = 'STRING';
    return 'CONTINUE';
}

function handleNumber(node: ValueNode, byte: number): Signal {
    if (isNumberByte(byte)) {
        append(node, byte);
        return 'CONTINUE';
    }

    if (!isNumberDelimiter(byte)) {
        return 'FAIL';
    }

    const literal = takeScratch(node);
    if (!NUMBER_PATTERN.test(literal)) {
        return 'FAIL';
    }

    const value = Number(literal);
    if (!Number.isFinite(value)) {
        return 'FAIL';
    }

    node.numberValue = value;
    node.state = 'DONE';
    return 'COMPLETE';
}

function handleKeyword(node: ValueNode, byte: number, word: readonly number[]): Signal {
    const scratch = append(node, byte);
    if (scratch.length < word.length) {
        return 'CONTINUE';
    }

    for (let i = 0; i < word.length; i++) {
        if (scratch[i] !== word[i]) return 'FAIL';
    }

    node.scratch = null;
    node.boolValue = word === TRUE_BYTES;
    node.state = 'DONE';
    return 'COMPLETE';
}

// ============ Helpers ============

/**
 * The open child of a container: the last one, unless it is already done.
 */
function activeChild(node: ValueNode): ValueNode | null {
    const last = node.children[node.children.length - 1];
    if (last === undefined || last.state === 'DONE') return null;
    return last;
}

function append(node: ValueNode, byte: number): number[] {
    if (node.scratch === null) {
        node.scratch = [];
    }
    node.scratch.push(byte);
    return node.scratch;
}

function takeScratch(node: ValueNode): string {
    const text = decoder.decode(Uint8Array.from(node.scratch ?? []));
    node.scratch = null;
    return text;
}

function bytesOf(word: string): readonly number[] {
    return Array.from(word, (c) => c.charCodeAt(0));
}
