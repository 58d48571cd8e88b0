import type { NodeAllocator } from './core/node.js';
import type { MalformedInputError } from './errors.js';

/**
 * Type of the JSON value held by a node.
 * 'untyped' only until the first byte of the value has been seen.
 */
export type ValueKind =
    | 'object'
    | 'array'
    | 'string'
    | 'number'
    | 'bool'
    | 'null'
    | 'untyped';

/**
 * State of a single node's own state machine.
 */
export type ParseState =
    | 'ITEM'                // Value type not yet known
    | 'OBJECT_KEY'          // Expecting "key" or }
    | 'OBJECT_KEY_PARSED'   // Expecting :
    | 'OBJECT_VALUE'        // Expecting member value
    | 'OBJECT_VALUE_PARSED' // Expecting , or }
    | 'ARRAY_VALUE'         // Expecting element (or ] if empty)
    | 'ARRAY_VALUE_PARSED'  // Expecting , or ]
    | 'STRING'              // Inside a string literal
    | 'ESCAPE'              // After a backslash
    | 'NUMBER'              // Accumulating a numeric literal
    | 'TRUE'                // Accumulating "true"
    | 'FALSE'               // Accumulating "false"
    | 'NULL'                // Accumulating "null"
    | 'DONE';               // Value complete

/**
 * Result of feeding one byte.
 */
export type Signal =
    | 'CONTINUE'    // Pass the node back with the next byte
    | 'COMPLETE'    // Top-level value finished, caller owns the node
    | 'FAIL';       // Malformed input, the tree has been released

/**
 * One JSON value, doubling as the parse state while it is being built.
 */
export interface ValueNode {
    kind: ValueKind;

    /** Member name, only set when the node is an object member */
    key: string | null;

    textValue: string | null;
    numberValue: number;
    boolValue: boolean;

    /** Object members or array elements, in document order */
    children: ValueNode[];

    state: ParseState;

    /** Bytes of the string, number or keyword being accumulated */
    scratch: number[] | null;
}

/**
 * Plain JavaScript form of a completed tree.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

export interface FeedResult {
    node: ValueNode | null;
    signal: Signal;
}

/**
 * What the feeder does after a malformed value.
 * - restart: start a new value on the next non-whitespace byte
 * - skip: drop bytes until one that can start a value
 * - throw: throw the MalformedInputError from push()
 */
export type ResyncPolicy = 'restart' | 'skip' | 'throw';

/**
 * Options for ByteFeeder and Bytewise.
 */
export interface FeederOptions {
    /** Resynchronization after a malformed value (default: 'restart') */
    resync?: ResyncPolicy;

    /** Maximum number of nodes in one value (default: unlimited) */
    maxNodes?: number;

    /** Allocator to use instead of a fresh one built from maxNodes */
    allocator?: NodeAllocator;

    /** Called for every malformed value */
    onError?: (error: MalformedInputError) => void;
}

/**
 * Options for creating a Bytewise stream parser.
 */
export interface StreamOptions extends FeederOptions {
    /** The source stream yielding byte chunks or text */
    stream: AsyncIterable<Uint8Array | string>;
}

/**
 * A completed top-level value yielded by Bytewise.
 */
export interface ParsedValue {
    value: JsonValue;
    node: ValueNode;

    /** Offset of the byte that completed the value; the input length for a number closed by end of input */
    offset: number;
}

export interface PrintOptions {
    /** Spaces or indent string; 0 or omitted prints compact output */
    indent?: number | string;
}
