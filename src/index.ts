export { ByteFeeder, Bytewise, parse } from './bytewise.js';
export { feed, currentState, isValueStart, isWhitespace, type FeedInput } from './core/statemachine.js';
export { NodeAllocator, countNodes, type AllocatorOptions } from './core/node.js';
export { toValue, print, fromValue } from './core/render.js';
export { MalformedInputError } from './errors.js';
export {
    type ValueKind,
    type ParseState,
    type Signal,
    type ValueNode,
    type JsonValue,
    type FeedResult,
    type ResyncPolicy,
    type FeederOptions,
    type StreamOptions,
    type ParsedValue,
    type PrintOptions,
} from './types.js';
