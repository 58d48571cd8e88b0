import type { JsonValue, PrintOptions, ValueNode } from '../types.js';
import { NodeAllocator } from './node.js';

// ============ Tree to Value ============

/**
 * Convert a completed tree to plain JavaScript values.
 * Duplicate object keys keep the last member.
 */
export function toValue(node: ValueNode): JsonValue {
    if (node.state !== 'DONE') {
        throw new TypeError(`Cannot convert an unfinished ${node.kind} value`);
    }

    switch (node.kind) {
        case 'object': {
            const obj: { [key: string]: JsonValue } = {};
            for (const member of node.children) {
                // defineProperty so a "__proto__" key stays an own member
                Object.defineProperty(obj, member.key ?? '', {
                    value: toValue(member),
                    enumerable: true,
                    writable: true,
                    configurable: true,
                });
            }
            return obj;
        }
        case 'array':
            return node.children.map(toValue);
        case 'string':
            return node.textValue ?? '';
        case 'number':
            return node.numberValue;
        case 'bool':
            return node.boolValue;
        case 'null':
            return null;
        case 'untyped':
            throw new TypeError('Cannot convert an untyped node');
    }
}

// ============ Tree to Text ============

/**
 * Render a completed tree as JSON text.
 */
export function print(node: ValueNode, options: PrintOptions = {}): string {
    const indent = typeof options.indent === 'number' ? ' '.repeat(options.indent) : options.indent ?? '';
    return printNode(node, indent, '');
}

function printNode(node: ValueNode, indent: string, depth: string): string {
    switch (node.kind) {
        case 'object':
            return printContainer(node, '{', '}', indent, depth, (member, inner) => {
                const separator = indent === '' ? ':' : ': ';
                return quote(member.key ?? '') + separator + printNode(member, indent, inner);
            });
        case 'array':
            return printContainer(node, '[', ']', indent, depth, (element, inner) => printNode(element, indent, inner));
        case 'string':
            return quote(node.textValue ?? '');
        case 'number':
            return formatNumber(node.numberValue);
        case 'bool':
            return node.boolValue ? 'true' : 'false';
        case 'null':
            return 'null';
        case 'untyped':
            throw new TypeError('Cannot print an untyped node');
    }
}

function printContainer(
    node: ValueNode,
    open: string,
    close: string,
    indent: string,
    depth: string,
    printChild: (child: ValueNode, inner: string) => string,
): string {
    if (node.children.length === 0) {
        return open + close;
    }

    if (indent === '') {
        return open + node.children.map((child) => printChild(child, '')).join(',') + close;
    }

    const inner = depth + indent;
    const lines = node.children.map((child) => inner + printChild(child, inner));
    return `${open}\n${lines.join(',\n')}\n${depth}${close}`;
}

const SHORT_ESCAPES: Record<string, string> = {
    '"': '\\"',
    '\\': '\\\\',
    '\b': '\\b',
    '\f': '\\f',
    '\n': '\\n',
    '\r': '\\r',
    '\t': '\\t',
};

function quote(text: string): string {
    let out = '"';
    for (const char of text) {
        const short = SHORT_ESCAPES[char];
        if (short !== undefined) {
            out += short;
        } else if (char < ' ') {
            out += '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0');
        } else {
            out += char;
        }
    }
    return out + '"';
}

function formatNumber(value: number): string {
    return Object.is(value, -0) ? '-0' : String(value);
}

// ============ Value to Tree ============

/**
 * Build a completed tree from plain JavaScript values.
 */
export function fromValue(value: unknown, allocator: NodeAllocator = new NodeAllocator()): ValueNode {
    const node = allocator.allocate();
    if (node === null) {
        throw new RangeError('Node limit reached');
    }

    try {
        fillNode(node, value, allocator);
    } catch (err) {
        allocator.release(node);
        throw err;
    }

    node.state = 'DONE';
    return node;
}

function fillNode(node: ValueNode, value: unknown, allocator: NodeAllocator): void {
    if (value === null) {
        node.kind = 'null';
    } else if (typeof value === 'boolean') {
        node.kind = 'bool';
        node.boolValue = value;
    } else if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new TypeError(`${value} has no JSON representation`);
        }
        node.kind = 'number';
        node.numberValue = value;
    } else if (typeof value === 'string') {
        node.kind = 'string';
        node.textValue = value;
    } else if (Array.isArray(value)) {
        node.kind = 'array';
        for (const element of value) {
            node.children.push(fromValue(element, allocator));
        }
    } else if (typeof value === 'object') {
        node.kind = 'object';
        for (const [key, member] of Object.entries(value)) {
            const child = fromValue(member, allocator);
            child.key = key;
            node.children.push(child);
        }
    } else {
        throw new TypeError(`${typeof value} has no JSON representation`);
    }
}
