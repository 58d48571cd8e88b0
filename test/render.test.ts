import { describe, it, expect } from 'vitest';
import { fromValue, print, toValue } from '../src/core/render.js';
import { NodeAllocator, createNode } from '../src/core/node.js';
import { parse } from '../src/bytewise.js';
import { run } from './helpers.js';

describe('Render', () => {
    describe('toValue', () => {
        it('converts a parsed tree', () => {
            const { node } = run('{"a":[1,"x",true,null],"b":{}}');

            expect(node === null ? undefined : toValue(node)).toEqual({ a: [1, 'x', true, null], b: {} });
        });

        it('keeps the last of duplicate keys', () => {
            expect(parse('{"a":1,"a":2}')).toEqual({ a: 2 });
        });

        it('keeps __proto__ as an own member', () => {
            const value = parse('{"__proto__":1}');

            expect(Object.keys(value ?? {})).toEqual(['__proto__']);
            expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
        });

        it('refuses an unfinished tree', () => {
            const { node } = run('[1,');

            expect(() => node && toValue(node)).toThrow(TypeError);
        });

        it('refuses an untyped node', () => {
            const node = createNode();
            node.state = 'DONE';

            expect(() => toValue(node)).toThrow('Cannot convert an untyped node');
        });
    });

    describe('print', () => {
        it('prints compact text by default', () => {
            const { node } = run('{ "a" : 1, "b" : [ true, false, null ] }');

            expect(node && print(node)).toBe('{"a":1,"b":[true,false,null]}');
        });

        it('indents like JSON.stringify', () => {
            const value = { a: [1, {}], b: 'x', c: { d: [] } };

            expect(print(fromValue(value), { indent: 2 })).toBe(JSON.stringify(value, null, 2));
            expect(print(fromValue(value), { indent: '\t' })).toBe(JSON.stringify(value, null, '\t'));
        });

        it('prints scalars', () => {
            expect(print(fromValue('hi'))).toBe('"hi"');
            expect(print(fromValue(2.5))).toBe('2.5');
            expect(print(fromValue(false))).toBe('false');
            expect(print(fromValue(null))).toBe('null');
        });

        it('keeps the sign of negative zero', () => {
            expect(print(fromValue(-0))).toBe('-0');
        });

        it('escapes strings', () => {
            expect(print(fromValue('a"b\\c\n\t'))).toBe('"a\\"b\\\\c\\n\\t"');
            expect(print(fromValue('\u0001'))).toBe('"\\u0001"');
            expect(print(fromValue('ü€'))).toBe('"ü€"');
        });

        it('prints keys with escapes', () => {
            expect(print(fromValue({ 'a"b': 1 }))).toBe('{"a\\"b":1}');
        });
    });

    describe('fromValue', () => {
        it('builds a completed tree', () => {
            const node = fromValue({ a: [1, 'x'] });

            expect(node.state).toBe('DONE');
            expect(node.kind).toBe('object');
            expect(node.children[0]?.key).toBe('a');
            expect(node.children[0]?.children.map((child) => child.kind)).toEqual(['number', 'string']);
        });

        it('rejects values JSON cannot hold', () => {
            expect(() => fromValue(NaN)).toThrow(TypeError);
            expect(() => fromValue(Infinity)).toThrow(TypeError);
            expect(() => fromValue(undefined)).toThrow(TypeError);
        });

        it('releases a partial tree when it throws', () => {
            const allocator = new NodeAllocator();

            expect(() => fromValue({ a: [1, () => 1] }, allocator)).toThrow(TypeError);
            expect(allocator.live).toBe(0);
        });

        it('throws when the node limit is reached', () => {
            const allocator = new NodeAllocator({ maxNodes: 2 });

            expect(() => fromValue([1, 2], allocator)).toThrow(RangeError);
            expect(allocator.live).toBe(0);
        });
    });

    describe('round trip', () => {
        const values = [
            { a: 1, b: [true, false, null] },
            [[], {}, [[{ deep: 'er' }]]],
            { text: 'quote " slash \\ solidus / tab \t line \n', unicode: 'héllo €' },
            [0, -0, 1.5e-7, -42, 1e21, 123456789.125],
            'plain',
            17,
            null,
        ];

        it.each(values.map((value) => ({ value })))('reproduces $value through printed text', ({ value }) => {
            expect(parse(print(fromValue(value)))).toEqual(value);
            expect(parse(print(fromValue(value), { indent: 3 }))).toEqual(value);
        });
    });
});
