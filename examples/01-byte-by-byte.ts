/**
 * Byte-by-byte Example
 *
 * Drives the state machine directly, one byte per call, the way a serial
 * line or socket reader would.
 * Run: npx tsx examples/01-byte-by-byte.ts
 */

import { type ValueNode, feed, print } from '../src/index.js';

const input = new TextEncoder().encode('{"sensor": "t1", "readings": [21.5, 21.75, 22], "ok": true}');

function main() {
    console.log('--- Byte-by-byte Example ---\n');

    let node: ValueNode | null = null;

    for (const [offset, byte] of input.entries()) {
        const result = feed({ node, byte });

        if (result.signal === 'FAIL') {
            console.log(`[Fail] at byte ${offset}`);
            return;
        }

        if (result.signal === 'COMPLETE' && result.node !== null) {
            console.log(`[Complete] after ${offset + 1} bytes`);
            console.log(print(result.node, { indent: 2 }));
            return;
        }

        node = result.node;
    }

    console.log('[Incomplete] input ended inside a value');
}

main();
