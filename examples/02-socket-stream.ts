/**
 * Socket Stream Example
 *
 * Several values arrive over one connection, split at arbitrary points, with
 * a corrupted record in between. The parser yields each value as soon as its
 * last byte is in and skips past the broken one.
 * Run: npx tsx examples/02-socket-stream.ts
 */

import { Bytewise } from '../src/index.js';

// Mock a socket (simulates packets arriving with network delay)
async function* mockSocket(): AsyncIterable<Uint8Array> {
    const packets = [
        '{"id": 1, "temp": 2',
        '0.5}\n{"id": 2, "te',
        'mp": oops}\n{"id"',
        ': 3, "temp": 19.25}\n',
    ];
    const encoder = new TextEncoder();

    for (const packet of packets) {
        await new Promise(resolve => setTimeout(resolve, 200));
        console.log(`[Socket] Received ${packet.length} bytes`);
        yield encoder.encode(packet);
    }
}

async function main() {
    console.log('--- Socket Stream Example ---\n');

    const parser = new Bytewise({
        stream: mockSocket(),
        resync: 'skip',
        onError: (error) => console.log(`[Malformed] ${error.toString()}`),
    });

    for await (const { value, offset } of parser) {
        console.log(`[Value @${offset}] ${JSON.stringify(value)}`);
    }

    console.log(`\n--- Done, ${parser.failures.length} malformed ---`);
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
