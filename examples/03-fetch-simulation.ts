/**
 * Fetch API Simulation Example
 *
 * Shows how to feed a fetch() response body to the parser. The body here is
 * a newline-separated log of events, handled one value at a time.
 *
 * Run: npx tsx examples/03-fetch-simulation.ts
 */

import { Bytewise, type JsonValue } from '../src/index.js';

async function main() {
    console.log('--- Fetch API Simulation ---\n');
    console.log('// In real code:\n// const response = await fetch("/api/events");');
    console.log('// const parser = new Bytewise({ stream: streamToIterable(response.body!) });\n');

    // Simulate fetch response
    const mockResponse = { body: createMockReadableStream() };

    const parser = new Bytewise({
        stream: streamToIterable(mockResponse.body)
    });

    console.log('[Streaming response]\n');

    const events: JsonValue[] = [];
    for await (const { value } of parser) {
        console.log(`  event: ${JSON.stringify(value)}`);
        events.push(value);
    }

    console.log('\n[Stream complete]');
    console.log(`Events received: ${events.length}`);
}

// --- Helper: Convert ReadableStream to AsyncIterable (commonly needed pattern) ---

async function* streamToIterable(stream: ReadableStream<Uint8Array>): AsyncIterable<Uint8Array> {
    const reader = stream.getReader();

    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            yield value;
        }
    } finally {
        reader.releaseLock();
    }
}

// --- Mock Stream (simulates a ReadableStream response from fetch()) ---

function createMockReadableStream(): ReadableStream<Uint8Array> {
    const chunks = [
        '{"type": "login", "user": "ada"}\n{"type": "vi',
        'ew", "page": "/docs", "ms": 42}\n',
        '{"type": "logout", "user": "ada", "tags": []}\n',
    ];

    let index = 0;
    const encoder = new TextEncoder();

    return new ReadableStream({
        async pull(controller) {
            if (index < chunks.length) {
                await new Promise(resolve => setTimeout(resolve, 300));
                controller.enqueue(encoder.encode(chunks[index]));
                index++;
            } else {
                controller.close();
            }
        }
    });
}

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
