#!/usr/bin/env node
/**
 * Reads JSON values from stdin byte by byte and prints each one as it completes.
 * Run: npx tsx src/cli.ts --indent 4 < values.json
 */

import { Bytewise } from './bytewise.js';
import { parseArgs } from './config.js';
import { print } from './core/render.js';
import log, { setFilter, topics } from './util/logging.js';

const USAGE = `Usage:
	bytewise-json [--indent N | --compact] [--resync restart|skip] [--log topic,topic]
`;

async function main(): Promise<number> {
    const config = parseArgs(process.argv.slice(2));
    if (config === null) {
        console.warn(USAGE);
        return 2;
    }

    setFilter(topics(config.log));

    const parser = new Bytewise({ stream: process.stdin, resync: config.resync });
    let values = 0;

    for await (const { node } of parser) {
        process.stdout.write(print(node, { indent: config.indent }) + '\n');
        values++;
    }

    log('cli', `${values} value(s), ${parser.failures.length} malformed`);
    return parser.failures.length === 0 ? 0 : 1;
}

main().then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
        log('cli', err);
        process.exitCode = 1;
    },
);
