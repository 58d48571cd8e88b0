import type { ResyncPolicy } from './types.js';

/**
 * Settings of the command line driver.
 */
export interface CliConfig {
    /** Spaces per level; 0 prints one value per line, compact */
    indent: number;
    resync: ResyncPolicy;

    /** Logging topics to show */
    log: string[];
}

export const defaultConfig: CliConfig = {
    indent: 2,
    resync: 'restart',
    log: ['cli', 'parse'],
};

/**
 * Parse command line flags. Returns null when usage should be shown.
 */
export function parseArgs(argv: string[]): CliConfig | null {
    const config: CliConfig = { ...defaultConfig, log: [...defaultConfig.log] };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = argv[i + 1];

        if (arg === '--compact') {
            config.indent = 0;
        } else if (arg === '--indent' && next !== undefined && /^[0-9]+$/.test(next)) {
            config.indent = Number(next);
            i++;
        } else if (arg === '--resync' && (next === 'restart' || next === 'skip')) {
            config.resync = next;
            i++;
        } else if (arg === '--log' && next !== undefined) {
            config.log = next.split(',').filter((topic) => topic !== '');
            i++;
        } else {
            return null;
        }
    }

    return config;
}
