#!/usr/bin/env tsx
/**
 * Statement Sorter CLI
 *
 * The CLI owns all I/O: it supplies the filesystem and text-extraction ports
 * to the headless core and prints what the core returns as data.
 */

import { parseArgs, UsageError, USAGE } from './args.js';
import { scanCommand } from './commands/scan.js';
import { applyCommand } from './commands/apply.js';
import { errorMessage } from './utils/errors.js';
import type { ParsedCommand } from './types.js';

async function main(): Promise<number> {
    const argv = process.argv.slice(2);

    if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
        console.log('Statement Sorter CLI');
        console.log('');
        console.log(USAGE);
        return 0;
    }

    let parsed: ParsedCommand;
    try {
        parsed = parseArgs(argv);
    } catch (err) {
        if (err instanceof UsageError) {
            console.error(`✖ ${err.message}\n`);
            console.error(USAGE);
            return 2;
        }
        throw err;
    }

    return parsed.command === 'scan' ? scanCommand(parsed) : applyCommand(parsed);
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (err: unknown) => {
        console.error('Unexpected error:', errorMessage(err));
        process.exit(1);
    }
);
