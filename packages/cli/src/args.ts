import type { CommandName, CommandOptions, ParsedCommand } from './types.js';

export const USAGE = [
    'Usage:',
    '  stmtsort scan  <source> <destination-root> [--threshold N] [--json] [--verbose] [--config FILE]',
    '  stmtsort apply <source> <destination-root> [--threshold N] [--json] [--verbose] [--config FILE] [--dry-run] [--yes]',
    '',
    'Options:',
    '  --threshold N   Minimum score for a match (0 to 1.3)',
    '  --json          Print the result as JSON',
    '  --verbose, -v   Print per-folder and per-source diagnostics',
    '  --config FILE   Read settings from FILE instead of the nearest stmtsort.yaml',
    '  --dry-run       Show the moves apply would make without moving anything',
    '  --yes, -y       Apply without asking for confirmation',
].join('\n');

/**
 * Invalid command line. The message is shown above the usage text.
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function isCommand(value: string | undefined): value is CommandName {
    return value === 'scan' || value === 'apply';
}

function requireValue(flag: string, value: string | undefined): string {
    if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${flag} requires a value`);
    }
    return value;
}

function parseThreshold(raw: string): number {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new UsageError(`--threshold must be a number, got "${raw}"`);
    }
    return value;
}

/**
 * Parse `process.argv.slice(2)`.
 */
export function parseArgs(argv: readonly string[]): ParsedCommand {
    const [command, ...rest] = argv;
    if (!isCommand(command)) {
        throw new UsageError(command === undefined ? 'Missing command' : `Unknown command: ${command}`);
    }

    const options: CommandOptions = { json: false, verbose: false, dryRun: false, yes: false };
    const positionals: string[] = [];

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        switch (arg) {
            case '--json':
                options.json = true;
                break;
            case '--verbose':
            case '-v':
                options.verbose = true;
                break;
            case '--dry-run':
                options.dryRun = true;
                break;
            case '--yes':
            case '-y':
                options.yes = true;
                break;
            case '--threshold':
                options.threshold = parseThreshold(requireValue(arg, rest[++i]));
                break;
            case '--config':
                options.config = requireValue(arg, rest[++i]);
                break;
            default:
                if (arg.startsWith('-')) {
                    throw new UsageError(`Unknown option: ${arg}`);
                }
                positionals.push(arg);
        }
    }

    if (command === 'scan' && (options.dryRun || options.yes)) {
        throw new UsageError('--dry-run and --yes only apply to the apply command');
    }

    if (positionals.length !== 2) {
        throw new UsageError('Expected <source> and <destination-root>');
    }

    const [source, destination] = positionals;
    return { command, source, destination, options };
}
