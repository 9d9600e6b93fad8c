import { createInterface } from 'node:readline';
import type { CommandOptions } from '../types.js';

/**
 * Prompts the user for confirmation if in a TTY.
 * If --yes is provided, returns true automatically.
 * If not a TTY and --yes is not provided, returns false.
 * The question goes to stderr so JSON on stdout stays clean.
 */
export async function promptContinue(message: string, options: Pick<CommandOptions, 'yes'>): Promise<boolean> {
    if (options.yes) return true;

    if (!process.stdin.isTTY) {
        console.error('Non-interactive mode. Use --yes to apply without confirmation.');
        return false;
    }

    const rl = createInterface({ input: process.stdin, output: process.stderr });

    return new Promise((resolve) => {
        rl.question(`${message} [y/N] `, (answer) => {
            rl.close();
            resolve(answer.trim().toLowerCase() === 'y');
        });
    });
}
