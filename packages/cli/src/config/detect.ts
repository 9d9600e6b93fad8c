import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILE_NAME = 'stmtsort.yaml';

/**
 * Searches for stmtsort.yaml, starting at startPath and bubbling up to the
 * filesystem root.
 */
export function findConfigFile(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, CONFIG_FILE_NAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}
