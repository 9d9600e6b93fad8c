import type { NamingPattern } from '../types/index.js';
import { COLLISION_SUFFIX } from '../types/index.js';
import { formatDate } from './format-date.js';

/**
 * Answers whether a filename is already taken in the destination folder.
 */
export type ExistsCheck = (fileName: string) => boolean;

function buildName(pattern: NamingPattern, datePart: string, extension: string): string {
    const ext = extension ? `.${extension}` : '';
    return `${pattern.prefix}${datePart}${pattern.suffix}${ext}`;
}

/**
 * Build `prefix + date + suffix + "." + extension`. When that name is taken,
 * the date part gets a disambiguator (`2023-04_01`, `2023-04_02`, ...) until a
 * free name is found.
 *
 * Decides a name only; creating or moving the file is the caller's job.
 */
export function generateFilename(
    pattern: NamingPattern,
    date: Date,
    extension: string,
    exists: ExistsCheck
): string {
    const formatted = formatDate(date, pattern.dateFormat);
    let name = buildName(pattern, formatted, extension);
    let counter: number = COLLISION_SUFFIX.START;

    while (exists(name)) {
        const disambiguator = String(counter).padStart(COLLISION_SUFFIX.PAD, '0');
        name = buildName(pattern, `${formatted}${COLLISION_SUFFIX.SEPARATOR}${disambiguator}`, extension);
        counter += 1;
    }

    return name;
}
