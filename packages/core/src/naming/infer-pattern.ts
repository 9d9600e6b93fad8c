/**
 * Naming-pattern inference from a folder's existing filenames.
 *
 * Frequency-based: the dominant `prefix + date + suffix` shape among the
 * folder's documents becomes the template for new arrivals.
 */

import type { NamingPattern } from '../types/index.js';
import { DEFAULT_DATE_FORMAT } from '../types/index.js';
import { isHiddenName, splitFileName } from '../utils/file-name.js';
import { FILENAME_DATE_PATTERNS } from './filename-dates.js';
import { Tally } from './tally.js';

/**
 * Pattern used when a folder has no date-bearing filenames: `<folder>_YYYY-MM`.
 */
export function defaultNamingPattern(folderName: string): NamingPattern {
    return { prefix: `${folderName}_`, dateFormat: DEFAULT_DATE_FORMAT, suffix: '' };
}

/**
 * Infer the naming pattern of a folder.
 *
 * Only non-hidden names with the given extension are examined, extension
 * stripped, in lexicographic order. Every date shape found in a name is
 * tallied as a `(prefix, format, suffix)` triple; the most frequent triple
 * wins and ties go to the one seen first.
 *
 * @param folderName - Used only for the fallback pattern
 * @param entryNames - Current entries of the folder
 * @param extension - Lowercased extension of the incoming document
 */
export function inferNamingPattern(
    folderName: string,
    entryNames: readonly string[],
    extension: string
): NamingPattern {
    const baseNames = entryNames
        .filter(name => !isHiddenName(name))
        .map(name => splitFileName(name))
        .filter(parts => parts.extension === extension)
        .map(parts => parts.baseName)
        .sort();

    const tally = new Tally<NamingPattern>();

    for (const name of baseNames) {
        for (const { format, pattern } of FILENAME_DATE_PATTERNS) {
            const match = pattern.exec(name);
            if (!match) continue;

            const prefix = name.slice(0, match.index);
            const suffix = name.slice(match.index + match[0].length);
            tally.add(JSON.stringify([prefix, format, suffix]), { prefix, dateFormat: format, suffix });
        }
    }

    return tally.mostFrequent() ?? defaultNamingPattern(folderName);
}
