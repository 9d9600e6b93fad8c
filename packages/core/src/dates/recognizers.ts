/**
 * Date recognizers for document text, in priority order.
 *
 * Order is policy: text containing several date-like substrings resolves to
 * the first recognizer that yields a real calendar date anywhere in the text.
 */

import { utcDate } from '../utils/date-parse.js';

export interface DateRecognizer {
    name: string;
    /** Must carry the `g` flag; matches are scanned left to right. */
    pattern: RegExp;
    toDate: (match: RegExpMatchArray) => Date | null;
}

const MONTH_NAMES = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];

/**
 * Month number (1-12) for a full name, a three-letter abbreviation or "sept".
 */
export function monthFromName(word: string): number | null {
    const lower = word.toLowerCase();
    if (lower === 'sept') return 9;
    const index = MONTH_NAMES.findIndex(name => name === lower || name.slice(0, 3) === lower);
    return index === -1 ? null : index + 1;
}

export const DATE_RECOGNIZERS: readonly DateRecognizer[] = [
    {
        name: 'YYYY-MM-DD',
        pattern: /(20\d{2})[-/](0[1-9]|1[0-2])[-/](0[1-9]|[12]\d|3[01])/g,
        toDate: m => utcDate(Number(m[1]), Number(m[2]), Number(m[3])),
    },
    {
        name: 'MM-DD-YYYY',
        pattern: /(0[1-9]|1[0-2])[-/](0[1-9]|[12]\d|3[01])[-/](20\d{2})/g,
        toDate: m => utcDate(Number(m[3]), Number(m[1]), Number(m[2])),
    },
    {
        name: 'MM-YYYY',
        pattern: /(0[1-9]|1[0-2])[-/](20\d{2})/g,
        toDate: m => utcDate(Number(m[2]), Number(m[1]), 1),
    },
    {
        name: 'Month YYYY',
        pattern: /\b((?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*)\s+(20\d{2})/gi,
        toDate: m => {
            const month = monthFromName(m[1]);
            return month === null ? null : utcDate(Number(m[2]), month, 1);
        },
    },
];
