import type { DateRecognizer } from './recognizers.js';
import { DATE_RECOGNIZERS } from './recognizers.js';

/**
 * Find the first calendar date in free text.
 *
 * Recognizers are tried in order; within one recognizer, matches are scanned
 * left to right and the first valid date wins. A match that is not a real date
 * ("02/30/2023", "Maybe 2023") counts as no match. Never throws.
 */
export function extractDate(
    text: string,
    recognizers: readonly DateRecognizer[] = DATE_RECOGNIZERS
): Date | null {
    for (const recognizer of recognizers) {
        for (const match of text.matchAll(recognizer.pattern)) {
            const date = recognizer.toDate(match);
            if (date) return date;
        }
    }
    return null;
}
