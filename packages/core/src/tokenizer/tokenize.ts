/**
 * Text normalization into token sets.
 *
 * No stemming, no stop words: two vocabularies are compared only through
 * set overlap, so the token form must be stable across documents.
 */

import type { TokenSet } from '../types/index.js';
import { MIN_TOKEN_LENGTH } from '../types/index.js';

const FILENAME_SEPARATORS = /[._-]/g;
const NON_ALPHANUMERIC = /[^\p{L}\p{M}\p{N}]+/u;
const WHITESPACE = /\s+/;
const EDGE_PUNCTUATION = /^\p{P}+|\p{P}+$/gu;

/**
 * Tokenize a filename or folder name.
 *
 * - NFC-normalize and lowercase
 * - `.`, `_` and `-` become spaces
 * - Split on every non-alphanumeric boundary
 * - Keep tokens of at least two characters
 *
 * @example tokenizeFileName('Chase_Statement-2023.01') // {'chase', 'statement', '2023', '01'}
 */
export function tokenizeFileName(name: string): TokenSet {
    const tokens = name
        .normalize('NFC')
        .toLowerCase()
        .replace(FILENAME_SEPARATORS, ' ')
        .split(NON_ALPHANUMERIC)
        .filter(token => token.length >= MIN_TOKEN_LENGTH);
    return new Set(tokens);
}

/**
 * Tokenize extracted document text.
 *
 * Splits on whitespace only and trims punctuation from each end of a token,
 * so inner punctuation survives ("03/15/2023", "o'brien", "u.s"). Text is
 * NFC-normalized first, so decomposed and precomposed accents give the same token.
 */
export function tokenizeContent(text: string): TokenSet {
    const tokens = text
        .normalize('NFC')
        .toLowerCase()
        .split(WHITESPACE)
        .map(token => token.replace(EDGE_PUNCTUATION, ''))
        .filter(token => token.length >= MIN_TOKEN_LENGTH);
    return new Set(tokens);
}
