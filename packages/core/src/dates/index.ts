/**
 * Dates module: finding a document's date in its text, with metadata fallbacks.
 */

export { extractDate } from './extract-date.js';
export { DATE_RECOGNIZERS, monthFromName } from './recognizers.js';
export { resolveDocumentDate } from './resolve-date.js';
export type { DateRecognizer } from './recognizers.js';
export type { DateSource, ResolvedDate, DateResolveOptions } from './resolve-date.js';
