/**
 * Naming module: folder naming conventions and collision-safe filenames.
 */

export { inferNamingPattern, defaultNamingPattern } from './infer-pattern.js';
export { generateFilename } from './generate-filename.js';
export { formatDate } from './format-date.js';
export { FILENAME_DATE_PATTERNS } from './filename-dates.js';
export { Tally } from './tally.js';
export type { ExistsCheck } from './generate-filename.js';
export type { FilenameDatePattern } from './filename-dates.js';
