export { utcDate, isValidDate } from './date-parse.js';
export { firstAvailable } from './fallback.js';
export type { FallbackProvider, FallbackResult } from './fallback.js';
export { splitFileName, isHiddenName } from './file-name.js';
export type { FileNameParts } from './file-name.js';
