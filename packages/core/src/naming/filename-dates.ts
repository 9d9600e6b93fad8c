import type { DateFormat } from '../types/index.js';

export interface FilenameDatePattern {
    format: DateFormat;
    pattern: RegExp;
}

/**
 * Date shapes recognized inside existing filenames, in priority order.
 * Several may match one name ("2023-01-15" is also "2023-01"); each match is
 * tallied separately.
 */
export const FILENAME_DATE_PATTERNS: readonly FilenameDatePattern[] = [
    { format: 'YYYY-MM-DD', pattern: /20\d{2}-\d{2}-\d{2}/ },
    { format: 'MM-DD-YYYY', pattern: /\d{2}-\d{2}-20\d{2}/ },
    { format: 'YYYY_MM_DD', pattern: /20\d{2}_\d{2}_\d{2}/ },
    { format: 'YYYY-MM', pattern: /20\d{2}-\d{2}/ },
    { format: 'MM-YYYY', pattern: /\d{2}-20\d{2}/ },
    { format: 'YYYYMMDD', pattern: /20\d{2}\d{2}\d{2}/ },
];
