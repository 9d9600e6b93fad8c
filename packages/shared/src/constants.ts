/**
 * Constants for Statement Sorter.
 */

/**
 * Additive score terms. Content similarity contributes up to 1.0 on top of
 * these, so the nominal score range is [0, 1.3].
 */
export const SCORE_WEIGHTS = {
    EXTENSION_BONUS: 0.2,
    ANCHOR_BONUS: 0.1,
} as const;

/**
 * Upper bound of the nominal score scale (jaccard + both bonuses).
 */
export const MAX_SCORE = 1.3;

/**
 * Lower bounds for each display band.
 */
export const CONFIDENCE_BANDS = {
    HIGH: 0.6,
    MEDIUM: 0.35,
    LOW: 0.15,
} as const;

/**
 * Scan defaults, overridable via stmtsort.yaml or CLI flags.
 */
export const SCAN_DEFAULTS = {
    THRESHOLD: 0.35,
    EXTENSIONS: ['pdf'],
    MAX_PAGES: 3,
    DATE_PAGES: 1,
    RECURSIVE_SOURCE: true,
} as const;

/**
 * Minimum token length kept by both tokenizer variants.
 */
export const MIN_TOKEN_LENGTH = 2;

/**
 * Date formats a naming pattern can carry, in inference priority order.
 */
export const DATE_FORMATS = [
    'YYYY-MM-DD',
    'MM-DD-YYYY',
    'YYYY_MM_DD',
    'YYYY-MM',
    'MM-YYYY',
    'YYYYMMDD',
] as const;

/**
 * Format used when a folder has no date-bearing filenames.
 */
export const DEFAULT_DATE_FORMAT = 'YYYY-MM';

/**
 * Collision disambiguator: `_01`, `_02`, ...
 */
export const COLLISION_SUFFIX = {
    START: 1,
    PAD: 2,
    SEPARATOR: '_',
} as const;
