// Schemas
export {
    DateFormatSchema,
    NamingPatternSchema,
    ConfidenceBandSchema,
    MatchCandidateSchema,
    FolderDiagnosticSchema,
    SourceDiagnosticSchema,
    ScanResultSchema,
    MoveSchema,
    MoveFailureSchema,
    MoveReportSchema,
    OrganizerConfigSchema,
} from './schemas.js';

// Types
export type {
    DateFormat,
    NamingPattern,
    ConfidenceBand,
    MatchCandidate,
    FolderDiagnostic,
    SourceDiagnostic,
    ScanResult,
    Move,
    MoveFailure,
    MoveReport,
    OrganizerConfig,
} from './schemas.js';

// Constants
export {
    SCORE_WEIGHTS,
    MAX_SCORE,
    CONFIDENCE_BANDS,
    SCAN_DEFAULTS,
    MIN_TOKEN_LENGTH,
    DATE_FORMATS,
    DEFAULT_DATE_FORMAT,
    COLLISION_SUFFIX,
} from './constants.js';
