/**
 * Boundary records come from the shared package; in-memory engine types and
 * ports are defined here.
 */
export type {
    DateFormat,
    NamingPattern,
    ConfidenceBand,
    MatchCandidate,
    FolderDiagnostic,
    SourceDiagnostic,
    ScanResult,
    OrganizerConfig,
} from '@statement-sorter/shared';

export {
    SCORE_WEIGHTS,
    CONFIDENCE_BANDS,
    MIN_TOKEN_LENGTH,
    DEFAULT_DATE_FORMAT,
    COLLISION_SUFFIX,
} from '@statement-sorter/shared';

export type { TokenSet, SourceDocument, DestinationProfile } from './documents.js';
export type {
    DocumentEntry,
    FileTimestamps,
    FileSystemPort,
    TextExtractor,
    EnginePorts,
} from './ports.js';
