// Types (boundary records re-exported from shared)
export type {
    DateFormat,
    NamingPattern,
    ConfidenceBand,
    MatchCandidate,
    FolderDiagnostic,
    SourceDiagnostic,
    ScanResult,
    OrganizerConfig,
    TokenSet,
    SourceDocument,
    DestinationProfile,
    DocumentEntry,
    FileTimestamps,
    FileSystemPort,
    TextExtractor,
    EnginePorts,
} from './types/index.js';

// Utils
export { splitFileName, isHiddenName, firstAvailable } from './utils/index.js';
export type { FallbackProvider, FallbackResult } from './utils/index.js';

// Tokenizer
export { tokenizeFileName, tokenizeContent } from './tokenizer/index.js';

// Scorer
export { jaccardSimilarity, scoreBreakdown, scoreMatch, confidenceBand } from './scorer/index.js';
export type { ScoreBreakdown } from './scorer/index.js';

// Dates
export { extractDate, resolveDocumentDate, DATE_RECOGNIZERS } from './dates/index.js';
export type { DateRecognizer, DateSource, ResolvedDate } from './dates/index.js';

// Naming
export { inferNamingPattern, defaultNamingPattern, generateFilename, formatDate } from './naming/index.js';
export type { ExistsCheck } from './naming/index.js';

// Profiler
export { buildDestinationProfiles, scanSourceDocuments } from './profiler/index.js';
export type { ScanOptions, SourceScanOptions, ProfileResult, SourceScanResult } from './profiler/index.js';

// Planner
export { planMatches, selectBestMatch, proposeName, NameReservations } from './planner/index.js';
export type { PlanOptions, PlanResult, BestMatch } from './planner/index.js';
