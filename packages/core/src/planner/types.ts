import type { DestinationProfile, MatchCandidate, SourceDiagnostic } from '../types/index.js';
import type { ScoreBreakdown } from '../scorer/index.js';

export interface BestMatch {
    profile: DestinationProfile;
    breakdown: ScoreBreakdown;
}

/**
 * Options for planMatches.
 */
export interface PlanOptions {
    /** Leading pages searched for a document date. */
    datePages: number;
    /** Clock used when neither content nor metadata yields a date. */
    now?: () => Date;
    signal?: AbortSignal;
}

export interface PlanResult {
    /** Sorted by descending score. */
    candidates: MatchCandidate[];
    /** One per source, in source order. */
    diagnostics: SourceDiagnostic[];
}
