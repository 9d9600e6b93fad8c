import type { DestinationProfile, FolderDiagnostic } from '../types/index.js';

/**
 * Options shared by destination profiling and source scanning.
 */
export interface ScanOptions {
    /** Tracked extensions, lowercased without dots. */
    extensions: readonly string[];
    /** Leading pages read for tokens. */
    maxPages: number;
    signal?: AbortSignal;
}

export interface SourceScanOptions extends ScanOptions {
    recursive: boolean;
}

/**
 * Profiles plus diagnostics, returned as data (core does not log).
 */
export interface ProfileResult {
    profiles: DestinationProfile[];
    diagnostics: FolderDiagnostic[];
    warnings: string[];
}
