/**
 * Zod schemas for Statement Sorter data structures.
 *
 * Records here cross package boundaries (core → CLI → JSON output), so token
 * sets are not part of them: they live only in core's in-memory types.
 */

import { z } from 'zod';
import { DATE_FORMATS, MAX_SCORE, SCAN_DEFAULTS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Score on the additive scale: jaccard [0,1] plus bonuses.
 */
const score = z.number().min(0);

/**
 * File extension: lowercased, without the leading dot.
 */
const extension = z
    .string()
    .min(1)
    .transform(value => value.replace(/^\./, '').toLowerCase());

// ============================================================================
// Naming Schemas
// ============================================================================

export const DateFormatSchema = z.enum(DATE_FORMATS);

export type DateFormat = z.infer<typeof DateFormatSchema>;

/**
 * `prefix + date + suffix` template inferred from a folder's filenames.
 * Prefix and suffix may be empty; the date format never is.
 */
export const NamingPatternSchema = z.object({
    prefix: z.string(),
    dateFormat: DateFormatSchema,
    suffix: z.string(),
});

export type NamingPattern = z.infer<typeof NamingPatternSchema>;

// ============================================================================
// Match Schemas
// ============================================================================

export const ConfidenceBandSchema = z.enum(['high', 'medium', 'low', 'very_low']);

export type ConfidenceBand = z.infer<typeof ConfidenceBandSchema>;

/**
 * One proposal. A null destination means no folder cleared the threshold;
 * the best score found is still carried for display and sorting.
 */
export const MatchCandidateSchema = z
    .object({
        sourcePath: z.string().min(1),
        fileName: z.string().min(1),
        destinationPath: z.string().min(1).nullable(),
        score,
        proposedName: z.string().min(1).nullable(),
        band: ConfidenceBandSchema,
    })
    .refine(c => (c.destinationPath === null) === (c.proposedName === null), {
        message: 'proposedName must be present exactly when destinationPath is',
    });

export type MatchCandidate = z.infer<typeof MatchCandidateSchema>;

/**
 * Per-folder profile summary for operator troubleshooting.
 */
export const FolderDiagnosticSchema = z.object({
    folderPath: z.string(),
    tokenCount: z.number().int().min(0),
    extensions: z.array(z.string()),
    documentCount: z.number().int().min(1),
});

export type FolderDiagnostic = z.infer<typeof FolderDiagnosticSchema>;

/**
 * Per-source best-match summary, recorded whether or not the threshold is met.
 */
export const SourceDiagnosticSchema = z.object({
    sourcePath: z.string(),
    bestDestination: z.string().nullable(),
    score,
    jaccard: z.number().min(0).max(1),
    extensionBonus: z.number().min(0),
    anchorBonus: z.number().min(0),
});

export type SourceDiagnostic = z.infer<typeof SourceDiagnosticSchema>;

/**
 * Immutable result of one scan.
 */
export const ScanResultSchema = z.object({
    sourceDir: z.string(),
    destinationRoot: z.string(),
    threshold: score,
    profileCount: z.number().int().min(0),
    candidates: z.array(MatchCandidateSchema),
    diagnostics: z.object({
        folders: z.array(FolderDiagnosticSchema),
        sources: z.array(SourceDiagnosticSchema),
    }),
});

export type ScanResult = z.infer<typeof ScanResultSchema>;

// ============================================================================
// Move Schemas
// ============================================================================

export const MoveSchema = z.object({
    from: z.string(),
    to: z.string(),
});

export type Move = z.infer<typeof MoveSchema>;

export const MoveFailureSchema = z.object({
    path: z.string(),
    message: z.string(),
});

export type MoveFailure = z.infer<typeof MoveFailureSchema>;

/**
 * Partial-failure report of the apply phase.
 */
export const MoveReportSchema = z.object({
    moved: z.array(MoveSchema),
    failures: z.array(MoveFailureSchema),
    skipped: z.number().int().min(0),
});

export type MoveReport = z.infer<typeof MoveReportSchema>;

// ============================================================================
// Configuration Schema
// ============================================================================

/**
 * Contents of stmtsort.yaml. Every field is optional; defaults fill the rest.
 */
export const OrganizerConfigSchema = z.object({
    threshold: z.number().min(0).max(MAX_SCORE).default(SCAN_DEFAULTS.THRESHOLD),
    extensions: z.array(extension).min(1).default([...SCAN_DEFAULTS.EXTENSIONS]),
    maxPages: z.number().int().min(1).default(SCAN_DEFAULTS.MAX_PAGES),
    datePages: z.number().int().min(1).default(SCAN_DEFAULTS.DATE_PAGES),
    recursiveSource: z.boolean().default(SCAN_DEFAULTS.RECURSIVE_SOURCE),
});

export type OrganizerConfig = z.infer<typeof OrganizerConfigSchema>;
