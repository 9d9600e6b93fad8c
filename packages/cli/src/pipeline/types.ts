import type { FolderDiagnostic, MoveReport, OrganizerConfig, ScanResult } from '@statement-sorter/shared';
import type { DestinationProfile, EnginePorts, SourceDocument } from '@statement-sorter/core';
import type { CommandOptions } from '../types.js';

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

/**
 * Central state object passed through the scan/apply pipeline.
 */
export interface PipelineState {
    sourceDir: string;
    destinationRoot: string;
    config: OrganizerConfig;
    options: CommandOptions;
    ports: EnginePorts;
    signal?: AbortSignal;
    /** Clock for undated documents. */
    now?: () => Date;

    // Accumulated during pipeline execution
    profiles: DestinationProfile[];
    folderDiagnostics: FolderDiagnostic[];
    sources: SourceDocument[];
    scanResult?: ScanResult;
    moveReport?: MoveReport;

    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;

export interface NamedStep {
    name: string;
    fn: PipelineStep;
}
