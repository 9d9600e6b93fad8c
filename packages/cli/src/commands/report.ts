import { basename, join, relative } from 'node:path';
import type { MatchCandidate, MoveReport, ScanResult, SourceDiagnostic, FolderDiagnostic } from '@statement-sorter/shared';
import type { PipelineState } from '../pipeline/types.js';
import { extensionList } from '../utils/format.js';
import { arrow, fail, log, success, warn } from '../utils/console.js';

function score(value: number): string {
    return value.toFixed(2);
}

/**
 * Path relative to the destination root; the root itself is ".".
 */
export function displayPath(root: string, path: string): string {
    return relative(root, path) || '.';
}

export function formatCandidate(candidate: MatchCandidate, root: string): string {
    const head = `${score(candidate.score)}  ${candidate.band.padEnd(8)}  ${candidate.fileName}`;
    if (candidate.destinationPath === null || candidate.proposedName === null) {
        return `${head}  (no match)`;
    }
    return `${head}  → ${join(displayPath(root, candidate.destinationPath), candidate.proposedName)}`;
}

export function formatFolderDiagnostic(folder: FolderDiagnostic, root: string): string {
    const documents = folder.documentCount === 1 ? 'document' : 'documents';
    return `${displayPath(root, folder.folderPath)}: ${folder.tokenCount} tokens, ` +
        `${folder.documentCount} ${documents} (${extensionList(folder.extensions)})`;
}

export function formatSourceDiagnostic(source: SourceDiagnostic, root: string): string {
    const best = source.bestDestination === null ? 'none' : displayPath(root, source.bestDestination);
    return `${basename(source.sourcePath)} → ${best} ` +
        `(jaccard ${score(source.jaccard)} + extension ${score(source.extensionBonus)} ` +
        `+ anchor ${score(source.anchorBonus)} = ${score(source.score)})`;
}

export function printScanResult(result: ScanResult, verbose: boolean): void {
    const root = result.destinationRoot;

    if (verbose) {
        log('\n--- Destination Folders ---');
        for (const folder of result.diagnostics.folders) {
            log(`  ${formatFolderDiagnostic(folder, root)}`);
        }
        log('\n--- Best Matches ---');
        for (const source of result.diagnostics.sources) {
            log(`  ${formatSourceDiagnostic(source, root)}`);
        }
    }

    log('\n--- Proposed Moves ---');
    if (result.candidates.length === 0) {
        log('  (no documents)');
    }
    for (const candidate of result.candidates) {
        log(`  ${formatCandidate(candidate, root)}`);
    }

    const matched = result.candidates.filter(c => c.destinationPath !== null).length;
    log('');
    arrow(
        `Matched ${matched} of ${result.candidates.length} documents ` +
        `(threshold ${result.threshold}, ${result.profileCount} folders profiled)`
    );
}

export function printMoveReport(report: MoveReport, dryRun: boolean): void {
    log(dryRun ? '\n--- Planned Moves (dry run) ---' : '\n--- Moves ---');
    for (const move of report.moved) {
        arrow(`${move.from} → ${move.to}`);
    }
    for (const failure of report.failures) {
        fail(`${failure.path}: ${failure.message}`);
    }

    log('');
    const verb = dryRun ? 'Would move' : 'Moved';
    const summary = `${verb} ${report.moved.length} files; ${report.failures.length} failed; ${report.skipped} unmatched left in place.`;
    if (report.failures.length > 0) {
        warn(summary);
    } else {
        success(summary);
    }
}

/**
 * Prints warnings and errors collected by the pipeline. Returns true when a
 * fatal error stopped it.
 *
 * Printed warnings are drained from `state.warnings` in place: the extractors
 * hold a reference to that array, so it must never be replaced.
 */
export function printOutcome(state: PipelineState): boolean {
    for (const w of state.warnings.splice(0)) {
        warn(w);
    }
    for (const e of state.errors) {
        console.error(`✖ ERROR [${e.step}]: ${e.message}`);
    }
    return state.errors.some(e => e.fatal);
}

export function printJson(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
}
