import { constants } from 'node:fs';
import { copyFile, link, mkdir, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { NameReservations, proposeName } from '@statement-sorter/core';
import type { MatchCandidate, MoveReport } from '@statement-sorter/shared';
import type { PipelineState, PipelineStep } from '../types.js';
import { errorCode, errorMessage } from '../../utils/errors.js';
import { recordFatal } from './fail.js';

type MatchedCandidate = MatchCandidate & { destinationPath: string; proposedName: string };

function isMatched(candidate: MatchCandidate): candidate is MatchedCandidate {
    return candidate.destinationPath !== null && candidate.proposedName !== null;
}

/**
 * Groups matched candidates by destination folder (folders in path order,
 * candidates in score order within each).
 */
function groupByDestination(candidates: readonly MatchCandidate[]): [string, MatchedCandidate[]][] {
    const groups = new Map<string, MatchedCandidate[]>();
    for (const candidate of candidates) {
        if (!isMatched(candidate)) continue;
        const group = groups.get(candidate.destinationPath) ?? [];
        group.push(candidate);
        groups.set(candidate.destinationPath, group);
    }
    return [...groups.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

// Hard links unavailable: other device, or a filesystem without them (FAT, exFAT, some shares)
const LINK_UNSUPPORTED = new Set(['EXDEV', 'EPERM', 'ENOTSUP', 'ENOSYS']);

/**
 * Move a file, creating the target folder. Never replaces an existing
 * target: the file is hard-linked into place (EEXIST when the name is
 * taken) and the source unlinked, with an exclusive copy + unlink where
 * links are unavailable.
 */
export async function moveFile(from: string, to: string): Promise<void> {
    await mkdir(dirname(to), { recursive: true });
    try {
        await link(from, to);
    } catch (err) {
        const code = errorCode(err);
        if (code === undefined || !LINK_UNSUPPORTED.has(code)) {
            throw err;
        }
        await copyFile(from, to, constants.COPYFILE_EXCL);
    }
    await unlink(from);
}

/**
 * Step 5: Moving Files
 * Moves every matched source into its destination, one at a time. Each
 * target name is recomputed against the folder as it is at that moment, so
 * earlier moves are seen by later ones. A failed move is recorded and the
 * rest continue.
 */
export const applyMoves: PipelineStep = async (state: PipelineState) => {
    const result = state.scanResult;
    if (!result) {
        state.errors.push({ step: 'apply', message: 'Nothing to apply: the scan produced no result.', fatal: true });
        return state;
    }

    const groups = groupByDestination(result.candidates);
    const matchedCount = groups.reduce((sum, [, group]) => sum + group.length, 0);
    const report: MoveReport = {
        moved: [],
        failures: [],
        skipped: result.candidates.length - matchedCount,
    };
    state.moveReport = report;

    if (state.options.dryRun) {
        for (const [folder, group] of groups) {
            for (const candidate of group) {
                report.moved.push({ from: candidate.sourcePath, to: join(folder, candidate.proposedName) });
            }
        }
        state.warnings.push('Dry run: no files were moved.');
        return state;
    }

    const sources = new Map(state.sources.map(source => [source.path, source]));
    const profiles = new Map(state.profiles.map(profile => [profile.path, profile]));

    for (const [folder, group] of groups) {
        for (const candidate of group) {
            if (state.signal?.aborted) {
                return recordFatal(state, 'apply', 'Moving stopped', state.signal.reason);
            }

            const source = sources.get(candidate.sourcePath);
            const profile = profiles.get(folder);
            if (!source || !profile) {
                report.failures.push({ path: candidate.sourcePath, message: 'Not part of the current scan' });
                continue;
            }

            try {
                const name = await proposeName(source, profile, state.ports, new NameReservations(state.ports.fs), {
                    datePages: state.config.datePages,
                    now: state.now,
                });
                const target = join(folder, name);
                await moveFile(source.path, target);
                report.moved.push({ from: source.path, to: target });
            } catch (err) {
                report.failures.push({ path: candidate.sourcePath, message: errorMessage(err) });
            }
        }
    }

    return state;
};
