import { planMatches, type PlanResult } from '@statement-sorter/core';
import { ScanResultSchema } from '@statement-sorter/shared';
import type { PipelineStep } from '../types.js';
import { recordFatal } from './fail.js';

/**
 * Step 4: Match Planning
 * Scores sources against profiles and proposes names. The result is
 * validated before anything downstream (printing, JSON, apply) sees it.
 */
export const planMoves: PipelineStep = async (state) => {
    let planned: PlanResult;
    try {
        planned = await planMatches(state.sources, state.profiles, state.config.threshold, state.ports, {
            datePages: state.config.datePages,
            now: state.now,
            signal: state.signal,
        });
    } catch (err) {
        return recordFatal(state, 'plan', 'Failed to plan matches', err);
    }

    const parsed = ScanResultSchema.safeParse({
        sourceDir: state.sourceDir,
        destinationRoot: state.destinationRoot,
        threshold: state.config.threshold,
        profileCount: state.profiles.length,
        candidates: planned.candidates,
        diagnostics: {
            folders: state.folderDiagnostics,
            sources: planned.diagnostics,
        },
    });

    if (!parsed.success) {
        state.errors.push({
            step: 'plan',
            message: `Scan result failed validation: ${parsed.error.issues.map(i => i.message).join('; ')}`,
            fatal: true,
            error: parsed.error,
        });
        return state;
    }

    state.scanResult = parsed.data;
    return state;
};
