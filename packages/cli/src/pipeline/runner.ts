import type { OrganizerConfig } from '@statement-sorter/shared';
import type { EnginePorts } from '@statement-sorter/core';
import type { NamedStep, PipelineState } from './types.js';
import { checkDirectories } from './steps/check-dirs.js';
import { profileDestinations } from './steps/profile.js';
import { scanSources } from './steps/scan.js';
import { planMoves } from './steps/plan.js';
import { applyMoves } from './steps/apply.js';
import type { CommandOptions } from '../types.js';
import { arrow } from '../utils/console.js';

export const SCAN_STEPS: readonly NamedStep[] = [
    { name: 'Directory Check', fn: checkDirectories },
    { name: 'Destination Profiling', fn: profileDestinations },
    { name: 'Source Scan', fn: scanSources },
    { name: 'Match Planning', fn: planMoves },
];

export const APPLY_STEPS: readonly NamedStep[] = [
    { name: 'Moving Files', fn: applyMoves },
];

export interface PipelineInit {
    sourceDir: string;
    destinationRoot: string;
    config: OrganizerConfig;
    options: CommandOptions;
    ports: EnginePorts;
    signal?: AbortSignal;
    now?: () => Date;
    /** Pre-existing warning sink (e.g. the extractors' failure reports). */
    warnings?: string[];
}

export function createPipelineState(init: PipelineInit): PipelineState {
    return {
        sourceDir: init.sourceDir,
        destinationRoot: init.destinationRoot,
        config: init.config,
        options: init.options,
        ports: init.ports,
        signal: init.signal,
        now: init.now,
        profiles: [],
        folderDiagnostics: [],
        sources: [],
        warnings: init.warnings ?? [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the processing pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 * Progress lines are suppressed in JSON mode so stdout stays parseable.
 */
export async function runPipeline(
    initial: PipelineState,
    steps: readonly NamedStep[]
): Promise<PipelineState> {
    let state = initial;

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        if (!state.options.json) {
            arrow(`Step ${i + 1}/${steps.length}: ${step.name}...`);
        }

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
