import { buildDestinationProfiles } from '@statement-sorter/core';
import type { PipelineStep } from '../types.js';
import { recordFatal } from './fail.js';

/**
 * Step 2: Destination Profiling
 * Builds one vocabulary per destination folder holding tracked documents.
 */
export const profileDestinations: PipelineStep = async (state) => {
    try {
        const result = await buildDestinationProfiles(state.destinationRoot, state.ports, {
            extensions: state.config.extensions,
            maxPages: state.config.maxPages,
            signal: state.signal,
        });

        state.profiles = result.profiles;
        state.folderDiagnostics = result.diagnostics;
        state.warnings.push(...result.warnings);
    } catch (err) {
        return recordFatal(state, 'profile', `Failed to profile ${state.destinationRoot}`, err);
    }

    return state;
};
