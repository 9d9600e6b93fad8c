import { scanSourceDocuments } from '@statement-sorter/core';
import type { PipelineStep } from '../types.js';
import { recordFatal } from './fail.js';
import { extensionList } from '../../utils/format.js';

/**
 * Step 3: Source Scan
 * Tokenizes every tracked document in the source folder.
 */
export const scanSources: PipelineStep = async (state) => {
    try {
        const result = await scanSourceDocuments(state.sourceDir, state.ports, {
            extensions: state.config.extensions,
            maxPages: state.config.maxPages,
            recursive: state.config.recursiveSource,
            signal: state.signal,
        });

        state.sources = result.documents;
        state.warnings.push(...result.warnings);

        if (result.documents.length === 0) {
            state.warnings.push(
                `No source documents (${extensionList(state.config.extensions)}) found in ${state.sourceDir}`
            );
        }
    } catch (err) {
        return recordFatal(state, 'scan', `Failed to scan ${state.sourceDir}`, err);
    }

    return state;
};
