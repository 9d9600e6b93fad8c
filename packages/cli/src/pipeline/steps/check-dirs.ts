import { stat } from 'node:fs/promises';
import { isAbsolute, relative } from 'node:path';
import type { PipelineState, PipelineStep } from '../types.js';
import { errorCode, errorMessage } from '../../utils/errors.js';

async function requireDirectory(state: PipelineState, label: string, path: string): Promise<boolean> {
    try {
        const s = await stat(path);
        if (s.isDirectory()) return true;
        state.errors.push({ step: 'check-dirs', message: `${label} is not a directory: ${path}`, fatal: true });
    } catch (err) {
        state.errors.push({
            step: 'check-dirs',
            message: errorCode(err) === 'ENOENT'
                ? `${label} folder not found: ${path}`
                : `Cannot read ${label.toLowerCase()} folder ${path}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }
    return false;
}

function isInside(child: string, parent: string): boolean {
    const rel = relative(parent, child);
    return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

/**
 * Step 1: Directory Check
 * Both folders must exist. Scanning a folder against itself is refused.
 */
export const checkDirectories: PipelineStep = async (state) => {
    const sourceOk = await requireDirectory(state, 'Source', state.sourceDir);
    const destinationOk = await requireDirectory(state, 'Destination root', state.destinationRoot);
    if (!sourceOk || !destinationOk) {
        return state;
    }

    if (state.sourceDir === state.destinationRoot) {
        state.errors.push({
            step: 'check-dirs',
            message: 'Source and destination root must be different folders.',
            fatal: true,
        });
    } else if (isInside(state.sourceDir, state.destinationRoot)) {
        state.warnings.push(
            `Source ${state.sourceDir} is inside the destination root; its documents are also profiled as a destination.`
        );
    }

    return state;
};
