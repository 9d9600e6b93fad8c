import type { PipelineState } from '../types.js';
import { errorMessage } from '../../utils/errors.js';

/**
 * Records a fatal step error. A cancelled run reports the cancellation
 * instead of whatever the interrupted operation threw.
 */
export function recordFatal(state: PipelineState, step: string, context: string, err: unknown): PipelineState {
    state.errors.push({
        step,
        message: state.signal?.aborted ? 'Cancelled by user' : `${context}: ${errorMessage(err)}`,
        fatal: true,
        error: err,
    });
    return state;
}
