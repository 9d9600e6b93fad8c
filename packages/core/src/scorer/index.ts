/**
 * Scorer module: similarity between a source document and a destination profile.
 */

export { jaccardSimilarity, scoreBreakdown, scoreMatch } from './score.js';
export { confidenceBand } from './band.js';
export type { ScoreBreakdown } from './types.js';
