import type { ConfidenceBand } from '../types/index.js';
import { CONFIDENCE_BANDS } from '../types/index.js';

/**
 * Display band for a score. Bounds are inclusive lower limits.
 */
export function confidenceBand(score: number): ConfidenceBand {
    if (score >= CONFIDENCE_BANDS.HIGH) return 'high';
    if (score >= CONFIDENCE_BANDS.MEDIUM) return 'medium';
    if (score >= CONFIDENCE_BANDS.LOW) return 'low';
    return 'very_low';
}
