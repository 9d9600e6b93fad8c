import type { DestinationProfile, SourceDocument } from '../types/index.js';
import { scoreBreakdown } from '../scorer/index.js';
import type { BestMatch } from './types.js';

/**
 * Highest-scoring profile for a source. Equal scores resolve to the
 * lexicographically smallest folder path, whatever order profiles arrive in.
 */
export function selectBestMatch(
    source: SourceDocument,
    profiles: readonly DestinationProfile[]
): BestMatch | null {
    let best: BestMatch | null = null;

    for (const profile of profiles) {
        const breakdown = scoreBreakdown(source, profile);
        if (
            !best ||
            breakdown.total > best.breakdown.total ||
            (breakdown.total === best.breakdown.total && profile.path < best.profile.path)
        ) {
            best = { profile, breakdown };
        }
    }

    return best;
}
