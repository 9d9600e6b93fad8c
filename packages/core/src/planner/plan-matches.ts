import type {
    DestinationProfile,
    EnginePorts,
    MatchCandidate,
    SourceDiagnostic,
    SourceDocument,
} from '../types/index.js';
import { confidenceBand } from '../scorer/index.js';
import { selectBestMatch } from './select-best.js';
import { proposeName } from './propose-name.js';
import { NameReservations } from './reservations.js';
import type { BestMatch, PlanOptions, PlanResult } from './types.js';

interface Ranked {
    source: SourceDocument;
    best: BestMatch | null;
    score: number;
}

/**
 * Plan a destination and filename for every source document.
 *
 * Each source is scored against every profile and the best one kept. At or
 * above `threshold` the candidate gets that destination and a proposed name;
 * below it (or with no profiles at all) it is still reported, without a
 * destination, carrying the best score found (0 with no profiles).
 *
 * Names are proposed in descending score order, so when two documents would
 * collide in one folder the stronger match gets the undecorated name.
 *
 * PURE with respect to the filesystem: reads only, never moves or creates.
 */
export async function planMatches(
    sources: readonly SourceDocument[],
    profiles: readonly DestinationProfile[],
    threshold: number,
    ports: EnginePorts,
    options: PlanOptions
): Promise<PlanResult> {
    const scored: Ranked[] = sources.map(source => {
        const best = selectBestMatch(source, profiles);
        return { source, best, score: best ? best.breakdown.total : 0 };
    });

    const diagnostics: SourceDiagnostic[] = scored.map(({ source, best, score }) => ({
        sourcePath: source.path,
        bestDestination: best ? best.profile.path : null,
        score,
        jaccard: best ? best.breakdown.jaccard : 0,
        extensionBonus: best ? best.breakdown.extensionBonus : 0,
        anchorBonus: best ? best.breakdown.anchorBonus : 0,
    }));

    // Stable: equal scores keep source order
    const ranked = [...scored].sort((a, b) => b.score - a.score);

    const reservations = new NameReservations(ports.fs);
    const candidates: MatchCandidate[] = [];

    for (const { source, best, score } of ranked) {
        options.signal?.throwIfAborted();

        const base = {
            sourcePath: source.path,
            fileName: source.fileName,
            score,
            band: confidenceBand(score),
        };

        if (best && score >= threshold) {
            const proposedName = await proposeName(source, best.profile, ports, reservations, options);
            candidates.push({ ...base, destinationPath: best.profile.path, proposedName });
        } else {
            candidates.push({ ...base, destinationPath: null, proposedName: null });
        }
    }

    return { candidates, diagnostics };
}
