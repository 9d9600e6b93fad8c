import type { DestinationProfile, SourceDocument, TokenSet } from '../types/index.js';
import { SCORE_WEIGHTS } from '../types/index.js';
import { tokenizeFileName } from '../tokenizer/index.js';
import type { ScoreBreakdown } from './types.js';

/**
 * Intersection size over union size. Two empty sets score 0, not 1.
 */
export function jaccardSimilarity(a: TokenSet, b: TokenSet): number {
    let intersection = 0;
    for (const token of a) {
        if (b.has(token)) intersection++;
    }
    const union = a.size + b.size - intersection;
    return union === 0 ? 0 : intersection / union;
}

function sharesAnyToken(a: TokenSet, b: TokenSet): boolean {
    for (const token of a) {
        if (b.has(token)) return true;
    }
    return false;
}

/**
 * Score a source document against one destination profile, term by term.
 *
 * The terms are summed, not normalized: content overlap dominates (up to 1.0),
 * an extension match adds 0.2 and a folder-name echo adds 0.1. Treat the
 * total as a ranking signal, not a probability.
 */
export function scoreBreakdown(source: SourceDocument, profile: DestinationProfile): ScoreBreakdown {
    const jaccard = jaccardSimilarity(source.tokens, profile.tokens);
    const extensionBonus = profile.extensions.has(source.extension)
        ? SCORE_WEIGHTS.EXTENSION_BONUS
        : 0;
    const anchorBonus = sharesAnyToken(source.tokens, tokenizeFileName(profile.folderName))
        ? SCORE_WEIGHTS.ANCHOR_BONUS
        : 0;

    return {
        jaccard,
        extensionBonus,
        anchorBonus,
        total: jaccard + extensionBonus + anchorBonus,
    };
}

export function scoreMatch(source: SourceDocument, profile: DestinationProfile): number {
    return scoreBreakdown(source, profile).total;
}
