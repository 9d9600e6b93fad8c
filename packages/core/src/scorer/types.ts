/**
 * Individual score terms, kept apart for diagnostics.
 */
export interface ScoreBreakdown {
    jaccard: number;
    extensionBonus: number;
    anchorBonus: number;
    total: number;
}
