/**
 * Planner module: best destination and proposed name for each source document.
 */

export { planMatches } from './plan-matches.js';
export { selectBestMatch } from './select-best.js';
export { proposeName } from './propose-name.js';
export { NameReservations, FolderNames } from './reservations.js';
export type { BestMatch, PlanOptions, PlanResult } from './types.js';
