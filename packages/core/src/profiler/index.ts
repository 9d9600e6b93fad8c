/**
 * Profiler module: destination folder vocabularies and source documents.
 */

export { buildDestinationProfiles } from './build-profiles.js';
export { scanSourceDocuments } from './scan-sources.js';
export { documentTokens } from './document-tokens.js';
export type { ScanOptions, SourceScanOptions, ProfileResult } from './types.js';
export type { SourceScanResult } from './scan-sources.js';
export type { DocumentTokens, TokenSource } from './document-tokens.js';
