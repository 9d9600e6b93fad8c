/**
 * Normalized vocabulary of a document or folder. Built once, never mutated.
 */
export type TokenSet = ReadonlySet<string>;

/**
 * An unsorted document awaiting a destination.
 */
export interface SourceDocument {
    readonly path: string;
    readonly fileName: string;
    /** Lowercased, without the leading dot. */
    readonly extension: string;
    readonly tokens: TokenSet;
}

/**
 * Aggregated vocabulary of one candidate target folder.
 */
export interface DestinationProfile {
    readonly path: string;
    /** The folder's own name, source of the anchor bonus. */
    readonly folderName: string;
    readonly tokens: TokenSet;
    readonly extensions: ReadonlySet<string>;
    readonly documentCount: number;
}
