/**
 * Ports through which the engine reaches the outside world.
 * Core never imports node:fs; the CLI supplies implementations.
 */

/**
 * A regular, non-hidden file found while walking a directory.
 */
export interface DocumentEntry {
    path: string;
    fileName: string;
    /** Lowercased, without the leading dot; empty when the name has none. */
    extension: string;
    folderPath: string;
    folderName: string;
}

export interface FileTimestamps {
    createdAt: Date | null;
    modifiedAt: Date | null;
}

export interface FileSystemPort {
    /**
     * Lists regular files under `root`, skipping hidden entries.
     * Resolves to an empty list when `root` does not exist.
     */
    listDocuments(root: string, options: { recursive: boolean }): Promise<DocumentEntry[]>;

    /**
     * Every entry name currently inside `folderPath` (files and folders,
     * hidden included). Used for collision checks and pattern inference.
     */
    listEntryNames(folderPath: string): Promise<string[]>;

    /**
     * Timestamps of a file; unavailable values are null, never thrown.
     */
    readTimestamps(path: string): Promise<FileTimestamps>;
}

export interface TextExtractor {
    /**
     * Text of the first `maxPages` pages, or null when the format is
     * unsupported or the document is unreadable.
     */
    extractText(path: string, maxPages: number): Promise<string | null>;
}

export interface EnginePorts {
    fs: FileSystemPort;
    extractor: TextExtractor;
}
