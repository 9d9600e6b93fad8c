import type { FileSystemPort } from '../types/index.js';

/**
 * Snapshot of one destination folder plus the names handed out so far.
 * Comparison ignores case so proposals stay safe on case-insensitive volumes.
 */
export class FolderNames {
    private readonly taken: Set<string>;

    constructor(readonly entryNames: readonly string[]) {
        this.taken = new Set(entryNames.map(name => name.toLowerCase()));
    }

    isTaken(fileName: string): boolean {
        return this.taken.has(fileName.toLowerCase());
    }

    reserve(fileName: string): void {
        this.taken.add(fileName.toLowerCase());
    }
}

/**
 * Per-scan registry of destination folders. Each folder is listed once; names
 * proposed earlier in the scan count as taken for later proposals, so no two
 * candidates share a target.
 */
export class NameReservations {
    private readonly folders = new Map<string, FolderNames>();

    constructor(private readonly fs: FileSystemPort) {}

    async forFolder(folderPath: string): Promise<FolderNames> {
        let folder = this.folders.get(folderPath);
        if (!folder) {
            folder = new FolderNames(await this.fs.listEntryNames(folderPath));
            this.folders.set(folderPath, folder);
        }
        return folder;
    }
}
