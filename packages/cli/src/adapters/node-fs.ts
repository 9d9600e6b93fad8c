import { readdir, stat } from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import { basename, join } from 'node:path';
import {
    isHiddenName,
    splitFileName,
    type DocumentEntry,
    type FileSystemPort,
    type FileTimestamps,
} from '@statement-sorter/core';
import { errorCode } from '../utils/errors.js';

const MISSING_DIRECTORY = new Set(['ENOENT', 'ENOTDIR']);

/**
 * FileSystemPort over node:fs/promises. Read-only.
 */
export class NodeFileSystem implements FileSystemPort {
    async listDocuments(root: string, options: { recursive: boolean }): Promise<DocumentEntry[]> {
        const entries: DocumentEntry[] = [];
        await this.walk(root, options.recursive, entries);
        return entries;
    }

    async listEntryNames(folderPath: string): Promise<string[]> {
        try {
            return await readdir(folderPath);
        } catch (err) {
            if (MISSING_DIRECTORY.has(errorCode(err) ?? '')) return [];
            throw err;
        }
    }

    async readTimestamps(path: string): Promise<FileTimestamps> {
        let stats: Stats;
        try {
            stats = await stat(path);
        } catch (err) {
            // Unreadable metadata is reported as absent; the date chain moves on
            if (errorCode(err) !== undefined) {
                return { createdAt: null, modifiedAt: null };
            }
            throw err;
        }

        return {
            // Filesystems without birth time report the epoch
            createdAt: stats.birthtimeMs > 0 ? stats.birthtime : null,
            modifiedAt: stats.mtimeMs > 0 ? stats.mtime : null,
        };
    }

    private async walk(folder: string, recursive: boolean, out: DocumentEntry[]): Promise<void> {
        let dirents: Dirent[];
        try {
            dirents = await readdir(folder, { withFileTypes: true });
        } catch (err) {
            if (MISSING_DIRECTORY.has(errorCode(err) ?? '')) return;
            throw err;
        }

        dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const dirent of dirents) {
            // Skip hidden and temporary files
            if (isHiddenName(dirent.name)) continue;

            const path = join(folder, dirent.name);
            if (dirent.isDirectory()) {
                if (recursive) await this.walk(path, recursive, out);
            } else if (dirent.isFile()) {
                out.push({
                    path,
                    fileName: dirent.name,
                    extension: splitFileName(dirent.name).extension,
                    folderPath: folder,
                    folderName: basename(folder),
                });
            }
        }
    }
}
