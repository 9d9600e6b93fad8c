/**
 * Destination profiling: one aggregated vocabulary per folder that holds at
 * least one tracked document.
 */

import type { DestinationProfile, EnginePorts, FolderDiagnostic } from '../types/index.js';
import { tokenizeFileName } from '../tokenizer/index.js';
import { documentTokens } from './document-tokens.js';
import type { ProfileResult, ScanOptions } from './types.js';

interface FolderAccumulator {
    folderName: string;
    tokens: Set<string>;
    extensions: Set<string>;
    documentCount: number;
}

/**
 * Walk `root` and profile every folder containing tracked documents.
 *
 * Each document contributes its content tokens (filename tokens when the
 * content is empty) plus the tokens of its folder's own name. Documents are
 * grouped by immediate parent folder. Folders without tracked documents get
 * no profile and can never be a match target.
 *
 * Profiles are returned sorted by folder path.
 */
export async function buildDestinationProfiles(
    root: string,
    ports: EnginePorts,
    options: ScanOptions
): Promise<ProfileResult> {
    const tracked = new Set(options.extensions);
    const entries = await ports.fs.listDocuments(root, { recursive: true });
    const folders = new Map<string, FolderAccumulator>();

    for (const entry of entries) {
        if (!tracked.has(entry.extension)) continue;
        options.signal?.throwIfAborted();

        const { tokens } = await documentTokens(entry, ports.extractor, options.maxPages);

        let folder = folders.get(entry.folderPath);
        if (!folder) {
            folder = {
                folderName: entry.folderName,
                tokens: new Set(tokenizeFileName(entry.folderName)),
                extensions: new Set(),
                documentCount: 0,
            };
            folders.set(entry.folderPath, folder);
        }

        for (const token of tokens) folder.tokens.add(token);
        folder.extensions.add(entry.extension);
        folder.documentCount += 1;
    }

    const profiles: DestinationProfile[] = [...folders.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([path, folder]) => ({
            path,
            folderName: folder.folderName,
            tokens: folder.tokens,
            extensions: folder.extensions,
            documentCount: folder.documentCount,
        }));

    const diagnostics: FolderDiagnostic[] = profiles.map(profile => ({
        folderPath: profile.path,
        tokenCount: profile.tokens.size,
        extensions: [...profile.extensions].sort(),
        documentCount: profile.documentCount,
    }));

    const warnings: string[] = [];
    if (profiles.length === 0) {
        const exts = options.extensions.map(ext => `.${ext}`).join(', ');
        warnings.push(`No destination documents (${exts}) found under ${root}`);
    }

    return { profiles, diagnostics, warnings };
}
