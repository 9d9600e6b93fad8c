import type { EnginePorts, SourceDocument } from '../types/index.js';
import { documentTokens } from './document-tokens.js';
import type { SourceScanOptions } from './types.js';

export interface SourceScanResult {
    documents: SourceDocument[];
    warnings: string[];
}

/**
 * Build a SourceDocument for every tracked file in the source folder,
 * in path order.
 */
export async function scanSourceDocuments(
    sourceDir: string,
    ports: EnginePorts,
    options: SourceScanOptions
): Promise<SourceScanResult> {
    const tracked = new Set(options.extensions);
    const entries = await ports.fs.listDocuments(sourceDir, { recursive: options.recursive });
    const documents: SourceDocument[] = [];
    const warnings: string[] = [];

    const sorted = entries
        .filter(entry => tracked.has(entry.extension))
        .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

    for (const entry of sorted) {
        options.signal?.throwIfAborted();

        const { tokens, source } = await documentTokens(entry, ports.extractor, options.maxPages);
        if (source === 'filename') {
            warnings.push(`No extractable text in ${entry.fileName}; matching on filename only`);
        }

        documents.push({
            path: entry.path,
            fileName: entry.fileName,
            extension: entry.extension,
            tokens,
        });
    }

    return { documents, warnings };
}
