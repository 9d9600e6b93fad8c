import type { DocumentEntry, TextExtractor, TokenSet } from '../types/index.js';
import { tokenizeContent, tokenizeFileName } from '../tokenizer/index.js';
import { firstAvailable } from '../utils/fallback.js';
import { splitFileName } from '../utils/file-name.js';

export type TokenSource = 'content' | 'filename';

export interface DocumentTokens {
    tokens: TokenSet;
    source: TokenSource;
}

/**
 * Vocabulary of one document: content tokens from its leading pages, or its
 * filename tokens (extension stripped) when extraction yields nothing.
 */
export async function documentTokens(
    entry: DocumentEntry,
    extractor: TextExtractor,
    maxPages: number
): Promise<DocumentTokens> {
    const resolved = await firstAvailable<TokenSet, TokenSource>(
        [
            {
                name: 'content',
                get: async () => {
                    const text = await extractor.extractText(entry.path, maxPages);
                    return text === null ? null : tokenizeContent(text);
                },
            },
            { name: 'filename', get: () => tokenizeFileName(splitFileName(entry.fileName).baseName) },
        ],
        tokens => tokens.size > 0
    );

    return resolved
        ? { tokens: resolved.value, source: resolved.source }
        : { tokens: new Set<string>(), source: 'filename' };
}
