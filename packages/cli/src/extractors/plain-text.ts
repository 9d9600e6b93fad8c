import { readFile } from 'node:fs/promises';
import type { TextExtractor } from '@statement-sorter/core';
import type { ExtractionFailureHandler } from './pdf.js';

// Form feed separates pages in plain-text exports
const PAGE_BREAK = '\f';

/**
 * UTF-8 text files (.txt, .md). Pages are form-feed separated; a file without
 * form feeds is one page.
 */
export class PlainTextExtractor implements TextExtractor {
    constructor(private readonly onFailure?: ExtractionFailureHandler) {}

    async extractText(path: string, maxPages: number): Promise<string | null> {
        try {
            const content = await readFile(path, 'utf-8');
            const text = content.split(PAGE_BREAK).slice(0, maxPages).join('\n');
            return text.trim().length > 0 ? text : null;
        } catch (err) {
            this.onFailure?.(path, err);
            return null;
        }
    }
}
