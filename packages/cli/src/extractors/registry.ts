import { basename } from 'node:path';
import { splitFileName, type TextExtractor } from '@statement-sorter/core';
import { PdfTextExtractor, type ExtractionFailureHandler } from './pdf.js';
import { PlainTextExtractor } from './plain-text.js';

/**
 * Dispatches extraction on the file's extension. Unregistered extensions
 * yield null, which the engine treats as "no text".
 */
export class ExtractorRegistry implements TextExtractor {
    private readonly byExtension = new Map<string, TextExtractor>();

    register(extensions: readonly string[], extractor: TextExtractor): this {
        for (const extension of extensions) {
            this.byExtension.set(extension.toLowerCase(), extractor);
        }
        return this;
    }

    supports(extension: string): boolean {
        return this.byExtension.has(extension.toLowerCase());
    }

    async extractText(path: string, maxPages: number): Promise<string | null> {
        const { extension } = splitFileName(basename(path));
        const extractor = this.byExtension.get(extension);
        return extractor ? extractor.extractText(path, maxPages) : null;
    }
}

export function createDefaultExtractors(onFailure?: ExtractionFailureHandler): ExtractorRegistry {
    return new ExtractorRegistry()
        .register(['pdf'], new PdfTextExtractor(onFailure))
        .register(['txt', 'md'], new PlainTextExtractor(onFailure));
}
