import { createRequire } from 'node:module';
import { readFile } from 'node:fs/promises';
import type PdfParse from 'pdf-parse';
import type { TextExtractor } from '@statement-sorter/core';

// pdf-parse's entry point runs a debug harness when it has no CommonJS parent
const require = createRequire(import.meta.url);
const pdfParse: typeof PdfParse = require('pdf-parse');

export type ExtractionFailureHandler = (path: string, err: unknown) => void;

/**
 * Runs `work` with `console.log` redirected to `sink`.
 *
 * The pdf.js build bundled with pdf-parse prints its warnings ("Warning:
 * Indexing all PDF objects", font table complaints) through `console.log`,
 * which would land in the middle of `--json` output on stdout.
 */
export async function withConsoleLogRedirected<T>(
    work: () => Promise<T>,
    sink: (line: string) => void
): Promise<T> {
    const original = console.log;
    console.log = (...args: unknown[]) => {
        sink(args.map(String).join(' '));
    };
    try {
        return await work();
    } finally {
        console.log = original;
    }
}

function toStderr(line: string): void {
    console.error(line);
}

/**
 * PDF text via pdf-parse, limited to the first `maxPages` pages.
 * Scanned PDFs without a text layer yield null. Parser warnings go to stderr.
 */
export class PdfTextExtractor implements TextExtractor {
    constructor(private readonly onFailure?: ExtractionFailureHandler) {}

    async extractText(path: string, maxPages: number): Promise<string | null> {
        try {
            const buffer = await readFile(path);
            const result = await withConsoleLogRedirected(() => pdfParse(buffer, { max: maxPages }), toStderr);
            return result.text.trim().length > 0 ? result.text : null;
        } catch (err) {
            this.onFailure?.(path, err);
            return null;
        }
    }
}
