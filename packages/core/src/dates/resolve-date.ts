import type { EnginePorts, FileTimestamps } from '../types/index.js';
import { firstAvailable, type FallbackProvider } from '../utils/fallback.js';
import { isValidDate } from '../utils/date-parse.js';
import { extractDate } from './extract-date.js';

export type DateSource = 'content' | 'created' | 'modified' | 'now';

export interface ResolvedDate {
    date: Date;
    source: DateSource;
}

export interface DateResolveOptions {
    /** Leading pages searched for a date. */
    datePages: number;
    now?: () => Date;
}

/**
 * Date of a document: content date, then creation time, then modification
 * time, then the current instant. Never throws for missing dates.
 */
export async function resolveDocumentDate(
    path: string,
    ports: EnginePorts,
    options: DateResolveOptions
): Promise<ResolvedDate> {
    let timestamps: Promise<FileTimestamps> | null = null;
    const readTimestamps = (): Promise<FileTimestamps> => {
        if (!timestamps) timestamps = ports.fs.readTimestamps(path);
        return timestamps;
    };

    const providers: FallbackProvider<Date, Exclude<DateSource, 'now'>>[] = [
        {
            name: 'content',
            get: async () => {
                const text = await ports.extractor.extractText(path, options.datePages);
                return text === null ? null : extractDate(text);
            },
        },
        { name: 'created', get: async () => (await readTimestamps()).createdAt },
        { name: 'modified', get: async () => (await readTimestamps()).modifiedAt },
    ];

    const resolved = await firstAvailable(providers, isValidDate);
    if (resolved) {
        return { date: resolved.value, source: resolved.source };
    }

    const now = options.now ?? (() => new Date());
    return { date: now(), source: 'now' };
}
