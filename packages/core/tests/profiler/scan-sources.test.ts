import { describe, it, expect } from 'vitest';
import { scanSourceDocuments } from '../../src/profiler/index.js';
import { MemoryPorts } from '../helpers/memory-ports.js';

const inbox = () => new MemoryPorts({
    '/inbox/b-statement.pdf': { pages: ['Chase checking statement'] },
    '/inbox/a-scan.PDF': {},
    '/inbox/photo.jpg': {},
    '/inbox/.hidden.pdf': { pages: ['hidden'] },
    '/inbox/2023/old.pdf': { pages: ['archived statement'] },
});

describe('scanSourceDocuments', () => {
    it('returns tracked documents in path order, recursing when asked', async () => {
        const { documents } = await scanSourceDocuments('/inbox', inbox().ports, {
            extensions: ['pdf'],
            maxPages: 3,
            recursive: true,
        });

        expect(documents.map(d => d.path)).toEqual([
            '/inbox/2023/old.pdf',
            '/inbox/a-scan.PDF',
            '/inbox/b-statement.pdf',
        ]);
    });

    it('stays at the top level when not recursive', async () => {
        const { documents } = await scanSourceDocuments('/inbox', inbox().ports, {
            extensions: ['pdf'],
            maxPages: 3,
            recursive: false,
        });

        expect(documents.map(d => d.fileName)).toEqual(['a-scan.PDF', 'b-statement.pdf']);
    });

    it('uses content tokens when text is available', async () => {
        const { documents } = await scanSourceDocuments('/inbox', inbox().ports, {
            extensions: ['pdf'],
            maxPages: 3,
            recursive: false,
        });

        const statement = documents.find(d => d.fileName === 'b-statement.pdf');
        expect(statement?.tokens).toEqual(new Set(['chase', 'checking', 'statement']));
        expect(statement?.extension).toBe('pdf');
    });

    it('falls back to filename tokens and warns', async () => {
        const { documents, warnings } = await scanSourceDocuments('/inbox', inbox().ports, {
            extensions: ['pdf'],
            maxPages: 3,
            recursive: false,
        });

        const scan = documents.find(d => d.fileName === 'a-scan.PDF');
        expect(scan?.tokens).toEqual(new Set(['scan']));
        expect(warnings).toEqual(['No extractable text in a-scan.PDF; matching on filename only']);
    });

    it('returns nothing for a missing folder', async () => {
        const result = await scanSourceDocuments('/nowhere', inbox().ports, {
            extensions: ['pdf'],
            maxPages: 3,
            recursive: true,
        });

        expect(result).toEqual({ documents: [], warnings: [] });
    });
});
