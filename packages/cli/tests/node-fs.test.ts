import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile, utimes } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NodeFileSystem } from '../src/adapters/node-fs.js';

describe('NodeFileSystem', () => {
    const fs = new NodeFileSystem();
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'stmtsort-fs-'));
        await mkdir(join(root, 'Chase', '2023'), { recursive: true });
        await mkdir(join(root, '.cache'));
        await writeFile(join(root, 'top.PDF'), 'x');
        await writeFile(join(root, '.DS_Store'), 'x');
        await writeFile(join(root, 'Chase', 'Chase_2023-01.pdf'), 'x');
        await writeFile(join(root, 'Chase', '~$lock.pdf'), 'x');
        await writeFile(join(root, 'Chase', '2023', 'old.pdf'), 'x');
        await writeFile(join(root, '.cache', 'hidden.pdf'), 'x');
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('lists non-hidden files recursively in name order', async () => {
        const entries = await fs.listDocuments(root, { recursive: true });
        expect(entries.map(e => e.path)).toEqual([
            join(root, 'Chase', '2023', 'old.pdf'),
            join(root, 'Chase', 'Chase_2023-01.pdf'),
            join(root, 'top.PDF'),
        ]);
    });

    it('describes each file with its folder', async () => {
        const entries = await fs.listDocuments(root, { recursive: true });
        expect(entries[1]).toEqual({
            path: join(root, 'Chase', 'Chase_2023-01.pdf'),
            fileName: 'Chase_2023-01.pdf',
            extension: 'pdf',
            folderPath: join(root, 'Chase'),
            folderName: 'Chase',
        });
        expect(entries[2]?.extension).toBe('pdf');
    });

    it('stays at the top level when not recursive', async () => {
        const entries = await fs.listDocuments(root, { recursive: false });
        expect(entries.map(e => e.fileName)).toEqual(['top.PDF']);
    });

    it('returns nothing for a missing root', async () => {
        expect(await fs.listDocuments(join(root, 'missing'), { recursive: true })).toEqual([]);
        expect(await fs.listEntryNames(join(root, 'missing'))).toEqual([]);
    });

    it('lists every entry name, hidden ones included', async () => {
        const names = await fs.listEntryNames(join(root, 'Chase'));
        expect([...names].sort()).toEqual(['2023', 'Chase_2023-01.pdf', '~$lock.pdf']);
    });

    it('reads the modification time', async () => {
        const path = join(root, 'top.PDF');
        const modified = new Date(Date.UTC(2023, 4, 1));
        await utimes(path, modified, modified);

        const timestamps = await fs.readTimestamps(path);
        expect(timestamps.modifiedAt?.getTime()).toBe(modified.getTime());
    });

    it('reports missing timestamps as null', async () => {
        expect(await fs.readTimestamps(join(root, 'nope.pdf'))).toEqual({ createdAt: null, modifiedAt: null });
    });
});
