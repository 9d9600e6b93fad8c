import { describe, it, expect } from 'vitest';
import {
    NamingPatternSchema,
    MatchCandidateSchema,
    ScanResultSchema,
    MoveReportSchema,
    OrganizerConfigSchema,
} from '../src/schemas.js';

describe('NamingPatternSchema', () => {
    it('accepts empty prefix and suffix', () => {
        const result = NamingPatternSchema.safeParse({ prefix: '', dateFormat: 'YYYYMMDD', suffix: '' });
        expect(result.success).toBe(true);
    });

    it('rejects unknown date formats', () => {
        const result = NamingPatternSchema.safeParse({ prefix: 'Chase_', dateFormat: 'DD.MM.YYYY', suffix: '' });
        expect(result.success).toBe(false);
    });

    it('rejects an empty date format', () => {
        const result = NamingPatternSchema.safeParse({ prefix: 'Chase_', dateFormat: '', suffix: '' });
        expect(result.success).toBe(false);
    });
});

describe('MatchCandidateSchema', () => {
    const matched = {
        sourcePath: '/inbox/statement.pdf',
        fileName: 'statement.pdf',
        destinationPath: '/archive/Chase',
        score: 0.9,
        proposedName: 'Chase_2023-04.pdf',
        band: 'high',
    };

    it('validates a matched candidate', () => {
        expect(MatchCandidateSchema.safeParse(matched).success).toBe(true);
    });

    it('validates an unmatched candidate', () => {
        const unmatched = { ...matched, destinationPath: null, proposedName: null, score: 0.1, band: 'very_low' };
        expect(MatchCandidateSchema.safeParse(unmatched).success).toBe(true);
    });

    it('accepts scores above 1 (bonuses are additive)', () => {
        expect(MatchCandidateSchema.safeParse({ ...matched, score: 1.3 }).success).toBe(true);
    });

    it('rejects negative scores', () => {
        expect(MatchCandidateSchema.safeParse({ ...matched, score: -0.1 }).success).toBe(false);
    });

    it('rejects a destination without a proposed name', () => {
        expect(MatchCandidateSchema.safeParse({ ...matched, proposedName: null }).success).toBe(false);
    });

    it('rejects a proposed name without a destination', () => {
        expect(MatchCandidateSchema.safeParse({ ...matched, destinationPath: null }).success).toBe(false);
    });
});

describe('ScanResultSchema', () => {
    it('validates an empty scan', () => {
        const result = ScanResultSchema.safeParse({
            sourceDir: '/inbox',
            destinationRoot: '/archive',
            threshold: 0.35,
            profileCount: 0,
            candidates: [],
            diagnostics: { folders: [], sources: [] },
        });
        expect(result.success).toBe(true);
    });

    it('rejects a folder diagnostic with no documents', () => {
        const result = ScanResultSchema.safeParse({
            sourceDir: '/inbox',
            destinationRoot: '/archive',
            threshold: 0.35,
            profileCount: 1,
            candidates: [],
            diagnostics: {
                folders: [{ folderPath: '/archive/Chase', tokenCount: 3, extensions: ['pdf'], documentCount: 0 }],
                sources: [],
            },
        });
        expect(result.success).toBe(false);
    });
});

describe('MoveReportSchema', () => {
    it('validates a partial failure report', () => {
        const result = MoveReportSchema.safeParse({
            moved: [{ from: '/inbox/a.pdf', to: '/archive/Chase/Chase_2023-04.pdf' }],
            failures: [{ path: '/inbox/b.pdf', message: 'EACCES: permission denied' }],
            skipped: 2,
        });
        expect(result.success).toBe(true);
    });
});

describe('OrganizerConfigSchema', () => {
    it('fills every default from an empty object', () => {
        const config = OrganizerConfigSchema.parse({});
        expect(config).toEqual({
            threshold: 0.35,
            extensions: ['pdf'],
            maxPages: 3,
            datePages: 1,
            recursiveSource: true,
        });
    });

    it('normalizes extensions to lowercase without dots', () => {
        const config = OrganizerConfigSchema.parse({ extensions: ['.PDF', 'Txt'] });
        expect(config.extensions).toEqual(['pdf', 'txt']);
    });

    it('rejects thresholds beyond the score scale', () => {
        expect(OrganizerConfigSchema.safeParse({ threshold: 1.5 }).success).toBe(false);
        expect(OrganizerConfigSchema.safeParse({ threshold: -0.1 }).success).toBe(false);
    });

    it('rejects an empty extension list', () => {
        expect(OrganizerConfigSchema.safeParse({ extensions: [] }).success).toBe(false);
    });

    it('rejects non-integer page counts', () => {
        expect(OrganizerConfigSchema.safeParse({ maxPages: 2.5 }).success).toBe(false);
        expect(OrganizerConfigSchema.safeParse({ datePages: 0 }).success).toBe(false);
    });
});
