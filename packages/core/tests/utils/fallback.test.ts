import { describe, it, expect, vi } from 'vitest';
import { firstAvailable } from '../../src/utils/fallback.js';

describe('firstAvailable', () => {
    it('returns the first non-null value with its provider name', async () => {
        const result = await firstAvailable([
            { name: 'a', get: () => null },
            { name: 'b', get: async () => 'value-b' },
            { name: 'c', get: () => 'value-c' },
        ]);
        expect(result).toEqual({ source: 'b', value: 'value-b' });
    });

    it('does not call providers after a success', async () => {
        const later = vi.fn(() => 'late');
        await firstAvailable([
            { name: 'a', get: () => 'early' },
            { name: 'b', get: later },
        ]);
        expect(later).not.toHaveBeenCalled();
    });

    it('skips values rejected by isUsable', async () => {
        const result = await firstAvailable(
            [
                { name: 'empty', get: () => new Set<string>() },
                { name: 'full', get: () => new Set(['token']) },
            ],
            value => value.size > 0
        );
        expect(result?.source).toBe('full');
    });

    it('returns null when nothing is available', async () => {
        expect(await firstAvailable([{ name: 'a', get: () => null }])).toBeNull();
        expect(await firstAvailable([])).toBeNull();
    });
});
