import { describe, it, expect } from 'vitest';
import { parseArgs, UsageError } from '../src/args.js';

describe('parseArgs', () => {
    it('parses a scan with defaults', () => {
        expect(parseArgs(['scan', 'inbox', 'archive'])).toEqual({
            command: 'scan',
            source: 'inbox',
            destination: 'archive',
            options: { json: false, verbose: false, dryRun: false, yes: false },
        });
    });

    it('parses flags in any position', () => {
        const parsed = parseArgs(['apply', '--dry-run', 'inbox', '--threshold', '0.5', 'archive', '-y', '--config', 'my.yaml']);
        expect(parsed.command).toBe('apply');
        expect(parsed.source).toBe('inbox');
        expect(parsed.destination).toBe('archive');
        expect(parsed.options).toEqual({
            json: false,
            verbose: false,
            dryRun: true,
            yes: true,
            threshold: 0.5,
            config: 'my.yaml',
        });
    });

    it('accepts --json and --verbose on scan', () => {
        const { options } = parseArgs(['scan', 'a', 'b', '--json', '-v']);
        expect(options.json).toBe(true);
        expect(options.verbose).toBe(true);
    });

    it('rejects unknown commands and options', () => {
        expect(() => parseArgs(['sort', 'a', 'b'])).toThrow('Unknown command: sort');
        expect(() => parseArgs([])).toThrow('Missing command');
        expect(() => parseArgs(['scan', 'a', 'b', '--fast'])).toThrow('Unknown option: --fast');
    });

    it('requires exactly two folders', () => {
        expect(() => parseArgs(['scan', 'a'])).toThrow('Expected <source> and <destination-root>');
        expect(() => parseArgs(['scan', 'a', 'b', 'c'])).toThrow(UsageError);
    });

    it('validates the threshold value', () => {
        expect(() => parseArgs(['scan', 'a', 'b', '--threshold', 'high'])).toThrow('--threshold must be a number, got "high"');
        expect(() => parseArgs(['scan', 'a', 'b', '--threshold'])).toThrow('--threshold requires a value');
    });

    it('keeps apply-only flags off scan', () => {
        expect(() => parseArgs(['scan', 'a', 'b', '--yes'])).toThrow('--dry-run and --yes only apply to the apply command');
    });
});
