import { describe, it, expect, vi, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { findConfigFile } from '../src/config/detect.js';
import { ConfigError, resolveConfig } from '../src/config/load-config.js';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

const projectDir = '/Users/test/statements';
const configPath = join(projectDir, 'stmtsort.yaml');

function withConfigFile(path: string, content: string): void {
    vi.mocked(existsSync).mockImplementation(p => String(p) === path);
    vi.mocked(readFileSync).mockReturnValue(content);
}

describe('findConfigFile', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should find stmtsort.yaml in a parent folder', () => {
        vi.mocked(existsSync).mockImplementation(p => String(p) === configPath);
        expect(findConfigFile(join(projectDir, 'inbox', '2024'))).toBe(configPath);
    });

    it('should return null if no config is found in parents', () => {
        vi.mocked(existsSync).mockReturnValue(false);
        expect(findConfigFile('/')).toBeNull();
    });
});

describe('resolveConfig', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should use schema defaults without a config file', () => {
        vi.mocked(existsSync).mockReturnValue(false);

        expect(resolveConfig({}, projectDir)).toEqual({
            config: {
                threshold: 0.35,
                extensions: ['pdf'],
                maxPages: 3,
                datePages: 1,
                recursiveSource: true,
            },
            path: null,
        });
    });

    it('should read values from the nearest config file', () => {
        withConfigFile(configPath, 'threshold: 0.5\nextensions: [.PDF, txt]\nrecursiveSource: false\n');

        const { config, path } = resolveConfig({}, projectDir);
        expect(path).toBe(configPath);
        expect(config.threshold).toBe(0.5);
        expect(config.extensions).toEqual(['pdf', 'txt']);
        expect(config.recursiveSource).toBe(false);
        expect(config.maxPages).toBe(3);
    });

    it('should let the CLI threshold override the file', () => {
        withConfigFile(configPath, 'threshold: 0.5\n');
        expect(resolveConfig({ threshold: 0.8 }, projectDir).config.threshold).toBe(0.8);
    });

    it('should treat an empty file as defaults', () => {
        withConfigFile(configPath, '');
        expect(resolveConfig({}, projectDir).config.threshold).toBe(0.35);
    });

    it('should resolve an explicit config path against the start folder', () => {
        const explicit = join(projectDir, 'conf', 'custom.yaml');
        withConfigFile(explicit, 'maxPages: 5\n');

        const { config, path } = resolveConfig({ configPath: 'conf/custom.yaml' }, projectDir);
        expect(path).toBe(explicit);
        expect(config.maxPages).toBe(5);
    });

    it('should fail when an explicit config file is missing', () => {
        vi.mocked(existsSync).mockReturnValue(false);
        expect(() => resolveConfig({ configPath: '/nowhere/stmtsort.yaml' }, projectDir))
            .toThrow('Config file not found: /nowhere/stmtsort.yaml');
    });

    it('should report schema violations with their field', () => {
        withConfigFile(configPath, 'threshold: 2\n');
        expect(() => resolveConfig({}, projectDir)).toThrow(ConfigError);
        expect(() => resolveConfig({}, projectDir)).toThrow(/threshold:/);
    });

    it('should reject a file that is not a mapping', () => {
        withConfigFile(configPath, '- pdf\n- txt\n');
        expect(() => resolveConfig({}, projectDir)).toThrow(`Config file must contain a mapping: ${configPath}`);
    });

    it('should wrap YAML syntax errors', () => {
        withConfigFile(configPath, 'threshold: [0.5\n');
        expect(() => resolveConfig({}, projectDir)).toThrow(`Failed to read ${configPath}`);
    });
});
