import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { OrganizerConfigSchema, type OrganizerConfig } from '@statement-sorter/shared';
import { findConfigFile } from './detect.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Unreadable or invalid configuration. Always fatal.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface ConfigOverrides {
    /** Explicit config file path (--config). */
    configPath?: string;
    threshold?: number;
}

export interface ResolvedConfig {
    config: OrganizerConfig;
    /** File the values came from; null when only defaults apply. */
    path: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the raw mapping from a YAML config file. An empty file is an empty
 * mapping.
 */
export function readConfigFile(path: string): Record<string, unknown> {
    let data: unknown;
    try {
        data = parse(readFileSync(path, 'utf-8'));
    } catch (err) {
        throw new ConfigError(`Failed to read ${path}: ${errorMessage(err)}`);
    }

    if (data === null || data === undefined) return {};
    if (!isRecord(data)) {
        throw new ConfigError(`Config file must contain a mapping: ${path}`);
    }
    return data;
}

/**
 * Loads stmtsort.yaml (explicit path, or the nearest one above startPath),
 * applies CLI overrides and validates the result. Schema defaults fill
 * whatever neither source sets.
 */
export function resolveConfig(overrides: ConfigOverrides, startPath: string = process.cwd()): ResolvedConfig {
    let path: string | null;
    if (overrides.configPath !== undefined) {
        path = resolve(startPath, overrides.configPath);
        if (!existsSync(path)) {
            throw new ConfigError(`Config file not found: ${path}`);
        }
    } else {
        path = findConfigFile(startPath);
    }

    const values = path ? readConfigFile(path) : {};
    if (overrides.threshold !== undefined) {
        values.threshold = overrides.threshold;
    }

    const result = OrganizerConfigSchema.safeParse(values);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration${path ? ` in ${path}` : ''}: ${issues}`);
    }

    return { config: result.data, path };
}
