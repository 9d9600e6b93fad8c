import { basename, resolve } from 'node:path';
import type { EnginePorts } from '@statement-sorter/core';
import type { OrganizerConfig } from '@statement-sorter/shared';
import { resolveConfig } from '../config/load-config.js';
import { NodeFileSystem } from '../adapters/node-fs.js';
import { createDefaultExtractors } from '../extractors/registry.js';
import { createPipelineState } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import type { ParsedCommand } from '../types.js';
import { errorMessage } from '../utils/errors.js';

export interface RunContext {
    state: PipelineState;
    /** Config file in effect; null when running on defaults. */
    configPath: string | null;
    /** Detaches the SIGINT handler. */
    dispose: () => void;
}

/**
 * Node ports for a run. Extraction failures and extensions without an
 * extractor are reported through `warnings`.
 *
 * A document is read once for tokens and again for its date, so a failure
 * is reported only the first time for each path.
 */
export function createNodePorts(config: OrganizerConfig, warnings: string[]): EnginePorts {
    const unreadable = new Set<string>();
    const extractor = createDefaultExtractors((path, err) => {
        if (unreadable.has(path)) return;
        unreadable.add(path);
        warnings.push(`Could not read text from ${basename(path)}: ${errorMessage(err)}`);
    });

    for (const extension of config.extensions) {
        if (!extractor.supports(extension)) {
            warnings.push(`No text extractor for .${extension}; those documents match on filename only`);
        }
    }

    return { fs: new NodeFileSystem(), extractor };
}

/**
 * Loads configuration and builds the initial pipeline state. Ctrl-C aborts
 * the run between documents. Throws ConfigError on bad configuration.
 */
export function createRunContext(parsed: ParsedCommand): RunContext {
    const { config, path } = resolveConfig({
        configPath: parsed.options.config,
        threshold: parsed.options.threshold,
    });

    const warnings: string[] = [];
    const controller = new AbortController();
    const onSigint = () => controller.abort(new Error('Cancelled by user'));
    process.once('SIGINT', onSigint);

    const state = createPipelineState({
        sourceDir: resolve(parsed.source),
        destinationRoot: resolve(parsed.destination),
        config,
        options: parsed.options,
        ports: createNodePorts(config, warnings),
        signal: controller.signal,
        warnings,
    });

    return {
        state,
        configPath: path,
        dispose: () => {
            process.off('SIGINT', onSigint);
        },
    };
}
