/**
 * Statement Sorter CLI - Core Types
 */

export type CommandName = 'scan' | 'apply';

export interface CommandOptions {
    /** Overrides the configured match threshold. */
    threshold?: number;
    /** Explicit config file; otherwise stmtsort.yaml is searched upward. */
    config?: string;
    json: boolean;
    verbose: boolean;
    dryRun: boolean;
    yes: boolean;
}

export interface ParsedCommand {
    command: CommandName;
    source: string;
    destination: string;
    options: CommandOptions;
}
