import { runPipeline, SCAN_STEPS } from '../pipeline/runner.js';
import type { ParsedCommand } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { info, log } from '../utils/console.js';
import { createRunContext, type RunContext } from './context.js';
import { printJson, printOutcome, printScanResult } from './report.js';

/**
 * `stmtsort scan`: profile, scan and plan, then print the proposals.
 * Read-only. Resolves to the process exit code.
 */
export async function scanCommand(parsed: ParsedCommand): Promise<number> {
    const { json, verbose } = parsed.options;
    if (!json) {
        log(`\nStatement Sorter - Scanning ${parsed.source}`);
    }

    let context: RunContext;
    try {
        context = createRunContext(parsed);
    } catch (err) {
        console.error(`\n✖ Error: ${errorMessage(err)}`);
        return 1;
    }

    try {
        if (!json && context.configPath) {
            info(`Config: ${context.configPath}`);
        }

        const state = await runPipeline(context.state, SCAN_STEPS);
        if (printOutcome(state) || !state.scanResult) {
            return 1;
        }

        if (json) {
            printJson(state.scanResult);
        } else {
            printScanResult(state.scanResult, verbose);
        }
        return 0;
    } finally {
        context.dispose();
    }
}
