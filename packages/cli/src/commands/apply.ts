import { APPLY_STEPS, runPipeline, SCAN_STEPS } from '../pipeline/runner.js';
import type { ParsedCommand } from '../types.js';
import { errorMessage } from '../utils/errors.js';
import { info, log } from '../utils/console.js';
import { promptContinue } from '../utils/prompt.js';
import { createRunContext, type RunContext } from './context.js';
import { printJson, printMoveReport, printOutcome, printScanResult } from './report.js';

/**
 * `stmtsort apply`: a fresh scan, a confirmation, then the moves.
 * Resolves to the process exit code; any failed move makes it 1.
 */
export async function applyCommand(parsed: ParsedCommand): Promise<number> {
    const { json, verbose, dryRun } = parsed.options;
    if (!json) {
        log(`\nStatement Sorter - Applying ${parsed.source}${dryRun ? ' (dry run)' : ''}`);
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

        let state = await runPipeline(context.state, SCAN_STEPS);
        const result = state.scanResult;
        if (printOutcome(state) || !result) {
            return 1;
        }
        if (!json) {
            printScanResult(result, verbose);
        }

        const matched = result.candidates.filter(c => c.destinationPath !== null).length;
        if (matched === 0) {
            if (json) printJson({ moved: [], failures: [], skipped: result.candidates.length });
            else log('\nNothing to move.');
            return 0;
        }

        if (!dryRun && !(await promptContinue(`\nMove ${matched} documents?`, parsed.options))) {
            log('\nNothing was moved.');
            return 1;
        }

        state = await runPipeline(state, APPLY_STEPS);
        const fatal = printOutcome(state);
        const report = state.moveReport;
        if (!report) {
            return 1;
        }

        if (json) {
            printJson(report);
        } else {
            printMoveReport(report, dryRun);
        }
        return fatal || report.failures.length > 0 ? 1 : 0;
    } finally {
        context.dispose();
    }
}
