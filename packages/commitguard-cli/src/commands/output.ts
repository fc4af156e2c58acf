import chalk from 'chalk';
import { CommitGuardError, EXIT_ENGINE_ERROR, Logger, errorMessage, summarizeOutcome } from '@commitguard/core';
import type { HookOutcome, OutcomeKind, RunReport } from '@commitguard/core';

const KIND_COLORS: Record<OutcomeKind, (text: string) => string> = {
    CLEAN: chalk.green,
    MODIFIED: chalk.yellow,
    VIOLATION: chalk.red,
    EXTERNAL_FAILURE: chalk.red,
    TOOL_ERROR: chalk.magenta,
};

function printOutcome(outcome: HookOutcome): void {
    const [headline, ...messages] = summarizeOutcome(outcome);
    console.log(KIND_COLORS[outcome.kind](headline));
    for (const message of messages) {
        console.log(chalk.dim(message));
    }
    if (outcome.detail && Logger.isDebug()) {
        console.log(chalk.dim(outcome.detail.replace(/^/gm, '    ')));
    }
}

export function printReport(report: RunReport, options: { json?: boolean } = {}): void {
    if (options.json) {
        process.stdout.write(JSON.stringify(report, null, 2) + '\n');
        return;
    }

    for (const outcome of report.outcomes) {
        printOutcome(outcome);
    }

    const seconds = (report.stats.duration_ms / 1000).toFixed(2);
    switch (report.status) {
        case 'PASS':
            console.log(chalk.green.bold(`\nPASS`) + chalk.dim(` ${report.stats.hooks} hook(s) in ${seconds}s`));
            break;
        case 'FAIL':
            console.log(chalk.red.bold(`\nFAIL`) + chalk.dim(` ${report.stats.hooks} hook(s) in ${seconds}s`));
            break;
        case 'ERROR':
            console.log(chalk.magenta.bold(`\nERROR`) + chalk.dim(' the engine could not complete every hook'));
            break;
    }
}

/**
 * Print an error that stops a command and return the engine-error exit code.
 */
export function printError(error: unknown): typeof EXIT_ENGINE_ERROR {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    if (error instanceof CommitGuardError && error.suggestion) {
        console.error(chalk.dim(error.suggestion));
    }
    if (!(error instanceof CommitGuardError) && error instanceof Error && error.stack) {
        Logger.debug(error.stack);
    }
    return EXIT_ENGINE_ERROR;
}
