import path from 'path';
import chalk from 'chalk';
import {
    DEFAULT_CONFIG_FILE,
    FileSelector,
    HookOrchestrator,
    Logger,
    loadConfig,
    writeChangelog,
} from '@commitguard/core';
import type { ExitCode, LoadedConfig } from '@commitguard/core';
import { printError, printReport } from './output.js';

export interface RunConfigOptions {
    config?: string;
    staged?: boolean;
    json?: boolean;
    jobs?: string;
    dryRun?: boolean;
}

function parseJobs(value: string | undefined, fallback: number | undefined): number | undefined {
    if (value === undefined) return fallback;
    const jobs = Number(value);
    if (!Number.isInteger(jobs) || jobs < 1) {
        throw new Error(`--jobs must be a positive integer, got '${value}'`);
    }
    return jobs;
}

async function resolveInputs(cwd: string, paths: string[], staged: boolean): Promise<string[]> {
    if (staged) {
        const files = await FileSelector.staged(cwd);
        Logger.debug(`${files.length} staged file(s)`);
        return files;
    }
    return paths.length > 0 ? paths : ['.'];
}

/**
 * Load the configuration and run every enabled hook over the inputs.
 */
export async function runConfigCommand(cwd: string, paths: string[], options: RunConfigOptions = {}): Promise<ExitCode> {
    const configPath = path.resolve(cwd, options.config ?? DEFAULT_CONFIG_FILE);

    let config: LoadedConfig;
    let jobs: number | undefined;
    let inputs: string[];
    try {
        config = await loadConfig(configPath);
        jobs = parseJobs(options.jobs, config.jobs);
        inputs = await resolveInputs(cwd, paths, !!options.staged);
    } catch (error) {
        return printError(error);
    }

    const controller = new AbortController();
    const cancel = (signal: NodeJS.Signals) => {
        Logger.warn(`Received ${signal}, stopping running hooks...`);
        controller.abort();
    };
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    try {
        if (!options.json) {
            console.log(chalk.blue(`Running ${config.hooks.filter((h) => h.enabled).length} hook(s)...\n`));
        }
        const orchestrator = new HookOrchestrator({
            cwd,
            cacheDir: config.cacheDir,
            jobs,
            signal: controller.signal,
        });
        const report = await orchestrator.runAll(config.hooks, inputs, { dryRun: !!options.dryRun });

        if (config.changelog && !options.dryRun) {
            const written = await writeChangelog(cwd, report);
            if (written) Logger.debug(`Changelog updated: ${written}`);
        }

        printReport(report, { json: options.json });
        return report.exit_code;
    } finally {
        process.off('SIGINT', cancel);
        process.off('SIGTERM', cancel);
    }
}
