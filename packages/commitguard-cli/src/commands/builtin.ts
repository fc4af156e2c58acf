import { EXIT_CLEAN, HookOrchestrator, Logger, createBuiltinDescriptor, parseMaxBytes } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';
import { printError, printReport } from './output.js';

export interface BuiltinOptions {
    dryRun?: boolean;
    json?: boolean;
    maxBytes?: string;
}

/**
 * Run one built-in over the given paths using its default include patterns.
 */
export async function builtinCommand(cwd: string, name: string, paths: string[], options: BuiltinOptions = {}): Promise<ExitCode> {
    if (paths.length === 0) {
        Logger.info(`${name}: no paths given, nothing to do`);
        return EXIT_CLEAN;
    }

    const args = options.maxBytes !== undefined ? [options.maxBytes] : [];
    let descriptor;
    try {
        if (options.maxBytes !== undefined) {
            parseMaxBytes(args);
        }
        descriptor = createBuiltinDescriptor(name, { args });
    } catch (error) {
        return printError(error);
    }

    const orchestrator = new HookOrchestrator({ cwd });
    const report = await orchestrator.runAll([descriptor], paths, { dryRun: !!options.dryRun });
    printReport(report, { json: options.json });
    return report.exit_code;
}
