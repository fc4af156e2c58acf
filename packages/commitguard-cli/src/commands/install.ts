import path from 'path';
import chalk from 'chalk';
import { EXIT_CLEAN, installGitShim } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';
import { printError } from './output.js';

export interface InstallOptions {
    path?: string;
}

export async function installCommand(cwd: string, options: InstallOptions = {}): Promise<ExitCode> {
    const binary = options.path ?? 'commitguard';
    try {
        const result = await installGitShim({ cwd, binary });
        const where = path.relative(cwd, result.path) || result.path;
        if (!result.changed) {
            console.log(chalk.dim(`${where} is already up to date`));
        } else {
            console.log(chalk.green(`Installed pre-commit shim at ${where}`));
        }
        if (result.backup) {
            console.log(chalk.yellow(`Previous hook kept at ${path.relative(cwd, result.backup)}`));
        }
        return EXIT_CLEAN;
    } catch (error) {
        return printError(error);
    }
}
