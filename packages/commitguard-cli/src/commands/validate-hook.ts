import chalk from 'chalk';
import { EXIT_CLEAN, EXIT_FINDINGS, validateBuiltinHook } from '@commitguard/core';
import type { ExitCode, ValidationCheck } from '@commitguard/core';
import { printError } from './output.js';

export async function validateHookCommand(name: string): Promise<ExitCode> {
    let checks: ValidationCheck[];
    try {
        checks = await validateBuiltinHook(name);
    } catch (error) {
        return printError(error);
    }

    for (const check of checks) {
        const mark = check.passed ? chalk.green('✓') : chalk.red('✗');
        console.log(`${mark} ${check.name}${check.detail ? chalk.dim(` (${check.detail})`) : ''}`);
    }
    const failed = checks.filter((c) => !c.passed).length;
    if (failed > 0) {
        console.log(chalk.red(`\n${name}: ${failed} of ${checks.length} checks failed`));
        return EXIT_FINDINGS;
    }
    console.log(chalk.green(`\n${name}: all ${checks.length} checks passed`));
    return EXIT_CLEAN;
}
