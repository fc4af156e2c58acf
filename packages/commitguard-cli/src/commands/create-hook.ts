import path from 'path';
import chalk from 'chalk';
import { EXIT_CLEAN, SCAFFOLD_LANGUAGES, ToolError, isScaffoldLanguage, scaffoldHook } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';
import { printError } from './output.js';

export interface CreateHookOptions {
    outputDir?: string;
    force?: boolean;
}

export async function createHookCommand(
    cwd: string,
    name: string,
    language: string,
    description: string,
    options: CreateHookOptions = {}
): Promise<ExitCode> {
    try {
        if (!isScaffoldLanguage(language)) {
            throw new ToolError(`Unsupported language '${language}'`, `Choose one of: ${SCAFFOLD_LANGUAGES.join(', ')}.`);
        }
        const result = await scaffoldHook({
            name,
            language,
            description,
            outputDir: options.outputDir ?? '.',
            cwd,
            force: options.force,
        });
        console.log(chalk.green(`Created ${path.relative(cwd, result.script)}`));
        console.log(chalk.dim(`Paste ${path.relative(cwd, result.snippet)} into your config to enable it.`));
        return EXIT_CLEAN;
    } catch (error) {
        return printError(error);
    }
}
