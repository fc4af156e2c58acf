import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, EXIT_CLEAN, EXIT_ENGINE_ERROR, defaultConfigTemplate } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';

export interface InitOptions {
    force?: boolean;
    dryRun?: boolean;
}

export async function initCommand(cwd: string, target: string | undefined, options: InitOptions = {}): Promise<ExitCode> {
    const configPath = path.resolve(cwd, target ?? DEFAULT_CONFIG_FILE);
    const content = defaultConfigTemplate();

    if (options.dryRun) {
        console.log(chalk.dim(`Would write ${configPath}:\n`));
        console.log(content);
        return EXIT_CLEAN;
    }

    if ((await fs.pathExists(configPath)) && !options.force) {
        console.error(chalk.yellow(`${path.relative(cwd, configPath) || configPath} already exists. Use --force to overwrite.`));
        return EXIT_ENGINE_ERROR;
    }

    await fs.outputFile(configPath, content);
    console.log(chalk.green(`Created ${path.relative(cwd, configPath)}`));
    console.log(chalk.dim('Next: run `commitguard install` to add the git pre-commit shim.'));
    return EXIT_CLEAN;
}
