import { Command } from 'commander';
import { LogLevel, Logger, builtinTransforms } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';
import { builtinCommand } from './commands/builtin.js';
import { runConfigCommand } from './commands/run-config.js';
import { listHooksCommand } from './commands/list-hooks.js';
import { initCommand } from './commands/init.js';
import { installCommand } from './commands/install.js';
import { createHookCommand } from './commands/create-hook.js';
import { validateHookCommand } from './commands/validate-hook.js';
import { completionsCommand } from './commands/completions.js';

export const CLI_VERSION = '0.1.0';

interface GlobalOptions {
    dryRun?: boolean;
    debug?: boolean;
}

export function createProgram(cwd: string = process.cwd()): Command {
    const program = new Command();
    const globals = (): GlobalOptions => program.opts<GlobalOptions>();
    const exit = (code: ExitCode) => {
        process.exitCode = code;
    };

    program
        .name('commitguard')
        .description('Run pre-commit hooks: built-in fixers and provisioned external tools')
        .version(CLI_VERSION)
        .option('--dry-run', 'Report what hooks would change without writing files')
        .option('--debug', 'Show resolved commands and raw tool output')
        .hook('preAction', () => {
            if (globals().debug) {
                Logger.setLevel(LogLevel.DEBUG);
            }
        });

    for (const hook of builtinTransforms().values()) {
        const command = program
            .command(hook.id)
            .description(`${hook.title} (built-in ${hook.mode})`)
            .argument('[paths...]', 'Files or directories to process')
            .option('--json', 'Print the report as JSON');
        if (hook.id === 'check-added-large-files') {
            command.option('--max-bytes <n>', 'Largest allowed file size in bytes');
        }
        command.action(async (paths: string[], options: { json?: boolean; maxBytes?: string }) => {
            exit(await builtinCommand(cwd, hook.id, paths, { ...options, dryRun: globals().dryRun }));
        });
    }

    program
        .command('run-config')
        .description('Run every enabled hook from the configuration')
        .argument('[paths...]', 'Files or directories to check (default: .)')
        .option('-c, --config <path>', 'Path to the configuration file', '.commitguard.yaml')
        .option('--staged', 'Check the files staged in git')
        .option('--json', 'Print the report as JSON')
        .option('-j, --jobs <n>', 'Hooks to run at once')
        .addHelpText('after', `
Examples:
  $ commitguard run-config                    # Every file under the current directory
  $ commitguard run-config src README.md      # Only these paths
  $ commitguard --dry-run run-config --staged # Preview fixes for staged files
    `)
        .action(async (paths: string[], options: { config?: string; staged?: boolean; json?: boolean; jobs?: string }) => {
            exit(await runConfigCommand(cwd, paths, { ...options, dryRun: globals().dryRun }));
        });

    program
        .command('list-hooks')
        .description('List configured hooks and their provisioning state')
        .option('-c, --config <path>', 'Path to the configuration file', '.commitguard.yaml')
        .option('--all', 'Include disabled hooks')
        .action(async (options: { config?: string; all?: boolean }) => {
            exit(await listHooksCommand(cwd, options));
        });

    program
        .command('init')
        .description('Write a starter configuration')
        .argument('[path]', 'Where to write it', '.commitguard.yaml')
        .option('-f, --force', 'Overwrite an existing file')
        .action(async (target: string, options: { force?: boolean }) => {
            exit(await initCommand(cwd, target, { ...options, dryRun: globals().dryRun }));
        });

    program
        .command('install')
        .description('Install the git pre-commit shim')
        .option('--path <binary>', 'Command the shim runs', 'commitguard')
        .action(async (options: { path?: string }) => {
            exit(await installCommand(cwd, options));
        });

    program
        .command('create-hook')
        .description('Scaffold a custom hook script and config snippet')
        .argument('<name>', 'Hook name')
        .argument('<language>', 'node, python or shell')
        .argument('<description>', 'One-line description')
        .option('--output-dir <dir>', 'Where to write the files', '.')
        .option('-f, --force', 'Overwrite an existing script')
        .action(async (name: string, language: string, description: string, options: { outputDir?: string; force?: boolean }) => {
            exit(await createHookCommand(cwd, name, language, description, options));
        });

    program
        .command('validate-hook')
        .description('Check a built-in hook against its contract')
        .argument('<name>', 'Built-in hook name')
        .action(async (name: string) => {
            exit(await validateHookCommand(name));
        });

    program
        .command('completions')
        .description('Print a shell completion script')
        .argument('<shell>', 'bash, zsh or fish')
        .option('--out <file>', 'Write to a file instead of stdout')
        .action(async (shell: string, options: { out?: string }) => {
            exit(await completionsCommand(program, cwd, shell, options));
        });

    return program;
}
