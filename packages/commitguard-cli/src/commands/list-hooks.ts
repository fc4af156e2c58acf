import path from 'path';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, EXIT_CLEAN, ProvisioningManager, loadConfig } from '@commitguard/core';
import type { ExitCode, HookDescriptor } from '@commitguard/core';
import { printError } from './output.js';

export interface ListHooksOptions {
    config?: string;
    all?: boolean;
}

export interface HookListing {
    name: string;
    kind: HookDescriptor['kind'];
    enabled: boolean;
    runs: string;
    provisioning: 'n/a' | 'ready' | 'pending';
}

export async function describeHooks(hooks: readonly HookDescriptor[], provisioning: ProvisioningManager): Promise<HookListing[]> {
    const rows: HookListing[] = [];
    for (const hook of hooks) {
        if (hook.kind === 'builtin') {
            rows.push({ name: hook.name, kind: hook.kind, enabled: hook.enabled, runs: hook.include.join(', '), provisioning: 'n/a' });
            continue;
        }
        const state = !hook.install ? 'n/a' : (await provisioning.isReady(hook)) ? 'ready' : 'pending';
        rows.push({ name: hook.name, kind: hook.kind, enabled: hook.enabled, runs: hook.command, provisioning: state });
    }
    return rows;
}

export async function listHooksCommand(cwd: string, options: ListHooksOptions = {}): Promise<ExitCode> {
    let rows: HookListing[];
    try {
        const config = await loadConfig(path.resolve(cwd, options.config ?? DEFAULT_CONFIG_FILE));
        const provisioning = new ProvisioningManager({ cwd, cacheDir: config.cacheDir });
        const hooks = options.all ? config.hooks : config.hooks.filter((h) => h.enabled);
        rows = await describeHooks(hooks, provisioning);
    } catch (error) {
        return printError(error);
    }

    if (rows.length === 0) {
        console.log(chalk.dim('No hooks enabled. Use --all to include disabled ones.'));
        return EXIT_CLEAN;
    }

    const width = Math.max(...rows.map((r) => r.name.length));
    for (const row of rows) {
        const name = row.enabled ? chalk.bold(row.name.padEnd(width)) : chalk.dim(row.name.padEnd(width));
        const state = row.enabled ? '' : chalk.dim(' (disabled)');
        const provisioning = row.provisioning === 'n/a' ? '' : chalk.dim(` [${row.provisioning}]`);
        console.log(`${name}  ${row.kind.padEnd(8)}  ${row.runs}${provisioning}${state}`);
    }
    return EXIT_CLEAN;
}
