import fs from 'fs-extra';
import path from 'path';
import { execa } from 'execa';
import { ToolError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { writeFileAtomic } from '../utils/fs.js';
import { shellQuote } from '../utils/shell.js';

export const SHIM_MARKER = '# installed by commitguard';
export const BACKUP_SUFFIX = '.backup';

export interface ShimInstallResult {
    path: string;
    /** Where a pre-existing foreign hook was moved. */
    backup?: string;
    /** False when an identical shim was already installed. */
    changed: boolean;
}

export function renderPreCommitShim(binary: string): string {
    return [
        '#!/bin/sh',
        SHIM_MARKER,
        '# Runs the configured hooks against the staged files.',
        `exec ${shellQuote(binary)} run-config --staged`,
        '',
    ].join('\n');
}

export async function resolveHookPath(cwd: string): Promise<string> {
    try {
        const { stdout } = await execa('git', ['rev-parse', '--git-path', 'hooks/pre-commit'], { cwd });
        return path.resolve(cwd, stdout.trim());
    } catch (error) {
        throw new ToolError(`Not a git repository: ${errorMessage(error)}`, 'Run `git init` first, or run install inside the work tree.');
    }
}

/**
 * Write the shim at `hookPath`. A hook that commitguard did not install is
 * moved aside to `<hookPath>.backup` rather than overwritten.
 */
export async function writeShim(hookPath: string, binary: string): Promise<ShimInstallResult> {
    const content = renderPreCommitShim(binary);
    let backup: string | undefined;

    if (await fs.pathExists(hookPath)) {
        const existing = await fs.readFile(hookPath, 'utf-8');
        if (existing === content) {
            return { path: hookPath, changed: false };
        }
        if (!existing.includes(SHIM_MARKER)) {
            backup = hookPath + BACKUP_SUFFIX;
            if (await fs.pathExists(backup)) {
                throw new ToolError(
                    `${hookPath} is not a commitguard shim and ${backup} already exists`,
                    'Move one of them out of the way and run install again.'
                );
            }
            await fs.move(hookPath, backup);
            Logger.info(`Moved existing hook to ${backup}`);
        }
    }

    await fs.ensureDir(path.dirname(hookPath));
    await writeFileAtomic(hookPath, content);
    await fs.chmod(hookPath, 0o755);
    return { path: hookPath, backup, changed: true };
}

export async function installGitShim(options: { cwd: string; binary: string }): Promise<ShimInstallResult> {
    const hookPath = await resolveHookPath(options.cwd);
    return writeShim(hookPath, options.binary);
}
