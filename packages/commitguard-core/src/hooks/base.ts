import fs from 'fs-extra';
import path from 'path';
import { isBinaryFile } from 'isbinaryfile';
import { writeFileAtomic } from '../utils/fs.js';
import { Logger } from '../utils/logger.js';

export type HookMode = 'fixer' | 'checker';

export interface HookFileContext {
    cwd: string;
    dryRun: boolean;
    args: readonly string[];
}

export type FileCheckResult =
    | { status: 'clean' }
    | { status: 'skipped'; reason: string }
    | { status: 'modified'; message: string }
    | { status: 'violation'; message: string };

export interface ChangeWording {
    done: string;
    pending: string;
}

/**
 * An in-process transform. Implementations look at one file at a time and
 * never share state between files, so the executor may run them in parallel.
 */
export abstract class BuiltinHook {
    constructor(
        public readonly id: string,
        public readonly title: string,
        public readonly mode: HookMode,
        public readonly defaultInclude: readonly string[]
    ) { }

    abstract checkFile(file: string, context: HookFileContext): Promise<FileCheckResult>;

    /**
     * Reject `args` this hook cannot use. Called when the config is loaded,
     * so a bad value fails once instead of on every file. Throws ToolError.
     */
    validateArgs(_args: readonly string[]): void { }

    protected resolve(file: string, context: HookFileContext): string {
        return path.isAbsolute(file) ? file : path.join(context.cwd, file);
    }

    /**
     * Read a file as UTF-8, or null when it looks binary.
     */
    protected async readText(file: string, context: HookFileContext): Promise<string | null> {
        const absPath = this.resolve(file, context);
        const buffer = await fs.readFile(absPath);
        if (await isBinaryFile(buffer, buffer.length)) {
            Logger.debug(`${this.id}: skipping binary file ${file}`);
            return null;
        }
        return buffer.toString('utf-8');
    }

    /**
     * Replace a file's content unless running dry. Reports the change either way.
     */
    protected async rewrite(file: string, next: string, context: HookFileContext, change: ChangeWording): Promise<FileCheckResult> {
        if (context.dryRun) {
            return { status: 'modified', message: `${file}: ${change.pending}` };
        }
        await writeFileAtomic(this.resolve(file, context), next);
        return { status: 'modified', message: `${file}: ${change.done}` };
    }

    protected clean(): FileCheckResult {
        return { status: 'clean' };
    }

    protected skipped(reason: string): FileCheckResult {
        return { status: 'skipped', reason };
    }

    protected violation(message: string): FileCheckResult {
        return { status: 'violation', message };
    }
}
