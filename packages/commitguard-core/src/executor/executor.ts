import path from 'path';
import { execa } from 'execa';
import { errorMessage } from '../errors.js';
import { ProvisioningManager } from '../provisioning/manager.js';
import { Logger } from '../utils/logger.js';
import { defaultConcurrency, mapWithConcurrency } from '../utils/concurrency.js';
import { hasPlaceholder, renderTemplate, shellJoin, shellQuote } from '../utils/shell.js';
import type { FileCheckResult } from '../hooks/base.js';
import type {
    BuiltinHookDescriptor,
    ExternalHookDescriptor,
    HookDescriptor,
    HookOutcome,
    OutcomeKind,
    ResolvedFileSet,
} from '../types/index.js';

export interface ExecutorOptions {
    cwd: string;
    provisioning?: ProvisioningManager;
    /** Files a built-in processes at once. */
    concurrency?: number;
    signal?: AbortSignal;
}

export function createOutcome(hook: string, kind: OutcomeKind, startedAt: number, fields: Partial<Pick<HookOutcome, 'files' | 'messages' | 'detail'>> = {}): HookOutcome {
    return {
        hook,
        kind,
        files: fields.files ?? [],
        messages: fields.messages ?? [],
        ...(fields.detail !== undefined ? { detail: fields.detail } : {}),
        duration_ms: Date.now() - startedAt,
    };
}

/**
 * Runs one hook against its resolved file set and folds the result into a
 * HookOutcome. Hook failures never throw out of `run`.
 */
export class HookExecutor {
    readonly cwd: string;
    private provisioning: ProvisioningManager;
    private concurrency: number;
    private signal?: AbortSignal;

    constructor(options: ExecutorOptions) {
        this.cwd = options.cwd;
        this.provisioning = options.provisioning ?? new ProvisioningManager({ cwd: options.cwd });
        this.concurrency = options.concurrency ?? defaultConcurrency();
        this.signal = options.signal;
    }

    async run(descriptor: HookDescriptor, fileSet: ResolvedFileSet, dryRun: boolean): Promise<HookOutcome> {
        switch (descriptor.kind) {
            case 'builtin':
                return this.runBuiltin(descriptor, fileSet, dryRun);
            case 'external':
                return this.runExternal(descriptor, fileSet);
        }
    }

    private async runBuiltin(descriptor: BuiltinHookDescriptor, fileSet: ResolvedFileSet, dryRun: boolean): Promise<HookOutcome> {
        const start = Date.now();
        const context = { cwd: this.cwd, dryRun, args: descriptor.args };

        const finished = new Map<number, FileCheckResult>();
        let results: FileCheckResult[];
        try {
            results = await mapWithConcurrency(fileSet.files, this.concurrency, async (file, i) => {
                const result = await descriptor.hook.checkFile(file, context);
                finished.set(i, result);
                return result;
            });
        } catch (error) {
            Logger.debug(`${descriptor.name}: ${error instanceof Error && error.stack ? error.stack : errorMessage(error)}`);
            // Files rewritten before the failure stay rewritten; report them.
            const files: string[] = [];
            const messages = [errorMessage(error)];
            fileSet.files.forEach((file, i) => {
                const result = finished.get(i);
                if (result?.status === 'modified') {
                    files.push(file);
                    messages.push(result.message);
                }
            });
            return createOutcome(descriptor.name, 'TOOL_ERROR', start, {
                files,
                messages,
                detail: error instanceof Error ? error.stack : undefined,
            });
        }

        const modified: string[] = [];
        const violations: string[] = [];
        const messages: string[] = [];
        results.forEach((result, i) => {
            const file = fileSet.files[i];
            switch (result.status) {
                case 'modified':
                    modified.push(file);
                    messages.push(result.message);
                    break;
                case 'violation':
                    violations.push(file);
                    messages.push(result.message);
                    break;
                case 'skipped':
                    Logger.debug(`${descriptor.name}: skipped ${file} (${result.reason})`);
                    break;
                case 'clean':
                    break;
            }
        });

        if (violations.length > 0) {
            const files = fileSet.files.filter((file) => violations.includes(file) || modified.includes(file));
            return createOutcome(descriptor.name, 'VIOLATION', start, { files, messages });
        }
        if (modified.length > 0) {
            return createOutcome(descriptor.name, 'MODIFIED', start, { files: modified, messages });
        }
        return createOutcome(descriptor.name, 'CLEAN', start);
    }

    /**
     * The shell command an external hook runs for the given files. File paths
     * are made relative to the hook's working directory.
     */
    buildCommand(descriptor: ExternalHookDescriptor, files: readonly string[]): string {
        const workDir = this.workingDir(descriptor);
        const relative = files.map((file) => path.relative(workDir, path.resolve(this.cwd, file)).split(path.sep).join('/'));
        const quotedFiles = shellJoin(relative);
        const quotedArgs = shellJoin(descriptor.args);
        const usesArgs = hasPlaceholder(descriptor.command, 'args');
        const usesFiles = hasPlaceholder(descriptor.command, 'files');

        // Args go before files unless the template places them itself.
        const filesValue = usesArgs ? quotedFiles : [quotedArgs, quotedFiles].filter(Boolean).join(' ');
        const rendered = renderTemplate(descriptor.command, {
            files: filesValue,
            args: quotedArgs,
            env: shellQuote(this.provisioning.envDir(descriptor)),
            bin: shellQuote(this.provisioning.binDir(descriptor)),
        });
        return usesFiles ? rendered : `${rendered} ${filesValue}`.trimEnd();
    }

    private workingDir(descriptor: ExternalHookDescriptor): string {
        return descriptor.workingDir ? path.resolve(this.cwd, descriptor.workingDir) : this.cwd;
    }

    private async runExternal(descriptor: ExternalHookDescriptor, fileSet: ResolvedFileSet): Promise<HookOutcome> {
        const start = Date.now();
        if (fileSet.files.length === 0) {
            return createOutcome(descriptor.name, 'CLEAN', start);
        }
        if (this.signal?.aborted) {
            return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, { messages: ['cancelled before start'] });
        }

        const command = this.buildCommand(descriptor, fileSet.files);
        Logger.debug(`${descriptor.name}: ${command}`);

        let result;
        try {
            result = await execa(command, {
                shell: true,
                cwd: this.workingDir(descriptor),
                env: { ...descriptor.env },
                all: true,
                reject: false,
                timeout: descriptor.timeoutMs,
                signal: this.signal,
                killSignal: 'SIGTERM',
            });
        } catch (error) {
            return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, {
                messages: [`could not start: ${errorMessage(error)}`],
            });
        }

        const detail = result.all;
        if (detail) {
            Logger.debug(`[${descriptor.name}]\n${detail}`);
        }
        if (result.isCanceled) {
            return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, { messages: ['cancelled'], detail });
        }
        if (result.timedOut) {
            return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, {
                messages: [`timed out after ${descriptor.timeoutMs} ms`],
                detail,
            });
        }

        switch (result.exitCode) {
            case 0:
                return createOutcome(descriptor.name, 'CLEAN', start);
            case 1: {
                const kind = descriptor.onExit1 === 'modified' ? 'MODIFIED' : 'VIOLATION';
                const summary = descriptor.onExit1 === 'modified' ? 'modified files' : 'found problems';
                return createOutcome(descriptor.name, kind, start, {
                    files: [...fileSet.files],
                    messages: [`${descriptor.name} ${summary} (exit code 1)`],
                    detail,
                });
            }
            default:
                return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, {
                    messages: [result.exitCode === undefined ? 'process did not start' : `exited with code ${result.exitCode}`],
                    detail,
                });
        }
    }
}
