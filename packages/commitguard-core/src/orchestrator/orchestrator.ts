import path from 'path';
import { HookExecutor, createOutcome } from '../executor/executor.js';
import { ProvisioningManager } from '../provisioning/manager.js';
import { FileSelector } from '../selection/file-selector.js';
import { ProvisionError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { EXIT_CLEAN, EXIT_ENGINE_ERROR, EXIT_FINDINGS, OutcomeKindSchema } from '../types/index.js';
import type { ExitCode, HookDescriptor, HookOutcome, OutcomeKind, ResolvedFileSet, RunReport, RunStatus } from '../types/index.js';

export interface OrchestratorOptions {
    cwd: string;
    cacheDir?: string;
    /** Hooks run at once. Fixers may touch the same files, so the default is 1. */
    jobs?: number;
    signal?: AbortSignal;
    provisioning?: ProvisioningManager;
}

export interface RunOptions {
    dryRun: boolean;
}

type Planned =
    | { descriptor: HookDescriptor; fileSet: ResolvedFileSet; ready: Promise<Error | undefined> }
    | { descriptor: HookDescriptor; failed: HookOutcome };

export function computeExitCode(outcomes: readonly HookOutcome[]): ExitCode {
    if (outcomes.some((o) => o.kind === 'TOOL_ERROR')) return EXIT_ENGINE_ERROR;
    if (outcomes.every((o) => o.kind === 'CLEAN')) return EXIT_CLEAN;
    return EXIT_FINDINGS;
}

function statusFor(exitCode: ExitCode): RunStatus {
    switch (exitCode) {
        case EXIT_CLEAN:
            return 'PASS';
        case EXIT_FINDINGS:
            return 'FAIL';
        case EXIT_ENGINE_ERROR:
            return 'ERROR';
    }
}

export function buildReport(outcomes: HookOutcome[], durationMs: number): RunReport {
    const byKind: Record<string, number> = {};
    for (const kind of OutcomeKindSchema.options) {
        byKind[kind] = 0;
    }
    for (const o of outcomes) {
        byKind[o.kind]++;
    }
    const exitCode = computeExitCode(outcomes);
    return {
        status: statusFor(exitCode),
        exit_code: exitCode,
        outcomes,
        stats: {
            duration_ms: durationMs,
            hooks: outcomes.length,
            by_kind: byKind,
        },
    };
}

const KIND_LABELS: Record<OutcomeKind, string> = {
    CLEAN: 'Passed',
    MODIFIED: 'Modified',
    VIOLATION: 'Failed',
    EXTERNAL_FAILURE: 'Error',
    TOOL_ERROR: 'Engine error',
};

/**
 * Headline for the hook, then its messages indented beneath it.
 */
export function summarizeOutcome(o: HookOutcome): string[] {
    const files = o.files.length === 1 ? '1 file' : `${o.files.length} files`;
    const headline = `${o.hook}: ${KIND_LABELS[o.kind]}${o.kind === 'CLEAN' ? '' : ` (${files})`}`;
    return [headline, ...o.messages.map((message) => `  - ${message}`)];
}

export function summarizeReport(report: RunReport): string[] {
    return report.outcomes.flatMap(summarizeOutcome);
}

/**
 * Runs every enabled hook against the same input and folds the outcomes
 * into one report. A failing hook never stops the others.
 */
export class HookOrchestrator {
    readonly cwd: string;
    private jobs: number;
    private signal?: AbortSignal;
    private provisioning: ProvisioningManager;
    private executor: HookExecutor;

    constructor(options: OrchestratorOptions) {
        this.cwd = options.cwd;
        this.jobs = options.jobs ?? 1;
        this.signal = options.signal;
        this.provisioning = options.provisioning ?? new ProvisioningManager({ cwd: options.cwd, cacheDir: options.cacheDir });
        this.executor = new HookExecutor({ cwd: options.cwd, provisioning: this.provisioning, signal: options.signal });
    }

    async runAll(descriptors: readonly HookDescriptor[], inputPaths: readonly string[], options: RunOptions): Promise<RunReport> {
        const start = Date.now();
        const enabled = descriptors
            .filter((d) => d.enabled)
            .sort((a, b) => a.position - b.position);

        // 1. Resolve file sets
        const planned = await this.plan(enabled, inputPaths);

        // 2 + 3. Execute, each external hook waiting on its own provisioning
        const outcomes = await mapWithConcurrency(planned, this.jobs, (entry) => this.execute(entry, options.dryRun));

        const report = buildReport(outcomes, Date.now() - start);
        Logger.debug(`Run finished: ${report.status} in ${report.stats.duration_ms} ms`);
        return report;
    }

    /** The cache dir, as a root-relative glob, when it lives inside the root. */
    private cacheIgnore(): string[] {
        const relative = path.relative(this.cwd, this.provisioning.cacheDir).split(path.sep).join('/');
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) return [];
        return [`${relative}/**`];
    }

    private async plan(enabled: readonly HookDescriptor[], inputPaths: readonly string[]): Promise<Planned[]> {
        const started = Date.now();
        let candidates: string[];
        try {
            candidates = await FileSelector.expand(inputPaths, {
                cwd: this.cwd,
                ignore: this.cacheIgnore(),
            });
        } catch (error) {
            Logger.error(`Could not resolve input paths: ${errorMessage(error)}`);
            return enabled.map((descriptor) => ({
                descriptor,
                failed: createOutcome(descriptor.name, 'TOOL_ERROR', started, { messages: [errorMessage(error)] }),
            }));
        }

        return enabled.map((descriptor): Planned => {
            let fileSet: ResolvedFileSet;
            try {
                fileSet = FileSelector.filter(descriptor, candidates);
            } catch (error) {
                return {
                    descriptor,
                    failed: createOutcome(descriptor.name, 'TOOL_ERROR', started, { messages: [errorMessage(error)] }),
                };
            }
            Logger.debug(`${descriptor.name}: ${fileSet.files.length} file(s) selected`);
            return { descriptor, fileSet, ready: this.startProvisioning(descriptor, fileSet) };
        });
    }

    /**
     * Begin provisioning now so different hooks install concurrently. The
     * failure is kept as a value and reported when the hook's turn comes.
     */
    private startProvisioning(descriptor: HookDescriptor, fileSet: ResolvedFileSet): Promise<Error | undefined> {
        if (descriptor.kind !== 'external' || !descriptor.install || fileSet.files.length === 0 || this.signal?.aborted) {
            return Promise.resolve(undefined);
        }
        return this.provisioning.ensureReady(descriptor).then(
            () => undefined,
            (error: unknown) => (error instanceof Error ? error : new Error(String(error)))
        );
    }

    private async execute(entry: Planned, dryRun: boolean): Promise<HookOutcome> {
        if ('failed' in entry) {
            return entry.failed;
        }
        const { descriptor, fileSet } = entry;
        const start = Date.now();

        const provisionError = await entry.ready;
        if (provisionError) {
            Logger.warn(provisionError.message);
            return createOutcome(descriptor.name, 'EXTERNAL_FAILURE', start, {
                files: [...fileSet.files],
                messages: [provisionError.message],
                detail: provisionError instanceof ProvisionError ? provisionError.output : undefined,
            });
        }
        if (this.signal?.aborted) {
            return createOutcome(descriptor.name, 'TOOL_ERROR', start, { messages: ['run cancelled before this hook started'] });
        }

        Logger.debug(`Running ${descriptor.name} on ${fileSet.files.length} file(s)`);
        return this.executor.run(descriptor, fileSet, dryRun);
    }
}
