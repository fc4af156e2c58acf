import { z } from 'zod';

export const INSTALL_LANGUAGES = ['node', 'python', 'rust'] as const;
export const EXIT_ONE_CONVENTIONS = ['modified', 'violation'] as const;

export const HookEntrySchema = z.object({
    name: z.string().min(1),
    enabled: z.boolean().optional().default(true),
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional().default([]),
    args: z.array(z.string()).optional().default([]),
    // External hooks only
    command: z.string().min(1).optional(),
    install: z.string().min(1).optional(),
    language: z.enum(INSTALL_LANGUAGES).optional(),
    package: z.string().min(1).optional(),
    repo: z.string().min(1).optional(),
    install_args: z.array(z.string()).optional(),
    working_dir: z.string().min(1).optional(),
    env: z.record(z.string()).optional().default({}),
    on_exit_1: z.enum(EXIT_ONE_CONVENTIONS).optional(),
    timeout_ms: z.number().int().positive().optional(),
}).strict();

export const ConfigSchema = z.object({
    hooks: z.array(HookEntrySchema),
    cache_dir: z.string().min(1).optional(),
    jobs: z.number().int().positive().optional(),
    changelog: z.boolean().optional().default(false),
}).strict();

export type HookEntry = z.infer<typeof HookEntrySchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type InstallLanguage = typeof INSTALL_LANGUAGES[number];
export type ExitOneConvention = typeof EXIT_ONE_CONVENTIONS[number];

export const OutcomeKindSchema = z.enum(['CLEAN', 'MODIFIED', 'VIOLATION', 'EXTERNAL_FAILURE', 'TOOL_ERROR']);
export type OutcomeKind = z.infer<typeof OutcomeKindSchema>;

export const HookOutcomeSchema = z.object({
    hook: z.string(),
    kind: OutcomeKindSchema,
    files: z.array(z.string()),
    messages: z.array(z.string()),
    detail: z.string().optional(),
    duration_ms: z.number(),
});
export type HookOutcome = z.infer<typeof HookOutcomeSchema>;

export const RunStatusSchema = z.enum(['PASS', 'FAIL', 'ERROR']);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const EXIT_CLEAN = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_ENGINE_ERROR = 2;
export type ExitCode = typeof EXIT_CLEAN | typeof EXIT_FINDINGS | typeof EXIT_ENGINE_ERROR;

export const RunReportSchema = z.object({
    status: RunStatusSchema,
    exit_code: z.union([z.literal(EXIT_CLEAN), z.literal(EXIT_FINDINGS), z.literal(EXIT_ENGINE_ERROR)]),
    outcomes: z.array(HookOutcomeSchema),
    stats: z.object({
        duration_ms: z.number(),
        hooks: z.number(),
        by_kind: z.record(z.number()),
    }),
});
export type RunReport = z.infer<typeof RunReportSchema>;

export interface ResolvedFileSet {
    hook: string;
    files: string[];
}

export * from './descriptor.js';
