import type { BuiltinHook } from '../hooks/base.js';
import type { ExitOneConvention, InstallLanguage } from './index.js';

/**
 * Fields every hook carries regardless of how it runs.
 */
interface HookDescriptorBase {
    readonly name: string;
    readonly enabled: boolean;
    readonly include: readonly string[];
    readonly exclude: readonly string[];
    readonly args: readonly string[];
    /** Position in the configuration document; reports are ordered by it. */
    readonly position: number;
}

export interface BuiltinHookDescriptor extends HookDescriptorBase {
    readonly kind: 'builtin';
    readonly hook: BuiltinHook;
}

export interface InstallSpec {
    /** Shell template; `{install}` expands to the language installer, `{env}` to the hook's environment dir. */
    readonly template: string;
    readonly language?: InstallLanguage;
    readonly package?: string;
    /** Git URL installed from instead of, or alongside, a registry package. */
    readonly repo?: string;
    /** Extra flags passed to the language installer before the target. */
    readonly installArgs?: readonly string[];
}

export interface ExternalHookDescriptor extends HookDescriptorBase {
    readonly kind: 'external';
    /** Shell template; `{files}`, `{args}`, `{env}` and `{bin}` are substituted before spawning. */
    readonly command: string;
    readonly install?: InstallSpec;
    readonly workingDir?: string;
    readonly env: Readonly<Record<string, string>>;
    /** What exit code 1 means for this tool. */
    readonly onExit1: ExitOneConvention;
    readonly timeoutMs?: number;
}

export type HookDescriptor = BuiltinHookDescriptor | ExternalHookDescriptor;
export type HookKind = HookDescriptor['kind'];
