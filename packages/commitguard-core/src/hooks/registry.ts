import type { BuiltinHook } from './base.js';
import { TrailingWhitespaceHook } from './builtin/trailing-whitespace.js';
import { EndOfFileFixerHook } from './builtin/end-of-file-fixer.js';
import { CheckYamlHook } from './builtin/check-yaml.js';
import { PrettyFormatJsonHook } from './builtin/pretty-format-json.js';
import { CheckAddedLargeFilesHook } from './builtin/check-added-large-files.js';
import { UnknownHookError } from '../errors.js';
import type { BuiltinHookDescriptor } from '../types/index.js';

const BUILTIN_HOOKS: ReadonlyMap<string, BuiltinHook> = new Map(
    [
        new TrailingWhitespaceHook(),
        new EndOfFileFixerHook(),
        new CheckYamlHook(),
        new PrettyFormatJsonHook(),
        new CheckAddedLargeFilesHook(),
    ].map((hook): [string, BuiltinHook] => [hook.id, hook])
);

export function builtinTransforms(): ReadonlyMap<string, BuiltinHook> {
    return BUILTIN_HOOKS;
}

export function builtinNames(): string[] {
    return [...BUILTIN_HOOKS.keys()];
}

export function isBuiltin(name: string): boolean {
    return BUILTIN_HOOKS.has(name);
}

export function resolveBuiltin(name: string, where?: string): BuiltinHook {
    const hook = BUILTIN_HOOKS.get(name);
    if (!hook) {
        throw new UnknownHookError(name, builtinNames(), where);
    }
    return hook;
}

export interface BuiltinOverrides {
    enabled?: boolean;
    include?: readonly string[];
    exclude?: readonly string[];
    args?: readonly string[];
    position?: number;
}

/**
 * Build the descriptor for a built-in, falling back to its compiled-in
 * include patterns when the caller gives none.
 */
export function createBuiltinDescriptor(name: string, overrides: BuiltinOverrides = {}, where?: string): BuiltinHookDescriptor {
    const hook = resolveBuiltin(name, where);
    const descriptor: BuiltinHookDescriptor = {
        kind: 'builtin',
        name,
        hook,
        enabled: overrides.enabled ?? true,
        include: Object.freeze([...(overrides.include ?? hook.defaultInclude)]),
        exclude: Object.freeze([...(overrides.exclude ?? [])]),
        args: Object.freeze([...(overrides.args ?? [])]),
        position: overrides.position ?? 0,
    };
    return Object.freeze(descriptor);
}
