import fs from 'fs-extra';
import path from 'path';
import { isMap, parseDocument } from 'yaml';
import type { ZodIssue } from 'zod';
import { ConfigError, ErrorCode, PatternError, ToolError, UnknownHookError, errorMessage } from '../errors.js';
import { builtinNames, createBuiltinDescriptor, isBuiltin } from '../hooks/registry.js';
import { validatePattern } from '../selection/file-selector.js';
import { ConfigSchema } from '../types/index.js';
import type { ExternalHookDescriptor, HookDescriptor, HookEntry, InstallSpec } from '../types/index.js';

export const DEFAULT_CONFIG_FILE = '.commitguard.yaml';

export interface LoadedConfig {
    path: string;
    hooks: HookDescriptor[];
    cacheDir?: string;
    jobs?: number;
    changelog: boolean;
}

/** Keys that only make sense for a hook that spawns a process. */
const EXTERNAL_ONLY_KEYS = [
    'command', 'install', 'language', 'package', 'repo', 'install_args', 'working_dir', 'on_exit_1', 'timeout_ms',
] as const;

function formatPath(segments: readonly (string | number)[]): string {
    let out = '';
    for (const segment of segments) {
        if (typeof segment === 'number') {
            out += `[${segment}]`;
        } else {
            out += out === '' ? segment : `.${segment}`;
        }
    }
    return out;
}

function describeIssue(issue: ZodIssue): string {
    const where = formatPath(issue.path);
    if (issue.code === 'unrecognized_keys') {
        const scope = where === '' ? 'at top level' : `at ${where}`;
        return `Unknown key '${issue.keys[0]}' ${scope}`;
    }
    return where === '' ? issue.message : `${where}: ${issue.message}`;
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadConfig(configPath: string): Promise<LoadedConfig> {
    let text: string;
    try {
        text = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
        if (isMissing(error)) {
            throw new ConfigError(
                `Config file not found: ${configPath}`,
                'Run `commitguard init` to create one, or pass --config.',
                ErrorCode.CONFIG_NOT_FOUND
            );
        }
        throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(error)}`);
    }
    return { ...parseConfig(text, configPath), path: path.resolve(configPath) };
}

function validatePatterns(patterns: readonly string[], where: string): void {
    patterns.forEach((pattern, i) => {
        try {
            validatePattern(pattern);
        } catch (error) {
            if (error instanceof PatternError) {
                throw new ConfigError(`${where}[${i}]: ${error.message}`);
            }
            throw error;
        }
    });
}

function toInstallSpec(entry: HookEntry, where: string): InstallSpec | undefined {
    if (entry.install === undefined) {
        const stray = (['language', 'package', 'repo', 'install_args'] as const).find((key) => entry[key] !== undefined);
        if (stray) {
            throw new ConfigError(`${where}.${stray}: only applies together with 'install'`);
        }
        return undefined;
    }
    if (entry.install.includes('{install}') && (entry.language === undefined || (entry.package === undefined && entry.repo === undefined))) {
        throw new ConfigError(
            `${where}.install: '{install}' needs 'language' and one of 'package' or 'repo'`,
            `Set language to one of node, python, rust and name the package or git repository to install.`
        );
    }
    return Object.freeze({
        template: entry.install,
        language: entry.language,
        package: entry.package,
        repo: entry.repo,
        installArgs: entry.install_args ? Object.freeze([...entry.install_args]) : undefined,
    });
}

function toExternal(entry: HookEntry, position: number, where: string): ExternalHookDescriptor | undefined {
    if (entry.command === undefined) {
        return undefined;
    }
    if (entry.on_exit_1 === undefined) {
        throw new ConfigError(
            `${where}: external hook '${entry.name}' must set on_exit_1`,
            `Use 'modified' for tools that rewrite files and exit 1, 'violation' for linters.`
        );
    }
    const descriptor: ExternalHookDescriptor = {
        kind: 'external',
        name: entry.name,
        enabled: entry.enabled,
        include: Object.freeze([...(entry.include ?? [])]),
        exclude: Object.freeze([...entry.exclude]),
        args: Object.freeze([...entry.args]),
        position,
        command: entry.command,
        install: toInstallSpec(entry, where),
        workingDir: entry.working_dir,
        env: Object.freeze({ ...entry.env }),
        onExit1: entry.on_exit_1,
        timeoutMs: entry.timeout_ms,
    };
    return Object.freeze(descriptor);
}

function toDescriptor(entry: HookEntry, position: number, source: string): HookDescriptor {
    const where = `${source}: hooks[${position}]`;
    validatePatterns(entry.include ?? [], `${where}.include`);
    validatePatterns(entry.exclude, `${where}.exclude`);

    if (isBuiltin(entry.name)) {
        const forbidden = EXTERNAL_ONLY_KEYS.find((key) => entry[key] !== undefined)
            ?? (Object.keys(entry.env).length > 0 ? 'env' : undefined);
        if (forbidden) {
            throw new ConfigError(
                `${where}.${forbidden}: built-in hook '${entry.name}' cannot set '${forbidden}'`,
                'Built-ins run in process; only enabled, include, exclude and args apply.'
            );
        }
        const descriptor = createBuiltinDescriptor(entry.name, {
            enabled: entry.enabled,
            include: entry.include,
            exclude: entry.exclude,
            args: entry.args,
            position,
        }, `${where}.name`);
        try {
            descriptor.hook.validateArgs(descriptor.args);
        } catch (error) {
            if (error instanceof ToolError) {
                throw new ConfigError(`${where}.args: ${error.message}`, error.suggestion);
            }
            throw error;
        }
        return descriptor;
    }

    const external = toExternal(entry, position, where);
    if (!external) {
        throw new UnknownHookError(entry.name, builtinNames(), `${where}.name`);
    }
    return external;
}

/**
 * Parse and validate a configuration document. The first problem found is
 * reported with the key path it was found at, e.g. `hooks[2].include[0]`.
 */
export function parseConfig(text: string, source = DEFAULT_CONFIG_FILE): LoadedConfig {
    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
        throw new ConfigError(`${source}: invalid YAML: ${doc.errors[0].message}`);
    }
    if (!isMap(doc.contents)) {
        throw new ConfigError(
            `${source}: expected a mapping with a 'hooks' list`,
            'Run `commitguard init` for a starting point.'
        );
    }

    const raw: unknown = doc.toJS();
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`${source}: ${describeIssue(result.error.issues[0])}`);
    }
    const config = result.data;

    const seen = new Map<string, number>();
    config.hooks.forEach((entry, i) => {
        const first = seen.get(entry.name);
        if (first !== undefined) {
            throw new ConfigError(`${source}: hooks[${i}].name: duplicate hook name '${entry.name}' (first defined at hooks[${first}])`);
        }
        seen.set(entry.name, i);
    });

    return {
        path: source,
        hooks: config.hooks.map((entry, i) => toDescriptor(entry, i, source)),
        cacheDir: config.cache_dir,
        jobs: config.jobs,
        changelog: config.changelog,
    };
}

export function defaultConfigTemplate(): string {
    return `# commitguard configuration
# Hooks run in the order listed. Built-ins need only a name; anything else
# needs a command and an on_exit_1 convention (modified | violation).

hooks:
  - name: trailing-whitespace
  - name: end-of-file-fixer
  - name: check-yaml
  - name: pretty-format-json
    enabled: false
  - name: check-added-large-files
    args: ["500000"]

  - name: prettier
    enabled: false
    include: ["*.js", "*.ts", "*.css", "*.md"]
    language: node
    package: prettier
    install: "{install}"
    command: "{bin}/prettier --write {files}"
    on_exit_1: modified

  - name: ruff
    enabled: false
    include: ["*.py"]
    language: python
    package: ruff
    install: "{install}"
    command: "{bin}/ruff check {args} {files}"
    on_exit_1: violation

  # Installed from a git repository; install_args go to the installer.
  - name: taplo
    enabled: false
    include: ["*.toml"]
    language: rust
    repo: https://github.com/tamasfe/taplo
    package: taplo-cli
    install_args: ["--locked"]
    install: "{install}"
    command: "{bin}/taplo fmt --check {files}"
    on_exit_1: violation

  - name: shellcheck
    enabled: false
    include: ["*.sh"]
    command: "shellcheck {files}"
    on_exit_1: violation
`;
}
