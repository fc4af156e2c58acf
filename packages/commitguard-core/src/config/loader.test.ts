import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { defaultConfigTemplate, loadConfig, parseConfig } from './loader.js';
import { ConfigError, ErrorCode, UnknownHookError } from '../errors.js';

const yaml = (lines: string[]) => lines.join('\n') + '\n';

describe('parseConfig', () => {
    it('merges built-ins with registry defaults', () => {
        const config = parseConfig(yaml([
            'hooks:',
            '  - name: check-yaml',
            '  - name: trailing-whitespace',
            '    exclude: ["*.snap"]',
        ]));

        expect(config.hooks).toHaveLength(2);
        const [first, second] = config.hooks;
        expect(first).toMatchObject({ kind: 'builtin', name: 'check-yaml', include: ['*.yml', '*.yaml'], position: 0 });
        expect(second).toMatchObject({ kind: 'builtin', name: 'trailing-whitespace', exclude: ['*.snap'], position: 1 });
        expect(config.changelog).toBe(false);
    });

    it('builds external descriptors', () => {
        const config = parseConfig(yaml([
            'cache_dir: .cache/hooks',
            'jobs: 2',
            'changelog: true',
            'hooks:',
            '  - name: prettier',
            '    include: ["*.ts"]',
            '    language: node',
            '    package: prettier',
            '    install: "{install}"',
            '    command: "{bin}/prettier --write {files}"',
            '    on_exit_1: modified',
            '    env:',
            '      NODE_ENV: test',
            '    timeout_ms: 5000',
        ]));

        expect(config.cacheDir).toBe('.cache/hooks');
        expect(config.jobs).toBe(2);
        expect(config.changelog).toBe(true);
        expect(config.hooks[0]).toEqual({
            kind: 'external',
            name: 'prettier',
            enabled: true,
            include: ['*.ts'],
            exclude: [],
            args: [],
            position: 0,
            command: '{bin}/prettier --write {files}',
            install: { template: '{install}', language: 'node', package: 'prettier' },
            workingDir: undefined,
            env: { NODE_ENV: 'test' },
            onExit1: 'modified',
            timeoutMs: 5000,
        });
        expect(Object.isFrozen(config.hooks[0])).toBe(true);
    });

    it('rejects unknown top-level keys', () => {
        expect(() => parseConfig('hooks: []\nrepos: []\n', 'cfg.yaml')).toThrow("cfg.yaml: Unknown key 'repos' at top level");
    });

    it('rejects unknown hook keys with their path', () => {
        const text = yaml(['hooks:', '  - name: check-yaml', '  - name: end-of-file-fixer', '    stages: [commit]']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: Unknown key 'stages' at hooks[1]");
    });

    it('names the key path of a type error', () => {
        const text = yaml(['hooks:', '  - name: check-yaml', '    include: [1]']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow('cfg.yaml: hooks[0].include[0]:');
    });

    it('reports invalid patterns at their key path', () => {
        const text = yaml(['hooks:', '  - name: a', '    command: echo', '    on_exit_1: violation', '  - name: check-yaml', '    include: ["*.yml", "src/[x"]']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[1].include[1]: Invalid glob pattern 'src/[x'");
    });

    it('rejects duplicate names', () => {
        const text = yaml(['hooks:', '  - name: check-yaml', '  - name: check-yaml']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("hooks[1].name: duplicate hook name 'check-yaml'");
    });

    it('raises UnknownHookError for a name with no command', () => {
        const text = yaml(['hooks:', '  - name: trailing-whitespace', '  - name: check-toml']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow(UnknownHookError);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[1].name: unknown built-in hook 'check-toml'");
    });

    it('forbids process keys on built-ins', () => {
        const text = yaml(['hooks:', '  - name: check-yaml', '    command: yamllint {files}']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[0].command: built-in hook 'check-yaml' cannot set 'command'");
    });

    it('requires on_exit_1 on external hooks', () => {
        const text = yaml(['hooks:', '  - name: lint', '    command: eslint {files}']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("external hook 'lint' must set on_exit_1");
    });

    it('requires language and a package or repo for {install}', () => {
        const text = yaml(['hooks:', '  - name: lint', '    command: eslint', '    on_exit_1: violation', '    install: "{install}"', '    language: node']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[0].install: '{install}' needs 'language' and one of 'package' or 'repo'");
    });

    it('accepts a git repo with installer args in place of a package', () => {
        const config = parseConfig(yaml([
            'hooks:',
            '  - name: lint',
            '    command: "{bin}/lint {files}"',
            '    on_exit_1: violation',
            '    install: "{install}"',
            '    language: python',
            '    repo: https://example.com/lint.git',
            '    install_args: ["--pre"]',
        ]));
        const [hook] = config.hooks;
        expect(hook.kind === 'external' ? hook.install : undefined).toEqual({
            template: '{install}',
            language: 'python',
            repo: 'https://example.com/lint.git',
            installArgs: ['--pre'],
        });
    });

    it('rejects installer keys without install', () => {
        const text = yaml(['hooks:', '  - name: lint', '    command: eslint', '    on_exit_1: violation', '    install_args: ["--pre"]']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[0].install_args: only applies together with 'install'");
    });

    it('validates built-in args when loading', () => {
        const text = yaml(['hooks:', '  - name: trailing-whitespace', '  - name: check-added-large-files', '    args: ["ten"]']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow(
            "cfg.yaml: hooks[1].args: check-added-large-files: max bytes must be a positive integer, got 'ten'"
        );
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow(ConfigError);
    });

    it('rejects installer keys on built-ins', () => {
        const text = yaml(['hooks:', '  - name: check-yaml', '    repo: https://example.com/x.git']);
        expect(() => parseConfig(text, 'cfg.yaml')).toThrow("cfg.yaml: hooks[0].repo: built-in hook 'check-yaml' cannot set 'repo'");
    });

    it('rejects malformed YAML and non-mapping documents', () => {
        expect(() => parseConfig('hooks: [\n', 'cfg.yaml')).toThrow(/^cfg\.yaml: invalid YAML: /);
        expect(() => parseConfig('- a\n- b\n', 'cfg.yaml')).toThrow("cfg.yaml: expected a mapping with a 'hooks' list");
        expect(() => parseConfig('', 'cfg.yaml')).toThrow(ConfigError);
    });

    it('parses the default template', () => {
        const config = parseConfig(defaultConfigTemplate());
        expect(config.hooks.map((h) => h.name)).toEqual([
            'trailing-whitespace',
            'end-of-file-fixer',
            'check-yaml',
            'pretty-format-json',
            'check-added-large-files',
            'prettier',
            'ruff',
            'taplo',
            'shellcheck',
        ]);
        expect(config.hooks.filter((h) => h.enabled).map((h) => h.name)).toEqual([
            'trailing-whitespace',
            'end-of-file-fixer',
            'check-yaml',
            'check-added-large-files',
        ]);
    });
});

describe('loadConfig', () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-loader-test-'));
    });

    afterEach(async () => {
        await fs.remove(testDir);
    });

    it('reads a file and records its absolute path', async () => {
        const file = path.join(testDir, '.commitguard.yaml');
        await fs.writeFile(file, 'hooks:\n  - name: check-yaml\n');

        const config = await loadConfig(file);

        expect(config.path).toBe(file);
        expect(config.hooks[0].name).toBe('check-yaml');
    });

    it('reports a missing file with its own code', async () => {
        const error = await loadConfig(path.join(testDir, 'missing.yaml')).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(ConfigError);
        expect(error instanceof ConfigError && error.code).toBe(ErrorCode.CONFIG_NOT_FOUND);
    });
});
