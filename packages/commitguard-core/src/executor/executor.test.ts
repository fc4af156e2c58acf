import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { HookExecutor } from './executor.js';
import { createBuiltinDescriptor } from '../hooks/registry.js';
import type { ExternalHookDescriptor } from '../types/index.js';

function external(command: string, fields: Partial<ExternalHookDescriptor> = {}): ExternalHookDescriptor {
    return {
        kind: 'external',
        name: 'tool',
        enabled: true,
        include: [],
        exclude: [],
        args: [],
        position: 0,
        command,
        env: {},
        onExit1: 'violation',
        ...fields,
    };
}

describe('HookExecutor', () => {
    let testDir: string;
    let executor: HookExecutor;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'executor-test-'));
        executor = new HookExecutor({ cwd: testDir, concurrency: 2 });
    });

    afterEach(async () => {
        await fs.remove(testDir);
    });

    describe('built-in hooks', () => {
        it('reports only the files it changed', async () => {
            await fs.writeFile(path.join(testDir, 'a.txt'), 'dirty  \n');
            await fs.writeFile(path.join(testDir, 'b.txt'), 'clean\n');
            const descriptor = createBuiltinDescriptor('trailing-whitespace');

            const outcome = await executor.run(descriptor, { hook: 'trailing-whitespace', files: ['a.txt', 'b.txt'] }, false);

            expect(outcome.kind).toBe('MODIFIED');
            expect(outcome.files).toEqual(['a.txt']);
            expect(outcome.messages).toEqual(['a.txt: removed trailing whitespace']);
            expect(await fs.readFile(path.join(testDir, 'a.txt'), 'utf-8')).toBe('dirty\n');
        });

        it('lets a violation outrank modifications and lists both', async () => {
            await fs.writeFile(path.join(testDir, 'ugly.json'), '{"a":1}');
            await fs.writeFile(path.join(testDir, 'bad.json'), '{');
            const descriptor = createBuiltinDescriptor('pretty-format-json');

            const outcome = await executor.run(descriptor, { hook: descriptor.name, files: ['ugly.json', 'bad.json'] }, false);

            expect(outcome.kind).toBe('VIOLATION');
            expect(outcome.files).toEqual(['ugly.json', 'bad.json']);
            expect(outcome.messages[0]).toBe('ugly.json: formatted JSON');
            expect(outcome.messages[1].startsWith('bad.json: invalid JSON')).toBe(true);
        });

        it('turns a thrown error into TOOL_ERROR', async () => {
            const descriptor = createBuiltinDescriptor('end-of-file-fixer');

            const outcome = await executor.run(descriptor, { hook: descriptor.name, files: ['gone.txt'] }, false);

            expect(outcome.kind).toBe('TOOL_ERROR');
            expect(outcome.messages[0]).toContain('ENOENT');
        });

        it('stops rewriting after a failing file and reports what was already fixed', async () => {
            const dirty = Array.from({ length: 40 }, (_, i) => `f${i}.txt`);
            for (const file of dirty) {
                await fs.writeFile(path.join(testDir, file), 'x  \n');
            }
            const fixed = async () => {
                const done: string[] = [];
                for (const file of dirty) {
                    if (await fs.readFile(path.join(testDir, file), 'utf-8') === 'x\n') done.push(file);
                }
                return done;
            };
            const descriptor = createBuiltinDescriptor('trailing-whitespace');

            const outcome = await executor.run(descriptor, { hook: descriptor.name, files: ['missing.txt', ...dirty] }, false);
            const fixedAtReturn = await fixed();

            expect(outcome.kind).toBe('TOOL_ERROR');
            expect(outcome.messages[0]).toContain('ENOENT');
            expect(outcome.files).toEqual(fixedAtReturn);
            expect(fixedAtReturn.length).toBeLessThan(dirty.length);

            await new Promise((resolve) => setTimeout(resolve, 200));
            expect(await fixed()).toEqual(fixedAtReturn);
        });

        it('is clean for an empty file set', async () => {
            const outcome = await executor.run(createBuiltinDescriptor('check-yaml'), { hook: 'check-yaml', files: [] }, false);
            expect(outcome).toMatchObject({ hook: 'check-yaml', kind: 'CLEAN', files: [], messages: [] });
        });
    });

    describe('buildCommand', () => {
        it('quotes files into {files}', () => {
            expect(executor.buildCommand(external('prettier --write {files}'), ['src/a b.ts', 'x.ts'])).toBe("prettier --write 'src/a b.ts' x.ts");
        });

        it('puts args before files when the template has no {args}', () => {
            expect(executor.buildCommand(external('eslint {files}', { args: ['--fix'] }), ['a.ts'])).toBe('eslint --fix a.ts');
        });

        it('honours an explicit {args}', () => {
            const hook = external('ruff check {args} {files}', { args: ['--select', 'E'] });
            expect(executor.buildCommand(hook, ['a.py'])).toBe('ruff check --select E a.py');
        });

        it('appends args and files when neither placeholder is present', () => {
            expect(executor.buildCommand(external('shellcheck', { args: ['-x'] }), ['run.sh'])).toBe('shellcheck -x run.sh');
        });

        it('makes paths relative to the working directory', () => {
            expect(executor.buildCommand(external('gofmt -l {files}', { workingDir: 'svc' }), ['svc/main.go'])).toBe('gofmt -l main.go');
        });
    });

    describe('external hooks', () => {
        beforeEach(async () => {
            await fs.writeFile(path.join(testDir, 'a.txt'), 'a\n');
        });

        const set = { hook: 'tool', files: ['a.txt'] };

        it('does not spawn for an empty file set', async () => {
            const outcome = await executor.run(external(`touch ${path.join(testDir, 'spawned')} #`), { hook: 'tool', files: [] }, false);

            expect(outcome.kind).toBe('CLEAN');
            expect(await fs.pathExists(path.join(testDir, 'spawned'))).toBe(false);
        });

        it('maps exit 0 to CLEAN', async () => {
            const outcome = await executor.run(external('test -f {files}'), set, false);
            expect(outcome.kind).toBe('CLEAN');
        });

        it('maps exit 1 by the hook convention', async () => {
            const modified = await executor.run(external('exit 1 #', { onExit1: 'modified' }), set, false);
            const violation = await executor.run(external('exit 1 #', { onExit1: 'violation' }), set, false);

            expect(modified).toMatchObject({ kind: 'MODIFIED', files: ['a.txt'], messages: ['tool modified files (exit code 1)'] });
            expect(violation).toMatchObject({ kind: 'VIOLATION', files: ['a.txt'], messages: ['tool found problems (exit code 1)'] });
        });

        it('maps any other exit code to EXTERNAL_FAILURE with output', async () => {
            const outcome = await executor.run(external('echo crashed; exit 2 #'), set, false);

            expect(outcome.kind).toBe('EXTERNAL_FAILURE');
            expect(outcome.messages).toEqual(['exited with code 2']);
            expect(outcome.detail).toBe('crashed');
        });

        it('passes the hook environment', async () => {
            const outcome = await executor.run(external('test "$HOOK_MODE" = strict #', { env: { HOOK_MODE: 'strict' } }), set, false);
            expect(outcome.kind).toBe('CLEAN');
        });

        it('runs in the working directory', async () => {
            await fs.outputFile(path.join(testDir, 'svc', 'main.go'), '');
            const outcome = await executor.run(external('test -f {files} && test -d ../svc', { workingDir: 'svc' }), { hook: 'tool', files: ['svc/main.go'] }, false);
            expect(outcome.kind).toBe('CLEAN');
        });

        it('fails a hook that exceeds its timeout', async () => {
            const outcome = await executor.run(external('exec sleep 5 #', { timeoutMs: 100 }), set, false);
            expect(outcome).toMatchObject({ kind: 'EXTERNAL_FAILURE', messages: ['timed out after 100 ms'] });
        });

        it('fails a hook cancelled mid-run', async () => {
            const controller = new AbortController();
            const cancellable = new HookExecutor({ cwd: testDir, signal: controller.signal });
            setTimeout(() => controller.abort(), 100);

            const outcome = await cancellable.run(external('exec sleep 5 #'), set, false);

            expect(outcome).toMatchObject({ kind: 'EXTERNAL_FAILURE', messages: ['cancelled'] });
        });
    });
});
