import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createBuiltinDescriptor } from '../hooks/registry.js';
import { HookExecutor } from '../executor/executor.js';
import { HookOrchestrator } from '../orchestrator/orchestrator.js';
import type { BuiltinHookDescriptor, HookOutcome } from '../types/index.js';

export interface ValidationCheck {
    name: string;
    passed: boolean;
    detail?: string;
}

interface Fixture {
    file: string;
    content: string;
    args?: string[];
}

/** Input each built-in must flag. */
const FIXTURES: Record<string, Fixture> = {
    'trailing-whitespace': { file: 'sample.txt', content: 'value   \n' },
    'end-of-file-fixer': { file: 'sample.txt', content: 'value' },
    'check-yaml': { file: 'sample.yaml', content: 'key: [unclosed\n' },
    'pretty-format-json': { file: 'sample.json', content: '{"key":1}' },
    'check-added-large-files': { file: 'sample.bin', content: 'x'.repeat(64), args: ['16'] },
};

function check(name: string, passed: boolean, outcome?: HookOutcome): ValidationCheck {
    return outcome && !passed ? { name, passed, detail: `got ${outcome.kind}: ${outcome.messages.join('; ')}` } : { name, passed };
}

/**
 * Exercise a built-in's contract in a scratch directory.
 */
export async function validateBuiltinHook(name: string): Promise<ValidationCheck[]> {
    const fixture: Fixture | undefined = FIXTURES[name];
    const descriptor: BuiltinHookDescriptor = createBuiltinDescriptor(name, {
        include: ['**/*'],
        args: fixture?.args,
    });
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'commitguard-validate-'));
    const checks: ValidationCheck[] = [];

    try {
        const executor = new HookExecutor({ cwd: dir });
        const orchestrator = new HookOrchestrator({ cwd: dir, cacheDir: path.join(dir, '.cache') });

        const empty = await executor.run(descriptor, { hook: name, files: [] }, false);
        checks.push(check('empty input is clean', empty.kind === 'CLEAN', empty));

        const missing = await orchestrator.runAll([descriptor], ['missing-file.txt'], { dryRun: false });
        checks.push(check('missing explicit file is a tool error', missing.outcomes[0].kind === 'TOOL_ERROR', missing.outcomes[0]));

        if (!fixture) {
            return checks;
        }

        const target = path.join(dir, fixture.file);
        await fs.writeFile(target, fixture.content);

        const dry = await orchestrator.runAll([descriptor], [fixture.file], { dryRun: true });
        const after = await fs.readFile(target, 'utf-8');
        checks.push(check('dry run leaves bytes intact', after === fixture.content));
        checks.push(check('known-bad input is reported', dry.outcomes[0].kind !== 'CLEAN', dry.outcomes[0]));

        if (descriptor.hook.mode === 'fixer') {
            const first = await orchestrator.runAll([descriptor], [fixture.file], { dryRun: false });
            checks.push(check('dry run predicts the real outcome', first.outcomes[0].kind === dry.outcomes[0].kind, first.outcomes[0]));
            const second = await orchestrator.runAll([descriptor], [fixture.file], { dryRun: false });
            checks.push(check('second run is clean', second.outcomes[0].kind === 'CLEAN', second.outcomes[0]));
        }
    } finally {
        await fs.remove(dir);
    }

    return checks;
}
