import { BuiltinHook, type FileCheckResult, type HookFileContext } from '../base.js';
import { errorMessage } from '../../errors.js';

export const JSON_INDENT = 2;

export class PrettyFormatJsonHook extends BuiltinHook {
    constructor() {
        super('pretty-format-json', 'Pretty-format JSON', 'fixer', ['*.json']);
    }

    async checkFile(file: string, context: HookFileContext): Promise<FileCheckResult> {
        const content = await this.readText(file, context);
        if (content === null) return this.skipped('binary file');

        let value: unknown;
        try {
            value = JSON.parse(content);
        } catch (error) {
            return this.violation(`${file}: invalid JSON (${errorMessage(error)})`);
        }

        const next = JSON.stringify(value, null, JSON_INDENT) + '\n';
        if (next === content) return this.clean();

        return this.rewrite(file, next, context, {
            done: 'formatted JSON',
            pending: 'would format JSON',
        });
    }
}
