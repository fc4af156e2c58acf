import { BuiltinHook, type FileCheckResult, type HookFileContext } from '../base.js';

export function stripTrailingWhitespace(content: string): string {
    return content.replace(/[ \t]+(?=\r?\n|$)/g, '');
}

export class TrailingWhitespaceHook extends BuiltinHook {
    constructor() {
        super('trailing-whitespace', 'Trim Trailing Whitespace', 'fixer', ['**/*']);
    }

    async checkFile(file: string, context: HookFileContext): Promise<FileCheckResult> {
        const content = await this.readText(file, context);
        if (content === null) return this.skipped('binary file');

        const next = stripTrailingWhitespace(content);
        if (next === content) return this.clean();

        return this.rewrite(file, next, context, {
            done: 'removed trailing whitespace',
            pending: 'would remove trailing whitespace',
        });
    }
}
