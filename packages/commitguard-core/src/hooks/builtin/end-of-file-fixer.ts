import { BuiltinHook, type FileCheckResult, type HookFileContext } from '../base.js';

/**
 * Exactly one line terminator at the end of a non-empty file; a file holding
 * only newlines becomes empty.
 */
export function fixEndOfFile(content: string): string {
    if (content === '') return content;
    const trimmed = content.replace(/[\r\n]+$/, '');
    if (trimmed === '') return '';
    const eol = content.includes('\r\n') ? '\r\n' : '\n';
    return trimmed + eol;
}

export class EndOfFileFixerHook extends BuiltinHook {
    constructor() {
        super('end-of-file-fixer', 'Fix End of Files', 'fixer', ['**/*']);
    }

    async checkFile(file: string, context: HookFileContext): Promise<FileCheckResult> {
        const content = await this.readText(file, context);
        if (content === null) return this.skipped('binary file');

        const next = fixEndOfFile(content);
        if (next === content) return this.clean();

        return this.rewrite(file, next, context, {
            done: 'normalized end of file',
            pending: 'would normalize end of file',
        });
    }
}
