import fs from 'fs-extra';
import { BuiltinHook, type FileCheckResult, type HookFileContext } from '../base.js';
import { ToolError } from '../../errors.js';

export const DEFAULT_MAX_BYTES = 500_000;

export function parseMaxBytes(args: readonly string[]): number {
    const [raw] = args;
    if (raw === undefined) return DEFAULT_MAX_BYTES;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new ToolError(`check-added-large-files: max bytes must be a positive integer, got '${raw}'`);
    }
    return value;
}

export class CheckAddedLargeFilesHook extends BuiltinHook {
    constructor() {
        super('check-added-large-files', 'Check for Added Large Files', 'checker', ['**/*']);
    }

    validateArgs(args: readonly string[]): void {
        parseMaxBytes(args);
    }

    async checkFile(file: string, context: HookFileContext): Promise<FileCheckResult> {
        const limit = parseMaxBytes(context.args);
        const { size } = await fs.stat(this.resolve(file, context));
        if (size > limit) {
            return this.violation(`${file} is too large (${size} bytes > ${limit} bytes)`);
        }
        return this.clean();
    }
}
