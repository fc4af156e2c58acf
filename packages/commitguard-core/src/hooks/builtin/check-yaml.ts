import { parseAllDocuments } from 'yaml';
import { BuiltinHook, type FileCheckResult, type HookFileContext } from '../base.js';

export class CheckYamlHook extends BuiltinHook {
    constructor() {
        super('check-yaml', 'Check YAML', 'checker', ['*.yml', '*.yaml']);
    }

    async checkFile(file: string, context: HookFileContext): Promise<FileCheckResult> {
        const content = await this.readText(file, context);
        if (content === null) return this.skipped('binary file');

        // Multi-document streams are valid YAML
        for (const doc of parseAllDocuments(content)) {
            const [first] = doc.errors;
            if (first) {
                return this.violation(`${file}: ${first.message}`);
            }
        }
        return this.clean();
    }
}
