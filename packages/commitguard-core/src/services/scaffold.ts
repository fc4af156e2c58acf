import fs from 'fs-extra';
import path from 'path';
import { stringify } from 'yaml';
import { ToolError } from '../errors.js';
import { shellQuote } from '../utils/shell.js';

export const SCAFFOLD_LANGUAGES = ['node', 'python', 'shell'] as const;
export type ScaffoldLanguage = typeof SCAFFOLD_LANGUAGES[number];

export const SNIPPET_FILE = 'commitguard-snippet.yaml';

export interface ScaffoldOptions {
    name: string;
    language: ScaffoldLanguage;
    description: string;
    outputDir: string;
    /** Root the generated command is relative to. */
    cwd?: string;
    force?: boolean;
}

export interface ScaffoldResult {
    script: string;
    snippet: string;
    command: string;
}

const NAME_RE = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

interface ScriptTemplate {
    extension: string;
    interpreter: string;
    render(description: string): string;
}

const TEMPLATES: Record<ScaffoldLanguage, ScriptTemplate> = {
    node: {
        extension: '.mjs',
        interpreter: 'node',
        render: (description) => `#!/usr/bin/env node
// ${description}
// Receives file paths as arguments. Exit 0 when clean, 1 when a file is rejected.
import { readFileSync } from 'node:fs';

let failed = false;
for (const file of process.argv.slice(2)) {
    const content = readFileSync(file, 'utf-8');
    if (content.includes('DO NOT COMMIT')) {
        console.error(\`\${file}: contains DO NOT COMMIT marker\`);
        failed = true;
    }
}
process.exit(failed ? 1 : 0);
`,
    },
    python: {
        extension: '.py',
        interpreter: 'python3',
        render: (description) => `#!/usr/bin/env python3
"""${description}

Receives file paths as arguments. Exit 0 when clean, 1 when a file is rejected.
"""
import sys


def main(paths):
    failed = False
    for path in paths:
        with open(path, encoding="utf-8", errors="replace") as handle:
            if "DO NOT COMMIT" in handle.read():
                print(f"{path}: contains DO NOT COMMIT marker", file=sys.stderr)
                failed = True
    return 1 if failed else 0


if __name__ == "__main__":
    sys.exit(main(sys.argv[1:]))
`,
    },
    shell: {
        extension: '.sh',
        interpreter: 'sh',
        render: (description) => `#!/bin/sh
# ${description}
# Receives file paths as arguments. Exit 0 when clean, 1 when a file is rejected.
status=0
for file in "$@"; do
    if grep -q 'DO NOT COMMIT' "$file"; then
        echo "$file: contains DO NOT COMMIT marker" >&2
        status=1
    fi
done
exit $status
`,
    },
};

export function isScaffoldLanguage(value: string): value is ScaffoldLanguage {
    return SCAFFOLD_LANGUAGES.some((language) => language === value);
}

/**
 * Write a starter hook script and a config snippet that runs it.
 */
export async function scaffoldHook(options: ScaffoldOptions): Promise<ScaffoldResult> {
    if (!NAME_RE.test(options.name)) {
        throw new ToolError(
            `Invalid hook name '${options.name}'`,
            'Use letters, digits, dashes and underscores, starting with a letter or digit.'
        );
    }

    const template = TEMPLATES[options.language];
    const cwd = options.cwd ?? process.cwd();
    const outputDir = path.resolve(cwd, options.outputDir);
    const script = path.join(outputDir, options.name + template.extension);
    const snippet = path.join(outputDir, SNIPPET_FILE);

    if (!options.force && (await fs.pathExists(script))) {
        throw new ToolError(`${script} already exists`, 'Pass --force to overwrite it.');
    }

    const relative = path.relative(cwd, script).split(path.sep).join('/');
    const command = `${template.interpreter} ${shellQuote(relative)} {files}`;
    const entry = {
        hooks: [{
            name: options.name,
            command,
            on_exit_1: 'violation',
        }],
    };

    await fs.ensureDir(outputDir);
    await fs.writeFile(script, template.render(options.description));
    await fs.chmod(script, 0o755);
    await fs.writeFile(snippet, `# ${options.description}\n` + stringify(entry));

    return { script, snippet, command };
}
