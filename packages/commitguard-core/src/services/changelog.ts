import fs from 'fs-extra';
import path from 'path';
import { writeFileAtomic } from '../utils/fs.js';
import type { HookOutcome, RunReport } from '../types/index.js';

export const CHANGELOG_FILE = 'COMMITGUARD_CHANGELOG.md';
const SEPARATOR = '\n---\n\n';

function renderOutcome(outcome: HookOutcome): string[] {
    const lines = [`## ${outcome.hook} (${outcome.kind})`, ''];
    if (outcome.files.length > 0) {
        lines.push('Files:');
        lines.push(...outcome.files.map((file) => `- \`${file}\``));
        lines.push('');
    }
    if (outcome.messages.length > 0) {
        lines.push('Messages:');
        lines.push(...outcome.messages.map((message) => `- ${message}`));
        lines.push('');
    }
    return lines;
}

/**
 * Markdown section for one run, or undefined when every hook was clean.
 */
export function renderChangelogEntry(report: RunReport, now: Date = new Date()): string | undefined {
    const changed = report.outcomes.filter((o) => o.kind !== 'CLEAN');
    if (changed.length === 0) return undefined;

    const lines = [`# Pre-commit Changes ${now.toISOString()}`, '', `Status: ${report.status}`, ''];
    for (const outcome of changed) {
        lines.push(...renderOutcome(outcome));
    }
    return lines.join('\n');
}

/**
 * Prepend this run's section to the changelog at the root. Returns the file
 * written, or undefined when there was nothing to record.
 */
export async function writeChangelog(cwd: string, report: RunReport, now: Date = new Date()): Promise<string | undefined> {
    const entry = renderChangelogEntry(report, now);
    if (!entry) return undefined;

    const filePath = path.join(cwd, CHANGELOG_FILE);
    const existing = (await fs.pathExists(filePath)) ? await fs.readFile(filePath, 'utf-8') : '';
    await writeFileAtomic(filePath, existing ? entry + SEPARATOR + existing : entry);
    return filePath;
}
