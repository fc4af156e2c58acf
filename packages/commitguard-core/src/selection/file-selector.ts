import fs from 'fs-extra';
import path from 'path';
import micromatch from 'micromatch';
import { globby } from 'globby';
import { execa } from 'execa';
import { PatternError, ToolError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import type { HookDescriptor, ResolvedFileSet } from '../types/index.js';

export interface SelectorOptions {
    cwd: string;
    /** Root-relative globs dropped from directory walks. */
    ignore?: readonly string[];
}

export type HookPatterns = Pick<HookDescriptor, 'name' | 'include' | 'exclude'>;

export const DEFAULT_INCLUDE = ['**/*'];

/** Version-control metadata and tool caches are never walked. */
const METADATA_IGNORE = [
    '**/.git/**',
    '**/.hg/**',
    '**/.svn/**',
    '**/node_modules/**',
    '**/.commitguard/**',
];

// Slash-less patterns such as '*.md' match the base name anywhere in the tree.
const MATCH_OPTIONS = { dot: true, basename: true };

/**
 * Root-relative, forward-slash form with no './' prefix and no trailing slash.
 */
export function canonicalPath(file: string, cwd: string): string {
    const relative = path.relative(cwd, path.resolve(cwd, file));
    if (relative === '') return '.';
    return relative.split(path.sep).join('/');
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function validatePattern(pattern: string): void {
    if (pattern.trim() === '') {
        throw new PatternError(pattern, 'pattern is empty');
    }
    try {
        micromatch.makeRe(pattern, { ...MATCH_OPTIONS, strictBrackets: true });
    } catch (error) {
        throw new PatternError(pattern, errorMessage(error));
    }
}

export class FileSelector {
    /**
     * Expand input paths into candidate files in traversal order. Directories
     * are walked recursively (sorted per directory); an explicit path that does
     * not exist is a ToolError.
     */
    static async expand(inputPaths: readonly string[], options: SelectorOptions): Promise<string[]> {
        const candidates: string[] = [];
        const ignore = [...(options.ignore ?? [])];

        for (const input of inputPaths) {
            const absPath = path.resolve(options.cwd, input);
            let isDirectory: boolean;
            try {
                isDirectory = (await fs.stat(absPath)).isDirectory();
            } catch (error) {
                if (isMissing(error)) {
                    throw new ToolError(`Path not found: ${input}`, 'Check the path or remove it from the argument list.');
                }
                throw new ToolError(`Cannot read ${input}: ${errorMessage(error)}`);
            }

            if (isDirectory) {
                const found = await globby('**/*', {
                    cwd: absPath,
                    dot: true,
                    gitignore: true,
                    ignore: METADATA_IGNORE,
                    onlyFiles: true,
                });
                found.sort();
                for (const file of found) {
                    const candidate = canonicalPath(path.join(absPath, file), options.cwd);
                    if (ignore.length > 0 && micromatch.isMatch(candidate, ignore, { dot: true })) continue;
                    candidates.push(candidate);
                }
            } else {
                candidates.push(canonicalPath(absPath, options.cwd));
            }
        }

        return candidates;
    }

    /**
     * Keep candidates matching an include pattern and no exclude pattern.
     * Exclude always wins; duplicates keep their first position.
     */
    static filter(hook: HookPatterns, candidates: readonly string[]): ResolvedFileSet {
        const include = hook.include.length > 0 ? [...hook.include] : DEFAULT_INCLUDE;
        const exclude = [...hook.exclude];
        for (const pattern of [...include, ...exclude]) {
            validatePattern(pattern);
        }

        const seen = new Set<string>();
        const files: string[] = [];
        for (const file of candidates) {
            if (seen.has(file)) continue;
            seen.add(file);

            if (!micromatch.isMatch(file, include, MATCH_OPTIONS)) continue;
            if (exclude.length > 0 && micromatch.isMatch(file, exclude, MATCH_OPTIONS)) {
                Logger.debug(`${hook.name}: excluded ${file}`);
                continue;
            }
            files.push(file);
        }

        return { hook: hook.name, files };
    }

    static async select(hook: HookPatterns, inputPaths: readonly string[], options: SelectorOptions): Promise<ResolvedFileSet> {
        const candidates = await FileSelector.expand(inputPaths, options);
        return FileSelector.filter(hook, candidates);
    }

    /**
     * Files added, copied, modified or renamed in the git index.
     */
    static async staged(cwd: string): Promise<string[]> {
        try {
            const { stdout } = await execa('git', ['diff', '--cached', '--name-only', '--diff-filter=ACMR', '-z'], { cwd });
            return stdout.split('\0').filter(Boolean);
        } catch (error) {
            throw new ToolError(`Could not list staged files: ${errorMessage(error)}`, 'Run inside a git work tree or pass paths explicitly.');
        }
    }
}
