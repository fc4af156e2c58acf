import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { TrailingWhitespaceHook, stripTrailingWhitespace } from './trailing-whitespace.js';
import { EndOfFileFixerHook, fixEndOfFile } from './end-of-file-fixer.js';
import { CheckYamlHook } from './check-yaml.js';
import { PrettyFormatJsonHook } from './pretty-format-json.js';
import { CheckAddedLargeFilesHook, DEFAULT_MAX_BYTES, parseMaxBytes } from './check-added-large-files.js';
import type { HookFileContext } from '../base.js';

describe('stripTrailingWhitespace', () => {
    it('removes spaces and tabs before each terminator', () => {
        expect(stripTrailingWhitespace('a  \nb\t\n')).toBe('a\nb\n');
    });

    it('keeps CRLF terminators', () => {
        expect(stripTrailingWhitespace('a \r\nb\r\n')).toBe('a\r\nb\r\n');
    });

    it('strips the last line without a terminator', () => {
        expect(stripTrailingWhitespace('a\nb   ')).toBe('a\nb');
    });
});

describe('fixEndOfFile', () => {
    it('adds a missing newline', () => {
        expect(fixEndOfFile('a')).toBe('a\n');
    });

    it('collapses extra newlines', () => {
        expect(fixEndOfFile('a\n\n\n')).toBe('a\n');
    });

    it('leaves empty files alone', () => {
        expect(fixEndOfFile('')).toBe('');
    });

    it('empties files made only of newlines', () => {
        expect(fixEndOfFile('\n\n')).toBe('');
    });

    it('uses CRLF when the file does', () => {
        expect(fixEndOfFile('a\r\nb')).toBe('a\r\nb\r\n');
    });
});

describe('parseMaxBytes', () => {
    it('defaults when no argument is given', () => {
        expect(parseMaxBytes([])).toBe(DEFAULT_MAX_BYTES);
    });

    it('reads the first argument', () => {
        expect(parseMaxBytes(['1024'])).toBe(1024);
    });

    it('rejects non-positive values', () => {
        expect(() => parseMaxBytes(['0'])).toThrow('max bytes must be a positive integer');
        expect(() => parseMaxBytes(['ten'])).toThrow("got 'ten'");
    });
});

describe('built-in hooks', () => {
    let testDir: string;
    let context: HookFileContext;

    beforeEach(async () => {
        testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'builtin-hook-test-'));
        context = { cwd: testDir, dryRun: false, args: [] };
    });

    afterEach(async () => {
        await fs.remove(testDir);
    });

    const read = (file: string) => fs.readFile(path.join(testDir, file), 'utf-8');

    it('trailing-whitespace rewrites the file', async () => {
        await fs.writeFile(path.join(testDir, 'notes.txt'), 'line with trailing spaces   \n');

        const result = await new TrailingWhitespaceHook().checkFile('notes.txt', context);

        expect(result).toEqual({ status: 'modified', message: 'notes.txt: removed trailing whitespace' });
        expect(await read('notes.txt')).toBe('line with trailing spaces\n');
    });

    it('trailing-whitespace only reports in dry run', async () => {
        await fs.writeFile(path.join(testDir, 'notes.txt'), 'x \n');

        const result = await new TrailingWhitespaceHook().checkFile('notes.txt', { ...context, dryRun: true });

        expect(result).toEqual({ status: 'modified', message: 'notes.txt: would remove trailing whitespace' });
        expect(await read('notes.txt')).toBe('x \n');
    });

    it('skips binary files', async () => {
        await fs.writeFile(path.join(testDir, 'blob.bin'), Buffer.from([0x00, 0x01, 0x20, 0x0a, 0x00, 0xff]));

        const result = await new TrailingWhitespaceHook().checkFile('blob.bin', context);

        expect(result).toEqual({ status: 'skipped', reason: 'binary file' });
    });

    it('end-of-file-fixer reports clean files as clean', async () => {
        await fs.writeFile(path.join(testDir, 'ok.txt'), 'done\n');

        const result = await new EndOfFileFixerHook().checkFile('ok.txt', context);

        expect(result).toEqual({ status: 'clean' });
    });

    it('check-yaml flags unparsable documents and never writes', async () => {
        await fs.writeFile(path.join(testDir, 'broken.yaml'), 'key: [unclosed');

        const result = await new CheckYamlHook().checkFile('broken.yaml', context);

        expect(result.status).toBe('violation');
        if (result.status === 'violation') {
            expect(result.message.startsWith('broken.yaml: ')).toBe(true);
        }
        expect(await read('broken.yaml')).toBe('key: [unclosed');
    });

    it('check-yaml accepts multi-document streams', async () => {
        await fs.writeFile(path.join(testDir, 'multi.yml'), 'a: 1\n---\nb: 2\n');

        const result = await new CheckYamlHook().checkFile('multi.yml', context);

        expect(result).toEqual({ status: 'clean' });
    });

    it('pretty-format-json re-indents with two spaces', async () => {
        await fs.writeFile(path.join(testDir, 'data.json'), '{"a":[1,2]}');

        const result = await new PrettyFormatJsonHook().checkFile('data.json', context);

        expect(result).toEqual({ status: 'modified', message: 'data.json: formatted JSON' });
        expect(await read('data.json')).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}\n');
    });

    it('pretty-format-json flags invalid JSON', async () => {
        await fs.writeFile(path.join(testDir, 'bad.json'), '{"a":');

        const result = await new PrettyFormatJsonHook().checkFile('bad.json', context);

        expect(result.status).toBe('violation');
        expect(await read('bad.json')).toBe('{"a":');
    });

    it('check-added-large-files compares against the limit argument', async () => {
        await fs.writeFile(path.join(testDir, 'big.bin'), 'x'.repeat(20));
        const hook = new CheckAddedLargeFilesHook();

        const over = await hook.checkFile('big.bin', { ...context, args: ['10'] });
        const under = await hook.checkFile('big.bin', { ...context, args: ['20'] });

        expect(over).toEqual({ status: 'violation', message: 'big.bin is too large (20 bytes > 10 bytes)' });
        expect(under).toEqual({ status: 'clean' });
    });
});
