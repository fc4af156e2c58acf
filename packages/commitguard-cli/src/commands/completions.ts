import fs from 'fs-extra';
import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { EXIT_CLEAN, ToolError } from '@commitguard/core';
import type { ExitCode } from '@commitguard/core';
import { printError } from './output.js';

export const COMPLETION_SHELLS = ['bash', 'zsh', 'fish'] as const;
export type CompletionShell = typeof COMPLETION_SHELLS[number];

interface CommandInfo {
    name: string;
    description: string;
    flags: string[];
}

function isCompletionShell(value: string): value is CompletionShell {
    return COMPLETION_SHELLS.some((shell) => shell === value);
}

function collect(program: Command): { global: string[]; commands: CommandInfo[] } {
    const longFlags = (cmd: Command) => cmd.options.flatMap((o) => (o.long ? [o.long] : []));
    return {
        global: [...new Set([...longFlags(program), '--help', '--version'])],
        commands: program.commands.map((cmd) => ({
            name: cmd.name(),
            description: cmd.description(),
            flags: [...longFlags(cmd), '--help'],
        })),
    };
}

function renderBash(bin: string, info: ReturnType<typeof collect>): string {
    const fn = `_${bin.replace(/[^A-Za-z0-9_]/g, '_')}`;
    const top = [...info.commands.map((c) => c.name), ...info.global].join(' ');
    const cases = info.commands.map((c) => `        ${c.name}) COMPREPLY=($(compgen -W "${c.flags.join(' ')}" -- "$cur")) ;;`);
    return [
        `# bash completion for ${bin}`,
        `${fn}() {`,
        '    local cur="${COMP_WORDS[COMP_CWORD]}"',
        '    if [ "$COMP_CWORD" -eq 1 ]; then',
        `        COMPREPLY=($(compgen -W "${top}" -- "$cur"))`,
        '        return',
        '    fi',
        '    case "${COMP_WORDS[1]}" in',
        ...cases,
        '    esac',
        '}',
        `complete -o default -F ${fn} ${bin}`,
        '',
    ].join('\n');
}

function renderZsh(bin: string, info: ReturnType<typeof collect>): string {
    const entries = info.commands.map((c) => `        '${c.name}:${c.description.replace(/:/g, '\\:').replace(/'/g, `'\\''`)}'`);
    return [
        `#compdef ${bin}`,
        `_${bin}() {`,
        '    local -a commands',
        '    commands=(',
        ...entries,
        '    )',
        '    if (( CURRENT == 2 )); then',
        `        _describe 'command' commands`,
        '    else',
        '        _files',
        '    fi',
        '}',
        `_${bin} "$@"`,
        '',
    ].join('\n');
}

function renderFish(bin: string, info: ReturnType<typeof collect>): string {
    const quote = (text: string) => `'${text.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    const lines = [`# fish completion for ${bin}`];
    for (const c of info.commands) {
        lines.push(`complete -c ${bin} -f -n '__fish_use_subcommand' -a ${c.name} -d ${quote(c.description)}`);
    }
    for (const c of info.commands) {
        for (const flag of c.flags) {
            lines.push(`complete -c ${bin} -n '__fish_seen_subcommand_from ${c.name}' -l ${flag.replace(/^--/, '')}`);
        }
    }
    lines.push('');
    return lines.join('\n');
}

export function renderCompletions(program: Command, shell: CompletionShell): string {
    const bin = program.name();
    const info = collect(program);
    switch (shell) {
        case 'bash':
            return renderBash(bin, info);
        case 'zsh':
            return renderZsh(bin, info);
        case 'fish':
            return renderFish(bin, info);
    }
}

export async function completionsCommand(program: Command, cwd: string, shell: string, options: { out?: string } = {}): Promise<ExitCode> {
    try {
        if (!isCompletionShell(shell)) {
            throw new ToolError(`Unsupported shell '${shell}'`, `Choose one of: ${COMPLETION_SHELLS.join(', ')}.`);
        }
        const script = renderCompletions(program, shell);
        if (options.out) {
            const target = path.resolve(cwd, options.out);
            await fs.outputFile(target, script);
            console.error(chalk.green(`Wrote ${shell} completions to ${target}`));
        } else {
            process.stdout.write(script);
        }
        return EXIT_CLEAN;
    } catch (error) {
        return printError(error);
    }
}
