export function shellQuote(arg: string): string {
    if (/^[A-Za-z0-9_/@%+=:,.-]+$/.test(arg)) {
        return arg;
    }
    return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(args: readonly string[]): string {
    return args.map(shellQuote).join(' ');
}

/**
 * Replace `{name}` tokens for the names present in `vars`; unknown tokens stay as written.
 */
export function renderTemplate(template: string, vars: Readonly<Record<string, string | undefined>>): string {
    return template.replace(/\{([a-z_]+)\}/g, (match, key: string) => {
        const value = vars[key];
        return value === undefined ? match : value;
    });
}

export function hasPlaceholder(template: string, name: string): boolean {
    return template.includes(`{${name}}`);
}
