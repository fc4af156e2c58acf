import path from 'path';
import fs from 'fs-extra';
import readline from 'readline';
import { createHash } from 'crypto';
import { execa } from 'execa';
import { z } from 'zod';
import { ProvisionError, errorMessage } from '../errors.js';
import { Logger } from '../utils/logger.js';
import { writeJsonAtomic } from '../utils/fs.js';
import { renderTemplate, shellJoin, shellQuote } from '../utils/shell.js';
import type { ExternalHookDescriptor, InstallLanguage, InstallSpec } from '../types/index.js';

export const CACHE_DIR_ENV = 'COMMITGUARD_CACHE_DIR';
export const MARKER_FILE = '.ready.json';

const KEY_RE = /^[0-9a-f]{16}$/;

const MarkerSchema = z.object({
    hook: z.string(),
    key: z.string().regex(KEY_RE),
    install: z.string(),
    provisioned_at: z.string(),
});
export type ProvisioningMarker = z.infer<typeof MarkerSchema>;

export interface ProvisioningOptions {
    cwd: string;
    cacheDir?: string;
}

export function resolveCacheDir(cwd: string, configured?: string): string {
    const dir = configured ?? process.env[CACHE_DIR_ENV] ?? path.join('.commitguard', 'tools');
    return path.resolve(cwd, dir);
}

/**
 * First 16 hex chars of the SHA-256 over everything that decides what gets installed.
 */
export function provisioningKey(name: string, install: InstallSpec): string {
    const identity = [
        name,
        install.template,
        install.language ?? '',
        install.package ?? '',
        install.repo ?? '',
        (install.installArgs ?? []).join('\x1f'),
    ].join('\0');
    return createHash('sha256').update(identity).digest('hex').slice(0, 16);
}

function safeName(name: string): string {
    return name.replace(/[^A-Za-z0-9._-]/g, '_');
}

function words(...parts: string[]): string {
    return parts.filter(Boolean).join(' ');
}

/**
 * The language installer invocation `{install}` expands to. A `repo` is
 * installed from git: npm takes the URL as the package spec, uv a `git+` URL
 * and cargo `--git` (with `package` naming the crate inside it).
 */
function installerCommand(install: InstallSpec, envDir: string): string | undefined {
    const { language } = install;
    const target = install.package ?? install.repo;
    if (language === undefined || target === undefined) return undefined;

    const env = shellQuote(envDir);
    const extra = shellJoin(install.installArgs ?? []);
    switch (language) {
        case 'node':
            return words('npm install --prefix', env, extra, shellQuote(target));
        case 'python': {
            const venv = shellQuote(path.join(envDir, 'venv'));
            const python = shellQuote(path.join(envDir, 'venv', 'bin', 'python'));
            const spec = install.package ?? `git+${target}`;
            return `uv venv ${venv} && ${words('uv pip install --python', python, extra, shellQuote(spec))}`;
        }
        case 'rust':
            return words(
                'cargo install --root',
                env,
                install.repo !== undefined ? `--git ${shellQuote(install.repo)}` : '',
                extra,
                install.package !== undefined ? shellQuote(install.package) : ''
            );
    }
}

function languageBinDir(language: InstallLanguage | undefined, envDir: string): string {
    switch (language) {
        case 'node':
            return path.join(envDir, 'node_modules', '.bin');
        case 'python':
            return path.join(envDir, 'venv', 'bin');
        default:
            return path.join(envDir, 'bin');
    }
}

/**
 * Installs the tools external hooks depend on into per-hook environment
 * directories under the cache dir, once per distinct install definition.
 */
export class ProvisioningManager {
    readonly cwd: string;
    readonly cacheDir: string;
    private inFlight = new Map<string, Promise<void>>();

    constructor(options: ProvisioningOptions) {
        this.cwd = options.cwd;
        this.cacheDir = resolveCacheDir(options.cwd, options.cacheDir);
    }

    envDir(descriptor: ExternalHookDescriptor): string {
        if (!descriptor.install) {
            return path.join(this.cacheDir, safeName(descriptor.name));
        }
        return path.join(this.cacheDir, `${safeName(descriptor.name)}-${provisioningKey(descriptor.name, descriptor.install)}`);
    }

    binDir(descriptor: ExternalHookDescriptor): string {
        return languageBinDir(descriptor.install?.language, this.envDir(descriptor));
    }

    markerPath(descriptor: ExternalHookDescriptor): string {
        return path.join(this.envDir(descriptor), MARKER_FILE);
    }

    /** The shell command the install template expands to. */
    installCommand(descriptor: ExternalHookDescriptor): string | undefined {
        const install = descriptor.install;
        if (!install) return undefined;
        const envDir = this.envDir(descriptor);
        return renderTemplate(install.template, { install: installerCommand(install, envDir), env: shellQuote(envDir) });
    }

    async isReady(descriptor: ExternalHookDescriptor): Promise<boolean> {
        const install = descriptor.install;
        if (!install) return true;

        const markerPath = this.markerPath(descriptor);
        if (!(await fs.pathExists(markerPath))) return false;

        let raw: unknown;
        try {
            raw = await fs.readJson(markerPath);
        } catch (error) {
            Logger.debug(`${descriptor.name}: unreadable marker ${markerPath}: ${errorMessage(error)}`);
            return false;
        }
        const marker = MarkerSchema.safeParse(raw);
        return marker.success
            && marker.data.key === provisioningKey(descriptor.name, install)
            && marker.data.install === install.template;
    }

    /**
     * Provision the hook's tool if its marker is missing or stale. Concurrent
     * calls for the same install definition share one attempt; a failed attempt
     * is forgotten so the next call retries.
     */
    async ensureReady(descriptor: ExternalHookDescriptor): Promise<void> {
        const install = descriptor.install;
        if (!install) return;

        const key = provisioningKey(descriptor.name, install);
        const pending = this.inFlight.get(key);
        if (pending) return pending;

        const attempt = this.provision(descriptor, install, key).finally(() => {
            this.inFlight.delete(key);
        });
        this.inFlight.set(key, attempt);
        return attempt;
    }

    private async provision(descriptor: ExternalHookDescriptor, install: InstallSpec, key: string): Promise<void> {
        if (await this.isReady(descriptor)) {
            Logger.debug(`${descriptor.name}: already provisioned (${key})`);
            return;
        }

        const envDir = this.envDir(descriptor);
        const command = this.installCommand(descriptor) ?? install.template;
        Logger.info(`Provisioning ${descriptor.name}...`);
        Logger.debug(`${descriptor.name}: ${command}`);

        await fs.remove(envDir);
        await fs.ensureDir(envDir);

        let exitCode: number | undefined;
        let output: string | undefined;
        try {
            const subprocess = execa(command, {
                shell: true,
                cwd: this.cwd,
                env: { ...descriptor.env },
                all: true,
                reject: false,
            });
            if (subprocess.all) {
                readline.createInterface({ input: subprocess.all }).on('line', (line) => {
                    Logger.debug(`[${descriptor.name}] ${line}`);
                });
            }
            const result = await subprocess;
            exitCode = result.exitCode;
            output = result.all;
        } catch (error) {
            await fs.remove(envDir);
            throw new ProvisionError(descriptor.name, `could not run install command: ${errorMessage(error)}`);
        }

        if (exitCode !== 0) {
            await fs.remove(envDir);
            throw new ProvisionError(descriptor.name, `install command exited with code ${exitCode ?? 'unknown'}`, output);
        }

        const marker: ProvisioningMarker = {
            hook: descriptor.name,
            key,
            install: install.template,
            provisioned_at: new Date().toISOString(),
        };
        await writeJsonAtomic(this.markerPath(descriptor), marker);
        await this.pruneStale(descriptor, envDir);
    }

    /** Remove environments left behind by earlier install definitions of the same hook. */
    private async pruneStale(descriptor: ExternalHookDescriptor, keep: string): Promise<void> {
        const prefix = `${safeName(descriptor.name)}-`;
        const entries = await fs.readdir(this.cacheDir);
        for (const entry of entries) {
            if (!entry.startsWith(prefix) || !KEY_RE.test(entry.slice(prefix.length))) continue;
            const dir = path.join(this.cacheDir, entry);
            if (dir === keep) continue;
            try {
                await fs.remove(dir);
                Logger.debug(`${descriptor.name}: pruned ${entry}`);
            } catch (error) {
                Logger.warn(`Could not remove stale environment ${dir}: ${errorMessage(error)}`);
            }
        }
    }
}
