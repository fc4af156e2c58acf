export enum ErrorCode {
    CONFIG_INVALID = 'CONFIG_INVALID',
    CONFIG_NOT_FOUND = 'CONFIG_NOT_FOUND',
    UNKNOWN_HOOK = 'UNKNOWN_HOOK',
    PATTERN_INVALID = 'PATTERN_INVALID',
    PROVISION_FAILED = 'PROVISION_FAILED',
    TOOL_FAILURE = 'TOOL_FAILURE',
}

export class CommitGuardError extends Error {
    public readonly code: ErrorCode;
    public readonly suggestion?: string;

    constructor(message: string, code: ErrorCode, suggestion?: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.suggestion = suggestion;

        // Restore prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Invalid or unreadable configuration. Fatal: nothing runs.
 */
export class ConfigError extends CommitGuardError {
    constructor(message: string, suggestion?: string, code: ErrorCode = ErrorCode.CONFIG_INVALID) {
        super(message, code, suggestion);
    }
}

export class UnknownHookError extends ConfigError {
    public readonly hookName: string;

    constructor(hookName: string, available: readonly string[], where?: string) {
        const prefix = where ? `${where}: ` : '';
        super(
            `${prefix}unknown built-in hook '${hookName}'`,
            `Available built-ins: ${available.join(', ')}. External hooks need a 'command'.`,
            ErrorCode.UNKNOWN_HOOK
        );
        this.hookName = hookName;
    }
}

export class PatternError extends CommitGuardError {
    public readonly pattern: string;

    constructor(pattern: string, reason: string) {
        super(`Invalid glob pattern '${pattern}': ${reason}`, ErrorCode.PATTERN_INVALID);
        this.pattern = pattern;
    }
}

export class ProvisionError extends CommitGuardError {
    public readonly hookName: string;
    public readonly output?: string;

    constructor(hookName: string, message: string, output?: string) {
        super(`Provisioning '${hookName}' failed: ${message}`, ErrorCode.PROVISION_FAILED);
        this.hookName = hookName;
        this.output = output;
    }
}

/**
 * Engine-level fault: a path the caller asked for is missing, a file could not be read or written.
 */
export class ToolError extends CommitGuardError {
    constructor(message: string, suggestion?: string) {
        super(message, ErrorCode.TOOL_FAILURE, suggestion);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
