/**
 * Error taxonomy
 *
 * Every failure raised by the engine extends HooklineError and carries a
 * stable `code` so hosts can branch without matching on message text.
 */

export class HooklineError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

// ─── Manifest / Registry ───

/**
 * Invalid or unreadable plugin manifest. `field` names the offending key
 * (e.g. `plugin.name`, `hooks[1].stage`) when validation failed.
 */
export class ManifestError extends HooklineError {
    readonly field?: string;

    constructor(message: string, options?: { field?: string; cause?: unknown }) {
        super('MANIFEST_INVALID', message, options);
        this.field = options?.field;
    }
}

export class RegistryError extends HooklineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('REGISTRY_IO', message, options);
    }
}

export class PluginNotFoundError extends HooklineError {
    readonly pluginName: string;

    constructor(pluginName: string) {
        super('PLUGIN_NOT_FOUND', `plugin "${pluginName}" not found`);
        this.pluginName = pluginName;
    }
}

export class ConfigError extends HooklineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('CONFIG_INVALID', message, options);
    }
}

/**
 * A command was invoked with missing or unusable arguments.
 */
export class UsageError extends HooklineError {
    constructor(message: string) {
        super('USAGE', message);
    }
}

export class AuditError extends HooklineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('AUDIT_WRITE', message, options);
    }
}

/**
 * Plugin search against GitHub failed. A rate-limited request gets its own
 * code, since retrying later or setting GITHUB_TOKEN fixes it.
 */
export class SearchError extends HooklineError {
    readonly status: number | null;

    constructor(message: string, options: { status?: number; rateLimited?: boolean; cause?: unknown } = {}) {
        super(options.rateLimited ? 'SEARCH_RATE_LIMITED' : 'SEARCH_FAILED', message, { cause: options.cause });
        this.status = options.status ?? null;
    }
}

// ─── Hook registration ───

export class HookRegistrationError extends HooklineError {
    constructor(message: string) {
        super('HOOK_INVALID', message);
    }
}

export class HookConflictError extends HooklineError {
    constructor(pattern: string, stage: string, name: string) {
        super('HOOK_CONFLICT', `hook "${name}" is already registered for ${pattern} at ${stage}`);
    }
}

// ─── Subprocess failures ───

export class HookTimeoutError extends HooklineError {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super('HOOK_TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Process could not be started or exited non-zero.
 */
export class HookProcessError extends HooklineError {
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(message: string, options: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}) {
        super('HOOK_PROCESS', withStderr(message, options.stderr), { cause: options.cause });
        this.exitCode = options.exitCode ?? null;
        this.stderr = options.stderr ?? '';
    }
}

/**
 * Process produced output that is not a valid envelope.
 */
export class HookProtocolError extends HooklineError {
    readonly stderr: string;

    constructor(message: string, options: { stderr?: string; cause?: unknown } = {}) {
        super('HOOK_PROTOCOL', withStderr(message, options.stderr), { cause: options.cause });
        this.stderr = options.stderr ?? '';
    }
}

/**
 * Plugin answered with `status: "error"`.
 */
export class HookResponseError extends HooklineError {
    readonly responseCode?: string;

    constructor(message: string, responseCode?: string) {
        super('HOOK_RESPONSE', responseCode ? `${message} (${responseCode})` : message);
        this.responseCode = responseCode;
    }
}

// ─── Dispatch ───

export class DispatchTransformError extends HooklineError {
    readonly hookName: string;
    readonly stage: string;

    constructor(hookName: string, stage: string, cause: unknown) {
        super('DISPATCH_TRANSFORM', `hook "${hookName}" (${stage}) failed: ${errorMessage(cause)}`, { cause });
        this.hookName = hookName;
        this.stage = stage;
    }
}

export class DispatchNotifyError extends HooklineError {
    readonly hookName: string;

    constructor(hookName: string, cause: unknown) {
        super('DISPATCH_NOTIFY', `notify hook "${hookName}" failed: ${errorMessage(cause)}`, { cause });
        this.hookName = hookName;
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function withStderr(message: string, stderr?: string): string {
    const trimmed = stderr?.trim();
    return trimmed ? `${message}: ${trimmed}` : message;
}
