/**
 * Hook System — Types
 *
 * Every host command passes through four stages:
 *   prevalidate → preexec → (command runs) → postexec → notify
 *
 * Hooks in the first three stages are `transform` hooks: they run in order and
 * may rewrite the context. Hooks in the notify stage are fire-and-forget.
 */

// ─── Stages & Modes ───

export const ALL_HOOK_STAGES = ['prevalidate', 'preexec', 'postexec', 'notify'] as const;

export type HookStage = typeof ALL_HOOK_STAGES[number];

export const ALL_HOOK_MODES = ['transform', 'notify'] as const;

export type HookMode = typeof ALL_HOOK_MODES[number];

export const DEFAULT_TRANSFORM_TIMEOUT_MS = 5_000;
export const DEFAULT_NOTIFY_TIMEOUT_MS = 30_000;

export function isHookStage(value: string): value is HookStage {
    return ALL_HOOK_STAGES.some(stage => stage === value);
}

export function isHookMode(value: string): value is HookMode {
    return ALL_HOOK_MODES.some(mode => mode === value);
}

/**
 * The only mode a stage admits: notify ⇔ notify.
 */
export function modeForStage(stage: HookStage): HookMode {
    return stage === 'notify' ? 'notify' : 'transform';
}

// ─── Context ───

/**
 * Data threaded through the pipeline for one command invocation
 */
export interface HookContext {
    /** Dotted command name, e.g. `todo.add` */
    command: string;
    args: string[];
    /** Flags explicitly set on the command line */
    flags: Record<string, string>;
    /** RFC 3339 time the invocation started */
    timestamp: string;
    /** Command output; present from postexec onward */
    result?: unknown;
}

export function createContext(
    command: string,
    args: string[] = [],
    flags: Record<string, string> = {},
    now: Date = new Date()
): HookContext {
    return {
        command,
        args: [...args],
        flags: { ...flags },
        timestamp: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
    };
}

// ─── Hooks ───

/**
 * Something that can run one hook invocation. Plugin binaries and user
 * scripts both implement this; the pipeline does not care which it gets.
 */
export interface HookHandler {
    /**
     * Run the hook. Transform handlers resolve with the context to continue
     * with; notify handlers resolve with their input unchanged.
     */
    invoke(ctx: HookContext, timeoutMs: number): Promise<HookContext>;
}

/**
 * A registered runtime dispatch unit
 */
export interface Hook {
    /** Command glob (`todo.add`, `todo.*`, `*`) */
    pattern: string;
    stage: HookStage;
    mode: HookMode;
    /** Sort key and identity within pattern+stage */
    name: string;
    /** `user` for scripts, `plugin:<name>` for plugin hooks */
    source: string;
    handler: HookHandler;
    timeoutMs: number;
}
