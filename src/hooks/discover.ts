import { readdir, stat, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { HookRegistrationError, errorMessage } from '../errors.js';
import type { HookRegistry } from './registry.js';
import { ScriptHookHandler } from './runner.js';
import type { Hook, HookContext, HookStage } from './types.js';
import {
    ALL_HOOK_STAGES,
    DEFAULT_NOTIFY_TIMEOUT_MS,
    DEFAULT_TRANSFORM_TIMEOUT_MS,
    createContext,
    isHookStage,
    modeForStage,
} from './types.js';

/**
 * A hook script found in the user hooks directory
 */
export interface UserHook {
    /** Absolute path to the script */
    path: string;
    pattern: string;
    stage: HookStage;
    /** Extension without the dot; empty when the file has none */
    extension: string;
    /** File name, used as the hook name */
    name: string;
}

export interface UserHookTimeouts {
    transformTimeout: number;
    notifyTimeout: number;
}

const DEFAULT_TIMEOUTS: UserHookTimeouts = {
    transformTimeout: DEFAULT_TRANSFORM_TIMEOUT_MS,
    notifyTimeout: DEFAULT_NOTIFY_TIMEOUT_MS,
};

/**
 * Parse `<command-pattern>.<stage>.<ext>` right to left. The pattern may
 * itself contain dots:
 *
 *   todo.add.preexec.sh → pattern `todo.add`, stage `preexec`, ext `sh`
 *   todo.*.notify.py    → pattern `todo.*`,   stage `notify`,  ext `py`
 *   *.postexec          → pattern `*`,        stage `postexec`, no ext
 *
 * Returns null when the name does not follow the convention.
 */
export function parseHookFilename(fileName: string): Omit<UserHook, 'path'> | null {
    const parts = fileName.split('.');
    if (parts.length < 2) return null;

    // with an extension: [...pattern, stage, ext]; without: [...pattern, stage]
    let stageIdx = parts.length - 2;
    let extension = parts[parts.length - 1];
    if (!isHookStage(parts[stageIdx]) && isHookStage(parts[parts.length - 1])) {
        stageIdx = parts.length - 1;
        extension = '';
    }

    const stage = parts[stageIdx];
    const pattern = parts.slice(0, stageIdx).join('.');
    if (!isHookStage(stage) || pattern === '') return null;

    return { pattern, stage, extension, name: fileName };
}

/**
 * Scan the hooks directory for executable scripts following the naming
 * convention. Nothing is executed. A missing directory yields no hooks;
 * files that cannot be inspected are skipped.
 */
export async function discoverHooks(hooksDir: string): Promise<UserHook[]> {
    const entries = await readdir(hooksDir, { withFileTypes: true }).catch((err: unknown) => {
        if (isMissing(err)) return null;
        throw err;
    });
    if (!entries) return [];

    const hooks: UserHook[] = [];
    for (const entry of entries) {
        if (entry.isDirectory()) continue;

        const parsed = parseHookFilename(entry.name);
        if (!parsed) continue;

        const filePath = path.join(hooksDir, entry.name);
        try {
            const info = await stat(filePath);
            if (!info.isFile() || (info.mode & 0o111) === 0) continue;
        } catch (err) {
            console.warn(`Skipping hook ${filePath}: ${errorMessage(err)}`);
            continue;
        }

        hooks.push({ ...parsed, path: filePath });
    }

    return hooks.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

/**
 * Turn a discovered script into a registrable hook
 */
export function toHook(
    userHook: UserHook,
    timeouts: UserHookTimeouts = DEFAULT_TIMEOUTS,
    env: NodeJS.ProcessEnv = process.env
): Hook {
    const mode = modeForStage(userHook.stage);
    return {
        pattern: userHook.pattern,
        stage: userHook.stage,
        mode,
        name: userHook.name,
        source: 'user',
        handler: new ScriptHookHandler(userHook.path, userHook.stage, mode, env),
        timeoutMs: mode === 'notify' ? timeouts.notifyTimeout : timeouts.transformTimeout,
    };
}

/**
 * Discover and register all user hooks. Returns the number registered.
 */
export async function registerUserHooks(
    registry: HookRegistry,
    hooksDir: string,
    timeouts: UserHookTimeouts = DEFAULT_TIMEOUTS,
    env: NodeJS.ProcessEnv = process.env
): Promise<number> {
    const discovered = await discoverHooks(hooksDir);
    let count = 0;

    for (const userHook of discovered) {
        try {
            registry.register(toHook(userHook, timeouts, env));
            count++;
        } catch (err) {
            console.warn(`Skipping hook ${userHook.name}: ${errorMessage(err)}`);
        }
    }

    return count;
}

// ─── Scaffolding ───

/**
 * Write a starter script for the pattern and stage. Refuses patterns that
 * would escape the hooks directory and never overwrites.
 */
export async function createHookScript(
    hooksDir: string,
    pattern: string,
    stage: HookStage,
    now: Date = new Date()
): Promise<string> {
    if (pattern === '' || /[/\\]/.test(pattern) || pattern.includes('..')) {
        throw new HookRegistrationError(`pattern "${pattern}" must be a command pattern, not a path`);
    }

    const filePath = path.join(hooksDir, `${pattern}.${stage}.sh`);
    if (path.dirname(path.resolve(filePath)) !== path.resolve(hooksDir)) {
        throw new HookRegistrationError(`hook path escapes ${hooksDir}`);
    }

    await mkdir(hooksDir, { recursive: true });
    try {
        // 'wx' fails if the file exists
        await writeFile(filePath, scriptTemplate(pattern, stage, now), { mode: 0o755, flag: 'wx' });
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
            throw new HookRegistrationError(`hook already exists: ${filePath}`);
        }
        throw err;
    }

    return filePath;
}

function scriptTemplate(pattern: string, stage: HookStage, now: Date): string {
    const mode = modeForStage(stage);
    let script = `#!/bin/sh
# hookline hook: ${pattern} at ${stage} stage (${mode} mode)
# Created: ${now.toISOString().slice(0, 10)}
#
# Receives the command context as JSON on stdin:
# {
#   "command": "todo.add",
#   "args": ["buy milk"],
#   "flags": {"priority": "high"},
#   "timestamp": "2026-01-15T10:30:00Z"
# }
#
# Transform hooks print the (modified) context to stdout; printing nothing
# keeps it unchanged. Notify hook output is ignored.

CONTEXT=$(cat)
`;

    if (mode === 'transform') {
        script += `
printf '%s\\n' "$CONTEXT"
`;
    }

    return script;
}

// ─── Dry run ───

export interface HookTestResult {
    hook: UserHook;
    /** The context the script returned (transform hooks only) */
    output?: HookContext;
}

/**
 * Run one hook script against a sample `test.command` context
 */
export async function testHook(
    scriptPath: string,
    timeouts: UserHookTimeouts = DEFAULT_TIMEOUTS,
    env: NodeJS.ProcessEnv = process.env
): Promise<HookTestResult> {
    const info = await stat(scriptPath).catch(() => null);
    if (!info?.isFile()) {
        throw new HookRegistrationError(`hook not found: ${scriptPath}`);
    }
    if ((info.mode & 0o111) === 0) {
        throw new HookRegistrationError(`hook not executable: ${scriptPath} (run: chmod +x ${scriptPath})`);
    }

    const parsed = parseHookFilename(path.basename(scriptPath));
    if (!parsed) {
        throw new HookRegistrationError(
            `"${path.basename(scriptPath)}" does not follow <pattern>.<stage>.<ext> (stages: ${ALL_HOOK_STAGES.join(', ')})`
        );
    }

    const userHook: UserHook = { ...parsed, path: path.resolve(scriptPath) };
    const hook = toHook(userHook, timeouts, env);
    const sample = createContext('test.command', ['sample', 'args'], { flag1: 'value1' });
    const result = await hook.handler.invoke(sample, hook.timeoutMs);

    return hook.mode === 'notify' ? { hook: userHook } : { hook: userHook, output: result };
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
