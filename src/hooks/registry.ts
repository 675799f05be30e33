import { minimatch } from 'minimatch';
import { HookConflictError, HookRegistrationError } from '../errors.js';
import type { Hook, HookStage } from './types.js';
import { ALL_HOOK_STAGES, isHookMode, isHookStage, modeForStage } from './types.js';

/**
 * Hook Registry — the set of hooks dispatchable during one process run
 *
 * Hooks come from:
 * 1. Enabled installed plugins (see plugins/runtime.ts)
 * 2. Executable scripts in the user hooks directory (see hooks/discover.ts)
 *
 * The registry is filled once, before the first dispatch, and read-only
 * afterwards, so it needs no locking.
 */
export class HookRegistry {
    private hooks: Hook[] = [];

    /**
     * Register a hook. Rejects incomplete hooks and duplicates of an
     * existing pattern + stage + name.
     */
    register(hook: Hook): void {
        this.validate(hook);
        if (this.hooks.some(existing => sameSlot(existing, hook))) {
            throw new HookConflictError(hook.pattern, hook.stage, hook.name);
        }
        this.hooks.push(hook);
    }

    /**
     * Register several hooks, all or nothing.
     */
    registerAll(hooks: Hook[]): void {
        for (const [i, hook] of hooks.entries()) {
            this.validate(hook);
            const clash = this.hooks.some(existing => sameSlot(existing, hook))
                || hooks.slice(0, i).some(earlier => sameSlot(earlier, hook));
            if (clash) {
                throw new HookConflictError(hook.pattern, hook.stage, hook.name);
            }
        }
        this.hooks.push(...hooks);
    }

    /**
     * Remove every hook from the given source (e.g. `plugin:obsidian`)
     */
    unregister(source: string): number {
        const before = this.hooks.length;
        this.hooks = this.hooks.filter(h => h.source !== source);
        return before - this.hooks.length;
    }

    /**
     * Hooks matching the command at the given stage, sorted by name
     */
    resolve(command: string, stage: HookStage): Hook[] {
        return this.hooks
            .filter(h => h.stage === stage && matchPattern(h.pattern, command))
            .sort(byName);
    }

    /**
     * True if any stage has a hook for the command
     */
    hasHooks(command: string): boolean {
        return this.hooks.some(h => matchPattern(h.pattern, command));
    }

    /**
     * All registered hooks grouped by stage, in pipeline order
     */
    list(): { stage: HookStage; hooks: Hook[] }[] {
        const result: { stage: HookStage; hooks: Hook[] }[] = [];
        for (const stage of ALL_HOOK_STAGES) {
            const hooks = this.hooks.filter(h => h.stage === stage).sort(byName);
            if (hooks.length > 0) {
                result.push({ stage, hooks });
            }
        }
        return result;
    }

    get size(): number {
        return this.hooks.length;
    }

    /**
     * Clear all hooks (useful for testing)
     */
    clear(): void {
        this.hooks = [];
    }

    private validate(hook: Hook): void {
        const missing = (['pattern', 'stage', 'mode', 'name', 'source'] as const)
            .filter(field => !hook[field]);
        if (missing.length > 0) {
            throw new HookRegistrationError(`hook "${hook.name || '?'}" is missing ${missing.join(', ')}`);
        }
        if (!isHookStage(hook.stage)) {
            throw new HookRegistrationError(`hook "${hook.name}": unknown stage "${hook.stage}"`);
        }
        if (!isHookMode(hook.mode)) {
            throw new HookRegistrationError(`hook "${hook.name}": unknown mode "${hook.mode}"`);
        }
        if (modeForStage(hook.stage) !== hook.mode) {
            throw new HookRegistrationError(
                `hook "${hook.name}": ${hook.mode} mode cannot run at the ${hook.stage} stage`
            );
        }
        if (typeof hook.handler?.invoke !== 'function') {
            throw new HookRegistrationError(`hook "${hook.name}" has no handler`);
        }
        if (!Number.isFinite(hook.timeoutMs) || hook.timeoutMs <= 0) {
            throw new HookRegistrationError(`hook "${hook.name}": timeout must be positive`);
        }
    }
}

/**
 * Match a dotted command name against a hook pattern:
 *   - `todo.add` matches only `todo.add`
 *   - `todo.*`   matches `todo.add`, `todo.done`, ...
 *   - `*`        matches everything
 */
export function matchPattern(pattern: string, command: string): boolean {
    return minimatch(command, pattern, { dot: true, nocomment: true, nonegate: true });
}

function sameSlot(a: Hook, b: Hook): boolean {
    return a.pattern === b.pattern && a.stage === b.stage && a.name === b.name;
}

function byName(a: Hook, b: Hook): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}
