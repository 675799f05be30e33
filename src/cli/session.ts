import type { Command } from 'commander';
import { createContext, type HookContext } from '../hooks/types.js';
import { createRuntime, type Runtime, type RuntimeOptions } from '../runtime.js';

export type HookedAction = (runtime: Runtime, ctx: HookContext) => Promise<unknown>;

/**
 * One CLI process: builds the runtime on first use and runs every command
 * action through the hook pipeline.
 */
export class CliSession {
    private runtime: Promise<Runtime> | null = null;

    constructor(private readonly options: RuntimeOptions = {}) { }

    get(): Promise<Runtime> {
        if (!this.runtime) {
            this.runtime = createRuntime(this.options);
        }
        return this.runtime;
    }

    /**
     * Run `action` under the dotted command name. The action reads its
     * arguments from the context, so preexec hooks can rewrite them.
     */
    async dispatch(command: string, args: string[], flags: Record<string, string>, action: HookedAction): Promise<HookContext> {
        const runtime = await this.get();
        const ctx = createContext(command, args, flags);
        return runtime.pipeline.run(ctx, c => action(runtime, c));
    }

    /**
     * Wait for background notify hooks unless `hooks.drainOnExit` is off
     */
    async close(): Promise<void> {
        if (!this.runtime) return;
        const runtime = await this.runtime;
        if (runtime.config.hooks.drainOnExit) {
            await runtime.pipeline.drain();
        }
    }
}

/**
 * Attach an action that goes through the pipeline as `name`
 */
export function hooked(session: CliSession, command: Command, name: string, action: HookedAction): Command {
    return command.action(async () => {
        await session.dispatch(name, [...command.args], explicitFlags(command), action);
    });
}

/**
 * Options the user actually typed; defaults are left out of the context
 */
export function explicitFlags(command: Command): Record<string, string> {
    const flags: Record<string, string> = {};
    for (const [key, value] of Object.entries<unknown>(command.opts())) {
        if (value === undefined || command.getOptionValueSource(key) === 'default') continue;
        flags[key] = Array.isArray(value) ? value.join(',') : String(value);
    }
    return flags;
}
