import { DispatchNotifyError, DispatchTransformError, errorMessage } from '../errors.js';
import type { AuditLogger } from '../logging/audit-log.js';
import type { HookRegistry } from './registry.js';
import type { Hook, HookContext, HookStage } from './types.js';

export interface PipelineOptions {
    /** Most notify hooks allowed to run at once; the rest queue */
    maxBackground?: number;
    /** Where notify failures are recorded */
    audit?: AuditLogger;
}

/**
 * Hook Pipeline — runs a command through its hook stages
 *
 * Transform stages (prevalidate, preexec, postexec) run their hooks one at a
 * time in name order, each seeing the previous hook's context; the first
 * failure aborts the command. The notify stage starts every matching hook in
 * the background and returns at once; failures are logged and audited only.
 */
export class HookPipeline {
    private readonly background = new Set<Promise<void>>();
    private readonly maxBackground: number;
    private readonly audit?: AuditLogger;
    private active = 0;
    private waiting: (() => void)[] = [];

    constructor(private readonly registry: HookRegistry, options: PipelineOptions = {}) {
        this.maxBackground = Math.max(1, options.maxBackground ?? 16);
        this.audit = options.audit;
    }

    /**
     * Run the full lifecycle around `execute`:
     * prevalidate → preexec → execute → postexec → notify.
     *
     * `execute` receives the context the pre-stages produced; a value it
     * returns becomes `result` on the context. Resolves with the final
     * context, rejects with the first fatal error.
     */
    async run(ctx: HookContext, execute: (ctx: HookContext) => Promise<unknown>): Promise<HookContext> {
        const command = ctx.command;

        if (!this.registry.hasHooks(command)) {
            const result = await execute(cloneContext(ctx));
            return result === undefined ? ctx : { ...ctx, result };
        }

        let current = await this.runStage(command, 'prevalidate', ctx);
        current = await this.runStage(command, 'preexec', current);

        const result = await execute(cloneContext(current));
        if (result !== undefined) {
            current = { ...current, result };
        }

        current = await this.runStage(command, 'postexec', current);
        this.dispatchNotify(command, current);
        return current;
    }

    /**
     * Run one stage's hooks for the command. For the notify stage this only
     * starts the hooks and resolves with `ctx` unchanged.
     */
    async runStage(command: string, stage: HookStage, ctx: HookContext): Promise<HookContext> {
        if (stage === 'notify') {
            this.dispatchNotify(command, ctx);
            return ctx;
        }

        let current = ctx;
        for (const hook of this.registry.resolve(command, stage)) {
            if (hook.mode !== 'transform') continue;
            try {
                current = await hook.handler.invoke(cloneContext(current), hook.timeoutMs);
            } catch (err) {
                throw new DispatchTransformError(hook.name, stage, err);
            }
        }
        return current;
    }

    /**
     * Start every notify hook matching the command. Returns how many were
     * started; does not wait for any of them.
     */
    dispatchNotify(command: string, ctx: HookContext): number {
        const hooks = this.registry.resolve(command, 'notify').filter(h => h.mode === 'notify');
        for (const hook of hooks) {
            const task: Promise<void> = this.runNotify(hook, cloneContext(ctx))
                .finally(() => this.background.delete(task));
            this.background.add(task);
        }
        return hooks.length;
    }

    /**
     * Notify hooks started but not yet finished
     */
    get pending(): number {
        return this.background.size;
    }

    /**
     * Wait for all background notify hooks, including ones started while
     * draining.
     */
    async drain(): Promise<void> {
        while (this.background.size > 0) {
            await Promise.all(Array.from(this.background));
        }
    }

    private async runNotify(hook: Hook, ctx: HookContext): Promise<void> {
        await this.acquireSlot();
        let failure: DispatchNotifyError | null = null;
        try {
            await hook.handler.invoke(ctx, hook.timeoutMs);
        } catch (err) {
            failure = new DispatchNotifyError(hook.name, err);
        } finally {
            this.releaseSlot();
        }

        if (failure) {
            await this.reportNotifyFailure(hook, ctx, failure);
        }
    }

    private async reportNotifyFailure(hook: Hook, ctx: HookContext, failure: DispatchNotifyError): Promise<void> {
        console.warn(failure.message);
        if (!this.audit) return;

        const subject = hook.source.startsWith('plugin:') ? hook.source.slice('plugin:'.length) : hook.source;
        try {
            await this.audit.record(
                subject,
                'hook.notify.failed',
                `hook=${hook.name} command=${ctx.command} error=${JSON.stringify(errorMessage(failure.cause))}`
            );
        } catch (err) {
            console.error(`Audit log unavailable: ${errorMessage(err)}`);
        }
    }

    private async acquireSlot(): Promise<void> {
        if (this.active < this.maxBackground) {
            this.active++;
            return;
        }
        // the releasing task hands its slot over, so `active` stays the same
        await new Promise<void>(resolve => this.waiting.push(resolve));
    }

    private releaseSlot(): void {
        const next = this.waiting.shift();
        if (next) {
            next();
        } else {
            this.active--;
        }
    }
}

/**
 * Copy deep enough that a handler cannot mutate the caller's args or flags
 */
export function cloneContext(ctx: HookContext): HookContext {
    return { ...ctx, args: [...ctx.args], flags: { ...ctx.flags } };
}
