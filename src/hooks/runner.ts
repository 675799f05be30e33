import { runSubprocess } from './subprocess.js';
import { parseContextOutput } from './protocol.js';
import type { HookContext, HookHandler, HookMode, HookStage } from './types.js';

/**
 * Script Hook Handler — runs a user hook script as a child process
 *
 * The script receives the context JSON on stdin. Transform scripts may print
 * a modified context; printing nothing leaves the context unchanged. Notify
 * script output is ignored.
 *
 * User scripts are trusted the way the user's shell is: they inherit the full
 * environment, plus:
 *   HOOKLINE_HOOK_COMMAND → ctx.command
 *   HOOKLINE_HOOK_STAGE   → stage the script is registered at
 */
export class ScriptHookHandler implements HookHandler {
    constructor(
        readonly scriptPath: string,
        readonly stage: HookStage,
        readonly mode: HookMode,
        private readonly baseEnv: NodeJS.ProcessEnv = process.env
    ) { }

    async invoke(ctx: HookContext, timeoutMs: number): Promise<HookContext> {
        const { stdout, stderr } = await runSubprocess({
            executable: this.scriptPath,
            input: JSON.stringify(ctx),
            timeoutMs,
            label: `hook ${this.scriptPath}`,
            env: {
                ...this.baseEnv,
                HOOKLINE_HOOK_COMMAND: ctx.command,
                HOOKLINE_HOOK_STAGE: this.stage,
            },
        });

        if (this.mode === 'notify') {
            return ctx;
        }
        return parseContextOutput(stdout, ctx, stderr);
    }
}
