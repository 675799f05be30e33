import { Command } from 'commander';
import chalk from 'chalk';
import { UsageError } from '../../errors.js';
import { createHookScript, testHook } from '../../hooks/discover.js';
import { ALL_HOOK_STAGES, isHookStage } from '../../hooks/types.js';
import { hooked, type CliSession } from '../session.js';
import { renderHookList, renderSuccess } from '../ui/render.js';

export function createHooksCommand(session: CliSession): Command {
    const cmd = new Command('hook')
        .description('Manage user hook scripts');

    // ─── List hooks ───
    hooked(session, cmd.command('list').description('List registered hooks by stage'), 'hook.list',
        async ({ hooks, paths }) => {
            renderHookList(hooks.list(), paths.hooksDir);
            return hooks.size;
        });

    // ─── Scaffold a hook ───
    hooked(session, cmd.command('create')
        .description('Create a starter hook script')
        .argument('<pattern>', 'Command pattern (todo.add, todo.*, *)')
        .argument('<stage>', `Hook stage (${ALL_HOOK_STAGES.join(', ')})`), 'hook.create',
    async ({ paths }, ctx) => {
        const [pattern, stage] = ctx.args;
        if (!pattern || !stage) {
            throw new UsageError('hook.create: expected <pattern> <stage>');
        }
        if (!isHookStage(stage)) {
            throw new UsageError(`unknown stage "${stage}" (valid: ${ALL_HOOK_STAGES.join(', ')})`);
        }

        const filePath = await createHookScript(paths.hooksDir, pattern, stage);
        renderSuccess(`Hook created: ${filePath}`);
        console.log(chalk.dim('  Edit it, then try it with: ') + chalk.white(`hookline hook test ${filePath}`));
        return filePath;
    });

    // ─── Dry-run a hook ───
    hooked(session, cmd.command('test')
        .description('Run a hook script against a sample context')
        .argument('<file>', 'Path to the hook script'), 'hook.test',
    async ({ config, env }, ctx) => {
        const file = ctx.args[0];
        if (!file) {
            throw new UsageError('hook.test: expected <file>');
        }

        const result = await testHook(file, config.hooks, env);
        renderSuccess(`${result.hook.name} ran (${result.hook.stage}, pattern ${result.hook.pattern})`);
        if (result.output) {
            console.log(chalk.dim('  Output context:'));
            console.log(JSON.stringify(result.output, null, 2));
        }
        return result.output;
    });

    return cmd;
}
