import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { UsageError, errorMessage } from '../../errors.js';
import type { LifecycleEvent } from '../../hooks/protocol.js';
import type { HookContext } from '../../hooks/types.js';
import { MANIFEST_FILENAME, parseManifest } from '../../plugins/manifest.js';
import { emptyPermissions, findEscalations, summarizePermissions } from '../../plugins/permissions.js';
import { hasEntrypoint, runPluginCommand, sendLifecycleEvent } from '../../plugins/runtime.js';
import { searchPlugins } from '../../plugins/search.js';
import type { InstalledPlugin } from '../../plugins/types.js';
import type { Runtime } from '../../runtime.js';
import { hooked, type CliSession } from '../session.js';
import { confirm } from '../ui/prompt.js';
import {
    renderAuditEntries,
    renderPermissions,
    renderPluginInfo,
    renderPluginList,
    renderSearchResults,
    renderSuccess,
    renderWarning,
} from '../ui/render.js';

export function createPluginsCommand(session: CliSession): Command {
    const cmd = new Command('plugin')
        .description('Manage installed plugins');

    // ─── List plugins ───
    hooked(session, cmd.command('list').description('List installed plugins'), 'plugin.list',
        async ({ plugins }) => {
            const installed = await plugins.list();
            renderPluginList(installed);
            return installed.map(p => p.entry.name);
        });

    // ─── Plugin details ───
    hooked(session, cmd.command('info')
        .description('Show a plugin\'s manifest, hooks and permissions')
        .argument('<name>', 'Plugin name'), 'plugin.info',
    async ({ plugins }, ctx) => {
        const plugin = await plugins.get(requireArg(ctx, 0, 'name'));
        renderPluginInfo(plugin, summarizePermissions(plugin.manifest.permissions));
        return plugin.entry;
    });

    // ─── Search GitHub ───
    hooked(session, cmd.command('search')
        .description('Search GitHub for published plugins')
        .argument('[query]', 'Part of the plugin name')
        .option('--tag <topic>', 'Only repositories carrying this GitHub topic'), 'plugin.search',
    async ({ env }, ctx) => {
        const query = ctx.args[0] ?? '';
        console.log(chalk.dim(`Searching GitHub for plugins${query ? ` matching "${query}"` : ''}...\n`));
        const results = await searchPlugins(query, { tag: ctx.flags.tag, token: env.GITHUB_TOKEN });
        renderSearchResults(results);
        return results.map(r => r.fullName);
    });

    // ─── Install a plugin ───
    hooked(session, cmd.command('install')
        .description('Install or upgrade a plugin from a local directory')
        .argument('<path>', `Directory containing ${MANIFEST_FILENAME}`)
        .option('-y, --yes', 'Skip the confirmation prompt'), 'plugin.install',
    async (runtime, ctx) => installPlugin(runtime, ctx));

    // ─── Remove a plugin ───
    hooked(session, cmd.command('remove')
        .description('Uninstall a plugin')
        .argument('<name>', 'Plugin name'), 'plugin.remove',
    async (runtime, ctx) => {
        const name = requireArg(ctx, 0, 'name');
        const plugin = await runtime.plugins.get(name);
        // the entrypoint is deleted with the plugin directory, so notify first
        await notifyLifecycle(runtime, plugin, 'remove');
        const entry = await runtime.plugins.remove(name);
        renderSuccess(`Plugin "${name}" removed`);
        return entry;
    });

    // ─── Enable / disable ───
    for (const enabled of [true, false]) {
        const verb = enabled ? 'enable' : 'disable';
        hooked(session, cmd.command(verb)
            .description(enabled ? 'Enable a plugin\'s hooks' : 'Disable a plugin\'s hooks without uninstalling it')
            .argument('<name>', 'Plugin name'), `plugin.${verb}`,
        async (runtime, ctx) => {
            const name = requireArg(ctx, 0, 'name');
            const entry = await runtime.plugins.setEnabled(name, enabled);
            await notifyLifecycle(runtime, await runtime.plugins.get(name), verb);
            renderSuccess(`Plugin "${name}" ${verb}d`);
            return entry;
        });
    }

    // ─── Run a plugin command ───
    hooked(session, cmd.command('run')
        .description('Run a command provided by a plugin')
        .argument('<name>', 'Plugin name')
        .argument('<command>', 'Command name')
        .argument('[args...]', 'Arguments passed to the plugin')
        .allowUnknownOption(), 'plugin.run',
    async (runtime, ctx) => {
        const plugin = await runtime.plugins.get(requireArg(ctx, 0, 'name'));
        if (!plugin.enabled) {
            throw new UsageError(`plugin "${plugin.entry.name}" is disabled`);
        }
        await runPluginCommand(plugin, requireArg(ctx, 1, 'command'), ctx.args.slice(2), {
            paths: runtime.paths,
            env: runtime.env,
        });
        return undefined;
    });

    // ─── Audit trail ───
    hooked(session, cmd.command('audit')
        .description('Show recent plugin audit log entries')
        .option('-n, --lines <count>', 'Number of entries to show', '30'), 'plugin.audit',
    async ({ audit }, ctx) => {
        const lines = Number.parseInt(ctx.flags.lines ?? '30', 10);
        const entries = await audit.tail(Number.isFinite(lines) && lines > 0 ? lines : 30);
        renderAuditEntries(entries);
        return entries.length;
    });

    return cmd;
}

/**
 * Preview the manifest, show what it asks for, confirm, then install.
 * Upgrades only prompt when the new version asks for more than the old one.
 */
async function installPlugin(runtime: Runtime, ctx: HookContext): Promise<unknown> {
    const sourceDir = path.resolve(requireArg(ctx, 0, 'path'));
    const manifest = await parseManifest(path.join(sourceDir, MANIFEST_FILENAME));
    const name = manifest.plugin.name;

    const existing = (await runtime.plugins.list()).find(p => p.entry.name === name);
    // a degraded install has no readable manifest, so it grants nothing
    const granted = existing?.degraded ? emptyPermissions() : existing?.manifest.permissions;
    const escalations = granted ? findEscalations(granted, manifest.permissions) : [];
    const isUpgrade = existing !== undefined;

    console.log(chalk.bold(`\n${isUpgrade ? 'Upgrading' : 'Installing'} ${name} v${manifest.plugin.version}`)
        + (isUpgrade ? chalk.dim(` (installed: v${existing.entry.version})`) : ''));
    console.log(chalk.dim(`  ${manifest.plugin.description}\n`));
    console.log('  Permissions:');
    renderPermissions(summarizePermissions(manifest.permissions), escalations);
    console.log();

    const needsConfirm = runtime.config.plugins.confirmInstall
        && ctx.flags.yes !== 'true'
        && (!isUpgrade || escalations.length > 0);
    if (needsConfirm && !(await confirm(`${isUpgrade ? 'Upgrade' : 'Install'} ${name}?`))) {
        console.log(chalk.dim('Installation cancelled.'));
        return { installed: false, name };
    }

    const result = await runtime.plugins.install(sourceDir);
    await notifyLifecycle(runtime, result.plugin, result.upgraded ? 'upgrade' : 'install');

    renderSuccess(result.upgraded
        ? `Plugin "${name}" upgraded ${result.previousVersion ?? '?'} → ${manifest.plugin.version}`
        : `Plugin "${name}" installed to ${result.plugin.dir}`);
    return { installed: true, name, version: manifest.plugin.version, upgraded: result.upgraded };
}

/**
 * Lifecycle events are courtesy notifications: a plugin that fails to handle
 * one does not undo the operation.
 */
async function notifyLifecycle(runtime: Runtime, plugin: InstalledPlugin, event: LifecycleEvent): Promise<void> {
    if (plugin.degraded || !(await hasEntrypoint(plugin))) return;
    try {
        await sendLifecycleEvent(plugin, event, { paths: runtime.paths, env: runtime.env });
    } catch (err) {
        renderWarning(`plugin ${plugin.entry.name} did not handle ${event}: ${errorMessage(err)}`);
    }
}

function requireArg(ctx: HookContext, index: number, name: string): string {
    const value = ctx.args[index];
    if (!value) {
        throw new UsageError(`${ctx.command}: missing <${name}> argument`);
    }
    return value;
}
