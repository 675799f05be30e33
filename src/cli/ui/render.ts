import chalk from 'chalk';
import type { Hook, HookStage } from '../../hooks/types.js';
import type { AuditEntry } from '../../logging/audit-log.js';
import type { SearchResult } from '../../plugins/search.js';
import type { InstalledPlugin } from '../../plugins/types.js';
import { formatDuration } from '../../utils/duration.js';

/**
 * Render the installed plugin table
 */
export function renderPluginList(plugins: InstalledPlugin[]): void {
    if (plugins.length === 0) {
        console.log(chalk.dim('\nNo plugins installed.'));
        console.log(chalk.dim(`Install a plugin from a local directory:\n  ${chalk.white('hookline plugin install <path>')}\n`));
        return;
    }

    console.log(chalk.bold(`\n🔌 Installed Plugins (${plugins.length})\n`));

    for (const plugin of plugins) {
        const state = plugin.degraded
            ? chalk.red(' degraded')
            : plugin.enabled ? '' : chalk.yellow(' disabled');
        console.log(`  ${chalk.cyan.bold(plugin.entry.name)} ${chalk.dim(`v${plugin.entry.version}`)}${state}`);

        if (plugin.degraded) {
            console.log(chalk.red(`    ${plugin.error ?? 'manifest unreadable'}`));
        } else {
            console.log(`    ${plugin.manifest.plugin.description}`);
            const parts: string[] = [];
            if (plugin.manifest.hooks.length > 0) parts.push(`${plugin.manifest.hooks.length} hooks`);
            if (plugin.manifest.commands.length > 0) parts.push(`${plugin.manifest.commands.length} commands`);
            if (parts.length > 0) {
                console.log(chalk.dim(`    Provides: ${parts.join(', ')}`));
            }
        }
        console.log();
    }
}

/**
 * Render everything known about one plugin
 */
export function renderPluginInfo(plugin: InstalledPlugin, permissionLines: string[]): void {
    const { manifest, entry } = plugin;

    console.log(chalk.bold(`\n${manifest.plugin.name} ${chalk.dim(`v${entry.version}`)}\n`));
    if (plugin.degraded) {
        console.log(chalk.red(`  Manifest unreadable: ${plugin.error ?? 'unknown error'}\n`));
    } else {
        console.log(`  ${manifest.plugin.description}`);
        console.log(chalk.dim(`  Author: ${manifest.plugin.author}${manifest.plugin.license ? ` │ License: ${manifest.plugin.license}` : ''}`));
        console.log(chalk.dim(`  Protocol: ${manifest.plugin.protocolVersion}`));
    }
    console.log(chalk.dim(`  Source: ${entry.source}`));
    console.log(chalk.dim(`  Directory: ${entry.dir}`));
    console.log(chalk.dim(`  Installed: ${entry.installedAt || 'unknown'}`));
    console.log(chalk.dim(`  Status: ${entry.enabled ? 'enabled' : 'disabled'}`));

    if (manifest.hooks.length > 0) {
        console.log(chalk.cyan.bold('\n  Hooks'));
        for (const hook of manifest.hooks) {
            const timeout = hook.timeout ? chalk.dim(` (timeout ${hook.timeout})`) : '';
            console.log(`    → ${chalk.white(hook.command)} ${chalk.dim(`${hook.stage}/${hook.mode}`)}${timeout}`);
        }
    }

    if (manifest.commands.length > 0) {
        console.log(chalk.cyan.bold('\n  Commands'));
        for (const command of manifest.commands) {
            const usage = command.args ? ` ${command.args}` : '';
            console.log(`    • ${chalk.white(command.name + usage)}  ${chalk.dim(command.description)}`);
        }
    }

    console.log(chalk.cyan.bold('\n  Permissions'));
    renderPermissions(permissionLines);
    console.log();
}

export function renderPermissions(lines: string[], escalations: string[] = []): void {
    for (const line of lines) {
        console.log(`    ${line}`);
    }
    for (const line of escalations) {
        console.log(chalk.yellow(`    ⚠ ${line}`));
    }
}

/**
 * Render registered hooks grouped by stage
 */
export function renderHookList(groups: { stage: HookStage; hooks: Hook[] }[], hooksDir: string): void {
    const total = groups.reduce((n, g) => n + g.hooks.length, 0);
    if (total === 0) {
        console.log(chalk.dim('No hooks registered.'));
        console.log(chalk.dim(`\nAdd executable scripts to ${chalk.white(hooksDir)}`));
        console.log(chalk.dim(`or scaffold one: ${chalk.white('hookline hook create <pattern> <stage>')}`));
        return;
    }

    console.log(chalk.bold(`\n🪝 Registered Hooks (${total})\n`));

    for (const { stage, hooks } of groups) {
        console.log(chalk.cyan.bold(`  ${stage}`));
        for (const hook of hooks) {
            const timeout = chalk.dim(` [${formatDuration(hook.timeoutMs)}]`);
            const source = chalk.dim(` (${hook.source})`);
            console.log(`    → ${chalk.white(hook.pattern)} ${hook.name}${timeout}${source}`);
        }
        console.log();
    }
}

export function renderAuditEntries(entries: AuditEntry[]): void {
    if (entries.length === 0) {
        console.log(chalk.dim('No audit entries.'));
        return;
    }
    for (const entry of entries) {
        const detail = entry.detail ? ` ${chalk.dim(entry.detail)}` : '';
        console.log(`${chalk.dim(entry.timestamp)} ${chalk.cyan(entry.plugin)} ${entry.action}${detail}`);
    }
}

export function renderSearchResults(results: SearchResult[]): void {
    if (results.length === 0) {
        console.log(chalk.dim('No plugins found.'));
        return;
    }
    for (const result of results) {
        console.log(`  ${chalk.cyan.bold(result.fullName)}  ${chalk.dim(`★ ${result.stars}`)}`);
        if (result.description) {
            console.log(chalk.dim(`    ${result.description}`));
        }
    }
    console.log(chalk.dim(`\n${results.length} result${results.length === 1 ? '' : 's'}`));
}

export function renderSuccess(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
}

export function renderWarning(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
}

export function renderError(message: string): void {
    console.error(chalk.red.bold(`✗ ${message}`));
}
