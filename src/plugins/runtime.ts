import { stat } from 'node:fs/promises';
import path from 'node:path';
import { HookRegistrationError, UsageError, errorMessage } from '../errors.js';
import {
    LIFECYCLE_TIMEOUT_MS,
    PROTOCOL_VERSION,
    commandInvocation,
    encodeInvocation,
    hookInvocation,
    isCompatibleProtocol,
    lifecycleInvocation,
    parseResponseOutput,
    type LifecycleEvent,
} from '../hooks/protocol.js';
import type { HookRegistry } from '../hooks/registry.js';
import { runSubprocess } from '../hooks/subprocess.js';
import type { Hook, HookContext, HookHandler, HookMode, HookStage } from '../hooks/types.js';
import { DEFAULT_NOTIFY_TIMEOUT_MS, DEFAULT_TRANSFORM_TIMEOUT_MS } from '../hooks/types.js';
import { parseDuration } from '../utils/duration.js';
import type { HooklinePaths } from '../utils/paths.js';
import { entrypointName } from './manifest.js';
import { buildPluginEnv } from './permissions.js';
import type { InstalledPlugin, Permissions } from './types.js';

type PluginDirs = Pick<HooklinePaths, 'configDir' | 'dataDir'>;

export interface PluginHookOptions {
    paths: PluginDirs;
    transformTimeout?: number;
    notifyTimeout?: number;
    /** Refuse plugins built against another protocol major version */
    strictProtocol?: boolean;
    /** Parent environment to filter (defaults to process.env) */
    env?: NodeJS.ProcessEnv;
}

/**
 * Plugin Hook Handler — sends a `hook` invocation to a plugin binary
 *
 * The child gets a filtered environment derived from the plugin's declared
 * permissions, never the full parent environment.
 */
export class PluginHookHandler implements HookHandler {
    constructor(
        readonly binaryPath: string,
        readonly stage: HookStage,
        readonly mode: HookMode,
        private readonly permissions: Permissions,
        private readonly paths: PluginDirs,
        private readonly parentEnv: NodeJS.ProcessEnv = process.env
    ) { }

    async invoke(ctx: HookContext, timeoutMs: number): Promise<HookContext> {
        const { stdout, stderr } = await runSubprocess({
            executable: this.binaryPath,
            input: encodeInvocation(hookInvocation(this.stage, this.mode, ctx)),
            timeoutMs,
            label: `plugin ${path.basename(this.binaryPath)}`,
            env: buildPluginEnv(this.permissions, this.paths, this.parentEnv),
        });

        if (this.mode === 'notify') {
            return ctx;
        }
        return parseResponseOutput(stdout, ctx, stderr);
    }
}

export function entrypointPath(plugin: InstalledPlugin): string {
    return path.join(plugin.dir, entrypointName(plugin.manifest));
}

export async function hasEntrypoint(plugin: InstalledPlugin): Promise<boolean> {
    const info = await stat(entrypointPath(plugin)).catch(() => null);
    return info?.isFile() ?? false;
}

/**
 * Build the hooks a plugin's manifest declares. Named
 * `<plugin>:<pattern>:<stage>` and sourced `plugin:<plugin>`.
 */
export function pluginHooks(plugin: InstalledPlugin, options: PluginHookOptions): Hook[] {
    const { manifest } = plugin;
    const name = manifest.plugin.name;

    if (options.strictProtocol && !isCompatibleProtocol(manifest.plugin.protocolVersion)) {
        throw new HookRegistrationError(
            `plugin ${name} speaks protocol ${manifest.plugin.protocolVersion}, expected ${PROTOCOL_VERSION}`
        );
    }

    const binary = entrypointPath(plugin);
    return manifest.hooks.map(def => {
        const fallback = def.mode === 'notify'
            ? options.notifyTimeout ?? DEFAULT_NOTIFY_TIMEOUT_MS
            : options.transformTimeout ?? DEFAULT_TRANSFORM_TIMEOUT_MS;

        return {
            pattern: def.command,
            stage: def.stage,
            mode: def.mode,
            name: `${name}:${def.command}:${def.stage}`,
            source: `plugin:${name}`,
            handler: new PluginHookHandler(binary, def.stage, def.mode, manifest.permissions, options.paths, options.env),
            timeoutMs: (def.timeout ? parseDuration(def.timeout) : null) ?? fallback,
        };
    });
}

/**
 * Register the hooks of every enabled, readable plugin. A plugin whose hooks
 * cannot be registered is skipped as a whole; the others still load.
 * Returns the number of hooks registered.
 */
export function registerPluginHooks(
    registry: HookRegistry,
    plugins: InstalledPlugin[],
    options: PluginHookOptions
): number {
    let count = 0;

    for (const plugin of plugins) {
        if (!plugin.enabled) continue;
        if (plugin.degraded) {
            console.warn(`Skipping plugin ${plugin.entry.name}: ${plugin.error ?? 'manifest unreadable'}`);
            continue;
        }

        try {
            const hooks = pluginHooks(plugin, options);
            registry.registerAll(hooks);
            count += hooks.length;
        } catch (err) {
            console.warn(`Skipping hooks of plugin ${plugin.entry.name}: ${errorMessage(err)}`);
        }
    }

    return count;
}

// ─── Commands & lifecycle ───

/**
 * Run one of the plugin's custom commands with the terminal attached.
 * Nothing is parsed from the plugin's output.
 */
export async function runPluginCommand(
    plugin: InstalledPlugin,
    command: string,
    args: string[],
    options: { paths: PluginDirs; flags?: Record<string, string>; env?: NodeJS.ProcessEnv }
): Promise<void> {
    if (!plugin.manifest.commands.some(c => c.name === command)) {
        throw new UsageError(`plugin ${plugin.manifest.plugin.name} has no command "${command}"`);
    }

    await runSubprocess({
        executable: entrypointPath(plugin),
        input: encodeInvocation(commandInvocation(command, args, options.flags)),
        label: `plugin ${plugin.manifest.plugin.name} ${command}`,
        env: buildPluginEnv(plugin.manifest.permissions, options.paths, options.env),
        output: 'inherit',
    });
}

/**
 * Tell a plugin about an install/upgrade/remove/enable/disable. Output is
 * discarded; the plugin gets a short fixed deadline.
 */
export async function sendLifecycleEvent(
    plugin: InstalledPlugin,
    event: LifecycleEvent,
    options: { paths: PluginDirs; env?: NodeJS.ProcessEnv; timeoutMs?: number }
): Promise<void> {
    await runSubprocess({
        executable: entrypointPath(plugin),
        input: encodeInvocation(lifecycleInvocation(event)),
        timeoutMs: options.timeoutMs ?? LIFECYCLE_TIMEOUT_MS,
        label: `plugin ${plugin.manifest.plugin.name} ${event}`,
        env: buildPluginEnv(plugin.manifest.permissions, options.paths, options.env),
    });
}
