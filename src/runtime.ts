import { ConfigLoader } from './config/loader.js';
import type { HooklineConfig } from './config/schema.js';
import { registerUserHooks } from './hooks/discover.js';
import { HookPipeline } from './hooks/pipeline.js';
import { HookRegistry } from './hooks/registry.js';
import { AuditLogger } from './logging/audit-log.js';
import { PluginRegistry } from './plugins/registry.js';
import { registerPluginHooks } from './plugins/runtime.js';
import { getPaths, type HooklinePaths } from './utils/paths.js';

export interface RuntimeOptions {
    /** Environment used for path resolution and passed to hook processes */
    env?: NodeJS.ProcessEnv;
    /** Skip reading config.yaml */
    config?: HooklineConfig;
}

export interface Runtime {
    config: HooklineConfig;
    paths: HooklinePaths;
    env: NodeJS.ProcessEnv;
    audit: AuditLogger;
    plugins: PluginRegistry;
    hooks: HookRegistry;
    pipeline: HookPipeline;
    /** Hooks registered from plugins and user scripts */
    loaded: { plugins: number; scripts: number };
}

/**
 * Wire up everything a host needs to dispatch commands through hooks:
 * configuration, the plugin registry, a hook registry filled from enabled
 * plugins and the user hooks directory, and a pipeline over it.
 */
export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
    const env = options.env ?? process.env;
    const paths = getPaths(env);
    const config = options.config ?? await new ConfigLoader(paths.configFile).load();

    const audit = new AuditLogger(paths.auditLogFile);
    const plugins = new PluginRegistry(paths, audit);
    const hooks = new HookRegistry();
    const loaded = {
        plugins: registerPluginHooks(hooks, await plugins.list(), {
            paths,
            transformTimeout: config.hooks.transformTimeout,
            notifyTimeout: config.hooks.notifyTimeout,
            strictProtocol: config.hooks.strictProtocol,
            env,
        }),
        scripts: await registerUserHooks(hooks, paths.hooksDir, {
            transformTimeout: config.hooks.transformTimeout,
            notifyTimeout: config.hooks.notifyTimeout,
        }, env),
    };

    const pipeline = new HookPipeline(hooks, { maxBackground: config.hooks.maxBackground, audit });

    return { config, paths, env, audit, plugins, hooks, pipeline, loaded };
}
