// hookline — Public API Surface
export { createCLI } from './cli/index.js';
export { CliSession } from './cli/session.js';
export { createRuntime } from './runtime.js';
export { HookRegistry, matchPattern } from './hooks/registry.js';
export { HookPipeline, cloneContext } from './hooks/pipeline.js';
export { ScriptHookHandler } from './hooks/runner.js';
export { runSubprocess } from './hooks/subprocess.js';
export {
    createHookScript,
    discoverHooks,
    parseHookFilename,
    registerUserHooks,
    testHook,
    toHook,
} from './hooks/discover.js';
export {
    PROTOCOL_VERSION,
    LIFECYCLE_TIMEOUT_MS,
    commandInvocation,
    encodeInvocation,
    hookInvocation,
    isCompatibleProtocol,
    lifecycleInvocation,
    parseContextOutput,
    parseResponseOutput,
} from './hooks/protocol.js';
export {
    ALL_HOOK_MODES,
    ALL_HOOK_STAGES,
    DEFAULT_NOTIFY_TIMEOUT_MS,
    DEFAULT_TRANSFORM_TIMEOUT_MS,
    createContext,
    isHookMode,
    isHookStage,
    modeForStage,
} from './hooks/types.js';
export { PluginRegistry } from './plugins/registry.js';
export {
    MANIFEST_FILENAME,
    entrypointName,
    isValidPluginName,
    parseManifest,
    parseManifestText,
    validateManifest,
} from './plugins/manifest.js';
export { buildPluginEnv, emptyPermissions, findEscalations, summarizePermissions } from './plugins/permissions.js';
export { PLUGIN_REPO_PREFIX, PLUGIN_TOPIC, buildSearchQuery, searchPlugins } from './plugins/search.js';
export {
    PluginHookHandler,
    entrypointPath,
    hasEntrypoint,
    pluginHooks,
    registerPluginHooks,
    runPluginCommand,
    sendLifecycleEvent,
} from './plugins/runtime.js';
export { AuditLogger } from './logging/audit-log.js';
export { ConfigLoader } from './config/loader.js';
export { defaultConfig } from './config/schema.js';
export { getPaths } from './utils/paths.js';
export * from './errors.js';

// Types
export type { Hook, HookContext, HookHandler, HookMode, HookStage } from './hooks/types.js';
export type { HookResponse, Invocation, InvocationType, LifecycleEvent } from './hooks/protocol.js';
export type { FetchFn, SearchOptions, SearchResult } from './plugins/search.js';
export type { PipelineOptions } from './hooks/pipeline.js';
export type { UserHook, UserHookTimeouts, HookTestResult } from './hooks/discover.js';
export type {
    CommandDef,
    HookDef,
    InstallResult,
    InstalledPlugin,
    Manifest,
    PluginEntry,
    PluginMeta,
    Permissions,
} from './plugins/types.js';
export type { AuditEntry } from './logging/audit-log.js';
export type { HooklineConfig, HooksConfig } from './config/schema.js';
export type { HooklinePaths } from './utils/paths.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
