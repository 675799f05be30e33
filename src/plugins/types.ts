/**
 * Plugin System — Types
 *
 * A plugin is a directory holding a `hookline-plugin.toml` manifest and an
 * executable entrypoint. The manifest declares hooks, custom commands and
 * the permissions the plugin asks for.
 */

import type { HookMode, HookStage } from '../hooks/types.js';

export interface PluginMeta {
    /** Kebab-case unique name */
    name: string;
    version: string;
    description: string;
    author: string;
    license?: string;
    /** Invocation protocol the plugin speaks, e.g. `1.0.0` */
    protocolVersion: string;
    /** Executable file name override (default `hookline-plugin-<name>`) */
    entrypoint?: string;
}

export interface HookDef {
    /** Command pattern (`todo.add`, `todo.*`, `*`) */
    command: string;
    stage: HookStage;
    mode: HookMode;
    /** Duration string such as `10s` */
    timeout?: string;
}

export interface CommandDef {
    name: string;
    description: string;
    /** Usage string shown in help */
    args?: string;
}

/**
 * Declared capabilities. Advisory: shown at install, diffed on upgrade,
 * used to filter the subprocess environment. Not enforced by the OS.
 */
export interface Permissions {
    network: boolean;
    filesystem: string[];
    store: boolean;
    configRead: boolean;
    configWrite: boolean;
    envVars: string[];
}

export interface Manifest {
    plugin: PluginMeta;
    hooks: HookDef[];
    commands: CommandDef[];
    permissions: Permissions;
}

/**
 * Persisted record in plugins.toml
 */
export interface PluginEntry {
    name: string;
    version: string;
    /** Where it was installed from (path or URL label) */
    source: string;
    /** Install directory */
    dir: string;
    /** RFC 3339 */
    installedAt: string;
    enabled: boolean;
}

/**
 * Registry entry joined with its freshly parsed manifest
 */
export interface InstalledPlugin {
    manifest: Manifest;
    entry: PluginEntry;
    dir: string;
    installedAt: Date | null;
    enabled: boolean;
    /** The manifest could not be read; `manifest` only has registry fields */
    degraded: boolean;
    /** Why the manifest could not be read */
    error?: string;
}

export interface InstallResult {
    plugin: InstalledPlugin;
    /** A plugin with the same name was already installed */
    upgraded: boolean;
    previousVersion?: string;
    /** Permissions of the replaced install, for escalation checks */
    previousPermissions?: Permissions;
}
