import type { HooklinePaths } from '../utils/paths.js';
import type { Permissions } from './types.js';

/** Always passed to plugin subprocesses */
const BASE_ENV_VARS = ['PATH', 'HOME'] as const;

export function emptyPermissions(): Permissions {
    return {
        network: false,
        filesystem: [],
        store: false,
        configRead: false,
        configWrite: false,
        envVars: [],
    };
}

/**
 * Human-readable list of what a plugin asks for, shown before install
 */
export function summarizePermissions(perms: Permissions): string[] {
    const lines: string[] = [];

    if (perms.network) lines.push('Network: outbound access');
    if (perms.filesystem.length > 0) lines.push(`Filesystem: ${perms.filesystem.join(', ')}`);
    if (perms.store) lines.push('Store: read/write the hookline data store');
    if (perms.configRead) lines.push('Config: read hookline configuration');
    if (perms.configWrite) lines.push('Config: write hookline configuration');
    if (perms.envVars.length > 0) lines.push(`Environment: ${perms.envVars.join(', ')}`);

    return lines.length > 0 ? lines : ['No special permissions required'];
}

/**
 * Capabilities requested by `proposed` that `current` did not grant.
 * An upgrade with a non-empty result needs fresh confirmation.
 */
export function findEscalations(current: Permissions, proposed: Permissions): string[] {
    const escalations: string[] = [];

    if (!current.network && proposed.network) escalations.push('NEW: network access');
    if (!current.store && proposed.store) escalations.push('NEW: data store access');
    if (!current.configWrite && proposed.configWrite) escalations.push('NEW: config write access');

    const knownPaths = new Set(current.filesystem);
    for (const p of proposed.filesystem) {
        if (!knownPaths.has(p)) escalations.push(`NEW: filesystem access to ${p}`);
    }

    const knownVars = new Set(current.envVars);
    for (const v of proposed.envVars) {
        if (!knownVars.has(v)) escalations.push(`NEW: environment variable ${v}`);
    }

    return escalations;
}

/**
 * Environment for a plugin subprocess, built from scratch:
 * PATH and HOME, declared variables that are set in the parent, and the
 * hookline directories when the plugin may read configuration.
 */
export function buildPluginEnv(
    perms: Permissions,
    paths: Pick<HooklinePaths, 'configDir' | 'dataDir'>,
    parentEnv: NodeJS.ProcessEnv = process.env
): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = {};

    for (const name of BASE_ENV_VARS) {
        env[name] = parentEnv[name] ?? '';
    }

    for (const name of perms.envVars) {
        const value = parentEnv[name];
        if (value) env[name] = value;
    }

    if (perms.configRead) {
        env.HOOKLINE_CONFIG_DIR = paths.configDir;
        env.HOOKLINE_DATA_DIR = paths.dataDir;
    }

    return env;
}
