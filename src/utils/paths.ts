import os from 'node:os';
import path from 'node:path';

const APP_DIR = 'hookline';

export interface HooklinePaths {
    /** Root of user configuration (config.yaml, plugins.toml, hooks/) */
    configDir: string;
    /** Root of installed data (plugins/, audit log) */
    dataDir: string;
    configFile: string;
    /** Persisted plugin registry */
    registryFile: string;
    pluginsDir: string;
    /** Flat directory of user hook scripts */
    hooksDir: string;
    auditLogFile: string;
}

/**
 * Resolve the on-disk layout, honouring XDG_CONFIG_HOME / XDG_DATA_HOME.
 */
export function getPaths(env: NodeJS.ProcessEnv = process.env): HooklinePaths {
    const home = env.HOME || os.homedir();
    const configRoot = env.XDG_CONFIG_HOME || path.join(home, '.config');
    const dataRoot = env.XDG_DATA_HOME || path.join(home, '.local', 'share');

    const configDir = path.join(configRoot, APP_DIR);
    const dataDir = path.join(dataRoot, APP_DIR);

    return {
        configDir,
        dataDir,
        configFile: path.join(configDir, 'config.yaml'),
        registryFile: path.join(configDir, 'plugins.toml'),
        pluginsDir: path.join(dataDir, 'plugins'),
        hooksDir: path.join(configDir, 'hooks'),
        auditLogFile: path.join(dataDir, 'plugin-audit.log'),
    };
}
