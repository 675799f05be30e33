import { chmod, copyFile, mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { z } from 'zod';
import { PluginNotFoundError, RegistryError, errorMessage } from '../errors.js';
import type { AuditLogger } from '../logging/audit-log.js';
import type { HooklinePaths } from '../utils/paths.js';
import { MANIFEST_FILENAME, entrypointName, parseManifest } from './manifest.js';
import { emptyPermissions } from './permissions.js';
import type { InstallResult, InstalledPlugin, Manifest, PluginEntry } from './types.js';

const RegistryFileSchema = z.object({
    plugins: z.array(z.object({
        name: z.string().min(1),
        version: z.string().default(''),
        source: z.string().default(''),
        dir: z.string().min(1),
        installed_at: z.string().default(''),
        enabled: z.boolean().default(true),
    })).default([]),
});

/**
 * Plugin Registry — installs, removes and enumerates plugins
 *
 * State lives in two places:
 * - `plugins.toml`: ordered list of PluginEntry records
 * - `<pluginsDir>/<name>/`: the copied manifest and entrypoint
 *
 * Nothing is cached: every list()/get() re-reads both, so a manifest edited
 * on disk is picked up on the next call.
 */
export class PluginRegistry {
    constructor(
        private readonly paths: Pick<HooklinePaths, 'registryFile' | 'pluginsDir'>,
        private readonly audit?: AuditLogger
    ) { }

    // ─── Persistence ───

    async loadEntries(): Promise<PluginEntry[]> {
        let content: string;
        try {
            content = await readFile(this.paths.registryFile, 'utf-8');
        } catch (err) {
            if (isMissing(err)) return [];
            throw new RegistryError(`reading plugin registry: ${errorMessage(err)}`, { cause: err });
        }

        let raw: unknown;
        try {
            raw = parseToml(content);
        } catch (err) {
            throw new RegistryError(`parsing plugin registry: ${errorMessage(err)}`, { cause: err });
        }

        const result = RegistryFileSchema.safeParse(raw);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new RegistryError(`invalid plugin registry at ${issue.path.join('.')}: ${issue.message}`);
        }

        return result.data.plugins.map(p => ({
            name: p.name,
            version: p.version,
            source: p.source,
            dir: p.dir,
            installedAt: p.installed_at,
            enabled: p.enabled,
        }));
    }

    async saveEntries(entries: PluginEntry[]): Promise<void> {
        const document = stringifyToml({
            plugins: entries.map(e => ({
                name: e.name,
                version: e.version,
                source: e.source,
                dir: e.dir,
                installed_at: e.installedAt,
                enabled: e.enabled,
            })),
        });

        try {
            await mkdir(path.dirname(this.paths.registryFile), { recursive: true });
            await writeFile(this.paths.registryFile, document + '\n', 'utf-8');
        } catch (err) {
            throw new RegistryError(`saving plugin registry: ${errorMessage(err)}`, { cause: err });
        }
    }

    // ─── Lifecycle ───

    /**
     * Install a plugin from a directory containing hookline-plugin.toml.
     * Installing a name that is already present replaces it in place.
     */
    async install(sourceDir: string, origin: string = sourceDir, now: Date = new Date()): Promise<InstallResult> {
        const manifestPath = path.join(sourceDir, MANIFEST_FILENAME);
        const manifest = await parseManifest(manifestPath);
        const name = manifest.plugin.name;

        const entries = await this.loadEntries();
        const previous = entries.find(e => e.name === name);
        const previousManifest = previous ? await this.readManifest(previous.dir) : null;

        const pluginDir = path.join(this.paths.pluginsDir, name);
        try {
            await mkdir(pluginDir, { recursive: true });
            await copyFile(manifestPath, path.join(pluginDir, MANIFEST_FILENAME));

            const binary = entrypointName(manifest);
            const sourceBinary = path.join(sourceDir, binary);
            if (await isExecutableFile(sourceBinary)) {
                const destBinary = path.join(pluginDir, binary);
                await copyFile(sourceBinary, destBinary);
                await chmod(destBinary, 0o755);
            }
        } catch (err) {
            throw new RegistryError(`copying plugin ${name} into ${pluginDir}: ${errorMessage(err)}`, { cause: err });
        }

        const entry: PluginEntry = {
            name,
            version: manifest.plugin.version,
            source: origin,
            dir: pluginDir,
            installedAt: now.toISOString().replace(/\.\d{3}Z$/, 'Z'),
            enabled: true,
        };
        await this.saveEntries([...entries.filter(e => e.name !== name), entry]);

        await this.audit?.record(
            name,
            previous ? 'upgrade' : 'install',
            previous ? `version=${manifest.plugin.version} from=${previous.version}` : `version=${manifest.plugin.version}`
        );

        return {
            plugin: {
                manifest,
                entry,
                dir: pluginDir,
                installedAt: now,
                enabled: true,
                degraded: false,
            },
            upgraded: previous !== undefined,
            previousVersion: previous?.version,
            previousPermissions: previousManifest?.permissions,
        };
    }

    /**
     * Uninstall a plugin and delete its directory
     */
    async remove(name: string): Promise<PluginEntry> {
        const entries = await this.loadEntries();
        const entry = entries.find(e => e.name === name);
        if (!entry) {
            throw new PluginNotFoundError(name);
        }

        try {
            await rm(entry.dir, { recursive: true, force: true });
        } catch (err) {
            throw new RegistryError(`removing ${entry.dir}: ${errorMessage(err)}`, { cause: err });
        }

        await this.saveEntries(entries.filter(e => e.name !== name));
        await this.audit?.record(name, 'remove', `version=${entry.version}`);
        return entry;
    }

    /**
     * Enable or disable a plugin's hooks without uninstalling it
     */
    async setEnabled(name: string, enabled: boolean): Promise<PluginEntry> {
        const entries = await this.loadEntries();
        const entry = entries.find(e => e.name === name);
        if (!entry) {
            throw new PluginNotFoundError(name);
        }

        const updated: PluginEntry = { ...entry, enabled };
        await this.saveEntries(entries.map(e => (e.name === name ? updated : e)));
        await this.audit?.record(name, enabled ? 'enable' : 'disable', `version=${entry.version}`);
        return updated;
    }

    // ─── Queries ───

    /**
     * All installed plugins in registry order. A plugin whose manifest is
     * missing or broken is still returned, flagged `degraded`.
     */
    async list(): Promise<InstalledPlugin[]> {
        const entries = await this.loadEntries();
        const plugins: InstalledPlugin[] = [];

        for (const entry of entries) {
            const installedAt = entry.installedAt ? new Date(entry.installedAt) : null;
            const base = {
                entry,
                dir: entry.dir,
                installedAt: installedAt && !Number.isNaN(installedAt.getTime()) ? installedAt : null,
                enabled: entry.enabled,
            };

            try {
                const manifest = await parseManifest(path.join(entry.dir, MANIFEST_FILENAME));
                plugins.push({ ...base, manifest, degraded: false });
            } catch (err) {
                plugins.push({ ...base, manifest: placeholderManifest(entry), degraded: true, error: errorMessage(err) });
            }
        }

        return plugins;
    }

    async get(name: string): Promise<InstalledPlugin> {
        const plugin = (await this.list()).find(p => p.entry.name === name);
        if (!plugin) {
            throw new PluginNotFoundError(name);
        }
        return plugin;
    }

    private async readManifest(dir: string): Promise<Manifest | null> {
        try {
            return await parseManifest(path.join(dir, MANIFEST_FILENAME));
        } catch {
            // a broken previous install grants nothing
            return null;
        }
    }
}

function placeholderManifest(entry: PluginEntry): Manifest {
    return {
        plugin: {
            name: entry.name,
            version: entry.version,
            description: '',
            author: '',
            protocolVersion: '',
        },
        hooks: [],
        commands: [],
        permissions: emptyPermissions(),
    };
}

async function isExecutableFile(filePath: string): Promise<boolean> {
    const info = await stat(filePath).catch(() => null);
    return info !== null && info.isFile() && (info.mode & 0o111) !== 0;
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
