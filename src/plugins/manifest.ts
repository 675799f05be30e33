import { readFile } from 'node:fs/promises';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import { ManifestError, errorMessage } from '../errors.js';
import { ALL_HOOK_MODES, ALL_HOOK_STAGES } from '../hooks/types.js';
import { durationError } from '../utils/duration.js';
import type { Manifest } from './types.js';

export const MANIFEST_FILENAME = 'hookline-plugin.toml';

export const ENTRYPOINT_PREFIX = 'hookline-plugin-';

/** Lowercase letters and digits in hyphen-separated words */
export const PLUGIN_NAME_PATTERN = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

// ─── Schema ───
//
// Missing strings default to '' so that "absent" and "empty" report the same
// `is required` error against the field.

const required = () =>
    z.string({ invalid_type_error: 'must be a string' }).min(1, 'is required').default('');

const optional = () =>
    z.string({ invalid_type_error: 'must be a string' }).optional();

const oneOf = <T extends readonly [string, ...string[]]>(values: T, what: string) =>
    required().pipe(z.enum(values, {
        errorMap: (_issue, ctx) => ({
            message: `"${String(ctx.data)}" is not a valid ${what} (expected ${values.join(', ')})`,
        }),
    }));

const PluginMetaSchema = z.object({
    name: required().pipe(z.string().regex(
        PLUGIN_NAME_PATTERN,
        'must be kebab-case (lowercase letters, digits and hyphens)'
    )),
    version: required(),
    description: required(),
    author: required(),
    license: optional(),
    protocol_version: required(),
    entrypoint: optional().refine(
        value => value === undefined || (value !== '' && !/[/\\]/.test(value) && !value.includes('..')),
        'must be a file name inside the plugin directory'
    ),
}).default({}).transform(meta => ({
    name: meta.name,
    version: meta.version,
    description: meta.description,
    author: meta.author,
    license: meta.license,
    protocolVersion: meta.protocol_version,
    entrypoint: meta.entrypoint,
}));

const HookDefSchema = z.object({
    command: required(),
    stage: oneOf(ALL_HOOK_STAGES, 'stage'),
    mode: oneOf(ALL_HOOK_MODES, 'mode'),
    timeout: optional().refine(
        value => value === undefined || durationError(value) === null,
        value => ({ message: value === undefined ? '' : durationError(value) ?? '' })
    ),
}).superRefine((hook, ctx) => {
    if (hook.stage === 'notify' && hook.mode !== 'notify') {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['mode'],
            message: `must be "notify" for the notify stage, got "${hook.mode}"`,
        });
    }
    if (hook.stage !== 'notify' && hook.mode === 'notify') {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['mode'],
            message: `"notify" is only valid with the notify stage, got stage "${hook.stage}"`,
        });
    }
});

const CommandDefSchema = z.object({
    name: required(),
    description: required(),
    args: optional(),
});

const PermissionsSchema = z.object({
    network: z.boolean().default(false),
    filesystem: z.array(z.string()).default([]),
    store: z.boolean().default(false),
    config_read: z.boolean().default(false),
    config_write: z.boolean().default(false),
    env_vars: z.array(z.string()).default([]),
}).default({}).transform(perms => ({
    network: perms.network,
    filesystem: perms.filesystem,
    store: perms.store,
    configRead: perms.config_read,
    configWrite: perms.config_write,
    envVars: perms.env_vars,
}));

export const ManifestSchema = z.object({
    plugin: PluginMetaSchema,
    hooks: z.array(HookDefSchema).default([]),
    commands: z.array(CommandDefSchema).default([]),
    permissions: PermissionsSchema,
});

// ─── Parsing ───

/**
 * Read, parse and validate a manifest file
 */
export async function parseManifest(manifestPath: string): Promise<Manifest> {
    let content: string;
    try {
        content = await readFile(manifestPath, 'utf-8');
    } catch (err) {
        throw new ManifestError(`reading manifest ${manifestPath}: ${errorMessage(err)}`, { cause: err });
    }
    return parseManifestText(content);
}

/**
 * Parse and validate manifest TOML
 */
export function parseManifestText(content: string): Manifest {
    let raw: unknown;
    try {
        raw = parseToml(content);
    } catch (err) {
        throw new ManifestError(`parsing manifest: ${errorMessage(err)}`, { cause: err });
    }
    return validateManifest(raw);
}

/**
 * Validate an already-decoded manifest. Throws a ManifestError naming the
 * first offending field, e.g. `hooks[0].stage "later" is not a valid stage`.
 */
export function validateManifest(raw: unknown): Manifest {
    const result = ManifestSchema.safeParse(raw);
    if (result.success) {
        return result.data;
    }

    const issue = result.error.issues[0];
    const field = formatPath(issue.path);
    throw new ManifestError(field ? `${field} ${issue.message}` : issue.message, { field: field || undefined });
}

/**
 * Executable file name for the plugin
 */
export function entrypointName(manifest: Manifest): string {
    return manifest.plugin.entrypoint || `${ENTRYPOINT_PREFIX}${manifest.plugin.name}`;
}

export function isValidPluginName(name: string): boolean {
    return PLUGIN_NAME_PATTERN.test(name);
}

/**
 * ['hooks', 0, 'stage'] → `hooks[0].stage`
 */
function formatPath(segments: (string | number)[]): string {
    return segments.reduce<string>((acc, segment) => {
        if (typeof segment === 'number') return `${acc}[${segment}]`;
        return acc ? `${acc}.${segment}` : segment;
    }, '');
}
