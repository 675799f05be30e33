import { z } from 'zod';
import { durationError, parseDuration } from '../utils/duration.js';

const duration = (fallback: string) =>
    z.string()
        .default(fallback)
        .refine(value => durationError(value) === null, value => ({
            message: durationError(value) ?? '',
        }))
        .transform(value => parseDuration(value) ?? 0);

export const HooksConfigSchema = z.object({
    /** Default timeout for prevalidate/preexec/postexec hooks */
    transformTimeout: duration('5s'),
    /** Default timeout for notify hooks */
    notifyTimeout: duration('30s'),
    /** Upper bound on concurrently running notify hooks */
    maxBackground: z.number().int().positive().default(16),
    /** Wait for pending notify hooks before the CLI exits */
    drainOnExit: z.boolean().default(true),
    /** Skip plugins whose protocol major version differs from ours */
    strictProtocol: z.boolean().default(false),
}).default({});

export const PluginsConfigSchema = z.object({
    /** Ask before installing or upgrading a plugin */
    confirmInstall: z.boolean().default(true),
}).default({});

export const HooklineConfigSchema = z.object({
    hooks: HooksConfigSchema,
    plugins: PluginsConfigSchema,
});

export type HooklineConfig = z.output<typeof HooklineConfigSchema>;
export type HooksConfig = HooklineConfig['hooks'];

export function defaultConfig(): HooklineConfig {
    return HooklineConfigSchema.parse({});
}
