import { z } from 'zod';
import { HookProtocolError, HookResponseError } from '../errors.js';
import type { HookContext, HookMode, HookStage } from './types.js';

/**
 * Invocation Protocol — JSON envelopes exchanged with plugin binaries
 *
 * The host writes one Invocation to the child's stdin and closes it. For
 * transform hooks the child answers with one Response on stdout; every other
 * invocation type ignores stdout.
 */

export const PROTOCOL_VERSION = '1.0.0';

export type InvocationType = 'hook' | 'command' | 'lifecycle';

export type LifecycleEvent = 'install' | 'upgrade' | 'remove' | 'enable' | 'disable';

export const LIFECYCLE_TIMEOUT_MS = 5_000;

export interface Invocation {
    protocol_version: string;
    type: InvocationType;
    stage?: HookStage;
    mode?: HookMode;
    event?: LifecycleEvent;
    command?: string;
    context?: HookContext;
    args?: string[];
    flags?: Record<string, string>;
}

export interface HookResponse {
    status: 'ok' | 'error';
    context?: HookContext;
    error?: string;
    code?: string;
}

// ─── Schemas ───

export const HookContextSchema = z.object({
    command: z.string(),
    args: z.array(z.string()).nullish().transform(args => args ?? []),
    flags: z.record(z.string()).nullish().transform(flags => flags ?? {}),
    timestamp: z.string().default(''),
    result: z.unknown().optional(),
});

export const HookResponseSchema = z.object({
    status: z.enum(['ok', 'error']),
    context: HookContextSchema.nullish(),
    error: z.string().optional(),
    code: z.string().optional(),
});

// ─── Builders ───

export function hookInvocation(stage: HookStage, mode: HookMode, context: HookContext): Invocation {
    return { protocol_version: PROTOCOL_VERSION, type: 'hook', stage, mode, context };
}

export function commandInvocation(command: string, args: string[], flags?: Record<string, string>): Invocation {
    const inv: Invocation = { protocol_version: PROTOCOL_VERSION, type: 'command', command, args };
    if (flags && Object.keys(flags).length > 0) inv.flags = flags;
    return inv;
}

export function lifecycleInvocation(event: LifecycleEvent): Invocation {
    return { protocol_version: PROTOCOL_VERSION, type: 'lifecycle', event };
}

export function encodeInvocation(inv: Invocation): string {
    return JSON.stringify(inv);
}

/**
 * Plugins declare the protocol they were built against; only the major
 * version has to agree.
 */
export function isCompatibleProtocol(version: string): boolean {
    return majorOf(version) === majorOf(PROTOCOL_VERSION);
}

// ─── Parsers ───

/**
 * Interpret a transform plugin's stdout.
 *
 * Empty output passes `ctx` through. A Response with `status: "error"`
 * becomes a HookResponseError; anything that is not a Response is a
 * HookProtocolError carrying the child's stderr.
 */
export function parseResponseOutput(stdout: string, ctx: HookContext, stderr = ''): HookContext {
    const body = stdout.trim();
    if (body === '') return ctx;

    const parsed = HookResponseSchema.safeParse(parseJson(body, 'response', stderr));
    if (!parsed.success) {
        throw new HookProtocolError(`invalid response envelope: ${describeIssue(parsed.error)}`, { stderr });
    }

    const response = parsed.data;
    if (response.status === 'error') {
        throw new HookResponseError(response.error || 'plugin reported an error', response.code);
    }
    return response.context ?? ctx;
}

/**
 * Interpret a user script's stdout: a bare Context, or nothing.
 */
export function parseContextOutput(stdout: string, ctx: HookContext, stderr = ''): HookContext {
    const body = stdout.trim();
    if (body === '') return ctx;

    const parsed = HookContextSchema.safeParse(parseJson(body, 'context', stderr));
    if (!parsed.success) {
        throw new HookProtocolError(`invalid context output: ${describeIssue(parsed.error)}`, { stderr });
    }
    return parsed.data;
}

function parseJson(body: string, what: string, stderr: string): unknown {
    try {
        return JSON.parse(body);
    } catch (err) {
        throw new HookProtocolError(`malformed ${what} JSON`, { stderr, cause: err });
    }
}

function describeIssue(error: z.ZodError): string {
    const issue = error.issues[0];
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
}

function majorOf(version: string): string {
    return version.trim().split('.')[0] ?? '';
}
