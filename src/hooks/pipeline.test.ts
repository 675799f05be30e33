import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DispatchTransformError, HookProtocolError, HookTimeoutError } from '../errors.js';
import { AuditLogger } from '../logging/audit-log.js';
import { makeTempDir, onStdin, removeDir, writeScript } from '../test-utils/scripts.js';
import { registerUserHooks } from './discover.js';
import { HookPipeline } from './pipeline.js';
import { HookRegistry } from './registry.js';
import type { Hook, HookContext, HookStage } from './types.js';
import { createContext, modeForStage } from './types.js';

let dir: string;
let registry: HookRegistry;
let audit: AuditLogger;
let pipeline: HookPipeline;

beforeEach(async () => {
    dir = await makeTempDir();
    registry = new HookRegistry();
    audit = new AuditLogger(path.join(dir, 'plugin-audit.log'));
    pipeline = new HookPipeline(registry, { audit, maxBackground: 4 });
});

afterEach(async () => {
    await pipeline.drain();
    await removeDir(dir);
    vi.restoreAllMocks();
});

function hook(
    name: string,
    stage: HookStage,
    invoke: (ctx: HookContext) => Promise<HookContext>,
    overrides: Partial<Hook> = {}
): Hook {
    return {
        pattern: 'todo.*',
        stage,
        mode: modeForStage(stage),
        name,
        source: 'user',
        handler: { invoke },
        timeoutMs: 1_000,
        ...overrides,
    };
}

function appendArg(value: string) {
    return async (ctx: HookContext): Promise<HookContext> => ({ ...ctx, args: [...ctx.args, value] });
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('HookPipeline', () => {
    describe('run', () => {
        it('calls execute directly when no hook matches', async () => {
            registry.register(hook('other', 'preexec', appendArg('x'), { pattern: 'note.*' }));
            const execute = vi.fn(async (ctx: HookContext) => ctx.args.length);

            const result = await pipeline.run(createContext('todo.add', ['a']), execute);

            expect(execute).toHaveBeenCalledTimes(1);
            expect(result.args).toEqual(['a']);
            expect(result.result).toBe(1);
        });

        it('runs the stages in order around execute', async () => {
            const seen: string[] = [];
            const trace = (label: string) => async (ctx: HookContext) => {
                seen.push(`${label}:${ctx.args.join(',')}${ctx.result === undefined ? '' : `=${String(ctx.result)}`}`);
                return { ...ctx, args: [...ctx.args, label] };
            };
            registry.register(hook('post', 'postexec', trace('post')));
            registry.register(hook('pre', 'preexec', trace('pre')));
            registry.register(hook('valid', 'prevalidate', trace('valid')));
            registry.register(hook('notify', 'notify', async ctx => {
                seen.push(`notify:${String(ctx.result)}`);
                return ctx;
            }));

            const result = await pipeline.run(createContext('todo.add', ['a']), async ctx => {
                seen.push(`execute:${ctx.args.join(',')}`);
                return 'done';
            });
            await pipeline.drain();

            expect(seen).toEqual([
                'valid:a',
                'pre:a,valid',
                'execute:a,valid,pre',
                'post:a,valid,pre=done',
                'notify:done',
            ]);
            expect(result.args).toEqual(['a', 'valid', 'pre', 'post']);
            expect(result.result).toBe('done');
        });

        it('does not run execute when a pre-stage fails', async () => {
            registry.register(hook('deny', 'prevalidate', async () => {
                throw new Error('denied');
            }));
            const execute = vi.fn(async () => 'never');

            await expect(pipeline.run(createContext('todo.add'), execute)).rejects.toThrow(
                'hook "deny" (prevalidate) failed: denied'
            );
            expect(execute).not.toHaveBeenCalled();
        });
    });

    describe('runStage', () => {
        it('chains transform hooks in name order', async () => {
            registry.register(hook('c-third', 'preexec', appendArg('c')));
            registry.register(hook('a-first', 'preexec', appendArg('a')));
            registry.register(hook('b-second', 'preexec', appendArg('b'), { pattern: '*' }));

            const ctx = await pipeline.runStage('todo.add', 'preexec', createContext('todo.add', ['x']));
            expect(ctx.args).toEqual(['x', 'a', 'b', 'c']);
        });

        it('orders hooks the same on every run whatever the registration order', async () => {
            const orders: string[][] = [];
            for (const names of [['b', 'c', 'a'], ['c', 'a', 'b']]) {
                const scrambled = new HookRegistry();
                for (const name of names) {
                    scrambled.register(hook(name, 'preexec', appendArg(name)));
                }
                const repeat = new HookPipeline(scrambled);
                for (let run = 0; run < 3; run++) {
                    const ctx = await repeat.runStage('todo.add', 'preexec', createContext('todo.add'));
                    orders.push(ctx.args);
                }
            }

            expect(orders).toHaveLength(6);
            for (const order of orders) {
                expect(order).toEqual(['a', 'b', 'c']);
            }
        });

        it('gives every hook its own copy of the context', async () => {
            registry.register(hook('mutator', 'preexec', async ctx => {
                ctx.args.push('mutated');
                ctx.flags.touched = 'yes';
                return ctx;
            }));
            const input = createContext('todo.add', ['x']);

            const output = await pipeline.runStage('todo.add', 'preexec', input);

            expect(input.args).toEqual(['x']);
            expect(input.flags).toEqual({});
            expect(output.args).toEqual(['x', 'mutated']);
        });

        it('stops at the first malformed output', async () => {
            const hooksDir = path.join(dir, 'hooks');
            await writeScript(hooksDir, 'todo.add.preexec.js', onStdin('process.stdout.write("{not json");'));
            await registerUserHooks(registry, hooksDir);
            // sorts after the script
            const after = vi.fn(appendArg('after'));
            registry.register(hook('todo.add.preexec.zz', 'preexec', after));

            const err = await pipeline.runStage('todo.add', 'preexec', createContext('todo.add'))
                .catch((e: unknown) => e);

            expect(err).toBeInstanceOf(DispatchTransformError);
            expect(err).toHaveProperty('hookName', 'todo.add.preexec.js');
            expect(err).toHaveProperty('cause', expect.any(HookProtocolError));
            expect(after).not.toHaveBeenCalled();
        });

        it('fails with a timeout well before a slow hook finishes', async () => {
            const hooksDir = path.join(dir, 'hooks');
            await writeScript(hooksDir, 'todo.add.preexec.js', onStdin('setTimeout(() => process.exit(0), 200);'));
            await registerUserHooks(registry, hooksDir, { transformTimeout: 50, notifyTimeout: 50 });

            const start = Date.now();
            const err = await pipeline.runStage('todo.add', 'preexec', createContext('todo.add'))
                .catch((e: unknown) => e);
            const elapsed = Date.now() - start;

            expect(err).toBeInstanceOf(DispatchTransformError);
            expect(err).toHaveProperty('cause', expect.any(HookTimeoutError));
            expect(elapsed).toBeLessThan(200);
        });

        it('returns from the notify stage without waiting', async () => {
            const gate = deferred();
            registry.register(hook('slow', 'notify', async ctx => {
                await gate.promise;
                return ctx;
            }));
            const ctx = createContext('todo.add');

            expect(await pipeline.runStage('todo.add', 'notify', ctx)).toBe(ctx);
            expect(pipeline.pending).toBe(1);

            gate.resolve();
            await pipeline.drain();
            expect(pipeline.pending).toBe(0);
        });
    });

    describe('notify', () => {
        it('keeps failures away from the command and audits them', async () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            registry.register(hook('notes:todo.*:notify', 'notify', async () => {
                throw new Error('boom');
            }, { source: 'plugin:notes' }));

            const result = await pipeline.run(createContext('todo.add'), async () => 'ok');
            expect(result.result).toBe('ok');

            await pipeline.drain();

            expect(warn).toHaveBeenCalledWith('notify hook "notes:todo.*:notify" failed: boom');
            const entries = await audit.tail();
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                plugin: 'notes',
                action: 'hook.notify.failed',
                detail: 'hook=notes:todo.*:notify command=todo.add error="boom"',
            });
        });

        it('audits a notify script that exits non-zero', async () => {
            const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const hooksDir = path.join(dir, 'hooks');
            const script = await writeScript(hooksDir, 'todo.*.notify.js', onStdin([
                'process.stderr.write("bad");',
                'process.exit(4);',
            ].join('\n')));
            await registerUserHooks(registry, hooksDir);

            const result = await pipeline.run(createContext('todo.add'), async () => 'ok');
            expect(result.result).toBe('ok');

            await pipeline.drain();

            const reason = `hook ${script} exited with code 4: bad`;
            expect(warn).toHaveBeenCalledWith(`notify hook "todo.*.notify.js" failed: ${reason}`);
            const entries = await audit.tail();
            expect(entries).toHaveLength(1);
            expect(entries[0]).toMatchObject({
                plugin: 'user',
                action: 'hook.notify.failed',
                detail: `hook=todo.*.notify.js command=todo.add error=${JSON.stringify(reason)}`,
            });
        });

        it('runs the other notify hooks when one fails', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const ran = vi.fn(async (ctx: HookContext) => ctx);
            registry.register(hook('a-fails', 'notify', async () => {
                throw new Error('nope');
            }));
            registry.register(hook('b-runs', 'notify', ran));

            pipeline.dispatchNotify('todo.add', createContext('todo.add'));
            await pipeline.drain();

            expect(ran).toHaveBeenCalledTimes(1);
        });

        it('only logs when the audit log cannot be written', async () => {
            vi.spyOn(console, 'warn').mockImplementation(() => undefined);
            const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const blocker = path.join(dir, 'blocker');
            await writeFile(blocker, '');
            const blocked = new HookPipeline(registry, { audit: new AuditLogger(path.join(blocker, 'audit.log')) });
            registry.register(hook('fails', 'notify', async () => {
                throw new Error('nope');
            }));

            blocked.dispatchNotify('todo.add', createContext('todo.add'));
            await blocked.drain();

            expect(error).toHaveBeenCalledTimes(1);
        });

        it('runs at most maxBackground hooks at once', async () => {
            const gate = deferred();
            let active = 0;
            let peak = 0;
            const limited = new HookPipeline(registry, { maxBackground: 2 });
            for (const name of ['n1', 'n2', 'n3', 'n4', 'n5']) {
                registry.register(hook(name, 'notify', async ctx => {
                    active++;
                    peak = Math.max(peak, active);
                    await gate.promise;
                    active--;
                    return ctx;
                }));
            }

            expect(limited.dispatchNotify('todo.add', createContext('todo.add'))).toBe(5);
            await tick();
            expect(active).toBe(2);
            expect(limited.pending).toBe(5);

            gate.resolve();
            await limited.drain();
            expect(peak).toBe(2);
            expect(limited.pending).toBe(0);
        });
    });

    it('tags inbox todos through a user hook script', async () => {
        const hooksDir = path.join(dir, 'hooks');
        await writeScript(hooksDir, 'todo.*.preexec.js', onStdin([
            'const ctx = JSON.parse(input);',
            'if (!ctx.args.some(a => a.startsWith("#"))) ctx.args.push("#inbox");',
            'process.stdout.write(JSON.stringify(ctx));',
        ].join('\n')));
        await registerUserHooks(registry, hooksDir);

        const stored: string[][] = [];
        const execute = async (ctx: HookContext) => {
            stored.push(ctx.args);
            return stored.length;
        };

        await pipeline.run(createContext('todo.add', ['buy milk']), execute);
        await pipeline.run(createContext('todo.add', ['call mom', '#family']), execute);
        await pipeline.run(createContext('note.add', ['idea']), execute);

        expect(stored).toEqual([
            ['buy milk', '#inbox'],
            ['call mom', '#family'],
            ['idea'],
        ]);
    });

    it('tags untagged todos as inbox through a user hook script', async () => {
        const hooksDir = path.join(dir, 'hooks');
        await writeScript(hooksDir, 'todo.*.preexec.js', onStdin([
            'const ctx = JSON.parse(input);',
            'if (!ctx.flags.tags) ctx.flags.tags = "inbox";',
            'process.stdout.write(JSON.stringify(ctx));',
        ].join('\n')));
        await registerUserHooks(registry, hooksDir);

        const seen: Record<string, string>[] = [];
        const execute = async (ctx: HookContext) => {
            seen.push(ctx.flags);
            return undefined;
        };

        await pipeline.run(createContext('todo.add', ['buy milk']), execute);
        await pipeline.run(createContext('todo.add', ['ship release'], { tags: 'work' }), execute);
        await pipeline.run(createContext('note.add', ['idea']), execute);

        expect(seen).toEqual([{ tags: 'inbox' }, { tags: 'work' }, {}]);
    });
});
