import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HookRegistrationError } from '../errors.js';
import { makeTempDir, onStdin, removeDir, writeScript } from '../test-utils/scripts.js';
import { createHookScript, discoverHooks, parseHookFilename, registerUserHooks, testHook } from './discover.js';
import { HookRegistry } from './registry.js';
import { ScriptHookHandler } from './runner.js';

let dir: string;

beforeEach(async () => {
    dir = await makeTempDir();
});

afterEach(async () => {
    await removeDir(dir);
});

describe('parseHookFilename', () => {
    it.each([
        ['todo.add.preexec.sh', 'todo.add', 'preexec', 'sh'],
        ['todo.*.notify.py', 'todo.*', 'notify', 'py'],
        ['*.prevalidate.js', '*', 'prevalidate', 'js'],
        ['*.postexec', '*', 'postexec', ''],
        ['sync.postexec.sh', 'sync', 'postexec', 'sh'],
    ])('%s', (fileName, pattern, stage, extension) => {
        expect(parseHookFilename(fileName)).toEqual({ pattern, stage, extension, name: fileName });
    });

    it.each(['README', 'notes.txt', 'todo.add.later.sh', 'preexec.sh', '.preexec.sh'])('rejects %s', (fileName) => {
        expect(parseHookFilename(fileName)).toBeNull();
    });
});

describe('discoverHooks', () => {
    it('returns nothing for a missing directory', async () => {
        expect(await discoverHooks(path.join(dir, 'missing'))).toEqual([]);
    });

    it('finds executable, well-named scripts sorted by name', async () => {
        await writeScript(dir, 'todo.add.preexec.sh', '');
        await writeScript(dir, 'todo.*.notify.py', '');
        await writeScript(dir, '*.postexec', '');
        await writeScript(dir, 'README.md', '');
        await writeFile(path.join(dir, 'note.add.preexec.sh'), '#!/bin/sh\n', { mode: 0o644 });
        await mkdir(path.join(dir, 'nested.preexec.d'));

        const hooks = await discoverHooks(dir);
        expect(hooks.map(h => h.name)).toEqual(['*.postexec', 'todo.*.notify.py', 'todo.add.preexec.sh']);
        expect(hooks[2]).toEqual({
            path: path.join(dir, 'todo.add.preexec.sh'),
            pattern: 'todo.add',
            stage: 'preexec',
            extension: 'sh',
            name: 'todo.add.preexec.sh',
        });
    });
});

describe('registerUserHooks', () => {
    it('registers discovered scripts with stage-appropriate modes and timeouts', async () => {
        await writeScript(dir, 'todo.add.preexec.sh', '');
        await writeScript(dir, 'todo.*.notify.sh', '');
        const registry = new HookRegistry();

        const count = await registerUserHooks(registry, dir, { transformTimeout: 2_000, notifyTimeout: 9_000 });

        expect(count).toBe(2);
        const [pre] = registry.resolve('todo.add', 'preexec');
        expect(pre.mode).toBe('transform');
        expect(pre.source).toBe('user');
        expect(pre.timeoutMs).toBe(2_000);
        expect(pre.handler).toBeInstanceOf(ScriptHookHandler);

        const [notify] = registry.resolve('todo.add', 'notify');
        expect(notify.mode).toBe('notify');
        expect(notify.timeoutMs).toBe(9_000);
    });
});

describe('createHookScript', () => {
    it('writes an executable starter script', async () => {
        const hooksDir = path.join(dir, 'hooks');
        const file = await createHookScript(hooksDir, 'todo.add', 'preexec', new Date('2026-01-15T00:00:00Z'));

        expect(file).toBe(path.join(hooksDir, 'todo.add.preexec.sh'));
        expect((await stat(file)).mode & 0o111).not.toBe(0);

        const content = await readFile(file, 'utf-8');
        expect(content.split('\n').slice(0, 3)).toEqual([
            '#!/bin/sh',
            '# hookline hook: todo.add at preexec stage (transform mode)',
            '# Created: 2026-01-15',
        ]);
    });

    it('never overwrites an existing hook', async () => {
        await createHookScript(dir, 'todo.add', 'notify');
        await expect(createHookScript(dir, 'todo.add', 'notify')).rejects.toBeInstanceOf(HookRegistrationError);
    });

    it.each(['../escape', 'a/b', 'a\\b', ''])('refuses the pattern "%s"', async (pattern) => {
        await expect(createHookScript(dir, pattern, 'preexec')).rejects.toBeInstanceOf(HookRegistrationError);
    });

    it('produces a transform script that echoes its context', async () => {
        const file = await createHookScript(dir, 'test.command', 'postexec');
        const result = await testHook(file);

        expect(result.output?.command).toBe('test.command');
        expect(result.output?.args).toEqual(['sample', 'args']);
        expect(result.output?.flags).toEqual({ flag1: 'value1' });
    });
});

describe('testHook', () => {
    it('returns the context a transform script prints', async () => {
        const file = await writeScript(dir, 'test.preexec.js', onStdin([
            'const ctx = JSON.parse(input);',
            'ctx.flags.seen = process.env.HOOKLINE_HOOK_STAGE;',
            'process.stdout.write(JSON.stringify(ctx));',
        ].join('\n')));

        const result = await testHook(file);
        expect(result.hook.stage).toBe('preexec');
        expect(result.output?.flags).toEqual({ flag1: 'value1', seen: 'preexec' });
    });

    it('returns no output for notify scripts', async () => {
        const file = await writeScript(dir, 'test.notify.js', 'process.stdout.write("ignored");');
        const result = await testHook(file);
        expect(result.output).toBeUndefined();
    });

    it('rejects a script that is not executable', async () => {
        const file = path.join(dir, 'test.preexec.sh');
        await writeFile(file, '#!/bin/sh\n', { mode: 0o644 });
        await expect(testHook(file)).rejects.toThrow(/not executable/);
    });

    it('rejects a badly named script', async () => {
        const file = await writeScript(dir, 'whatever.js', '');
        await expect(testHook(file)).rejects.toThrow(/does not follow/);
    });
});
