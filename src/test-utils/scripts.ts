import { chmod, mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { MANIFEST_FILENAME } from '../plugins/manifest.js';

/**
 * Fresh directory under the OS temp dir
 */
export function makeTempDir(prefix = 'hookline-test-'): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): Promise<void> {
    return rm(dir, { recursive: true, force: true });
}

/**
 * Write an executable Node script. The shebang names the running node
 * binary so the script works without node on PATH.
 */
export async function writeScript(dir: string, name: string, body: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const file = path.join(dir, name);
    await writeFile(file, `#!${process.execPath}\n${body}\n`, 'utf-8');
    await chmod(file, 0o755);
    return file;
}

/**
 * Script body that buffers stdin into `input` and then runs `body`
 */
export function onStdin(body: string): string {
    return [
        'let input = "";',
        'process.stdin.setEncoding("utf-8");',
        'process.stdin.on("data", chunk => { input += chunk; });',
        `process.stdin.on("end", () => {\n${body}\n});`,
    ].join('\n');
}

/**
 * Script body that appends its stdin to `file`, one invocation per line
 */
export function recordStdin(file: string): string {
    return onStdin(`require("node:fs").appendFileSync(${JSON.stringify(file)}, input + "\\n");`);
}

/**
 * Lay out a plugin source directory: manifest plus optional entrypoint
 */
export async function writePluginSource(
    dir: string,
    manifest: string,
    entrypoint?: { name: string; body: string }
): Promise<string> {
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, MANIFEST_FILENAME), manifest, 'utf-8');
    if (entrypoint) {
        await writeScript(dir, entrypoint.name, entrypoint.body);
    }
    return dir;
}

/**
 * Minimal valid manifest text
 */
export function manifestText(options: {
    name: string;
    version?: string;
    extra?: string;
}): string {
    return `[plugin]
name = "${options.name}"
version = "${options.version ?? '1.0.0'}"
description = "Test plugin ${options.name}"
author = "Test Author"
protocol_version = "1.0.0"
${options.extra ?? ''}`;
}
