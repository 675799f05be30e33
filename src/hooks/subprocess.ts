import { spawn } from 'node:child_process';
import { HookProcessError, HookTimeoutError, errorMessage } from '../errors.js';

export interface SubprocessOptions {
    executable: string;
    args?: string[];
    /** Written to stdin, which is then closed */
    input?: string;
    timeoutMs?: number;
    env: NodeJS.ProcessEnv;
    cwd?: string;
    /** Name used in error messages (defaults to the executable) */
    label?: string;
    /**
     * `pipe` captures output; `inherit` hands the terminal to the child
     * (stdin still carries the envelope).
     */
    output?: 'pipe' | 'inherit';
}

export interface SubprocessResult {
    stdout: string;
    stderr: string;
    exitCode: number;
    durationMs: number;
}

/**
 * Run an executable to completion.
 *
 * Rejects with HookTimeoutError when the deadline passes (the process group
 * is killed and pipes are destroyed right away, without waiting for
 * grandchildren holding them open), and with HookProcessError when the
 * process cannot start or exits non-zero.
 */
export function runSubprocess(options: SubprocessOptions): Promise<SubprocessResult> {
    const label = options.label ?? options.executable;
    const captured = (options.output ?? 'pipe') === 'pipe';
    const start = Date.now();

    return new Promise((resolve, reject) => {
        const child = spawn(options.executable, options.args ?? [], {
            cwd: options.cwd,
            env: options.env,
            stdio: ['pipe', captured ? 'pipe' : 'inherit', captured ? 'pipe' : 'inherit'],
            // own process group so a timeout takes down anything the hook forked
            detached: captured && process.platform !== 'win32',
        });

        let stdout = '';
        let stderr = '';
        let settled = false;
        let timer: ReturnType<typeof setTimeout> | null = null;

        const release = () => {
            if (timer) clearTimeout(timer);
            timer = null;
            child.stdin?.destroy();
            child.stdout?.destroy();
            child.stderr?.destroy();
        };

        const settle = (fn: () => void) => {
            if (settled) return;
            settled = true;
            release();
            fn();
        };

        if (options.timeoutMs !== undefined) {
            const timeoutMs = options.timeoutMs;
            timer = setTimeout(() => {
                killTree(child.pid, captured, () => child.kill('SIGKILL'));
                settle(() => reject(new HookTimeoutError(label, timeoutMs)));
            }, timeoutMs);
        }

        child.stdout?.setEncoding('utf-8');
        child.stderr?.setEncoding('utf-8');
        child.stdout?.on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr?.on('data', (chunk: string) => {
            stderr += chunk;
        });

        child.on('error', (err) => {
            settle(() => reject(new HookProcessError(`${label} could not be started: ${errorMessage(err)}`, {
                stderr,
                cause: err,
            })));
        });

        child.on('close', (code, signal) => {
            settle(() => {
                if (code === 0) {
                    resolve({ stdout, stderr, exitCode: 0, durationMs: Date.now() - start });
                    return;
                }
                const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
                reject(new HookProcessError(`${label} ${reason}`, { exitCode: code, stderr }));
            });
        });

        // A child that exits without reading stdin makes the write fail with
        // EPIPE; the exit status is what matters, so the stream error is dropped.
        child.stdin?.on('error', () => undefined);
        child.stdin?.end(options.input ?? '');
    });
}

function killTree(pid: number | undefined, grouped: boolean, fallback: () => void): void {
    if (pid === undefined) return;
    if (!grouped) {
        fallback();
        return;
    }
    try {
        process.kill(-pid, 'SIGKILL');
    } catch {
        // group already gone or never formed
        fallback();
    }
}
