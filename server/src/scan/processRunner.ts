import { spawn, spawnSync, ChildProcess } from 'node:child_process';
import { ProcessAbortedError, SpawnError, TimedOutError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';

export const KILL_GRACE_MS = 250;

export interface RunOptions {
    /** Hard ceiling; on expiry the whole process group is killed. */
    timeoutMs: number;
    /** Aborting terminates the process; only server shutdown uses this. */
    signal?: AbortSignal;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

export interface ProcessOutput {
    stdout: string;
    stderr: string;
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    durationMs: number;
}

export type CommandRunner = (command: readonly string[], options: RunOptions) => Promise<ProcessOutput>;

export function terminateProcessTree(child: ChildProcess) {
    const pid = child.pid;
    if (!pid) {
        sendSignal(() => child.kill(), 'kill child without pid');
        return;
    }
    if (process.platform === 'win32') {
        try {
            // spawnSync so taskkill finishes before we return.
            spawnSync('taskkill', ['/pid', pid.toString(), '/t', '/f'], { stdio: 'ignore' });
        } catch (error) {
            logger.warn('process: taskkill failed, falling back to kill()', { pid, error: formatError(error) });
            sendSignal(() => child.kill(), 'kill child');
        }
        return;
    }
    // The child was spawned detached, so -pid addresses its whole process group.
    sendSignal(() => process.kill(-pid, 'SIGTERM'), `SIGTERM group ${pid}`);
    sendSignal(() => child.kill('SIGTERM'), `SIGTERM ${pid}`);
    const escalate = setTimeout(() => {
        sendSignal(() => process.kill(-pid, 'SIGKILL'), `SIGKILL group ${pid}`);
        sendSignal(() => child.kill('SIGKILL'), `SIGKILL ${pid}`);
    }, KILL_GRACE_MS);
    escalate.unref();
}

function sendSignal(send: () => void, what: string) {
    try {
        send();
    } catch (error) {
        // ESRCH: the process or group already exited.
        logger.debug(`process: ${what} skipped`, formatError(error));
    }
}

/**
 * Run `command[0]` with the remaining entries as its argument vector, never
 * through a shell. Resolves with the captured output whatever the exit code;
 * rejects with `TimedOutError`, `SpawnError` or `ProcessAbortedError`.
 */
export const runProcess: CommandRunner = (command, options) => {
    return new Promise<ProcessOutput>((resolve, reject) => {
        const [file, ...args] = command;
        if (!file) {
            reject(new SpawnError('', 'command is empty'));
            return;
        }
        if (options.signal?.aborted) {
            reject(new ProcessAbortedError(abortReason(options.signal)));
            return;
        }

        const startedAt = Date.now();
        let settled = false;
        let stdout = '';
        let stderr = '';

        const child = spawn(file, args, {
            cwd: options.cwd,
            env: options.env,
            stdio: ['ignore', 'pipe', 'pipe'],
            detached: process.platform !== 'win32',
            windowsHide: true
        });

        const finish = (outcome: () => void) => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onAbort);
            outcome();
        };

        const timer = setTimeout(() => {
            logger.warn('process: hard timeout reached, terminating', { file, pid: child.pid, timeoutMs: options.timeoutMs });
            terminateProcessTree(child);
            finish(() => reject(new TimedOutError(options.timeoutMs)));
        }, options.timeoutMs);

        const onAbort = () => {
            terminateProcessTree(child);
            finish(() => reject(new ProcessAbortedError(abortReason(options.signal))));
        };
        options.signal?.addEventListener('abort', onAbort, { once: true });

        // Stream decoding keeps multibyte characters intact across pipe reads.
        child.stdout?.setEncoding('utf8');
        child.stderr?.setEncoding('utf8');
        child.stdout?.on('data', (chunk: string) => {
            stdout += chunk;
        });
        child.stderr?.on('data', (chunk: string) => {
            stderr += chunk;
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
            finish(() => reject(new SpawnError(file, error.message, error.code)));
        });

        child.on('close', (exitCode, signal) => {
            finish(() =>
                resolve({
                    stdout,
                    stderr,
                    exitCode,
                    signal,
                    durationMs: Date.now() - startedAt
                })
            );
        });
    });
};

function abortReason(signal: AbortSignal | undefined) {
    const reason: unknown = signal?.reason;
    if (typeof reason === 'string') return reason;
    if (reason instanceof Error) return reason.message;
    return 'Process aborted.';
}
