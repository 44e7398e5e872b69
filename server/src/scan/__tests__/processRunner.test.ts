import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { ProcessAbortedError, SpawnError, TimedOutError } from '../../core/errors.js';
import { KILL_GRACE_MS, runProcess } from '../processRunner.js';

const node = process.execPath;

function script(source: string) {
    return [node, '-e', source];
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** False once the pid is gone or left as a zombie no one has reaped yet. */
async function isAlive(pid: number) {
    try {
        process.kill(pid, 0);
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ESRCH') return false;
        throw error;
    }
    const stat = await fs.readFile(`/proc/${pid}/stat`, 'utf8').catch(() => '');
    return stat.split(') ')[1]?.startsWith('Z') !== true;
}

describe('runProcess', () => {
    it('captures stdout, stderr and the exit code', async () => {
        const output = await runProcess(
            script("process.stdout.write('report'); process.stderr.write('note'); process.exit(0)"),
            { timeoutMs: 10_000 }
        );
        expect(output).toEqual({
            stdout: 'report',
            stderr: 'note',
            exitCode: 0,
            signal: null,
            durationMs: expect.any(Number)
        });
    });

    it('decodes a multibyte character split across two writes', async () => {
        const output = await runProcess(
            script(
                "const bytes = Buffer.from('é'); process.stdout.write(bytes.subarray(0, 1)); setTimeout(() => process.stdout.write(bytes.subarray(1)), 100)"
            ),
            { timeoutMs: 10_000 }
        );
        expect(output.stdout).toBe('é');
    });

    it('resolves with a non-zero exit code instead of rejecting', async () => {
        const output = await runProcess(script("process.stderr.write('bad flag'); process.exit(3)"), {
            timeoutMs: 10_000
        });
        expect(output.exitCode).toBe(3);
        expect(output.stderr).toBe('bad flag');
    });

    it('passes arguments without a shell', async () => {
        const output = await runProcess(
            [node, '-e', 'process.stdout.write(JSON.stringify(process.argv.slice(1)))', '$HOME', 'a b', ';ls'],
            { timeoutMs: 10_000 }
        );
        expect(JSON.parse(output.stdout)).toEqual(['$HOME', 'a b', ';ls']);
    });

    it('kills a process that outlives its timeout', async () => {
        const started = Date.now();
        await expect(runProcess(script('setInterval(() => {}, 1000)'), { timeoutMs: 200 })).rejects.toBeInstanceOf(
            TimedOutError
        );
        expect(Date.now() - started).toBeLessThan(5_000);
    });

    it('reports the timeout in the error message', async () => {
        await expect(runProcess(script('setInterval(() => {}, 1000)'), { timeoutMs: 150 })).rejects.toThrow(
            'Scan timed out after 150ms and was terminated.'
        );
    });

    it.skipIf(process.platform === 'win32')('kills the grandchildren of a timed-out process', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-runner-'));
        const pidFile = path.join(dir, 'grandchild.pid');
        try {
            const parent = [
                "const { spawn } = require('node:child_process');",
                "const child = spawn(process.execPath, ['-e', 'setInterval(() => {}, 1000)'], { stdio: 'ignore' });",
                "require('node:fs').writeFileSync(process.argv[1], String(child.pid));",
                'setInterval(() => {}, 1000);'
            ].join('\n');
            await expect(runProcess([node, '-e', parent, pidFile], { timeoutMs: 500 })).rejects.toBeInstanceOf(
                TimedOutError
            );

            const pid = Number(await fs.readFile(pidFile, 'utf8'));
            expect(pid).toBeGreaterThan(0);
            await sleep(KILL_GRACE_MS + 50);
            const deadline = Date.now() + 2_000;
            while ((await isAlive(pid)) && Date.now() < deadline) {
                await sleep(25);
            }
            expect(await isAlive(pid)).toBe(false);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it('rejects with SpawnError when the executable does not exist', async () => {
        const failure = runProcess(['/nonexistent/nmap-binary', '-F', '127.0.0.1'], { timeoutMs: 10_000 });
        await expect(failure).rejects.toBeInstanceOf(SpawnError);
        await expect(failure).rejects.toMatchObject({ code: 'SPAWN_FAILED', errno: 'ENOENT' });
    });

    it('rejects an empty command', async () => {
        await expect(runProcess([], { timeoutMs: 1_000 })).rejects.toThrow('Failed to start <empty command>: command is empty');
    });

    it('terminates the process when the signal aborts', async () => {
        const controller = new AbortController();
        const running = runProcess(script('setInterval(() => {}, 1000)'), {
            timeoutMs: 10_000,
            signal: controller.signal
        });
        setTimeout(() => controller.abort('Server stopped (SIGTERM).'), 100);
        await expect(running).rejects.toBeInstanceOf(ProcessAbortedError);
        await expect(running).rejects.toThrow('Server stopped (SIGTERM).');
    });

    it('refuses to start with an already aborted signal', async () => {
        const controller = new AbortController();
        controller.abort();
        await expect(
            runProcess(script('process.exit(0)'), { timeoutMs: 1_000, signal: controller.signal })
        ).rejects.toBeInstanceOf(ProcessAbortedError);
    });
});
