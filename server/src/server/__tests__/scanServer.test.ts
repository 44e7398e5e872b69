import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import type { CommandRunner, ProcessOutput } from '../../scan/processRunner.js';
import { ProcessAbortedError } from '../../core/errors.js';
import { nmapReport } from '../../testing/nmapReport.js';
import { JsonTaskStore } from '../../task/jsonTaskStore.js';
import { TaskScheduler } from '../../task/scheduler.js';
import { createScanServer } from '../index.js';

const toolResultSchema = z.object({
    content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
    isError: z.boolean().optional()
});

const viewSchema = z
    .object({
        id: z.string(),
        status: z.string(),
        created_at: z.string()
    })
    .passthrough();

const errorSchema = z.object({
    error: z.object({ code: z.string().optional(), message: z.string(), retryable: z.boolean().optional() })
});

const REPORT = nmapReport({
    args: 'nmap -F -T4 -oX - 192.0.2.1',
    hosts: [{ address: '192.0.2.1', ports: [{ port: 80, service: 'http' }] }]
});

function delayedRunner(delayMs: number, commands: string[][]): CommandRunner {
    return (command, options) =>
        new Promise<ProcessOutput>((resolve, reject) => {
            commands.push([...command]);
            const timer = setTimeout(
                () => resolve({ stdout: REPORT, stderr: '', exitCode: 0, signal: null, durationMs: delayMs }),
                delayMs
            );
            options.signal?.addEventListener(
                'abort',
                () => {
                    clearTimeout(timer);
                    reject(new ProcessAbortedError('aborted'));
                },
                { once: true }
            );
        });
}

describe('scan MCP server', () => {
    let dir: string;
    let store: JsonTaskStore;
    let scheduler: TaskScheduler;
    let client: Client;
    let commands: string[][];

    async function connect(runnerDelayMs: number, maxConcurrentTasks = 5) {
        commands = [];
        scheduler = new TaskScheduler({
            store,
            maxConcurrentTasks,
            executionTimeoutMs: 10_000,
            defaultWaitMs: 1_000,
            runner: delayedRunner(runnerDelayMs, commands)
        });
        const server = createScanServer({
            scheduler,
            nmapPath: '/usr/bin/nmap',
            syncTimeoutSeconds: 2,
            waitBounds: {
                quick: { min: 1, max: 30 },
                full: { min: 1, max: 60 },
                custom: { min: 1, max: 60 }
            }
        });
        const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
        client = new Client({ name: 'scan-test-client', version: '0.0.0' });
        await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
    }

    async function call(name: string, args: Record<string, unknown>) {
        const result = toolResultSchema.parse(await client.callTool({ name, arguments: args }));
        const payload: unknown = JSON.parse(result.content[0].text);
        return { isError: result.isError === true, payload };
    }

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'scan-server-'));
        store = new JsonTaskStore(path.join(dir, 'tasks.json'));
        await store.open();
    });

    afterEach(async () => {
        await client.close();
        await scheduler.shutdown('test finished');
        await store.close();
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('lists the scan and polling tools', async () => {
        await connect(10);
        const { tools } = await client.listTools();
        expect(tools.map((tool) => tool.name).sort()).toEqual([
            'custom_scan',
            'full_scan',
            'get_task_result',
            'get_task_status',
            'quick_scan'
        ]);
    });

    it('returns a finished quick scan inline', async () => {
        await connect(10);
        const { isError, payload } = await call('quick_scan', { target: '192.0.2.1' });

        expect(isError).toBe(false);
        expect(commands).toEqual([['/usr/bin/nmap', '-F', '-T4', '-oX', '-', '192.0.2.1']]);
        expect(payload).toMatchObject({
            status: 'completed',
            profile: 'quick',
            target: '192.0.2.1',
            exit_code: 0,
            result: {
                target: '192.0.2.1',
                scan_time: '1.52s',
                hosts: [{ address: '192.0.2.1', status: 'up', ports: [{ port: 80, protocol: 'tcp', state: 'open', service: 'http' }] }]
            }
        });
        const view = viewSchema.parse(payload);
        expect(new Date(view.created_at).toISOString()).toBe(view.created_at);
        expect(view).not.toHaveProperty('message');
    });

    it('hands back a running task to poll when the wait budget runs out', async () => {
        await connect(1_500);
        const submitted = await call('full_scan', { target: '192.0.2.1', timeout: 1 });
        expect(submitted.isError).toBe(false);
        const view = viewSchema.parse(submitted.payload);
        expect(view.status).toBe('running');
        expect(view.message).toBe(
            'The scan is still running in the background. Poll get_task_status or get_task_result with this id.'
        );
        expect(commands[0]).toEqual(['/usr/bin/nmap', '-p', '1-65535', '-T4', '-sV', '-oX', '-', '192.0.2.1']);

        const status = await call('get_task_status', { task_id: view.id });
        expect(status.payload).toMatchObject({ id: view.id, status: 'running', profile: 'full' });
        expect(status.payload).not.toHaveProperty('result');

        await new Promise((resolve) => setTimeout(resolve, 900));
        const finished = await call('get_task_result', { task_id: view.id });
        expect(finished.payload).toMatchObject({ id: view.id, status: 'completed', exit_code: 0 });
        expect(viewSchema.parse(finished.payload).duration).toEqual(expect.any(Number));
    });

    it('rejects a scan past the ceiling with a retryable error', async () => {
        await connect(1_500, 1);
        const first = await call('quick_scan', { target: 'a.test', timeout: 1 });
        expect(viewSchema.parse(first.payload).status).toBe('running');

        const second = await call('quick_scan', { target: 'b.test', timeout: 1 });
        expect(second.isError).toBe(true);
        expect(errorSchema.parse(second.payload)).toEqual({
            error: {
                code: 'TOO_MANY_TASKS',
                message: 'Server busy: 1 scan task is already running. Retry later.',
                retryable: true
            }
        });
        expect(commands).toHaveLength(1);
    });

    it('runs custom commands through the configured binary', async () => {
        await connect(10);
        const { payload } = await call('custom_scan', { command: 'nmap -sV -p 22 192.0.2.1' });
        expect(payload).toMatchObject({ status: 'completed', profile: 'custom', target: '192.0.2.1' });
        expect(commands).toEqual([['/usr/bin/nmap', '-oX', '-', '-sV', '-p', '22', '192.0.2.1']]);
    });

    it('reports a malformed custom command as an invalid request', async () => {
        await connect(10);
        const { isError, payload } = await call('custom_scan', { command: '-sV "192.0.2.1' });
        expect(isError).toBe(true);
        expect(errorSchema.parse(payload).error).toEqual({
            code: 'INVALID_REQUEST',
            message: 'Unterminated " quote in command line.'
        });
        expect(commands).toHaveLength(0);
    });

    it('refuses a custom scan that writes its XML to a file', async () => {
        await connect(10);
        const { isError, payload } = await call('custom_scan', { command: '-sn -oX /tmp/out.xml 10.0.0.1' });
        expect(isError).toBe(true);
        expect(errorSchema.parse(payload).error).toEqual({
            code: 'INVALID_REQUEST',
            message: 'Custom scans must write XML to stdout: remove "-oX" or use "-oX -" instead of a file destination.'
        });
        expect(commands).toHaveLength(0);
    });

    it('reports unknown task ids', async () => {
        await connect(10);
        const { isError, payload } = await call('get_task_result', { task_id: 'no-such-task' });
        expect(isError).toBe(true);
        expect(errorSchema.parse(payload).error).toEqual({ code: 'NOT_FOUND', message: 'Task not found: no-such-task' });
    });

    it('refuses a target that looks like an option', async () => {
        await connect(10);
        const refused = await client
            .callTool({ name: 'quick_scan', arguments: { target: '--script=evil' } })
            .then((result) => toolResultSchema.parse(result).isError === true, () => true);
        expect(refused).toBe(true);
        expect(commands).toHaveLength(0);
    });
});
