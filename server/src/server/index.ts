import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ScanWaitBounds } from '../core/config.js';
import { serializeErrorForClient, StructuredError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { buildCustomScan, buildFullScan, buildQuickScan, type ScanRequest } from '../scan/profiles.js';
import type { TaskScheduler } from '../task/scheduler.js';
import type { TaskRecord } from '../task/types.js';
import { toStatusView, toTaskView } from './taskView.js';

export const SERVER_NAME = 'nmap-scan-mcp';
export const SERVER_VERSION = '0.1.0';

const STILL_RUNNING_MESSAGE =
    'The scan is still running in the background. Poll get_task_status or get_task_result with this id.';

const INSTRUCTIONS = `Runs nmap port scans as tasks.

1. Call quick_scan, full_scan or custom_scan.
2. If the scan finishes within the wait timeout the finished task is returned.
3. Otherwise the task comes back with status "running"; poll get_task_status / get_task_result with its id.

Quick scans usually finish in seconds; full scans can take many minutes.`;

export interface ScanServerOptions {
    scheduler: TaskScheduler;
    nmapPath: string;
    syncTimeoutSeconds: number;
    waitBounds: ScanWaitBounds;
}

const targetSchema = z
    .string()
    .trim()
    .min(1)
    .regex(/^[^-\s]\S*$/, 'target must be a single host, address or CIDR range and must not start with "-"')
    .describe('Target IP address, hostname or CIDR range, e.g. 192.168.1.1, example.com, 10.0.0.0/24');

const taskIdSchema = z.string().min(1).describe('Task id returned by a scan tool');

function waitSchema(bound: { min: number; max: number }, defaultSeconds: number) {
    return z
        .number()
        .int()
        .min(bound.min)
        .max(bound.max)
        .optional()
        .describe(
            `Seconds to wait for the scan before returning a task id to poll (${bound.min}-${bound.max}, default ${defaultSeconds})`
        );
}

function textResponse(payload: unknown, isError = false) {
    const text = typeof payload === 'string' ? payload : JSON.stringify(payload, null, 2);
    return { content: [{ type: 'text' as const, text }], isError };
}

function errorResponse(error: unknown) {
    if (!(error instanceof StructuredError)) {
        logger.error('server: unexpected tool failure', error);
    }
    return textResponse({ error: serializeErrorForClient(error) }, true);
}

function submitResponse(task: TaskRecord) {
    const view = toTaskView(task);
    return task.status === 'running' || task.status === 'pending' ? { ...view, message: STILL_RUNNING_MESSAGE } : view;
}

/** Build the MCP tool surface over a scheduler. Connecting a transport is the caller's job. */
export function createScanServer(options: ScanServerOptions) {
    const { scheduler, nmapPath, syncTimeoutSeconds, waitBounds } = options;
    const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION }, { instructions: INSTRUCTIONS });

    async function runScan(request: ScanRequest, timeoutSeconds: number | undefined) {
        const waitMs = (timeoutSeconds ?? syncTimeoutSeconds) * 1000;
        const task = await scheduler.submit({ ...request, waitMs });
        return textResponse(submitResponse(task));
    }

    server.registerTool(
        'quick_scan',
        {
            title: 'Quick port scan',
            description: 'Scan the ~100 most common ports of a target (nmap -F -T4).',
            inputSchema: { target: targetSchema, timeout: waitSchema(waitBounds.quick, syncTimeoutSeconds) }
        },
        async ({ target, timeout }) => {
            try {
                return await runScan(buildQuickScan(nmapPath, target), timeout);
            } catch (error) {
                return errorResponse(error);
            }
        }
    );

    server.registerTool(
        'full_scan',
        {
            title: 'Full port scan',
            description: 'Scan all 65535 ports of a target with service version detection (nmap -p 1-65535 -T4 -sV). Usually takes minutes.',
            inputSchema: { target: targetSchema, timeout: waitSchema(waitBounds.full, syncTimeoutSeconds) }
        },
        async ({ target, timeout }) => {
            try {
                return await runScan(buildFullScan(nmapPath, target), timeout);
            } catch (error) {
                return errorResponse(error);
            }
        }
    );

    server.registerTool(
        'custom_scan',
        {
            title: 'Custom nmap scan',
            description:
                'Run nmap with arbitrary arguments, e.g. "-sV -p 22,80 example.com". The target should be the last argument. XML output to stdout (-oX -) is added automatically; -oX or -oA with a file destination is rejected.',
            inputSchema: {
                command: z.string().trim().min(1).describe('nmap arguments and target, without the nmap executable'),
                timeout: waitSchema(waitBounds.custom, syncTimeoutSeconds)
            }
        },
        async ({ command, timeout }) => {
            try {
                return await runScan(buildCustomScan(nmapPath, command), timeout);
            } catch (error) {
                return errorResponse(error);
            }
        }
    );

    server.registerTool(
        'get_task_status',
        {
            title: 'Get scan task status',
            description: 'Return the status and timestamps of a scan task, without its result.',
            inputSchema: { task_id: taskIdSchema }
        },
        async ({ task_id }) => {
            try {
                return textResponse(toStatusView(await scheduler.getResult(task_id)));
            } catch (error) {
                return errorResponse(error);
            }
        }
    );

    server.registerTool(
        'get_task_result',
        {
            title: 'Get scan task result',
            description: 'Return the full scan task record. result is present once status is completed; error once failed.',
            inputSchema: { task_id: taskIdSchema }
        },
        async ({ task_id }) => {
            try {
                return textResponse(toTaskView(await scheduler.getResult(task_id)));
            } catch (error) {
                return errorResponse(error);
            }
        }
    );

    return server;
}
