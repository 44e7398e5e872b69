import { z } from 'zod';
import type { HostRecord, PortRecord, ScanResult, TaskRecord } from './types.js';

const portRecordSchema: z.ZodType<PortRecord> = z.object({
    port: z.number().int(),
    protocol: z.string(),
    state: z.string(),
    service: z.string().optional(),
    version: z.string().optional()
});

const hostRecordSchema: z.ZodType<HostRecord> = z.object({
    address: z.string(),
    status: z.string(),
    hostname: z.string().optional(),
    ports: z.array(portRecordSchema)
});

export const scanResultSchema: z.ZodType<ScanResult> = z.object({
    target: z.string(),
    scan_time: z.string(),
    hosts: z.array(hostRecordSchema)
});

export const commandSchema = z.array(z.string());

export const taskStatusSchema = z.enum(['pending', 'running', 'completed', 'failed']);

/** Shape of a task as persisted by the stores; validated on every load. */
export const taskRecordSchema: z.ZodType<TaskRecord> = z.object({
    id: z.string().min(1),
    command: commandSchema,
    profile: z.enum(['quick', 'full', 'custom']).optional(),
    target: z.string().optional(),
    status: taskStatusSchema,
    createdAt: z.number(),
    startedAt: z.number().optional(),
    finishedAt: z.number().optional(),
    durationMs: z.number().optional(),
    exitCode: z.number().int().optional(),
    result: scanResultSchema.optional(),
    error: z.string().optional()
});
