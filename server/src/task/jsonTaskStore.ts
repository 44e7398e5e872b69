import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import writeFileAtomic from 'write-file-atomic';
import { DuplicateTaskError, NotFoundError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';
import { taskRecordSchema } from './recordSchema.js';
import { applyTransition, isTerminal, markInterrupted } from './stateMachine.js';
import type { TaskStore } from './taskStore.js';
import type { ReconcileSummary, TaskMetadata, TaskRecord, TaskTransition } from './types.js';

/**
 * Task store that keeps every task in memory and rewrites one JSON snapshot
 * file on each mutation. State changes happen synchronously before the write
 * is queued, so two transitions on the same id can never interleave.
 */
export class JsonTaskStore implements TaskStore {
    private readonly tasks = new Map<string, TaskRecord>();
    private writeChain: Promise<void> = Promise.resolve();
    private opened = false;

    constructor(private readonly stateFile: string) {}

    async open(): Promise<ReconcileSummary> {
        const saved = await this.readSnapshot();
        const interrupted: string[] = [];
        const now = Date.now();
        for (const record of saved) {
            if (!isTerminal(record.status)) {
                markInterrupted(record, now);
                interrupted.push(record.id);
            }
            this.tasks.set(record.id, record);
        }
        this.opened = true;
        logger.info('store: loaded task snapshot', {
            stateFile: this.stateFile,
            taskCount: this.tasks.size,
            interrupted: interrupted.length
        });
        if (interrupted.length > 0) {
            await this.persist();
        }
        return { interrupted };
    }

    async create(id: string, command: readonly string[], meta: TaskMetadata = {}): Promise<TaskRecord> {
        this.assertOpen();
        if (this.tasks.has(id)) {
            throw new DuplicateTaskError(id);
        }
        const task: TaskRecord = {
            id,
            command: [...command],
            ...meta,
            status: 'pending',
            createdAt: Date.now()
        };
        this.tasks.set(id, task);
        try {
            await this.persist();
        } catch (error) {
            if (this.tasks.get(id) === task) {
                this.tasks.delete(id);
            }
            throw error;
        }
        return structuredClone(task);
    }

    async transition(id: string, change: TaskTransition): Promise<TaskRecord> {
        this.assertOpen();
        const task = this.tasks.get(id);
        if (!task) {
            throw new NotFoundError(id);
        }
        const previous = structuredClone(task);
        applyTransition(task, change);
        try {
            await this.persist();
        } catch (error) {
            // Undo only if no later transition has built on this one.
            if (this.tasks.get(id) === task && task.status === change.status) {
                this.tasks.set(id, previous);
            }
            throw error;
        }
        return structuredClone(task);
    }

    async get(id: string): Promise<TaskRecord> {
        const task = this.tasks.get(id);
        if (!task) {
            throw new NotFoundError(id);
        }
        return structuredClone(task);
    }

    async prune(olderThanMs: number): Promise<number> {
        const cutoff = Date.now() - olderThanMs;
        let removed = 0;
        for (const [id, task] of Array.from(this.tasks.entries())) {
            if (isTerminal(task.status) && (task.finishedAt ?? task.createdAt) < cutoff) {
                this.tasks.delete(id);
                removed += 1;
            }
        }
        if (removed > 0) {
            await this.persist();
        }
        return removed;
    }

    async close(): Promise<void> {
        // A failed write has already rejected its own caller; close only drains the queue.
        await this.writeChain.then(
            () => undefined,
            () => undefined
        );
    }

    /**
     * Queue a snapshot write behind any write already in flight. A failed
     * write rejects only its own caller; the next write still runs.
     */
    private persist(): Promise<void> {
        const write = () => this.writeSnapshot();
        const next = this.writeChain.then(write, write);
        this.writeChain = next;
        return next;
    }

    private async writeSnapshot() {
        const payload = Array.from(this.tasks.values());
        try {
            await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
            await writeFileAtomic(this.stateFile, JSON.stringify(payload, null, 2), { encoding: 'utf8' });
        } catch (error) {
            logger.error('store: failed to persist task snapshot', { stateFile: this.stateFile, error: formatError(error) });
            throw error;
        }
    }

    private async readSnapshot(): Promise<TaskRecord[]> {
        let raw: string;
        try {
            raw = await fs.readFile(this.stateFile, 'utf8');
        } catch (error) {
            if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
                return [];
            }
            throw error;
        }
        const parsed = z.array(z.unknown()).safeParse(JSON.parse(raw));
        if (!parsed.success) {
            throw new Error(`Task state file ${this.stateFile} does not contain a JSON array.`);
        }
        const records: TaskRecord[] = [];
        for (const entry of parsed.data) {
            const record = taskRecordSchema.safeParse(entry);
            if (record.success) {
                records.push(record.data);
            } else {
                logger.warn('store: skipping malformed task record', {
                    stateFile: this.stateFile,
                    issues: record.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                });
            }
        }
        return records;
    }

    private assertOpen() {
        if (!this.opened) {
            throw new Error('Task store used before open().');
        }
    }
}
