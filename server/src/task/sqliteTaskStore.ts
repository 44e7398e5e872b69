import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { DuplicateTaskError, NotFoundError } from '../core/errors.js';
import { logger } from '../core/logger.js';
import { commandSchema, scanResultSchema, taskStatusSchema } from './recordSchema.js';
import { applyTransition, INTERRUPTED_REASON } from './stateMachine.js';
import type { TaskStore } from './taskStore.js';
import type { ReconcileSummary, TaskMetadata, TaskRecord, TaskTransition } from './types.js';

const CREATE_TASKS_TABLE = `
  CREATE TABLE IF NOT EXISTS scan_tasks (
    id TEXT PRIMARY KEY,
    profile TEXT,
    target TEXT,
    command TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    result TEXT,
    error TEXT,
    exit_code INTEGER,
    created_at INTEGER NOT NULL,
    started_at INTEGER,
    finished_at INTEGER,
    duration_ms INTEGER
  );
`;

const CREATE_STATUS_INDEX = 'CREATE INDEX IF NOT EXISTS idx_scan_tasks_status ON scan_tasks(status);';

const nullable = <T extends z.ZodTypeAny>(schema: T) => schema.nullable().transform((value) => value ?? undefined);

const taskRowSchema = z.object({
    id: z.string(),
    profile: nullable(z.enum(['quick', 'full', 'custom'])),
    target: nullable(z.string()),
    command: z.string(),
    status: taskStatusSchema,
    result: nullable(z.string()),
    error: nullable(z.string()),
    exit_code: nullable(z.number().int()),
    created_at: z.number(),
    started_at: nullable(z.number()),
    finished_at: nullable(z.number()),
    duration_ms: nullable(z.number())
});

type TaskRow = z.infer<typeof taskRowSchema>;

function rowToTask(row: TaskRow): TaskRecord {
    const task: TaskRecord = {
        id: row.id,
        command: commandSchema.parse(JSON.parse(row.command)),
        status: row.status,
        createdAt: row.created_at
    };
    if (row.profile !== undefined) task.profile = row.profile;
    if (row.target !== undefined) task.target = row.target;
    if (row.started_at !== undefined) task.startedAt = row.started_at;
    if (row.finished_at !== undefined) task.finishedAt = row.finished_at;
    if (row.duration_ms !== undefined) task.durationMs = row.duration_ms;
    if (row.exit_code !== undefined) task.exitCode = row.exit_code;
    if (row.result !== undefined) task.result = scanResultSchema.parse(JSON.parse(row.result));
    if (row.error !== undefined) task.error = row.error;
    return task;
}

/**
 * Task store on a single SQLite table. Every transition is a read, a
 * legality check and a write inside one transaction.
 */
export class SqliteTaskStore implements TaskStore {
    private db: Database.Database | undefined;

    constructor(private readonly dbPath: string) {}

    async open(): Promise<ReconcileSummary> {
        fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
        const db = new Database(this.dbPath);
        db.pragma('journal_mode = WAL');
        db.exec(CREATE_TASKS_TABLE);
        db.exec(CREATE_STATUS_INDEX);
        this.db = db;

        const now = Date.now();
        const reconcile = db.transaction(() => {
            const stuck = z
                .array(z.object({ id: z.string() }))
                .parse(db.prepare("SELECT id FROM scan_tasks WHERE status IN ('pending', 'running')").all());
            db.prepare(
                `UPDATE scan_tasks
                 SET status = 'failed', error = ?, result = NULL, finished_at = ?,
                     duration_ms = CASE WHEN started_at IS NULL THEN NULL ELSE ? - started_at END
                 WHERE status IN ('pending', 'running')`
            ).run(INTERRUPTED_REASON, now, now);
            return stuck.map((row) => row.id);
        });
        const interrupted = reconcile();
        logger.info('store: opened task database', { dbPath: this.dbPath, interrupted: interrupted.length });
        return { interrupted };
    }

    async create(id: string, command: readonly string[], meta: TaskMetadata = {}): Promise<TaskRecord> {
        const db = this.connection();
        const insert = db.transaction(() => {
            if (this.readRow(id)) {
                throw new DuplicateTaskError(id);
            }
            db.prepare(
                `INSERT INTO scan_tasks (id, profile, target, command, status, created_at)
                 VALUES (?, ?, ?, ?, 'pending', ?)`
            ).run(id, meta.profile ?? null, meta.target ?? null, JSON.stringify(command), Date.now());
        });
        insert();
        return this.get(id);
    }

    async transition(id: string, change: TaskTransition): Promise<TaskRecord> {
        const db = this.connection();
        const update = db.transaction(() => {
            const row = this.readRow(id);
            if (!row) {
                throw new NotFoundError(id);
            }
            const task = applyTransition(rowToTask(row), change);
            db.prepare(
                `UPDATE scan_tasks
                 SET status = ?, result = ?, error = ?, exit_code = ?, started_at = ?, finished_at = ?, duration_ms = ?
                 WHERE id = ?`
            ).run(
                task.status,
                task.result ? JSON.stringify(task.result) : null,
                task.error ?? null,
                task.exitCode ?? null,
                task.startedAt ?? null,
                task.finishedAt ?? null,
                task.durationMs ?? null,
                id
            );
            return task;
        });
        return update();
    }

    async get(id: string): Promise<TaskRecord> {
        const row = this.readRow(id);
        if (!row) {
            throw new NotFoundError(id);
        }
        return rowToTask(row);
    }

    async prune(olderThanMs: number): Promise<number> {
        const cutoff = Date.now() - olderThanMs;
        const result = this.connection()
            .prepare("DELETE FROM scan_tasks WHERE status IN ('completed', 'failed') AND COALESCE(finished_at, created_at) < ?")
            .run(cutoff);
        return result.changes;
    }

    async close(): Promise<void> {
        this.db?.close();
        this.db = undefined;
    }

    private readRow(id: string): TaskRow | undefined {
        const raw = this.connection().prepare('SELECT * FROM scan_tasks WHERE id = ?').get(id);
        return raw === undefined ? undefined : taskRowSchema.parse(raw);
    }

    private connection() {
        if (!this.db) {
            throw new Error('Task store used before open().');
        }
        return this.db;
    }
}
