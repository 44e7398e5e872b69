import path from 'node:path';
import type { ReconcileSummary, TaskMetadata, TaskRecord, TaskTransition } from './types.js';

/**
 * Durable home of every task. The scheduler is the only caller that asks for
 * writes; `transition` rejects anything outside `pending → running → terminal`.
 */
export interface TaskStore {
    /** Load durable state and fail every task left pending or running. */
    open(): Promise<ReconcileSummary>;
    create(id: string, command: readonly string[], meta?: TaskMetadata): Promise<TaskRecord>;
    transition(id: string, change: TaskTransition): Promise<TaskRecord>;
    get(id: string): Promise<TaskRecord>;
    /** Delete terminal tasks that finished before `Date.now() - olderThanMs`. */
    prune(olderThanMs: number): Promise<number>;
    close(): Promise<void>;
}

const sqliteExtensions = new Set(['.db', '.sqlite', '.sqlite3']);

export function isSqliteStateFile(stateFile: string) {
    return sqliteExtensions.has(path.extname(stateFile).toLowerCase());
}

/** Pick the backend from the state file's extension and open it. */
export async function openTaskStore(stateFile: string): Promise<{ store: TaskStore; reconciled: ReconcileSummary }> {
    let store: TaskStore;
    // Loaded lazily so a JSON-backed server never touches the native sqlite binding.
    if (isSqliteStateFile(stateFile)) {
        const { SqliteTaskStore } = await import('./sqliteTaskStore.js');
        store = new SqliteTaskStore(stateFile);
    } else {
        const { JsonTaskStore } = await import('./jsonTaskStore.js');
        store = new JsonTaskStore(stateFile);
    }
    const reconciled = await store.open();
    return { store, reconciled };
}
