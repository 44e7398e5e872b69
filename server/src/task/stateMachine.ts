import { InvalidTransitionError } from '../core/errors.js';
import type { TaskRecord, TaskStatus, TaskTransition, TerminalStatus } from './types.js';

export const INTERRUPTED_REASON = 'interrupted: the server stopped before the scan finished';

const successors: Record<TaskStatus, readonly TaskStatus[]> = {
    pending: ['running'],
    running: ['completed', 'failed'],
    completed: [],
    failed: []
};

export function isTerminal(status: TaskStatus): status is TerminalStatus {
    return status === 'completed' || status === 'failed';
}

export function canTransition(from: TaskStatus, to: TaskStatus) {
    return successors[from].includes(to);
}

export function assertTransition(task: Pick<TaskRecord, 'id' | 'status'>, to: TaskStatus) {
    if (!canTransition(task.status, to)) {
        throw new InvalidTransitionError(task.id, task.status, to);
    }
}

/**
 * Apply a legal transition to a task in place, stamping the matching
 * timestamp. Throws before touching the task when the move is illegal.
 */
export function applyTransition(task: TaskRecord, change: TaskTransition, now = Date.now()) {
    assertTransition(task, change.status);
    task.status = change.status;
    if (change.status === 'running') {
        task.startedAt = now;
        return task;
    }
    task.finishedAt = now;
    task.durationMs = now - (task.startedAt ?? now);
    if (change.exitCode !== undefined) {
        task.exitCode = change.exitCode;
    }
    if (change.status === 'completed') {
        task.result = change.result;
    } else {
        task.error = change.error;
    }
    return task;
}

/** Startup rewrite of a task whose supervising process is gone. */
export function markInterrupted(task: TaskRecord, now = Date.now()) {
    task.status = 'failed';
    task.error = INTERRUPTED_REASON;
    delete task.result;
    task.finishedAt = now;
    if (task.startedAt !== undefined) {
        task.durationMs = now - task.startedAt;
    }
    return task;
}
