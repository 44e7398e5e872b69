import type { ScanProfile, ScanResult, TaskRecord, TaskStatus } from '../task/types.js';

export interface TaskStatusView {
    id: string;
    profile?: ScanProfile;
    target?: string;
    status: TaskStatus;
    created_at: string;
    started_at?: string;
    finished_at?: string;
    /** Seconds between start and finish. */
    duration?: number;
    error?: string;
}

export interface TaskView extends TaskStatusView {
    command: string[];
    exit_code?: number;
    result?: ScanResult;
}

const iso = (epochMs: number | undefined) => (epochMs === undefined ? undefined : new Date(epochMs).toISOString());

export function toStatusView(task: TaskRecord): TaskStatusView {
    return {
        id: task.id,
        profile: task.profile,
        target: task.target,
        status: task.status,
        created_at: new Date(task.createdAt).toISOString(),
        started_at: iso(task.startedAt),
        finished_at: iso(task.finishedAt),
        duration: task.durationMs === undefined ? undefined : task.durationMs / 1000,
        error: task.error
    };
}

export function toTaskView(task: TaskRecord): TaskView {
    return {
        ...toStatusView(task),
        command: task.command,
        exit_code: task.exitCode,
        result: task.result
    };
}
