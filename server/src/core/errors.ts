import type { TaskStatus } from '../task/types.js';

export type ErrorCode =
    | 'INVALID_TRANSITION'
    | 'TOO_MANY_TASKS'
    | 'TIMED_OUT'
    | 'SPAWN_FAILED'
    | 'PARSE_FAILED'
    | 'NOT_FOUND'
    | 'DUPLICATE_TASK'
    | 'PROCESS_ABORTED'
    | 'INVALID_CONFIG'
    | 'INVALID_REQUEST';

export class StructuredError extends Error {
    readonly code: ErrorCode;
    constructor(code: ErrorCode, message: string) {
        super(message);
        this.code = code;
        this.name = new.target.name;
    }
}

/** A transition was requested out of the legal `pending → running → terminal` order. */
export class InvalidTransitionError extends StructuredError {
    constructor(
        readonly taskId: string,
        readonly from: TaskStatus,
        readonly to: TaskStatus
    ) {
        super('INVALID_TRANSITION', `Task ${taskId} cannot move from ${from} to ${to}.`);
    }
}

/** Capacity exhaustion; callers may retry once a running task finishes. */
export class TooManyTasksError extends StructuredError {
    readonly retryable = true;
    constructor(readonly capacity: number) {
        super(
            'TOO_MANY_TASKS',
            `Server busy: ${capacity} scan task${capacity === 1 ? ' is' : 's are'} already running. Retry later.`
        );
    }
}

export class TimedOutError extends StructuredError {
    constructor(readonly timeoutMs: number) {
        super('TIMED_OUT', `Scan timed out after ${timeoutMs}ms and was terminated.`);
    }
}

/** The tool could not be started at all: missing binary, permissions, empty command. */
export class SpawnError extends StructuredError {
    constructor(
        readonly executable: string,
        reason: string,
        readonly errno?: string
    ) {
        super('SPAWN_FAILED', `Failed to start ${executable || '<empty command>'}: ${reason}`);
    }
}

export class ParseError extends StructuredError {
    constructor(
        reason: string,
        readonly fragment: string
    ) {
        super('PARSE_FAILED', `Could not parse scan output: ${reason}`);
    }
}

export class NotFoundError extends StructuredError {
    constructor(readonly taskId: string) {
        super('NOT_FOUND', `Task not found: ${taskId}`);
    }
}

export class DuplicateTaskError extends StructuredError {
    constructor(readonly taskId: string) {
        super('DUPLICATE_TASK', `Task ${taskId} already exists.`);
    }
}

export class ProcessAbortedError extends StructuredError {
    constructor(reason: string) {
        super('PROCESS_ABORTED', reason);
    }
}

export class ConfigError extends StructuredError {
    constructor(
        message: string,
        readonly issues: string[] = []
    ) {
        super('INVALID_CONFIG', issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    }
}

export class InvalidRequestError extends StructuredError {
    constructor(message: string) {
        super('INVALID_REQUEST', message);
    }
}

export interface SerializedError {
    code?: ErrorCode;
    message: string;
    retryable?: boolean;
}

export function serializeErrorForClient(error: unknown): SerializedError {
    if (error instanceof TooManyTasksError) {
        return { code: error.code, message: error.message, retryable: error.retryable };
    }
    if (error instanceof StructuredError) {
        return { code: error.code, message: error.message };
    }
    if (error instanceof Error) {
        return { message: error.message };
    }
    return { message: String(error) };
}
