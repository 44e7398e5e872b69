import { randomUUID } from 'node:crypto';
import {
    InvalidTransitionError,
    ParseError,
    ProcessAbortedError,
    SpawnError,
    TimedOutError,
    TooManyTasksError
} from '../core/errors.js';
import { logger } from '../core/logger.js';
import { formatError } from '../core/utils.js';
import { runProcess, type CommandRunner, type ProcessOutput } from '../scan/processRunner.js';
import { parseScanReport } from '../scan/resultParser.js';
import { AdmissionLedger } from './admissionLedger.js';
import type { TaskStore } from './taskStore.js';
import type { ScanResult, TaskMetadata, TaskRecord, TaskStatus, TerminalTransition } from './types.js';

export interface SchedulerOptions {
    store: TaskStore;
    maxConcurrentTasks: number;
    /** Hard ceiling on a single process run. */
    executionTimeoutMs: number;
    /** How long `submit` waits for a result when the caller gives no budget. */
    defaultWaitMs: number;
    runner?: CommandRunner;
    parse?: (rawOutput: string) => ScanResult;
    ledger?: AdmissionLedger;
}

export interface SubmitRequest extends TaskMetadata {
    command: string[];
    waitMs?: number;
}

type Settlement = { ok: true; task: TaskRecord } | { ok: false; error: unknown };

interface ActiveTask {
    controller: AbortController;
    done: Promise<Settlement>;
}

/**
 * Runs scan commands as supervised tasks. `submit` races each task's
 * execution against the caller's wait budget: a task that finishes in time is
 * returned finished, otherwise it is returned `running` and keeps executing
 * unattended. Either way the execution path is the same.
 */
export class TaskScheduler {
    private readonly store: TaskStore;
    private readonly runner: CommandRunner;
    private readonly parse: (rawOutput: string) => ScanResult;
    private readonly ledger: AdmissionLedger;
    private readonly executionTimeoutMs: number;
    private readonly defaultWaitMs: number;
    private readonly active = new Map<string, ActiveTask>();

    constructor(options: SchedulerOptions) {
        this.store = options.store;
        this.runner = options.runner ?? runProcess;
        this.parse = options.parse ?? parseScanReport;
        this.ledger = options.ledger ?? new AdmissionLedger(options.maxConcurrentTasks);
        this.executionTimeoutMs = options.executionTimeoutMs;
        this.defaultWaitMs = options.defaultWaitMs;
    }

    get capacity() {
        return this.ledger.capacity;
    }

    runningCount() {
        return this.ledger.runningCount();
    }

    async submit(request: SubmitRequest): Promise<TaskRecord> {
        // Check-and-increment happens before the first await.
        if (!this.ledger.tryAcquire()) {
            logger.warn('scheduler: rejecting submission, at capacity', this.ledger.snapshot());
            throw new TooManyTasksError(this.ledger.capacity);
        }

        const id = randomUUID();
        try {
            await this.store.create(id, request.command, { profile: request.profile, target: request.target });
            await this.store.transition(id, { status: 'running' });
        } catch (error) {
            this.ledger.release();
            throw error;
        }
        logger.info('scheduler: task started', { id, profile: request.profile, target: request.target });

        const controller = new AbortController();
        const done = this.execute(id, request.command, controller.signal).finally(() => {
            this.active.delete(id);
            this.ledger.release();
        });
        this.active.set(id, { controller, done });

        const waitMs = request.waitMs ?? this.defaultWaitMs;
        const outcome = await settleWithin(done, waitMs);
        if (!outcome) {
            logger.info('scheduler: wait budget elapsed, continuing in background', { id, waitMs });
            return this.store.get(id);
        }
        if (!outcome.ok) {
            throw outcome.error;
        }
        return outcome.task;
    }

    async getStatus(id: string): Promise<TaskStatus> {
        const task = await this.store.get(id);
        return task.status;
    }

    async getResult(id: string): Promise<TaskRecord> {
        return this.store.get(id);
    }

    /**
     * Terminate every supervised process and wait until each of their tasks
     * has been recorded as failed with `reason`.
     */
    async shutdown(reason: string) {
        const pending = Array.from(this.active.values());
        if (pending.length > 0) {
            logger.warn('scheduler: terminating running tasks', { count: pending.length, reason });
        }
        for (const entry of pending) {
            entry.controller.abort(reason);
        }
        await Promise.all(pending.map((entry) => entry.done));
    }

    /** Never rejects: every failure ends up either on the task or in the settlement. */
    private async execute(id: string, command: string[], signal: AbortSignal): Promise<Settlement> {
        let change: TerminalTransition;
        try {
            const output = await this.runner(command, { timeoutMs: this.executionTimeoutMs, signal });
            change = this.interpret(id, command, output);
        } catch (error) {
            change = { status: 'failed', error: formatError(error) };
            logFailure(id, error);
        }

        try {
            const task = await this.store.transition(id, change);
            logger.info('scheduler: task finished', { id, status: task.status, durationMs: task.durationMs });
            return { ok: true, task };
        } catch (error) {
            if (error instanceof InvalidTransitionError) {
                // Another terminal transition landed first; it stands.
                logger.warn('scheduler: late terminal transition rejected', { id, attempted: change.status, current: error.from });
                return this.readSettlement(id);
            }
            logger.error('scheduler: failed to record task outcome', { id, error: formatError(error) });
            return { ok: false, error };
        }
    }

    private interpret(id: string, command: string[], output: ProcessOutput): TerminalTransition {
        const exitCode = output.exitCode ?? undefined;
        try {
            const result = this.parse(output.stdout);
            if (output.exitCode !== 0) {
                logger.warn('scheduler: tool exited non-zero but produced a report', { id, exitCode: output.exitCode });
            }
            return { status: 'completed', result, exitCode };
        } catch (error) {
            if (!(error instanceof ParseError)) {
                throw error;
            }
            if (output.exitCode !== 0) {
                const diagnostic = output.stderr.trim() || output.stdout.trim();
                const how = output.signal ? `was killed by ${output.signal}` : `exited with code ${output.exitCode}`;
                const message = `${command[0]} ${how}${diagnostic ? `: ${diagnostic}` : ''}`;
                logger.warn('scheduler: tool failed', { id, exitCode: output.exitCode, signal: output.signal });
                return { status: 'failed', error: message, exitCode };
            }
            logger.warn('scheduler: unparseable tool output', { id, fragment: error.fragment });
            return { status: 'failed', error: error.message, exitCode };
        }
    }

    private async readSettlement(id: string): Promise<Settlement> {
        try {
            return { ok: true, task: await this.store.get(id) };
        } catch (error) {
            return { ok: false, error };
        }
    }
}

function logFailure(id: string, error: unknown) {
    if (error instanceof SpawnError) {
        logger.error('scheduler: scan tool could not be started, check nmapPath', { id, error: error.message, errno: error.errno });
    } else if (error instanceof TimedOutError) {
        logger.warn('scheduler: task hit its hard timeout', { id, timeoutMs: error.timeoutMs });
    } else if (error instanceof ProcessAbortedError) {
        logger.warn('scheduler: task aborted', { id, reason: error.message });
    } else {
        logger.error('scheduler: task execution failed', { id, error: formatError(error) });
    }
}

/** Resolves with the settlement if it arrives within `ms`, otherwise with undefined. */
function settleWithin(done: Promise<Settlement>, ms: number): Promise<Settlement | undefined> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => resolve(undefined), Math.max(0, ms));
        void done.then((settlement) => {
            clearTimeout(timer);
            resolve(settlement);
        });
    });
}
