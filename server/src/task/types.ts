export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed';

export type TerminalStatus = Extract<TaskStatus, 'completed' | 'failed'>;

export type ScanProfile = 'quick' | 'full' | 'custom';

export interface PortRecord {
    port: number;
    protocol: string;
    state: string;
    service?: string;
    version?: string;
}

export interface HostRecord {
    address: string;
    status: string;
    hostname?: string;
    ports: PortRecord[];
}

/** Normalized scan report, identical in shape for every scan profile. */
export interface ScanResult {
    target: string;
    scan_time: string;
    hosts: HostRecord[];
}

export interface TaskMetadata {
    profile?: ScanProfile;
    target?: string;
}

export interface TaskRecord extends TaskMetadata {
    id: string;
    command: string[];
    status: TaskStatus;
    createdAt: number;
    startedAt?: number;
    finishedAt?: number;
    durationMs?: number;
    exitCode?: number;
    result?: ScanResult;
    error?: string;
}

export type TaskTransition =
    | { status: 'running' }
    | { status: 'completed'; result: ScanResult; exitCode?: number }
    | { status: 'failed'; error: string; exitCode?: number };

export type TerminalTransition = Exclude<TaskTransition, { status: 'running' }>;

export interface ReconcileSummary {
    /** Ids of tasks that were pending or running when the store was last closed. */
    interrupted: string[];
}
