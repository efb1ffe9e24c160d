export type WorkerKind = 'environment' | 'reward';

export type WorkerStatus = 'stopped' | 'starting' | 'running' | 'degraded' | 'stopped-error';

export type WorkerConfig = Record<string, unknown>;

export interface WorkerHealth {
    healthy: boolean;
    details: Record<string, unknown>;
}

export interface WorkerOverview {
    id: string;
    kind: WorkerKind;
    status: WorkerStatus;
    config: WorkerConfig;
    lastHealthCheckAt: string | null;
    consecutiveFailures: number;
    lastError: string | null;
    details: Record<string, unknown>;
}

export interface CoordinatorOverview {
    id: string;
    running: boolean;
    workerCount: number;
    workers: WorkerOverview[];
}
