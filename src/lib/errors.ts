import type { NormalizedAction } from '@/types';

export type ErrorCode =
    | 'PARSE_ERROR'
    | 'UNKNOWN_TRAJECTORY'
    | 'POOL_EXHAUSTED'
    | 'DEVICE_UNAVAILABLE'
    | 'ACTION_EXECUTION_ERROR'
    | 'SNAPSHOT_MISMATCH'
    | 'SNAPSHOT_NOT_FOUND'
    | 'UNKNOWN_REWARD_TYPE'
    | 'WORKER_NOT_FOUND'
    | 'WORKER_OPERATION_FAILED';

export type ErrorDetails = Record<string, unknown>;

export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly httpStatus: number,
        public readonly details: ErrorDetails = {}
    ) {
        super(message);
        this.name = 'ServiceError';
        Object.setPrototypeOf(this, ServiceError.prototype);
    }

    toJSON(): { error: string; code: ErrorCode; details: ErrorDetails } {
        return { error: this.message, code: this.code, details: this.details };
    }
}

export class ParseError extends ServiceError {
    constructor(message: string, public readonly input: unknown) {
        super(message, 'PARSE_ERROR', 400, { input });
        this.name = 'ParseError';
        Object.setPrototypeOf(this, ParseError.prototype);
    }
}

export class UnknownTrajectoryError extends ServiceError {
    constructor(public readonly trajectoryId: string) {
        super(`Unknown trajectory: ${trajectoryId}`, 'UNKNOWN_TRAJECTORY', 404, { trajectoryId });
        this.name = 'UnknownTrajectoryError';
        Object.setPrototypeOf(this, UnknownTrajectoryError.prototype);
    }
}

export class PoolExhaustedError extends ServiceError {
    constructor(public readonly capacity: number) {
        super(`All ${capacity} device(s) are bound to live trajectories`, 'POOL_EXHAUSTED', 409, { capacity });
        this.name = 'PoolExhaustedError';
        Object.setPrototypeOf(this, PoolExhaustedError.prototype);
    }
}

export class DeviceUnavailableError extends ServiceError {
    constructor(
        public readonly deviceBinding: string,
        reason: string,
        trajectoryId?: string
    ) {
        super(`Device ${deviceBinding} is unavailable: ${reason}`, 'DEVICE_UNAVAILABLE', 503, { deviceBinding, trajectoryId });
        this.name = 'DeviceUnavailableError';
        Object.setPrototypeOf(this, DeviceUnavailableError.prototype);
    }
}

export class ActionExecutionError extends ServiceError {
    constructor(
        reason: string,
        public readonly action: NormalizedAction,
        trajectoryId: string,
        deviceBinding: string
    ) {
        super(`Action ${action.kind} failed: ${reason}`, 'ACTION_EXECUTION_ERROR', 502, { action, trajectoryId, deviceBinding });
        this.name = 'ActionExecutionError';
        Object.setPrototypeOf(this, ActionExecutionError.prototype);
    }
}

export class SnapshotMismatchError extends ServiceError {
    constructor(snapshotRef: string, expectedBinding: string, actualBinding: string, trajectoryId: string) {
        super(
            `Snapshot ${snapshotRef} was taken on ${actualBinding}, not on ${expectedBinding}`,
            'SNAPSHOT_MISMATCH',
            409,
            { snapshotRef, trajectoryId, expectedBinding, actualBinding }
        );
        this.name = 'SnapshotMismatchError';
        Object.setPrototypeOf(this, SnapshotMismatchError.prototype);
    }
}

export class SnapshotNotFoundError extends ServiceError {
    constructor(snapshotRef: string, trajectoryId: string) {
        super(`Snapshot not found: ${snapshotRef}`, 'SNAPSHOT_NOT_FOUND', 404, { snapshotRef, trajectoryId });
        this.name = 'SnapshotNotFoundError';
        Object.setPrototypeOf(this, SnapshotNotFoundError.prototype);
    }
}

export class UnknownRewardTypeError extends ServiceError {
    constructor(rewardType: string, supported: readonly string[]) {
        super(`Unknown reward type: ${rewardType}`, 'UNKNOWN_REWARD_TYPE', 400, { rewardType, supported });
        this.name = 'UnknownRewardTypeError';
        Object.setPrototypeOf(this, UnknownRewardTypeError.prototype);
    }
}

export class WorkerNotFoundError extends ServiceError {
    constructor(workerRef: string) {
        super(`Worker not found: ${workerRef}`, 'WORKER_NOT_FOUND', 404, { worker: workerRef });
        this.name = 'WorkerNotFoundError';
        Object.setPrototypeOf(this, WorkerNotFoundError.prototype);
    }
}

export class WorkerOperationFailedError extends ServiceError {
    constructor(workerId: string, operation: string, reason: string) {
        super(`Worker ${workerId} failed to ${operation}: ${reason}`, 'WORKER_OPERATION_FAILED', 500, { workerId, operation });
        this.name = 'WorkerOperationFailedError';
        Object.setPrototypeOf(this, WorkerOperationFailedError.prototype);
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    if (error && typeof error === 'object' && 'message' in error) {
        return String(error.message);
    }

    return String(error);
}
