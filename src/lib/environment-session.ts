import { createLogger } from './logger';
import { formatAction } from './action-normalizer';
import {
    ActionExecutionError,
    DeviceUnavailableError,
    SnapshotMismatchError,
    SnapshotNotFoundError,
    UnknownTrajectoryError,
    getErrorMessage,
} from './errors';
import type { SnapshotStore } from './snapshot-store';
import {
    DeviceControlError,
    type DeviceController,
    type NormalizedAction,
    type Observation,
    type TrajectoryState,
    type TrajectorySummary,
} from '@/types';

const logger = createLogger('environment-session');

export interface EnvironmentSessionOptions {
    trajectoryId: string;
    deviceBinding: string;
    controller: DeviceController;
    snapshots: SnapshotStore;
    commandTimeoutMs: () => number;
}

/**
 * One trajectory bound to exactly one device. Callers serialize access; the session
 * itself holds no lock.
 */
export class EnvironmentSession {
    readonly trajectoryId: string;
    readonly deviceBinding: string;
    readonly createdAt = Date.now();

    private state: TrajectoryState = 'created';
    private snapshotRef: string | null = null;
    private lastObservation: Observation | null = null;
    private lastActiveAt = this.createdAt;
    private snapshotSequence = 0;
    private readonly savedRefs: string[] = [];

    private readonly controller: DeviceController;
    private readonly snapshots: SnapshotStore;
    private readonly commandTimeoutMs: () => number;

    constructor(options: EnvironmentSessionOptions) {
        this.trajectoryId = options.trajectoryId;
        this.deviceBinding = options.deviceBinding;
        this.controller = options.controller;
        this.snapshots = options.snapshots;
        this.commandTimeoutMs = options.commandTimeoutMs;
    }

    getState(): TrajectoryState {
        return this.state;
    }

    getLastObservation(): Observation | null {
        return this.lastObservation;
    }

    getLastActiveAt(): number {
        return this.lastActiveAt;
    }

    /** Every ref this session has written metadata for, oldest first. */
    savedSnapshots(): readonly string[] {
        return [...this.savedRefs];
    }

    summary(): TrajectorySummary {
        return {
            trajectoryId: this.trajectoryId,
            deviceBinding: this.deviceBinding,
            state: this.state,
            snapshotRef: this.snapshotRef,
            createdAt: this.createdAt,
            lastActiveAt: this.lastActiveAt,
        };
    }

    async step(action: NormalizedAction): Promise<Observation> {
        this.assertLive();
        this.touch();
        logger.debug(`Executing "${formatAction(action)}"`, { trajectoryId: this.trajectoryId, deviceBinding: this.deviceBinding });

        let observation: Observation;
        try {
            observation = await this.controller.execute(this.deviceBinding, action, { timeoutMs: this.commandTimeoutMs() });
        } catch (error) {
            throw this.mapExecutionError(error, action);
        }

        this.state = 'running';
        this.lastObservation = observation;
        return observation;
    }

    async save(): Promise<string> {
        this.assertLive();
        this.touch();

        this.snapshotSequence += 1;
        const snapshotRef = `${this.trajectoryId}-${this.snapshotSequence}`;

        let deviceRef: string;
        try {
            deviceRef = await this.controller.snapshotSave(this.deviceBinding, snapshotRef);
        } catch (error) {
            throw this.mapDeviceError(error, `snapshot save failed: ${getErrorMessage(error)}`);
        }

        await this.snapshots.write({
            snapshotRef,
            trajectoryId: this.trajectoryId,
            deviceBinding: this.deviceBinding,
            deviceRef,
            createdAt: new Date().toISOString(),
        });
        this.savedRefs.push(snapshotRef);

        this.snapshotRef = snapshotRef;
        this.state = 'saved';
        logger.info(`Saved trajectory ${this.trajectoryId} as ${snapshotRef}`);
        return snapshotRef;
    }

    /** Restores the given snapshot, or the one taken by the latest `save` when none is named. */
    async load(requestedRef?: string): Promise<Observation> {
        this.assertLive();
        this.touch();

        const snapshotRef = requestedRef ?? this.snapshotRef;
        if (!snapshotRef) {
            throw new SnapshotNotFoundError('latest', this.trajectoryId);
        }

        const metadata = await this.snapshots.read(snapshotRef);
        if (!metadata) {
            throw new SnapshotNotFoundError(snapshotRef, this.trajectoryId);
        }
        if (metadata.deviceBinding !== this.deviceBinding) {
            throw new SnapshotMismatchError(snapshotRef, this.deviceBinding, metadata.deviceBinding, this.trajectoryId);
        }

        let observation: Observation;
        try {
            await this.controller.snapshotRestore(this.deviceBinding, metadata.deviceRef);
            observation = await this.controller.observe(this.deviceBinding, { timeoutMs: this.commandTimeoutMs() });
        } catch (error) {
            throw this.mapDeviceError(error, `snapshot restore failed: ${getErrorMessage(error)}`);
        }

        this.snapshotRef = snapshotRef;
        this.state = 'running';
        this.lastObservation = observation;
        logger.info(`Loaded ${snapshotRef} into trajectory ${this.trajectoryId}`);
        return observation;
    }

    /** Marks the session removed first, so a failing device reset still retires it. */
    async close(): Promise<void> {
        if (this.state === 'removed') return;
        this.state = 'removed';
        this.lastObservation = null;
        await this.controller.reset(this.deviceBinding);
    }

    private assertLive(): void {
        if (this.state === 'removed') {
            throw new UnknownTrajectoryError(this.trajectoryId);
        }
    }

    private touch(): void {
        this.lastActiveAt = Date.now();
    }

    private mapExecutionError(error: unknown, action: NormalizedAction): Error {
        if (error instanceof DeviceControlError && error.kind === 'unreachable') {
            return new DeviceUnavailableError(this.deviceBinding, error.message, this.trajectoryId);
        }
        return new ActionExecutionError(getErrorMessage(error), action, this.trajectoryId, this.deviceBinding);
    }

    private mapDeviceError(error: unknown, reason: string): Error {
        if (error instanceof DeviceControlError && error.kind === 'unreachable') {
            return new DeviceUnavailableError(this.deviceBinding, error.message, this.trajectoryId);
        }
        return new DeviceUnavailableError(this.deviceBinding, reason, this.trajectoryId);
    }
}
