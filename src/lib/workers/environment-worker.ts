import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { config as appConfig } from '@/config/app';
import { createLogger } from '../logger';
import { AsyncLock, KeyedLock } from '../async-lock';
import { normalizeAction } from '../action-normalizer';
import { EnvironmentSession } from '../environment-session';
import { PoolExhaustedError, UnknownTrajectoryError, getErrorMessage } from '../errors';
import type { SnapshotStore } from '../snapshot-store';
import { BaseWorker } from './base-worker';
import type {
    CreatedTrajectory,
    DeviceController,
    DevicePool,
    Observation,
    RemoveResult,
    StepResult,
    TrajectorySummary,
    WorkerConfig,
    WorkerHealth,
} from '@/types';

const logger = createLogger('environment-worker');

export const environmentWorkerConfigSchema = z.object({
    capacity: z.number().int().positive().default(appConfig.environment.capacity),
    commandTimeoutMs: z.number().int().positive().default(appConfig.environment.commandTimeoutMs),
    // 0 disables the idle reaper.
    maxIdleMs: z.number().int().nonnegative().default(appConfig.environment.maxIdleMs),
    parsePolicy: z.enum(['structured-first', 'dsl-first']).default('structured-first'),
}).passthrough();

export type EnvironmentWorkerConfig = z.infer<typeof environmentWorkerConfigSchema>;

export interface EnvironmentWorkerOptions {
    id?: string;
    config?: WorkerConfig;
    controller: DeviceController;
    pool: DevicePool;
    snapshots: SnapshotStore;
    reapIntervalMs?: number;
    /** Extra readiness check folded into {@link EnvironmentWorker.probe}, e.g. adb on PATH. */
    healthCheck?: () => Promise<boolean>;
}

export interface TrajectoryDetails extends TrajectorySummary {
    lastObservation: Observation | null;
}

/**
 * Owns the live trajectories of one device pool.
 *
 * Two tables are kept: trajectory id to session, and device binding to trajectory id.
 * The binding table only changes under {@link allocationLock}, which is never held
 * across a device call; everything touching a device runs under that trajectory's
 * own lock instead.
 */
export class EnvironmentWorker extends BaseWorker<EnvironmentWorkerConfig> {
    private readonly sessions = new Map<string, EnvironmentSession>();
    private readonly bindings = new Map<string, string>();
    private readonly allocationLock = new AsyncLock();
    private readonly trajectoryLocks = new KeyedLock();

    private readonly controller: DeviceController;
    private readonly pool: DevicePool;
    private readonly snapshots: SnapshotStore;
    private readonly reapIntervalMs: number;
    private readonly healthCheck?: () => Promise<boolean>;
    private reapTimer: NodeJS.Timeout | null = null;

    constructor(options: EnvironmentWorkerOptions) {
        super({
            id: options.id,
            kind: 'environment',
            schema: environmentWorkerConfigSchema,
            config: options.config,
        });
        this.controller = options.controller;
        this.pool = options.pool;
        this.snapshots = options.snapshots;
        this.reapIntervalMs = options.reapIntervalMs ?? appConfig.environment.reapIntervalMs;
        this.healthCheck = options.healthCheck;
    }

    async create(): Promise<CreatedTrajectory> {
        return this.allocationLock.runExclusive(() => {
            const { capacity } = this.config;
            const candidates = this.pool.devices().slice(0, capacity);
            const deviceBinding = this.sessions.size < capacity
                ? candidates.find((device) => !this.bindings.has(device))
                : undefined;

            if (!deviceBinding) {
                throw new PoolExhaustedError(Math.min(capacity, candidates.length));
            }

            const trajectoryId = randomUUID();
            const session = new EnvironmentSession({
                trajectoryId,
                deviceBinding,
                controller: this.controller,
                snapshots: this.snapshots,
                commandTimeoutMs: () => this.config.commandTimeoutMs,
            });
            this.bindings.set(deviceBinding, trajectoryId);
            this.sessions.set(trajectoryId, session);

            logger.info(`Created trajectory ${trajectoryId} on ${deviceBinding}`);
            return { trajectoryId, deviceBinding };
        });
    }

    async step(trajectoryId: string, rawAction: unknown): Promise<StepResult> {
        const session = this.lookup(trajectoryId);
        const action = normalizeAction(rawAction, this.config.parsePolicy);
        const observation = await this.exclusive(session, () => session.step(action));
        return { trajectoryId, observation };
    }

    async save(trajectoryId: string): Promise<string> {
        const session = this.lookup(trajectoryId);
        return this.exclusive(session, () => session.save());
    }

    async load(trajectoryId: string, snapshotRef?: string): Promise<Observation> {
        const session = this.lookup(trajectoryId);
        return this.exclusive(session, () => session.load(snapshotRef));
    }

    /**
     * Tears the session down, drops its snapshot metadata, then gives the device back.
     * Every phase always runs and the id stops routing as soon as this is called;
     * per-phase failures are reported in the result instead of thrown.
     */
    async remove(trajectoryId: string): Promise<RemoveResult> {
        const session = this.lookup(trajectoryId);
        this.sessions.delete(trajectoryId);
        const { deviceBinding } = session;

        let teardownError: string | null = null;
        try {
            await this.trajectoryLocks.runExclusive(trajectoryId, () => session.close());
        } catch (error) {
            teardownError = getErrorMessage(error);
            logger.warn(`Teardown of trajectory ${trajectoryId} failed`, error);
        }

        let snapshotError: string | null = null;
        const results = await Promise.allSettled(session.savedSnapshots().map((ref) => this.snapshots.remove(ref)));
        const failures = results.flatMap((result) => result.status === 'rejected' ? [getErrorMessage(result.reason)] : []);
        if (failures.length > 0) {
            snapshotError = failures.join('; ');
            logger.warn(`Dropping snapshots of trajectory ${trajectoryId} failed`, { failures });
        }

        let releaseError: string | null = null;
        try {
            await this.pool.recycle?.(deviceBinding);
        } catch (error) {
            releaseError = getErrorMessage(error);
            logger.warn(`Recycling ${deviceBinding} failed`, error);
        } finally {
            await this.allocationLock.runExclusive(() => {
                if (this.bindings.get(deviceBinding) === trajectoryId) {
                    this.bindings.delete(deviceBinding);
                }
            });
        }

        logger.info(`Removed trajectory ${trajectoryId}, released ${deviceBinding}`);
        return { trajectoryId, deviceBinding, teardownError, snapshotError, releaseError };
    }

    list(): TrajectorySummary[] {
        return Array.from(this.sessions.values())
            .map((session) => session.summary())
            .sort((a, b) => a.createdAt - b.createdAt);
    }

    describeTrajectory(trajectoryId: string): TrajectoryDetails {
        const session = this.lookup(trajectoryId);
        return { ...session.summary(), lastObservation: session.getLastObservation() };
    }

    /** Removes every trajectory idle for longer than `maxIdleMs`, skipping busy ones. */
    async reapIdle(now = Date.now()): Promise<string[]> {
        const { maxIdleMs } = this.config;
        if (maxIdleMs <= 0) return [];

        const stale = Array.from(this.sessions.values()).filter((session) =>
            now - session.getLastActiveAt() > maxIdleMs && !this.trajectoryLocks.isLocked(session.trajectoryId)
        );

        const reaped: string[] = [];
        for (const session of stale) {
            if (this.sessions.get(session.trajectoryId) !== session) continue;
            logger.info(`Reaping idle trajectory ${session.trajectoryId}`);
            await this.remove(session.trajectoryId);
            reaped.push(session.trajectoryId);
        }
        return reaped;
    }

    /**
     * Checks every device not bound to a trajectory; bound devices report through
     * their own steps. Healthy while at least one checked device answers.
     */
    async probe(): Promise<WorkerHealth> {
        const devices = this.pool.devices();
        const ready = this.healthCheck ? await this.healthCheck() : true;
        const free = devices.filter((device) => !this.bindings.has(device));
        const timeoutMs = appConfig.environment.adb.healthCheckTimeoutMs;

        const answers = await Promise.all(free.map((device) =>
            this.controller.checkDevice(device, { timeoutMs }).catch((error) => {
                logger.debug(`Health check of ${device} failed`, error);
                return false;
            })
        ));
        const unhealthyDevices = free.filter((_, index) => !answers[index]);

        return {
            healthy: ready && devices.length > 0 && (free.length === 0 || unhealthyDevices.length < free.length),
            details: {
                liveTrajectories: this.sessions.size,
                capacity: this.config.capacity,
                devices: devices.length,
                unhealthyDevices,
            },
        };
    }

    describe(): Record<string, unknown> {
        const bound = this.bindings.size;
        return {
            liveTrajectories: this.sessions.size,
            boundDevices: bound,
            freeDevices: Math.max(0, Math.min(this.config.capacity, this.pool.devices().length) - bound),
        };
    }

    async dispose(): Promise<void> {
        await super.dispose();
        const ids = Array.from(this.sessions.keys());
        const results = await Promise.all(ids.map((id) => this.remove(id)));
        const failed = results.filter((result) => result.teardownError || result.snapshotError || result.releaseError);
        if (failed.length > 0) {
            logger.warn(`${failed.length} of ${ids.length} trajectories did not tear down cleanly`);
        }
    }

    protected async onStart(): Promise<void> {
        this.syncReaper();
    }

    protected async onStop(): Promise<void> {
        this.clearReaper();
    }

    protected async onConfigChanged(previous: EnvironmentWorkerConfig, next: EnvironmentWorkerConfig): Promise<void> {
        if (this.isStarted() && previous.maxIdleMs !== next.maxIdleMs) {
            this.syncReaper();
        }
    }

    /** The sweep timer only runs while reaping is enabled. */
    private syncReaper(): void {
        if (this.config.maxIdleMs <= 0) {
            this.clearReaper();
        } else if (!this.reapTimer) {
            this.scheduleReap();
        }
    }

    private clearReaper(): void {
        if (this.reapTimer) {
            clearTimeout(this.reapTimer);
            this.reapTimer = null;
        }
    }

    private scheduleReap(): void {
        if (this.reapTimer) clearTimeout(this.reapTimer);
        this.reapTimer = setTimeout(() => {
            this.reapTimer = null;
            void this.reapIdle()
                .catch((error) => {
                    logger.error('Idle trajectory sweep failed', error);
                })
                .finally(() => {
                    if (this.isStarted() && this.config.maxIdleMs > 0 && !this.reapTimer) this.scheduleReap();
                });
        }, this.reapIntervalMs);
        this.reapTimer.unref();
    }

    private lookup(trajectoryId: string): EnvironmentSession {
        const session = this.sessions.get(trajectoryId);
        if (!session) {
            throw new UnknownTrajectoryError(trajectoryId);
        }
        return session;
    }

    /**
     * Queues behind the trajectory's other operations. A session removed while the
     * call waited rejects it with UnknownTrajectory.
     */
    private exclusive<T>(session: EnvironmentSession, fn: () => Promise<T>): Promise<T> {
        return this.trajectoryLocks.runExclusive(session.trajectoryId, fn);
    }
}
