import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import { config as appConfig } from '@/config/app';
import { createLogger } from './logger';
import { AsyncLock, KeyedLock } from './async-lock';
import { WorkerNotFoundError, WorkerOperationFailedError, getErrorMessage } from './errors';
import { withTimeout } from './timing';
import type { BaseWorker } from './workers/base-worker';
import { EnvironmentWorker } from './workers/environment-worker';
import { RewardWorker } from './workers/reward-worker';
import type {
    CoordinatorOverview,
    WorkerConfig,
    WorkerKind,
    WorkerOverview,
    WorkerStatus,
} from '@/types';

const logger = createLogger('coordinator');

export interface WorkerByKind {
    environment: EnvironmentWorker;
    reward: RewardWorker;
}

export interface WorkerHandle {
    readonly id: string;
    readonly kind: WorkerKind;
    start(): Promise<WorkerOverview>;
    stop(): Promise<WorkerOverview>;
    restart(): Promise<WorkerOverview>;
    updateConfig(patch: WorkerConfig): Promise<WorkerOverview>;
    status(): WorkerOverview;
}

export interface CoordinatorOptions {
    healthCheckIntervalMs?: number;
    probeTimeoutMs?: number;
    maxConsecutiveFailures?: number;
}

interface WorkerEntry {
    worker: BaseWorker;
    status: WorkerStatus;
    lastHealthCheckAt: string | null;
    lastHealth: Record<string, unknown>;
    consecutiveFailures: number;
    lastError: string | null;
}

const SERVING_STATUSES: readonly WorkerStatus[] = ['running', 'degraded'];

function isWorkerOfKind<K extends WorkerKind>(worker: BaseWorker, kind: K): worker is WorkerByKind[K] {
    return kind === 'environment' ? worker instanceof EnvironmentWorker : worker instanceof RewardWorker;
}

function describeFailure(error: unknown): string {
    if (error instanceof ZodError) {
        return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join(', ');
    }
    return getErrorMessage(error);
}

/**
 * Registry and control plane for workers.
 *
 * Registry membership changes under one lock; start, stop, restart and config
 * updates take a per-worker lock, so a slow start never blocks status reads or
 * control of other workers. Health probes only ever mark a worker degraded or
 * healthy again; they never restart or remove anything.
 */
export class Coordinator {
    readonly id = randomUUID();

    private readonly entries = new Map<string, WorkerEntry>();
    private readonly registryLock = new AsyncLock();
    private readonly controlLocks = new KeyedLock();
    private readonly healthCheckIntervalMs: number;
    private readonly probeTimeoutMs: number;
    private readonly maxConsecutiveFailures: number;
    private healthTimer: NodeJS.Timeout | null = null;
    private running = false;

    constructor(options: CoordinatorOptions = {}) {
        this.healthCheckIntervalMs = options.healthCheckIntervalMs ?? appConfig.coordinator.healthCheckIntervalMs;
        this.probeTimeoutMs = options.probeTimeoutMs ?? appConfig.coordinator.probeTimeoutMs;
        this.maxConsecutiveFailures = Math.max(1, options.maxConsecutiveFailures ?? appConfig.coordinator.maxConsecutiveFailures);
    }

    async register(worker: BaseWorker): Promise<string> {
        return this.registryLock.runExclusive(() => {
            if (this.entries.has(worker.id)) {
                throw new WorkerOperationFailedError(worker.id, 'register', 'a worker with this id is already registered');
            }
            this.entries.set(worker.id, {
                worker,
                status: 'stopped',
                lastHealthCheckAt: null,
                lastHealth: {},
                consecutiveFailures: 0,
                lastError: null,
            });
            logger.info(`Registered ${worker.kind} worker ${worker.id}`);
            return worker.id;
        });
    }

    /** Drops the worker from the registry and disposes it. */
    async unregister(workerId: string): Promise<void> {
        const entry = await this.registryLock.runExclusive(() => {
            const found = this.entry(workerId);
            this.entries.delete(workerId);
            return found;
        });

        await this.controlLocks.runExclusive(workerId, async () => {
            try {
                await entry.worker.dispose();
            } catch (error) {
                logger.error(`Failed to dispose worker ${workerId}`, error);
                throw new WorkerOperationFailedError(workerId, 'unregister', describeFailure(error));
            }
        });
        logger.info(`Unregistered worker ${workerId}`);
    }

    worker(workerId: string): WorkerHandle {
        const { worker } = this.entry(workerId);
        return {
            id: worker.id,
            kind: worker.kind,
            start: () => this.startWorker(workerId),
            stop: () => this.stopWorker(workerId),
            restart: () => this.restartWorker(workerId),
            updateConfig: (patch) => this.updateWorkerConfig(workerId, patch),
            status: () => this.workerStatus(workerId),
        };
    }

    /** First serving worker of the kind, in registration order. */
    resolve<K extends WorkerKind>(kind: K): WorkerByKind[K] {
        for (const entry of this.entries.values()) {
            if (SERVING_STATUSES.includes(entry.status) && isWorkerOfKind(entry.worker, kind)) {
                return entry.worker;
            }
        }
        throw new WorkerNotFoundError(`no running ${kind} worker`);
    }

    async startWorker(workerId: string): Promise<WorkerOverview> {
        return this.controlLocks.runExclusive(workerId, async () => {
            await this.doStart(workerId);
            return this.workerStatus(workerId);
        });
    }

    async stopWorker(workerId: string): Promise<WorkerOverview> {
        return this.controlLocks.runExclusive(workerId, async () => {
            await this.doStop(workerId);
            return this.workerStatus(workerId);
        });
    }

    async restartWorker(workerId: string): Promise<WorkerOverview> {
        return this.controlLocks.runExclusive(workerId, async () => {
            await this.doStop(workerId);
            await this.doStart(workerId);
            return this.workerStatus(workerId);
        });
    }

    async updateWorkerConfig(workerId: string, patch: WorkerConfig): Promise<WorkerOverview> {
        return this.controlLocks.runExclusive(workerId, async () => {
            const entry = this.entry(workerId);
            try {
                await entry.worker.updateConfig(patch);
            } catch (error) {
                throw new WorkerOperationFailedError(workerId, 'update config', describeFailure(error));
            }
            logger.info(`Updated config of worker ${workerId}`, { keys: Object.keys(patch) });
            return this.workerStatus(workerId);
        });
    }

    workerStatus(workerId: string): WorkerOverview {
        return this.overview(this.entry(workerId));
    }

    status(): CoordinatorOverview {
        const workers = Array.from(this.entries.values()).map((entry) => this.overview(entry));
        return {
            id: this.id,
            running: this.running,
            workerCount: workers.length,
            workers,
        };
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.scheduleHealthCheck();
        logger.info(`Coordinator ${this.id} started`);
    }

    /** Probes every serving worker once, bounded by the probe timeout. */
    async runHealthChecks(): Promise<void> {
        const targets = Array.from(this.entries.values()).filter((entry) => SERVING_STATUSES.includes(entry.status));
        await Promise.all(targets.map((entry) => this.checkWorker(entry)));
    }

    async shutdown(): Promise<void> {
        this.running = false;
        if (this.healthTimer) {
            clearTimeout(this.healthTimer);
            this.healthTimer = null;
        }

        const entries = await this.registryLock.runExclusive(() => {
            const all = Array.from(this.entries.values());
            this.entries.clear();
            return all;
        });

        await Promise.all(entries.map(({ worker }) =>
            this.controlLocks.runExclusive(worker.id, async () => {
                try {
                    await worker.dispose();
                } catch (error) {
                    logger.error(`Failed to dispose worker ${worker.id} during shutdown`, error);
                }
            })
        ));
        logger.info(`Coordinator ${this.id} shut down (${entries.length} worker(s) disposed)`);
    }

    private async doStart(workerId: string): Promise<void> {
        const entry = this.entry(workerId);
        if (SERVING_STATUSES.includes(entry.status)) return;

        entry.status = 'starting';
        try {
            await entry.worker.start();
        } catch (error) {
            entry.status = 'stopped-error';
            entry.lastError = describeFailure(error);
            logger.error(`Failed to start worker ${workerId}`, error);
            throw new WorkerOperationFailedError(workerId, 'start', entry.lastError);
        }
        entry.status = 'running';
        entry.consecutiveFailures = 0;
        entry.lastError = null;
        logger.info(`Started ${entry.worker.kind} worker ${workerId}`);
    }

    private async doStop(workerId: string): Promise<void> {
        const entry = this.entry(workerId);
        try {
            await entry.worker.stop();
        } catch (error) {
            entry.status = 'stopped-error';
            entry.lastError = describeFailure(error);
            logger.error(`Failed to stop worker ${workerId}`, error);
            throw new WorkerOperationFailedError(workerId, 'stop', entry.lastError);
        }
        entry.status = 'stopped';
        logger.info(`Stopped worker ${workerId}`);
    }

    private async checkWorker(entry: WorkerEntry): Promise<void> {
        const { worker } = entry;
        let healthy: boolean;
        let failure: string | null = null;
        try {
            const health = await withTimeout(worker.probe(), this.probeTimeoutMs, `health probe of ${worker.id}`);
            healthy = health.healthy;
            entry.lastHealth = health.details;
            if (!healthy) failure = 'probe reported unhealthy';
        } catch (error) {
            healthy = false;
            failure = getErrorMessage(error);
        }

        entry.lastHealthCheckAt = new Date().toISOString();
        // A control op may have stopped or removed the worker while the probe ran.
        if (this.entries.get(worker.id) !== entry || !SERVING_STATUSES.includes(entry.status)) return;

        if (healthy) {
            entry.consecutiveFailures = 0;
            if (entry.status === 'degraded') {
                entry.status = 'running';
                entry.lastError = null;
                logger.info(`Worker ${worker.id} recovered`);
            }
            return;
        }

        entry.consecutiveFailures += 1;
        entry.lastError = failure;
        if (entry.status === 'running' && entry.consecutiveFailures >= this.maxConsecutiveFailures) {
            entry.status = 'degraded';
            logger.warn(`Worker ${worker.id} degraded after ${entry.consecutiveFailures} failed health checks`, { lastError: failure });
        }
    }

    private scheduleHealthCheck(): void {
        if (this.healthTimer) clearTimeout(this.healthTimer);
        this.healthTimer = setTimeout(() => {
            void this.runHealthChecks()
                .catch((error) => {
                    logger.error('Health check round failed', error);
                })
                .finally(() => {
                    if (this.running) this.scheduleHealthCheck();
                });
        }, this.healthCheckIntervalMs);
        this.healthTimer.unref();
    }

    private entry(workerId: string): WorkerEntry {
        const entry = this.entries.get(workerId);
        if (!entry) {
            throw new WorkerNotFoundError(workerId);
        }
        return entry;
    }

    private overview(entry: WorkerEntry): WorkerOverview {
        const { worker } = entry;
        return {
            id: worker.id,
            kind: worker.kind,
            status: entry.status,
            config: worker.getConfig(),
            lastHealthCheckAt: entry.lastHealthCheckAt,
            consecutiveFailures: entry.consecutiveFailures,
            lastError: entry.lastError,
            details: { ...worker.describe(), health: entry.lastHealth },
        };
    }
}
