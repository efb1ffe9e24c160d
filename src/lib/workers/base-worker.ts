import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import type { WorkerConfig, WorkerHealth, WorkerKind } from '@/types';

export interface BaseWorkerOptions<TConfig extends WorkerConfig> {
    id?: string;
    kind: WorkerKind;
    schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
    config?: WorkerConfig;
}

/**
 * Lifecycle shared by every worker. Status bookkeeping lives in the coordinator; a
 * worker only knows whether its own background work is running.
 */
export abstract class BaseWorker<TConfig extends WorkerConfig = WorkerConfig> {
    readonly id: string;
    readonly kind: WorkerKind;

    protected config: TConfig;
    private readonly schema: z.ZodType<TConfig, z.ZodTypeDef, unknown>;
    private started = false;

    protected constructor(options: BaseWorkerOptions<TConfig>) {
        this.id = options.id ?? randomUUID();
        this.kind = options.kind;
        this.schema = options.schema;
        this.config = options.schema.parse(options.config ?? {});
    }

    async start(): Promise<void> {
        if (this.started) return;
        await this.onStart();
        this.started = true;
    }

    async stop(): Promise<void> {
        if (!this.started) return;
        this.started = false;
        await this.onStop();
    }

    isStarted(): boolean {
        return this.started;
    }

    getConfig(): TConfig {
        return { ...this.config };
    }

    /** Merges the patch over the current config; unknown keys are kept as given. */
    async updateConfig(patch: WorkerConfig): Promise<TConfig> {
        const next = this.schema.parse({ ...this.config, ...patch });
        const previous = this.config;
        this.config = next;
        await this.onConfigChanged(previous, next);
        return this.getConfig();
    }

    abstract probe(): Promise<WorkerHealth>;

    /** Worker-specific fields surfaced in status responses. */
    describe(): Record<string, unknown> {
        return {};
    }

    /** Releases everything the worker holds. Called once, at unregister or shutdown. */
    async dispose(): Promise<void> {
        await this.stop();
    }

    protected async onStart(): Promise<void> {}

    protected async onStop(): Promise<void> {}

    protected async onConfigChanged(_previous: TConfig, _next: TConfig): Promise<void> {}
}
