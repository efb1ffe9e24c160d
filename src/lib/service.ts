import { config } from '@/config/app';
import { createLogger } from './logger';
import { AdbDeviceController } from './adb-device-controller';
import { isAndroidToolAvailable, resolveAndroidToolPath } from './android-sdk';
import { Coordinator, type CoordinatorOptions } from './coordinator';
import { StaticDevicePool, emulatorSerials } from './device-pool';
import { SimulatedDeviceController } from './simulated-device-controller';
import { SnapshotStore } from './snapshot-store';
import { EnvironmentWorker } from './workers/environment-worker';
import { RewardWorker } from './workers/reward-worker';
import type { DeviceController, WorkerConfig } from '@/types';

const logger = createLogger('service');

export type DeviceDriver = 'adb' | 'simulated';

export interface ServiceOptions {
    driver: DeviceDriver;
    devices?: readonly string[];
    snapshotDir?: string;
    environmentConfig?: WorkerConfig;
    rewardConfig?: WorkerConfig;
    reapIntervalMs?: number;
    coordinator?: CoordinatorOptions;
    /** Supplied by tests that want to reach into the device model. */
    controller?: DeviceController;
}

export interface Service {
    coordinator: Coordinator;
    environmentWorkerId: string;
    rewardWorkerId: string;
    start(): Promise<void>;
    shutdown(): Promise<void>;
}

function defaultDevices(): string[] {
    if (config.environment.devices.length > 0) {
        return [...config.environment.devices];
    }
    return emulatorSerials({ basePort: config.environment.basePort, count: config.environment.deviceCount });
}

function createController(driver: DeviceDriver): DeviceController {
    if (driver === 'simulated') {
        return new SimulatedDeviceController();
    }
    return new AdbDeviceController({ adbPath: resolveAndroidToolPath('adb') });
}

/**
 * Builds the object graph: one coordinator owning one environment worker and one
 * reward worker. Nothing is started until {@link Service.start}.
 */
export async function createService(options: ServiceOptions): Promise<Service> {
    const controller = options.controller ?? createController(options.driver);
    const pool = new StaticDevicePool(options.devices ?? defaultDevices());
    const snapshots = new SnapshotStore(options.snapshotDir ?? config.environment.snapshotDir);

    const environment = new EnvironmentWorker({
        controller,
        pool,
        snapshots,
        config: options.environmentConfig,
        reapIntervalMs: options.reapIntervalMs,
        healthCheck: options.driver === 'adb' ? async () => isAndroidToolAvailable('adb') : undefined,
    });
    const reward = new RewardWorker({ config: options.rewardConfig });

    const coordinator = new Coordinator(options.coordinator);
    const environmentWorkerId = await coordinator.register(environment);
    const rewardWorkerId = await coordinator.register(reward);

    return {
        coordinator,
        environmentWorkerId,
        rewardWorkerId,
        async start() {
            await coordinator.startWorker(environmentWorkerId);
            await coordinator.startWorker(rewardWorkerId);
            coordinator.start();
            logger.info(`Service started with ${pool.devices().length} device(s) on the ${options.driver} driver`);
        },
        async shutdown() {
            await coordinator.shutdown();
        },
    };
}
