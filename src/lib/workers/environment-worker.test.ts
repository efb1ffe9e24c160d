import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EnvironmentWorker } from './environment-worker';
import { StaticDevicePool } from '../device-pool';
import { ActionExecutionError, ParseError, PoolExhaustedError, SnapshotNotFoundError, UnknownTrajectoryError } from '../errors';
import { LAUNCHER_ACTIVITY, SETTINGS_ACTIVITY, SimulatedDeviceController } from '../simulated-device-controller';
import { SnapshotStore } from '../snapshot-store';
import { sleep } from '../timing';
import type { DevicePool } from '@/types';

const DEVICES = ['emulator-5554', 'emulator-5556', 'emulator-5558'];

class ReadOnlySnapshotStore extends SnapshotStore {
    async remove(snapshotRef: string): Promise<void> {
        throw new Error(`cannot delete ${snapshotRef}`);
    }
}

class FlakyRecyclePool implements DevicePool {
    recycled: string[] = [];

    devices(): readonly string[] {
        return DEVICES;
    }

    async recycle(deviceBinding: string): Promise<void> {
        this.recycled.push(deviceBinding);
        throw new Error(`cannot recycle ${deviceBinding}`);
    }
}

describe('EnvironmentWorker', () => {
    let directory: string;
    let controller: SimulatedDeviceController;

    function createWorker(options: { capacity?: number; pool?: DevicePool; snapshots?: SnapshotStore } = {}) {
        return new EnvironmentWorker({
            controller,
            pool: options.pool ?? new StaticDevicePool(DEVICES),
            snapshots: options.snapshots ?? new SnapshotStore(directory),
            config: { capacity: options.capacity ?? DEVICES.length, maxIdleMs: 60_000 },
        });
    }

    beforeEach(async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'env-worker-test-'));
        controller = new SimulatedDeviceController();
    });

    afterEach(async () => {
        await fs.rm(directory, { recursive: true, force: true });
    });

    it('runs a trajectory from create to remove and reuses the device', async () => {
        const worker = createWorker();

        const { trajectoryId, deviceBinding } = await worker.create();
        expect(deviceBinding).toBe('emulator-5554');

        const clicked = await worker.step(trajectoryId, 'click 100 200');
        expect(clicked.trajectoryId).toBe(trajectoryId);
        expect(clicked.observation.pixels).not.toBeNull();
        expect(clicked.observation.currentActivity).toBe(SETTINGS_ACTIVITY);

        const snapshotRef = await worker.save(trajectoryId);
        expect(snapshotRef).toBe(`${trajectoryId}-1`);

        const back = await worker.step(trajectoryId, 'key back');
        expect(back.observation.currentActivity).toBe(LAUNCHER_ACTIVITY);

        const restored = await worker.load(trajectoryId, snapshotRef);
        expect(restored.currentActivity).toBe(SETTINGS_ACTIVITY);

        await expect(worker.remove(trajectoryId)).resolves.toEqual({
            trajectoryId,
            deviceBinding: 'emulator-5554',
            teardownError: null,
            snapshotError: null,
            releaseError: null,
        });
        expect(worker.list()).toEqual([]);

        const next = await worker.create();
        expect(next.deviceBinding).toBe('emulator-5554');
        expect(next.trajectoryId).not.toBe(trajectoryId);
    });

    it('accepts structured records as well as DSL commands', async () => {
        const worker = createWorker();
        const { trajectoryId } = await worker.create();

        const result = await worker.step(trajectoryId, { action_type: 'open_app', package: 'com.example.notes' });
        expect(result.observation.currentActivity).toBe('com.example.notes/.MainActivity');
    });

    it('hands out exactly N devices to N+1 concurrent creates', async () => {
        const worker = createWorker();

        const results = await Promise.allSettled(Array.from({ length: DEVICES.length + 1 }, () => worker.create()));
        const created = results.flatMap((result) => result.status === 'fulfilled' ? [result.value] : []);
        const failed = results.flatMap((result) => result.status === 'rejected' ? [result.reason] : []);

        expect(created).toHaveLength(DEVICES.length);
        expect(failed).toHaveLength(1);
        expect(failed[0]).toBeInstanceOf(PoolExhaustedError);
        expect(new Set(created.map((entry) => entry.trajectoryId)).size).toBe(DEVICES.length);
        expect(new Set(created.map((entry) => entry.deviceBinding))).toEqual(new Set(DEVICES));
    });

    it('only allocates from the first capacity devices', async () => {
        const worker = createWorker({ capacity: 1 });

        await expect(worker.create()).resolves.toMatchObject({ deviceBinding: 'emulator-5554' });
        await expect(worker.create()).rejects.toBeInstanceOf(PoolExhaustedError);

        await worker.updateConfig({ capacity: 2 });
        await expect(worker.create()).resolves.toMatchObject({ deviceBinding: 'emulator-5556' });
    });

    it('answers a second remove with UnknownTrajectory and frees the device once', async () => {
        const worker = createWorker({ capacity: 1 });
        const { trajectoryId } = await worker.create();

        await worker.remove(trajectoryId);
        await expect(worker.remove(trajectoryId)).rejects.toBeInstanceOf(UnknownTrajectoryError);
        await expect(worker.step(trajectoryId, 'screenshot')).rejects.toBeInstanceOf(UnknownTrajectoryError);

        await worker.create();
        await expect(worker.create()).rejects.toBeInstanceOf(PoolExhaustedError);
    });

    it('applies concurrent steps on one trajectory one after the other', async () => {
        controller = new SimulatedDeviceController({ latencyMs: 15 });
        const worker = createWorker();
        const { trajectoryId, deviceBinding } = await worker.create();

        const [first, second] = await Promise.all([
            worker.step(trajectoryId, 'click 1 1'),
            worker.step(trajectoryId, 'key back'),
        ]);

        expect(first.observation.currentActivity).toBe(SETTINGS_ACTIVITY);
        expect(second.observation.currentActivity).toBe(LAUNCHER_ACTIVITY);
        expect(controller.history(deviceBinding)).toEqual(['click 1 1', 'key back']);
        expect(controller.peakConcurrency(deviceBinding)).toBe(1);
    });

    it('runs different trajectories in parallel', async () => {
        controller = new SimulatedDeviceController({ latencyMs: 15 });
        const worker = createWorker();
        const a = await worker.create();
        const b = await worker.create();

        await Promise.all([worker.step(a.trajectoryId, 'screenshot'), worker.step(b.trajectoryId, 'screenshot')]);

        expect(controller.history(a.deviceBinding)).toEqual(['screenshot']);
        expect(controller.history(b.deviceBinding)).toEqual(['screenshot']);
    });

    it('rejects malformed actions before touching the device', async () => {
        const worker = createWorker();
        const { trajectoryId, deviceBinding } = await worker.create();

        await expect(worker.step(trajectoryId, 'click here')).rejects.toBeInstanceOf(ParseError);
        expect(controller.history(deviceBinding)).toEqual([]);
    });

    it('keeps the trajectory running after a command timeout', async () => {
        controller = new SimulatedDeviceController({ latencyMs: 50 });
        const worker = createWorker();
        const { trajectoryId } = await worker.create();
        await worker.step(trajectoryId, 'screenshot');
        await worker.updateConfig({ commandTimeoutMs: 5 });

        await expect(worker.step(trajectoryId, 'click 1 1')).rejects.toBeInstanceOf(ActionExecutionError);
        expect(worker.describeTrajectory(trajectoryId).state).toBe('running');
    });

    it('removes the trajectory even when teardown and release both fail', async () => {
        const pool = new FlakyRecyclePool();
        const worker = createWorker({ capacity: 1, pool });
        const { trajectoryId, deviceBinding } = await worker.create();
        controller.failResets(deviceBinding);

        await expect(worker.remove(trajectoryId)).resolves.toEqual({
            trajectoryId,
            deviceBinding,
            teardownError: 'reset refused',
            snapshotError: null,
            releaseError: 'cannot recycle emulator-5554',
        });
        expect(pool.recycled).toEqual(['emulator-5554']);
        await expect(worker.create()).resolves.toMatchObject({ deviceBinding: 'emulator-5554' });
    });

    it('drops snapshot metadata on remove so the next trajectory on the device cannot load it', async () => {
        const worker = createWorker({ capacity: 1 });
        const first = await worker.create();
        await worker.step(first.trajectoryId, 'click 1 1');
        const snapshotRef = await worker.save(first.trajectoryId);

        await expect(worker.remove(first.trajectoryId)).resolves.toMatchObject({ snapshotError: null });
        await expect(fs.readdir(directory)).resolves.toEqual([]);

        const second = await worker.create();
        expect(second.deviceBinding).toBe(first.deviceBinding);
        await expect(worker.load(second.trajectoryId, snapshotRef)).rejects.toBeInstanceOf(SnapshotNotFoundError);
    });

    it('reports snapshot cleanup failures without blocking the release', async () => {
        const worker = createWorker({ capacity: 1, snapshots: new ReadOnlySnapshotStore(directory) });
        const { trajectoryId } = await worker.create();
        await worker.save(trajectoryId);
        await worker.save(trajectoryId);

        await expect(worker.remove(trajectoryId)).resolves.toMatchObject({
            teardownError: null,
            snapshotError: `cannot delete ${trajectoryId}-1; cannot delete ${trajectoryId}-2`,
            releaseError: null,
        });
        await expect(worker.create()).resolves.toMatchObject({ deviceBinding: 'emulator-5554' });
    });

    it('lets an in-flight step finish before removing', async () => {
        controller = new SimulatedDeviceController({ latencyMs: 15 });
        const worker = createWorker();
        const { trajectoryId, deviceBinding } = await worker.create();

        const step = worker.step(trajectoryId, 'click 1 1');
        const removal = worker.remove(trajectoryId);

        await expect(step).resolves.toMatchObject({ trajectoryId });
        await expect(removal).resolves.toMatchObject({ teardownError: null });
        expect(controller.history(deviceBinding)).toEqual(['click 1 1']);
        expect(controller.currentActivity(deviceBinding)).toBe(LAUNCHER_ACTIVITY);
    });

    it('reaps trajectories idle for longer than maxIdleMs', async () => {
        const worker = createWorker();
        const idle = await worker.create();

        await expect(worker.reapIdle(Date.now() + 30_000)).resolves.toEqual([]);
        await expect(worker.reapIdle(Date.now() + 120_000)).resolves.toEqual([idle.trajectoryId]);
        expect(worker.list()).toEqual([]);

        await worker.updateConfig({ maxIdleMs: 0 });
        await worker.create();
        await expect(worker.reapIdle(Date.now() + 10_000_000)).resolves.toEqual([]);
    });

    it('removes every trajectory on dispose', async () => {
        const worker = createWorker();
        await worker.create();
        await worker.create();

        await worker.dispose();

        expect(worker.list()).toEqual([]);
        expect(worker.describe()).toEqual({ liveTrajectories: 0, boundDevices: 0, freeDevices: 3 });
    });

    it('rejects invalid config and keeps unknown keys', async () => {
        const worker = createWorker();

        await expect(worker.updateConfig({ capacity: 0 })).rejects.toThrow();
        const updated = await worker.updateConfig({ label: 'nightly' });
        expect(updated).toMatchObject({ capacity: 3, maxIdleMs: 60_000, label: 'nightly' });
    });

    it('reports its pool in health probes', async () => {
        const worker = createWorker();
        await worker.create();

        await expect(worker.probe()).resolves.toEqual({
            healthy: true,
            details: { liveTrajectories: 1, capacity: 3, devices: 3, unhealthyDevices: [] },
        });
    });

    it('checks free devices only and fails once none of them answers', async () => {
        const worker = createWorker();
        const { deviceBinding } = await worker.create();
        controller.setReachable(deviceBinding, false);
        controller.setReachable('emulator-5556', false);

        await expect(worker.probe()).resolves.toMatchObject({
            healthy: true,
            details: { unhealthyDevices: ['emulator-5556'] },
        });

        controller.setReachable('emulator-5558', false);
        await expect(worker.probe()).resolves.toMatchObject({
            healthy: false,
            details: { unhealthyDevices: ['emulator-5556', 'emulator-5558'] },
        });
        expect(controller.history(deviceBinding)).toEqual([]);
    });

    it('sweeps idle trajectories in the background while started', async () => {
        const worker = new EnvironmentWorker({
            controller,
            pool: new StaticDevicePool(DEVICES),
            snapshots: new SnapshotStore(directory),
            config: { maxIdleMs: 1 },
            reapIntervalMs: 10,
        });
        await worker.create();
        await worker.start();

        await sleep(60);

        expect(worker.list()).toEqual([]);
        await worker.dispose();
    });

    it('starts sweeping when reaping is switched on after start', async () => {
        const worker = new EnvironmentWorker({
            controller,
            pool: new StaticDevicePool(DEVICES),
            snapshots: new SnapshotStore(directory),
            config: { maxIdleMs: 0 },
            reapIntervalMs: 10,
        });
        await worker.start();
        await worker.create();

        await sleep(30);
        expect(worker.list()).toHaveLength(1);

        await worker.updateConfig({ maxIdleMs: 1 });
        await sleep(60);

        expect(worker.list()).toEqual([]);
        await worker.dispose();
    });
});
