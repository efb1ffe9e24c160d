import { formatAction } from './action-normalizer';
import { sleep } from './timing';
import {
    DeviceControlError,
    type DeviceController,
    type ExecuteOptions,
    type NormalizedAction,
    type Observation,
    type ScreenSize,
    type UiElement,
} from '@/types';

export const LAUNCHER_ACTIVITY = 'com.android.launcher3/.Launcher';
export const SETTINGS_ACTIVITY = 'com.android.settings/.Settings';

const SCREEN_SIZE: ScreenSize = { width: 1080, height: 1920 };

interface SimulatedDevice {
    activityStack: string[];
    typedText: string;
    frame: number;
    reachable: boolean;
    history: string[];
}

interface DeviceSnapshot {
    activityStack: string[];
    typedText: string;
}

export interface SimulatedDeviceControllerOptions {
    /** Delay applied to every execute call, used to make overlapping calls observable. */
    latencyMs?: number;
}

function freshDevice(): SimulatedDevice {
    return {
        activityStack: [LAUNCHER_ACTIVITY],
        typedText: '',
        frame: 0,
        reachable: true,
        history: [],
    };
}

function launcherElements(): UiElement[] {
    return [
        {
            bounds: [0, 0, 1080, 1920],
            text: '',
            resourceId: 'com.android.launcher3:id/workspace',
            className: 'android.widget.FrameLayout',
            contentDesc: '',
            clickable: false,
        },
        {
            bounds: [40, 100, 240, 300],
            text: 'Settings',
            resourceId: 'com.android.launcher3:id/icon',
            className: 'android.widget.TextView',
            contentDesc: 'Settings',
            clickable: true,
        },
    ];
}

/**
 * In-memory stand-in for a fleet of emulators. Activities form a stack: a click on the
 * launcher opens Settings, `back` pops, `home` returns to the launcher and `open_app`
 * pushes the package's main activity.
 */
export class SimulatedDeviceController implements DeviceController {
    private readonly devices = new Map<string, SimulatedDevice>();
    private readonly snapshots = new Map<string, DeviceSnapshot>();
    private readonly latencyMs: number;
    private readonly pendingFailures = new Map<string, DeviceControlError>();
    private readonly failingResets = new Set<string>();
    private readonly inFlight = new Map<string, number>();
    private readonly peakInFlight = new Map<string, number>();

    constructor(options: SimulatedDeviceControllerOptions = {}) {
        this.latencyMs = options.latencyMs ?? 0;
    }

    async execute(deviceBinding: string, action: NormalizedAction, options: ExecuteOptions = {}): Promise<Observation> {
        const device = this.device(deviceBinding);
        this.enter(deviceBinding);
        try {
            this.assertReachable(deviceBinding, device);

            const failure = this.pendingFailures.get(deviceBinding);
            if (failure) {
                this.pendingFailures.delete(deviceBinding);
                throw failure;
            }

            if (options.timeoutMs !== undefined && options.timeoutMs < this.latencyMs) {
                await sleep(options.timeoutMs);
                throw new DeviceControlError(`${formatAction(action)} timed out after ${options.timeoutMs}ms`, 'timeout', deviceBinding);
            }
            if (this.latencyMs > 0) {
                await sleep(this.latencyMs);
            }
            if (action.kind === 'wait') {
                await sleep(Math.min(action.durationMs, 10));
            }

            this.apply(device, action);
            device.history.push(formatAction(action));
            device.frame += 1;
            return this.render(device);
        } finally {
            this.leave(deviceBinding);
        }
    }

    async observe(deviceBinding: string): Promise<Observation> {
        const device = this.device(deviceBinding);
        this.assertReachable(deviceBinding, device);
        return this.render(device);
    }

    async snapshotSave(deviceBinding: string, name: string): Promise<string> {
        const device = this.device(deviceBinding);
        this.assertReachable(deviceBinding, device);
        const deviceRef = `${deviceBinding}:${name}`;
        this.snapshots.set(deviceRef, {
            activityStack: [...device.activityStack],
            typedText: device.typedText,
        });
        return deviceRef;
    }

    async snapshotRestore(deviceBinding: string, deviceRef: string): Promise<void> {
        const device = this.device(deviceBinding);
        this.assertReachable(deviceBinding, device);
        const snapshot = this.snapshots.get(deviceRef);
        if (!snapshot) {
            throw new DeviceControlError(`No device snapshot ${deviceRef}`, 'failed', deviceBinding);
        }
        device.activityStack = [...snapshot.activityStack];
        device.typedText = snapshot.typedText;
    }

    async reset(deviceBinding: string): Promise<void> {
        const device = this.device(deviceBinding);
        if (this.failingResets.has(deviceBinding)) {
            throw new DeviceControlError('reset refused', 'failed', deviceBinding);
        }
        this.assertReachable(deviceBinding, device);
        device.activityStack = [LAUNCHER_ACTIVITY];
        device.typedText = '';
    }

    async checkDevice(deviceBinding: string): Promise<boolean> {
        return this.device(deviceBinding).reachable;
    }

    setReachable(deviceBinding: string, reachable: boolean): void {
        this.device(deviceBinding).reachable = reachable;
    }

    /** The next execute on this device fails with the given kind. */
    failNext(deviceBinding: string, kind: DeviceControlError['kind'], message = 'injected failure'): void {
        this.pendingFailures.set(deviceBinding, new DeviceControlError(message, kind, deviceBinding));
    }

    failResets(deviceBinding: string, failing = true): void {
        if (failing) {
            this.failingResets.add(deviceBinding);
        } else {
            this.failingResets.delete(deviceBinding);
        }
    }

    history(deviceBinding: string): readonly string[] {
        return this.devices.get(deviceBinding)?.history ?? [];
    }

    currentActivity(deviceBinding: string): string | null {
        const stack = this.devices.get(deviceBinding)?.activityStack;
        return stack ? stack[stack.length - 1] ?? null : null;
    }

    /** Highest number of execute calls that overlapped on one device. */
    peakConcurrency(deviceBinding: string): number {
        return this.peakInFlight.get(deviceBinding) ?? 0;
    }

    private device(deviceBinding: string): SimulatedDevice {
        let device = this.devices.get(deviceBinding);
        if (!device) {
            device = freshDevice();
            this.devices.set(deviceBinding, device);
        }
        return device;
    }

    private assertReachable(deviceBinding: string, device: SimulatedDevice): void {
        if (!device.reachable) {
            throw new DeviceControlError(`device '${deviceBinding}' not found`, 'unreachable', deviceBinding);
        }
    }

    private apply(device: SimulatedDevice, action: NormalizedAction): void {
        const top = device.activityStack[device.activityStack.length - 1];
        switch (action.kind) {
            case 'click':
            case 'double_tap':
                if (top === LAUNCHER_ACTIVITY) {
                    device.activityStack.push(SETTINGS_ACTIVITY);
                }
                break;
            case 'key':
                if (action.name === 'back' && device.activityStack.length > 1) {
                    device.activityStack.pop();
                } else if (action.name === 'home') {
                    device.activityStack = [LAUNCHER_ACTIVITY];
                } else if (action.name === 'delete') {
                    device.typedText = device.typedText.slice(0, -1);
                }
                break;
            case 'text':
                device.typedText += action.value;
                break;
            case 'open_app':
                device.activityStack.push(`${action.packageName}/.MainActivity`);
                break;
            case 'long_press':
            case 'swipe':
            case 'scroll':
            case 'screenshot':
            case 'wait':
                break;
        }
    }

    private render(device: SimulatedDevice): Observation {
        const currentActivity = device.activityStack[device.activityStack.length - 1] ?? null;
        const frame = JSON.stringify({ frame: device.frame, activity: currentActivity, text: device.typedText });

        return {
            pixels: Buffer.from(frame, 'utf8').toString('base64'),
            uiElements: currentActivity === LAUNCHER_ACTIVITY ? launcherElements() : [],
            currentActivity,
            screenSize: { ...SCREEN_SIZE },
            orientation: 'portrait',
        };
    }

    private enter(deviceBinding: string): void {
        const count = (this.inFlight.get(deviceBinding) ?? 0) + 1;
        this.inFlight.set(deviceBinding, count);
        this.peakInFlight.set(deviceBinding, Math.max(count, this.peakInFlight.get(deviceBinding) ?? 0));
    }

    private leave(deviceBinding: string): void {
        this.inFlight.set(deviceBinding, (this.inFlight.get(deviceBinding) ?? 1) - 1);
    }
}
