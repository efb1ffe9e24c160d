// Contract between the environment core and whatever drives the devices.

import type { NormalizedAction } from './action';

export type Orientation = 'portrait' | 'landscape';

export interface UiElement {
    bounds: [number, number, number, number];
    text: string;
    resourceId: string;
    className: string;
    contentDesc: string;
    clickable: boolean;
}

export interface ScreenSize {
    width: number;
    height: number;
}

export interface Observation {
    /** Base64 PNG of the screen, or null when the capture failed. */
    pixels: string | null;
    uiElements: UiElement[];
    currentActivity: string | null;
    screenSize: ScreenSize;
    orientation: Orientation;
}

export type DeviceControlErrorKind = 'unreachable' | 'timeout' | 'failed';

export class DeviceControlError extends Error {
    constructor(
        message: string,
        public readonly kind: DeviceControlErrorKind,
        public readonly deviceBinding: string
    ) {
        super(message);
        this.name = 'DeviceControlError';
        Object.setPrototypeOf(this, DeviceControlError.prototype);
    }
}

export interface ExecuteOptions {
    timeoutMs?: number;
}

export interface DeviceController {
    execute(deviceBinding: string, action: NormalizedAction, options?: ExecuteOptions): Promise<Observation>;
    observe(deviceBinding: string, options?: ExecuteOptions): Promise<Observation>;
    snapshotSave(deviceBinding: string, name: string): Promise<string>;
    snapshotRestore(deviceBinding: string, deviceRef: string): Promise<void>;
    /** Return the device to a neutral state before it is handed to another trajectory. */
    reset(deviceBinding: string): Promise<void>;
    /** Whether the device answers; read-only, never throws for an unhealthy device. */
    checkDevice(deviceBinding: string, options?: ExecuteOptions): Promise<boolean>;
}

export interface DevicePool {
    devices(): readonly string[];
    recycle?(deviceBinding: string): Promise<void>;
}
