import type { DevicePool } from '@/types';

export interface EmulatorPortRange {
    basePort: number;
    count: number;
}

/** Serials adb assigns to local emulators: console ports go up in steps of two. */
export function emulatorSerials({ basePort, count }: EmulatorPortRange): string[] {
    const serials: string[] = [];
    for (let index = 0; index < count; index++) {
        serials.push(`emulator-${basePort + index * 2}`);
    }
    return serials;
}

/** Fixed device list handed over by whoever provisioned the emulators. */
export class StaticDevicePool implements DevicePool {
    private readonly serials: readonly string[];

    constructor(serials: readonly string[]) {
        const unique = Array.from(new Set(serials.map((serial) => serial.trim()).filter(Boolean)));
        if (unique.length === 0) {
            throw new Error('Device pool needs at least one device');
        }
        this.serials = unique;
    }

    devices(): readonly string[] {
        return this.serials;
    }
}
