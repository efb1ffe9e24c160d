import { describe, expect, it } from 'vitest';
import { StaticDevicePool, emulatorSerials } from './device-pool';

describe('emulatorSerials', () => {
    it('steps console ports by two', () => {
        expect(emulatorSerials({ basePort: 5554, count: 3 })).toEqual(['emulator-5554', 'emulator-5556', 'emulator-5558']);
        expect(emulatorSerials({ basePort: 5554, count: 0 })).toEqual([]);
    });
});

describe('StaticDevicePool', () => {
    it('trims and de-duplicates serials in order', () => {
        const pool = new StaticDevicePool([' emulator-5556', 'emulator-5554', 'emulator-5556', '']);
        expect(pool.devices()).toEqual(['emulator-5556', 'emulator-5554']);
    });

    it('needs at least one device', () => {
        expect(() => new StaticDevicePool([' '])).toThrow('Device pool needs at least one device');
    });
});
