import { describe, expect, it } from 'vitest';
import { AdbDeviceController, encodeInputText, scrollGesture, type AdbClient } from './adb-device-controller';
import type { AdbCommandOptions, HealthCheckResult } from './adb-reliable';
import { DeviceControlError } from '@/types';

const UI_XML = '<hierarchy><node text="Notes" class="android.widget.TextView" resource-id="" content-desc="" clickable="true" bounds="[0,0][100,50]" /></hierarchy>';

class FakeAdb implements AdbClient {
    readonly commands: string[] = [];
    snapshotOutput = 'OK';
    captureFails = false;
    healthy = true;
    healthTimeouts: Array<number | undefined> = [];

    async shell(command: string, _opts?: AdbCommandOptions): Promise<string> {
        this.commands.push(command);
        if (command === 'wm size') return 'Physical size: 1080x1920';
        if (command === 'dumpsys input') return '    SurfaceOrientation: 0';
        if (command === 'dumpsys window windows') return '  mCurrentFocus=Window{9a u0 com.example.notes/.MainActivity}';
        if (command.startsWith('cat ')) return UI_XML;
        return '';
    }

    async exec(args: string[], _opts?: AdbCommandOptions): Promise<string> {
        this.commands.push(args.join(' '));
        return this.snapshotOutput;
    }

    async execBuffer(args: string[]): Promise<Buffer> {
        this.commands.push(args.join(' '));
        if (this.captureFails) throw new Error('screencap failed');
        return Buffer.from('png');
    }

    async healthCheck(timeoutMs?: number): Promise<HealthCheckResult> {
        this.healthTimeouts.push(timeoutMs);
        return { healthy: this.healthy, details: { adbResponsive: true, bootCompleted: this.healthy }, latencyMs: 1 };
    }
}

function setup() {
    const adb = new FakeAdb();
    const controller = new AdbDeviceController({
        createClient: () => adb,
        uiDumpPath: '/sdcard/window_dump.xml',
        settleDelayMs: 0,
    });
    return { adb, controller };
}

describe('AdbDeviceController', () => {
    it('taps and then observes the device', async () => {
        const { adb, controller } = setup();

        const observation = await controller.execute('emulator-5554', { kind: 'click', x: 100, y: 200 });

        expect(adb.commands).toEqual([
            'input tap 100 200',
            'wm size',
            'dumpsys input',
            'dumpsys window windows',
            'uiautomator dump /sdcard/window_dump.xml',
            'exec-out screencap -p',
            'cat /sdcard/window_dump.xml',
        ]);
        expect(observation).toEqual({
            pixels: 'cG5n',
            uiElements: [{
                bounds: [0, 0, 100, 50],
                text: 'Notes',
                resourceId: '',
                className: 'android.widget.TextView',
                contentDesc: '',
                clickable: true,
            }],
            currentActivity: 'com.example.notes/.MainActivity',
            screenSize: { width: 1080, height: 1920 },
            orientation: 'portrait',
        });
    });

    it('reports device health from the adb health check', async () => {
        const { adb, controller } = setup();

        await expect(controller.checkDevice('emulator-5554', { timeoutMs: 250 })).resolves.toBe(true);
        adb.healthy = false;
        await expect(controller.checkDevice('emulator-5554')).resolves.toBe(false);
        expect(adb.healthTimeouts).toEqual([250, undefined]);
        expect(adb.commands).toEqual([]);
    });

    it('translates actions into input commands', async () => {
        const { adb, controller } = setup();

        await controller.execute('emulator-5554', { kind: 'text', value: "it's a test" });
        await controller.execute('emulator-5554', { kind: 'key', name: 'recents' });
        await controller.execute('emulator-5554', { kind: 'scroll', direction: 'down' });
        await controller.execute('emulator-5554', { kind: 'long_press', x: 5, y: 6 });

        const inputs = adb.commands.filter((command) => command.startsWith('input '));
        expect(inputs).toEqual([
            "input text 'it'\\''s%sa%stest'",
            'input keyevent KEYCODE_APP_SWITCH',
            'input swipe 540 1440 540 480 400',
            'input swipe 5 6 5 6 1000',
        ]);
        expect(adb.commands.filter((command) => command === 'wm size')).toHaveLength(1);
    });

    it('rejects package names that are not package names', async () => {
        const { adb, controller } = setup();

        await expect(controller.execute('emulator-5554', { kind: 'open_app', packageName: 'x; reboot' }))
            .rejects.toBeInstanceOf(DeviceControlError);
        expect(adb.commands).toEqual([]);
    });

    it('launches apps through monkey', async () => {
        const { adb, controller } = setup();
        await controller.execute('emulator-5554', { kind: 'open_app', packageName: 'com.example.notes' });
        expect(adb.commands[0]).toBe('monkey -p com.example.notes -c android.intent.category.LAUNCHER 1');
    });

    it('returns no pixels when the screen capture fails', async () => {
        const { adb, controller } = setup();
        adb.captureFails = true;

        const observation = await controller.observe('emulator-5554');
        expect(observation.pixels).toBeNull();
        expect(observation.currentActivity).toBe('com.example.notes/.MainActivity');
    });

    it('saves and loads emulator snapshots through the console', async () => {
        const { adb, controller } = setup();

        await expect(controller.snapshotSave('emulator-5554', 'traj-1')).resolves.toBe('traj-1');
        await controller.snapshotRestore('emulator-5554', 'traj-1');
        expect(adb.commands).toEqual(['emu avd snapshot save traj-1', 'emu avd snapshot load traj-1']);

        adb.snapshotOutput = 'KO: snapshot not found';
        await expect(controller.snapshotRestore('emulator-5554', 'missing')).rejects.toMatchObject({ kind: 'failed' });
    });

    it('goes home and kills background apps on reset', async () => {
        const { adb, controller } = setup();
        await controller.reset('emulator-5554');
        expect(adb.commands).toEqual(['input keyevent KEYCODE_HOME', 'am kill-all']);
    });
});

describe('input helpers', () => {
    it('encodes spaces and percent signs for input text', () => {
        expect(encodeInputText('50% off')).toBe("'50\\%%soff'");
    });

    it('moves the finger against the scroll direction', () => {
        const size = { width: 1000, height: 2000 };
        expect(scrollGesture('up', size)).toEqual([500, 500, 500, 1500]);
        expect(scrollGesture('right', size)).toEqual([750, 1000, 250, 1000]);
    });
});
