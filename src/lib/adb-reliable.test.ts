import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ReliableAdb, classifyAdbError, toDeviceControlError } from './adb-reliable';
import { TimeoutError, sleep } from './timing';
import { DeviceControlError } from '@/types';

function execError(message: string, stderr: string): Error {
    return Object.assign(new Error(message), { stderr });
}

describe('classifyAdbError', () => {
    it('recognizes the failures adb reports', () => {
        expect(classifyAdbError(execError('Command failed', 'error: device offline'))).toBe('DEVICE_OFFLINE');
        expect(classifyAdbError(execError('Command failed', 'error: device unauthorized.'))).toBe('DEVICE_UNAUTHORIZED');
        expect(classifyAdbError(new Error('read ECONNRESET'))).toBe('CONNECTION_RESET');
        expect(classifyAdbError(execError('Command failed', "adb: device 'emulator-5556' not found"))).toBe('DEVICE_NOT_FOUND');
        expect(classifyAdbError(execError('Command failed', 'error: no devices/emulators found'))).toBe('DEVICE_NOT_FOUND');
        expect(classifyAdbError(new TimeoutError('adb shell input tap 1 2', 100))).toBe('COMMAND_TIMEOUT');
    });

    it('does not mistake a missing file for a missing device', () => {
        expect(classifyAdbError(execError('Command failed', 'cat: /sdcard/window_dump.xml: No such file or directory')))
            .toBe('UNKNOWN');
    });
});

describe('toDeviceControlError', () => {
    it('maps link failures to unreachable and keeps stderr as the message', () => {
        const error = toDeviceControlError(execError('Command failed', 'error: device offline\n'), 'emulator-5554');
        expect(error).toBeInstanceOf(DeviceControlError);
        expect(error.kind).toBe('unreachable');
        expect(error.deviceBinding).toBe('emulator-5554');
        expect(error.message).toBe('DEVICE_OFFLINE: error: device offline');
    });

    it('maps timeouts and unknown failures to their own kinds', () => {
        expect(toDeviceControlError(new TimeoutError('adb shell wm size', 50), 'emulator-5554').kind).toBe('timeout');
        expect(toDeviceControlError(new Error('exit code 1'), 'emulator-5554').kind).toBe('failed');
    });

    it('passes device control errors through', () => {
        const original = new DeviceControlError('already classified', 'timeout', 'emulator-5556');
        expect(toDeviceControlError(original, 'emulator-5554')).toBe(original);
    });
});

describe.skipIf(process.platform === 'win32')('ReliableAdb', () => {
    let directory: string;

    beforeEach(async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'adb-reliable-test-'));
    });

    afterEach(async () => {
        await fs.rm(directory, { recursive: true, force: true });
    });

    async function fakeAdb(body: string): Promise<string> {
        const script = path.join(directory, 'adb');
        await fs.writeFile(script, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
        return script;
    }

    it('passes the serial and shell command through', async () => {
        const adbPath = await fakeAdb('echo "$2|$3|$4"');
        const adb = new ReliableAdb('emulator-5554', { adbPath, maxRetries: 0 });

        await expect(adb.shell('input tap 1 2')).resolves.toBe('emulator-5554|shell|input tap 1 2');
    });

    it('kills a command that outlives its timeout', async () => {
        const marker = path.join(directory, 'finished');
        const adbPath = await fakeAdb(`sleep 1\ntouch '${marker}'`);
        const adb = new ReliableAdb('emulator-5554', { adbPath, maxRetries: 0 });

        const failure = adb.shell('input tap 1 2', { timeoutMs: 100 });
        await expect(failure).rejects.toMatchObject({
            kind: 'timeout',
            message: 'COMMAND_TIMEOUT: adb shell input tap 1 2 timed out after 100ms',
        });

        await sleep(1_500);
        await expect(fs.access(marker)).rejects.toMatchObject({ code: 'ENOENT' });
    });
});
