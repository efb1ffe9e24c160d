import { config } from '@/config/app';
import { createLogger } from './logger';
import { ReliableAdb, type AdbCommandOptions, type HealthCheckResult } from './adb-reliable';
import {
    parseCurrentActivity,
    parseScreenSize,
    parseSurfaceOrientation,
    parseUiHierarchy,
    resolveOrientation,
} from './android-observation';
import { sleep } from './timing';
import {
    DeviceControlError,
    type DeviceController,
    type ExecuteOptions,
    type KeyName,
    type NormalizedAction,
    type Observation,
    type ScreenSize,
    type ScrollDirection,
} from '@/types';

const logger = createLogger('adb-device-controller');

export const KEYCODES: Record<KeyName, string> = {
    back: 'KEYCODE_BACK',
    home: 'KEYCODE_HOME',
    enter: 'KEYCODE_ENTER',
    power: 'KEYCODE_POWER',
    menu: 'KEYCODE_MENU',
    delete: 'KEYCODE_DEL',
    recents: 'KEYCODE_APP_SWITCH',
    volume_up: 'KEYCODE_VOLUME_UP',
    volume_down: 'KEYCODE_VOLUME_DOWN',
    tab: 'KEYCODE_TAB',
    escape: 'KEYCODE_ESCAPE',
    search: 'KEYCODE_SEARCH',
};

const DEFAULT_LONG_PRESS_MS = 1000;
const DOUBLE_TAP_GAP_MS = 80;
const SCROLL_DURATION_MS = 400;
const PACKAGE_NAME_PATTERN = /^[a-zA-Z][\w]*(\.[a-zA-Z][\w]*)+$/;
const SETTLE_DELAY_MS = 300;

/** The slice of {@link ReliableAdb} the controller drives; tests substitute a fake. */
export interface AdbClient {
    shell(command: string, opts?: AdbCommandOptions): Promise<string>;
    exec(args: string[], opts?: AdbCommandOptions): Promise<string>;
    execBuffer(args: string[], timeoutMs?: number): Promise<Buffer>;
    healthCheck(timeoutMs?: number): Promise<HealthCheckResult>;
}

export interface AdbDeviceControllerOptions {
    adbPath?: string;
    uiDumpPath?: string;
    settleDelayMs?: number;
    createClient?: (serial: string) => AdbClient;
}

/** Single-quote a value for the device shell. */
function shellQuote(value: string): string {
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** `input text` treats `%s` as a space and cannot take literal spaces. */
export function encodeInputText(value: string): string {
    return shellQuote(value.replace(/%/g, '\\%').replace(/ /g, '%s'));
}

export function scrollGesture(direction: ScrollDirection, { width, height }: ScreenSize): [number, number, number, number] {
    const cx = Math.round(width / 2);
    const cy = Math.round(height / 2);
    const top = Math.round(height * 0.25);
    const bottom = Math.round(height * 0.75);
    const left = Math.round(width * 0.25);
    const right = Math.round(width * 0.75);

    // The finger moves against the scroll direction.
    switch (direction) {
        case 'down':
            return [cx, bottom, cx, top];
        case 'up':
            return [cx, top, cx, bottom];
        case 'right':
            return [right, cy, left, cy];
        case 'left':
            return [left, cy, right, cy];
    }
}

export class AdbDeviceController implements DeviceController {
    private readonly clients = new Map<string, AdbClient>();
    private readonly screenSizes = new Map<string, ScreenSize>();
    private readonly createClient: (serial: string) => AdbClient;
    private readonly uiDumpPath: string;
    private readonly settleDelayMs: number;

    constructor(options: AdbDeviceControllerOptions = {}) {
        const adbPath = options.adbPath;
        this.createClient = options.createClient ?? ((serial) => new ReliableAdb(serial, { adbPath }));
        this.uiDumpPath = options.uiDumpPath ?? config.environment.adb.uiDumpPath;
        this.settleDelayMs = options.settleDelayMs ?? SETTLE_DELAY_MS;
    }

    async execute(deviceBinding: string, action: NormalizedAction, options: ExecuteOptions = {}): Promise<Observation> {
        const adb = this.client(deviceBinding);
        const opts: AdbCommandOptions = { timeoutMs: options.timeoutMs };

        switch (action.kind) {
            case 'click':
                await adb.shell(`input tap ${action.x} ${action.y}`, opts);
                break;
            case 'double_tap':
                await adb.shell(`input tap ${action.x} ${action.y}`, opts);
                await sleep(DOUBLE_TAP_GAP_MS);
                await adb.shell(`input tap ${action.x} ${action.y}`, opts);
                break;
            case 'long_press': {
                const duration = action.durationMs ?? DEFAULT_LONG_PRESS_MS;
                await adb.shell(`input swipe ${action.x} ${action.y} ${action.x} ${action.y} ${duration}`, opts);
                break;
            }
            case 'swipe':
                await adb.shell(`input swipe ${action.x1} ${action.y1} ${action.x2} ${action.y2} ${action.durationMs}`, opts);
                break;
            case 'text':
                await adb.shell(`input text ${encodeInputText(action.value)}`, opts);
                break;
            case 'key':
                await adb.shell(`input keyevent ${KEYCODES[action.name]}`, opts);
                break;
            case 'scroll': {
                const size = await this.screenSize(deviceBinding, opts);
                const [x1, y1, x2, y2] = scrollGesture(action.direction, size);
                await adb.shell(`input swipe ${x1} ${y1} ${x2} ${y2} ${SCROLL_DURATION_MS}`, opts);
                break;
            }
            case 'open_app':
                if (!PACKAGE_NAME_PATTERN.test(action.packageName)) {
                    throw new DeviceControlError(`Invalid package name "${action.packageName}"`, 'failed', deviceBinding);
                }
                await adb.shell(`monkey -p ${action.packageName} -c android.intent.category.LAUNCHER 1`, opts);
                break;
            case 'wait':
                await sleep(action.durationMs);
                break;
            case 'screenshot':
                break;
        }

        if (action.kind !== 'screenshot' && action.kind !== 'wait' && this.settleDelayMs > 0) {
            await sleep(this.settleDelayMs);
        }

        return this.observe(deviceBinding, options);
    }

    async observe(deviceBinding: string, options: ExecuteOptions = {}): Promise<Observation> {
        const adb = this.client(deviceBinding);
        const opts: AdbCommandOptions = { timeoutMs: options.timeoutMs };

        const naturalSize = await this.screenSize(deviceBinding, opts);
        const [inputDump, windowDump, uiElements, pixels] = await Promise.all([
            adb.shell('dumpsys input', opts),
            adb.shell('dumpsys window windows', opts),
            this.dumpUi(adb, opts),
            this.capture(adb, options.timeoutMs),
        ]);

        const { screenSize, orientation } = resolveOrientation(naturalSize, parseSurfaceOrientation(inputDump));
        return {
            pixels,
            uiElements,
            currentActivity: parseCurrentActivity(windowDump),
            screenSize,
            orientation,
        };
    }

    async snapshotSave(deviceBinding: string, name: string): Promise<string> {
        const output = await this.client(deviceBinding).exec(['emu', 'avd', 'snapshot', 'save', name]);
        this.assertConsoleOk(deviceBinding, output, `snapshot save ${name}`);
        return name;
    }

    async snapshotRestore(deviceBinding: string, deviceRef: string): Promise<void> {
        const output = await this.client(deviceBinding).exec(['emu', 'avd', 'snapshot', 'load', deviceRef]);
        this.assertConsoleOk(deviceBinding, output, `snapshot load ${deviceRef}`);
        this.screenSizes.delete(deviceBinding);
    }

    async reset(deviceBinding: string): Promise<void> {
        const adb = this.client(deviceBinding);
        await adb.shell(`input keyevent ${KEYCODES.home}`, { retries: 1 });
        await adb.shell('am kill-all', { retries: 1 });
        this.screenSizes.delete(deviceBinding);
    }

    async checkDevice(deviceBinding: string, options: ExecuteOptions = {}): Promise<boolean> {
        const result = await this.client(deviceBinding).healthCheck(options.timeoutMs);
        return result.healthy;
    }

    private client(deviceBinding: string): AdbClient {
        let client = this.clients.get(deviceBinding);
        if (!client) {
            client = this.createClient(deviceBinding);
            this.clients.set(deviceBinding, client);
        }
        return client;
    }

    private async screenSize(deviceBinding: string, opts: AdbCommandOptions): Promise<ScreenSize> {
        const cached = this.screenSizes.get(deviceBinding);
        if (cached) return cached;

        const output = await this.client(deviceBinding).shell('wm size', opts);
        const size = parseScreenSize(output);
        if (!size) {
            throw new DeviceControlError(`Unrecognized "wm size" output: ${output}`, 'failed', deviceBinding);
        }
        this.screenSizes.set(deviceBinding, size);
        return size;
    }

    private async dumpUi(adb: AdbClient, opts: AdbCommandOptions): Promise<Observation['uiElements']> {
        await adb.shell(`uiautomator dump ${this.uiDumpPath}`, opts);
        const xml = await adb.shell(`cat ${this.uiDumpPath}`, opts);
        return parseUiHierarchy(xml);
    }

    /** Screen capture is allowed to fail; the observation then carries no pixels. */
    private async capture(adb: AdbClient, timeoutMs?: number): Promise<string | null> {
        try {
            const png = await adb.execBuffer(['exec-out', 'screencap', '-p'], timeoutMs);
            return png.length > 0 ? png.toString('base64') : null;
        } catch (error) {
            logger.warn('Screen capture failed', error);
            return null;
        }
    }

    private assertConsoleOk(deviceBinding: string, output: string, label: string): void {
        if (/^KO\b/m.test(output)) {
            throw new DeviceControlError(`${label}: ${output}`, 'failed', deviceBinding);
        }
    }
}
