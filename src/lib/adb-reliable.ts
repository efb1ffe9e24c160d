import { execFile, type ExecFileException } from 'node:child_process';
import { config } from '@/config/app';
import { createLogger } from './logger';
import { TimeoutError, sleep } from './timing';
import { DeviceControlError, type DeviceControlErrorKind } from '@/types';

const logger = createLogger('adb-reliable');

export type AdbErrorType =
    | 'DEVICE_OFFLINE'
    | 'DEVICE_UNAUTHORIZED'
    | 'CONNECTION_RESET'
    | 'COMMAND_TIMEOUT'
    | 'DEVICE_NOT_FOUND'
    | 'UNKNOWN';

export interface HealthCheckResult {
    healthy: boolean;
    details: {
        adbResponsive: boolean;
        bootCompleted: boolean;
    };
    latencyMs: number;
}

export interface AdbCommandOptions {
    timeoutMs?: number;
    retries?: number;
    retryDelayMs?: number;
}

export interface ReliableAdbOptions {
    adbPath?: string;
    commandTimeoutMs?: number;
    maxRetries?: number;
    retryDelayMs?: number;
}

type ExecError = Error & { stderr?: string; stdout?: string };

function isExecError(error: unknown): error is ExecError {
    return error instanceof Error;
}

export function classifyAdbError(error: unknown): AdbErrorType {
    if (error instanceof TimeoutError) {
        return 'COMMAND_TIMEOUT';
    }
    const msg = [
        isExecError(error) ? error.message : '',
        isExecError(error) ? (error.stderr ?? '') : '',
        String(error),
    ].join(' ').toLowerCase();

    if (msg.includes('device offline')) return 'DEVICE_OFFLINE';
    if (msg.includes('unauthorized')) return 'DEVICE_UNAUTHORIZED';
    if (msg.includes('connection reset') || msg.includes('econnreset') || msg.includes('broken pipe')) return 'CONNECTION_RESET';
    if (msg.includes('device not found') || /device '[^']*' not found/.test(msg) || msg.includes('no devices/emulators found') || msg.includes('no such device')) return 'DEVICE_NOT_FOUND';
    return 'UNKNOWN';
}

const ERROR_KINDS: Record<AdbErrorType, DeviceControlErrorKind> = {
    DEVICE_OFFLINE: 'unreachable',
    DEVICE_UNAUTHORIZED: 'unreachable',
    CONNECTION_RESET: 'unreachable',
    DEVICE_NOT_FOUND: 'unreachable',
    COMMAND_TIMEOUT: 'timeout',
    UNKNOWN: 'failed',
};

export function toDeviceControlError(error: unknown, deviceId: string): DeviceControlError {
    if (error instanceof DeviceControlError) return error;
    const type = classifyAdbError(error);
    const stderr = isExecError(error) ? error.stderr?.trim() : undefined;
    const message = stderr || (error instanceof Error ? error.message : String(error));
    return new DeviceControlError(`${type}: ${message}`, ERROR_KINDS[type], deviceId);
}

interface ExecLimits {
    timeoutMs: number;
    label: string;
}

// execFile kills the child once `timeout` passes; `killed` tells that apart from a plain failure.
function settleExec<T>(
    limits: ExecLimits,
    resolve: (value: T) => void,
    reject: (reason: unknown) => void,
    error: ExecFileException | null,
    value: T,
    stderr: string
): void {
    if (!error) {
        resolve(value);
    } else if (error.killed) {
        reject(new TimeoutError(limits.label, limits.timeoutMs));
    } else {
        reject(Object.assign(error, { stderr }));
    }
}

function runExecFile(file: string, args: string[], limits: ExecLimits): Promise<{ stdout: string; stderr: string }> {
    return new Promise((resolve, reject) => {
        execFile(
            file,
            args,
            { encoding: 'utf8', maxBuffer: 16 * 1024 * 1024, timeout: limits.timeoutMs, killSignal: 'SIGKILL' },
            (error, stdout, stderr) => {
                settleExec(limits, resolve, reject, error, { stdout: String(stdout), stderr: String(stderr) }, String(stderr));
            }
        );
    });
}

function runExecFileBuffer(file: string, args: string[], limits: ExecLimits): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        execFile(
            file,
            args,
            { encoding: 'buffer', maxBuffer: 64 * 1024 * 1024, timeout: limits.timeoutMs, killSignal: 'SIGKILL' },
            (error, stdout, stderr) => {
                settleExec(limits, resolve, reject, error, stdout, stderr.toString('utf8'));
            }
        );
    });
}

/** adb bound to one serial, with retries for the transient failures emulators produce. */
export class ReliableAdb {
    readonly deviceId: string;
    private readonly adbPath: string;
    private readonly commandTimeoutMs: number;
    private readonly maxRetries: number;
    private readonly retryDelayMs: number;

    constructor(deviceId: string, options: ReliableAdbOptions = {}) {
        this.deviceId = deviceId;
        this.adbPath = options.adbPath ?? 'adb';
        this.commandTimeoutMs = options.commandTimeoutMs ?? config.environment.commandTimeoutMs;
        this.maxRetries = options.maxRetries ?? config.environment.adb.maxRetries;
        this.retryDelayMs = options.retryDelayMs ?? config.environment.adb.retryDelayMs;
    }

    async shell(command: string, opts: AdbCommandOptions = {}): Promise<string> {
        const stdout = await this.run(['shell', command], opts);
        return stdout.trim();
    }

    /** Raw adb subcommand against this device, e.g. `emu avd snapshot save`. */
    async exec(args: string[], opts: AdbCommandOptions = {}): Promise<string> {
        const stdout = await this.run(args, opts);
        return stdout.trim();
    }

    async execBuffer(args: string[], timeoutMs = this.commandTimeoutMs): Promise<Buffer> {
        return runExecFileBuffer(this.adbPath, ['-s', this.deviceId, ...args], { timeoutMs, label: `adb ${args.join(' ')}` });
    }

    async healthCheck(timeoutMs = config.environment.adb.healthCheckTimeoutMs): Promise<HealthCheckResult> {
        const start = Date.now();
        const details = {
            adbResponsive: false,
            bootCompleted: false,
        };

        try {
            const { stdout } = await runExecFile(
                this.adbPath,
                ['-s', this.deviceId, 'shell', 'echo', 'ping'],
                { timeoutMs, label: 'adb echo ping' }
            );
            details.adbResponsive = stdout.trim() === 'ping';
        } catch {
            return { healthy: false, details, latencyMs: Date.now() - start };
        }

        try {
            const bootProp = await this.shell('getprop sys.boot_completed', { timeoutMs, retries: 0 });
            details.bootCompleted = bootProp.trim() === '1';
        } catch (error) {
            logger.debug(`Boot property unreadable on ${this.deviceId}`, error);
        }

        const healthy = details.adbResponsive && details.bootCompleted;
        return { healthy, details, latencyMs: Date.now() - start };
    }

    async reconnect(): Promise<boolean> {
        const timeoutMs = config.environment.adb.healthCheckTimeoutMs;
        try {
            await runExecFile(this.adbPath, ['disconnect', this.deviceId], { timeoutMs, label: 'adb disconnect' })
                .catch(() => undefined);
            await sleep(1000);
            await runExecFile(this.adbPath, ['connect', this.deviceId], { timeoutMs, label: 'adb connect' });
            await sleep(2000);
            const result = await this.healthCheck();
            return result.healthy;
        } catch (error) {
            logger.warn(`Reconnect to ${this.deviceId} failed`, error);
            return false;
        }
    }

    private async run(args: string[], opts: AdbCommandOptions): Promise<string> {
        const maxRetries = opts.retries ?? this.maxRetries;
        const retryDelayMs = opts.retryDelayMs ?? this.retryDelayMs;
        const timeoutMs = opts.timeoutMs ?? this.commandTimeoutMs;
        const label = `adb ${args.join(' ')}`;

        let lastError: unknown;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            try {
                const { stdout } = await runExecFile(this.adbPath, ['-s', this.deviceId, ...args], { timeoutMs, label });
                return stdout;
            } catch (error) {
                lastError = error;
                const errorType = classifyAdbError(error);

                // Only link-level failures are retried.
                if (attempt >= maxRetries || (errorType !== 'DEVICE_OFFLINE' && errorType !== 'CONNECTION_RESET')) {
                    break;
                }

                logger.warn(`ADB ${errorType} for ${this.deviceId}, retrying (${attempt + 1}/${maxRetries})`);
                await sleep(retryDelayMs);
                await this.reconnect();
            }
        }

        throw toDeviceControlError(lastError ?? new Error(`${label} failed after ${maxRetries} retries`), this.deviceId);
    }
}
