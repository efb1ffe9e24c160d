function envString(name: string, fallback: string): string {
    const value = process.env[name]?.trim();
    return value ? value : fallback;
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name]?.trim();
    if (!raw) return fallback;
    const parsed = Number.parseInt(raw, 10);
    return Number.isFinite(parsed) ? parsed : fallback;
}

function envList(name: string): string[] {
    return (process.env[name] ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

export const config = {
    app: {
        name: 'Android Rollout Service',
    },

    server: {
        host: envString('HOST', 'localhost'),
        port: envInt('PORT', 5000),
        maxRequestBodyBytes: 256 * 1024,
    },

    logging: {
        // 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent'
        // Override with LOG_LEVEL environment variable
        defaultLevel: envString('LOG_LEVEL', 'info'),
    },

    environment: {
        // Upper bound on concurrently live trajectories per environment worker.
        capacity: envInt('ENV_CAPACITY', 4),
        // Explicit device serials win over the generated emulator-<port> list.
        devices: envList('ANDROID_DEVICES'),
        basePort: envInt('EMULATOR_BASE_PORT', 5554),
        deviceCount: envInt('EMULATOR_COUNT', 4),
        snapshotDir: envString('SNAPSHOT_DIR', '/tmp/android_snapshots'),
        commandTimeoutMs: envInt('ENV_COMMAND_TIMEOUT_MS', 15_000),
        maxIdleMs: envInt('ENV_MAX_IDLE_MS', 3_600_000),
        reapIntervalMs: 60_000,

        adb: {
            maxRetries: 3,
            retryDelayMs: 2_000,
            healthCheckTimeoutMs: 5_000,
            uiDumpPath: '/sdcard/window_dump.xml',
        },
    },

    coordinator: {
        healthCheckIntervalMs: envInt('HEALTH_CHECK_INTERVAL_MS', 10_000),
        probeTimeoutMs: 5_000,
        maxConsecutiveFailures: envInt('HEALTH_CHECK_MAX_FAILURES', 3),
    },

    reward: {
        ruleBased: {
            stepPenalty: -0.01,
            targetBonus: 0.5,
            successBonus: 1.0,
        },
        efficiency: {
            failurePenalty: -0.1,
        },
    },
} as const;

export type Config = typeof config;
