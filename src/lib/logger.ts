import pino from 'pino';
import { config } from '@/config/app';

export interface Logger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

const root = pino({
    level: config.logging.defaultLevel,
    base: { service: 'android-rollout-service' },
    timestamp: pino.stdTimeFunctions.isoTime,
});

function toBindings(meta: unknown): Record<string, unknown> {
    if (meta === undefined) return {};
    if (meta instanceof Error) return { err: meta };
    if (meta && typeof meta === 'object' && !Array.isArray(meta)) {
        return { ...meta };
    }
    return { detail: meta };
}

export function createLogger(name: string): Logger {
    const child = root.child({ module: name });
    const write = (level: Level) => (message: string, meta?: unknown) => {
        child[level](toBindings(meta), message);
    };

    return {
        debug: write('debug'),
        info: write('info'),
        warn: write('warn'),
        error: write('error'),
    };
}
