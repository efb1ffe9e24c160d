import 'dotenv/config';
import type { Server } from 'node:http';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { config } from '@/config/app';
import { createLogger } from '@/lib/logger';
import { getAndroidSdkSetupHint, isAndroidToolAvailable } from '@/lib/android-sdk';
import { createService, type DeviceDriver } from '@/lib/service';
import { createApp, listen } from '@/app/server';

const logger = createLogger('main');

const DRIVERS: readonly DeviceDriver[] = ['adb', 'simulated'];

async function main(): Promise<void> {
    const argv = await yargs(hideBin(process.argv))
        .scriptName('android-rollout-service')
        .usage('$0 [options]')
        .option('host', {
            type: 'string',
            default: config.server.host,
            describe: 'Interface the HTTP server binds to',
        })
        .option('port', {
            type: 'number',
            default: config.server.port,
            describe: 'HTTP port',
        })
        .option('driver', {
            choices: DRIVERS,
            default: 'adb' as const,
            describe: 'How devices are driven: real emulators over adb, or an in-memory simulation',
        })
        .option('capacity', {
            type: 'number',
            default: config.environment.capacity,
            describe: 'Maximum number of concurrently live trajectories',
        })
        .strict()
        .help()
        .parseAsync();

    if (argv.driver === 'adb' && !isAndroidToolAvailable('adb')) {
        logger.warn(getAndroidSdkSetupHint());
    }

    const service = await createService({
        driver: argv.driver,
        environmentConfig: { capacity: argv.capacity },
    });
    await service.start();

    let server: Server;
    try {
        server = await listen(createApp(service.coordinator), argv.port, argv.host);
    } catch (error) {
        await service.shutdown();
        throw error;
    }
    logger.info(`${config.app.name} listening on http://${argv.host}:${argv.port}`);

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`Received ${signal}, shutting down`);

        await new Promise<void>((resolve) => server.close(() => resolve()));
        await service.shutdown();
        process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error) => {
                logger.error('Shutdown failed', error);
                process.exit(1);
            });
        });
    }
}

main().catch((error) => {
    logger.error('Failed to start', error);
    process.exit(1);
});
