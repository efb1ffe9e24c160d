import type { Server } from 'node:http';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { ZodError } from 'zod';
import { config } from '@/config/app';
import { createLogger } from '@/lib/logger';
import { ServiceError, getErrorMessage } from '@/lib/errors';
import type { Coordinator } from '@/lib/coordinator';
import { coordinatorRoutes } from './api/coordinator/route';
import { workerRoutes } from './api/workers/route';
import { envRoutes } from './api/env/route';
import { rewardRoutes } from './api/reward/route';

const logger = createLogger('server');

/** Status of a body-parser failure (malformed JSON, oversized body), if that is what this is. */
function requestBodyStatus(error: unknown): number | null {
    if (
        error instanceof Error
        && 'type' in error && typeof error.type === 'string' && error.type.startsWith('entity.')
        && 'status' in error && typeof error.status === 'number'
    ) {
        return error.status;
    }
    return null;
}

export function createApp(coordinator: Coordinator): Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: config.server.maxRequestBodyBytes }));

    app.use('/api/coordinator', coordinatorRoutes(coordinator));
    app.use('/api/workers', workerRoutes(coordinator));
    app.use('/api/env', envRoutes(coordinator));
    app.use('/api/reward', rewardRoutes(coordinator));

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: `No route for ${req.method} ${req.path}`, code: 'NOT_FOUND', details: {} });
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (error instanceof ServiceError) {
            if (error.httpStatus >= 500) {
                logger.warn(`${req.method} ${req.path} failed: ${error.message}`, { code: error.code, details: error.details });
            }
            res.status(error.httpStatus).json(error.toJSON());
            return;
        }

        if (error instanceof ZodError) {
            res.status(400).json({
                error: 'Invalid request body',
                code: 'INVALID_REQUEST',
                details: { issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })) },
            });
            return;
        }

        const bodyStatus = requestBodyStatus(error);
        if (bodyStatus !== null) {
            res.status(bodyStatus).json({ error: getErrorMessage(error), code: 'INVALID_REQUEST', details: {} });
            return;
        }

        logger.error(`Unhandled error on ${req.method} ${req.path}`, error);
        res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR', details: {} });
    });

    return app;
}

/** Resolves once the port is bound; bind failures such as EADDRINUSE reject. */
export function listen(app: Express, port: number, host: string): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('error', reject);
        server.once('listening', () => {
            server.off('error', reject);
            resolve(server);
        });
    });
}
