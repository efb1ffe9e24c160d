import { Router } from 'express';
import asyncHandler from 'express-async-handler';
import { z } from 'zod';
import { createLogger } from '@/lib/logger';
import type { Coordinator } from '@/lib/coordinator';

const logger = createLogger('api:workers');

const configPatchSchema = z.record(z.unknown());

export function workerRoutes(coordinator: Coordinator): Router {
    const router = Router();

    router.get('/:id/status', (req, res) => {
        res.json(coordinator.worker(req.params.id).status());
    });

    router.post('/:id/start', asyncHandler(async (req, res) => {
        res.json(await coordinator.worker(req.params.id).start());
    }));

    router.post('/:id/stop', asyncHandler(async (req, res) => {
        res.json(await coordinator.worker(req.params.id).stop());
    }));

    router.post('/:id/restart', asyncHandler(async (req, res) => {
        res.json(await coordinator.worker(req.params.id).restart());
    }));

    router.put('/:id/config', asyncHandler(async (req, res) => {
        const patch = configPatchSchema.parse(req.body);
        res.json(await coordinator.worker(req.params.id).updateConfig(patch));
    }));

    router.delete('/:id', asyncHandler(async (req, res) => {
        await coordinator.unregister(req.params.id);
        logger.info(`Worker ${req.params.id} unregistered over HTTP`);
        res.json({ id: req.params.id, removed: true });
    }));

    return router;
}
