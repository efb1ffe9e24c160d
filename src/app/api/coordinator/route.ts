import { Router } from 'express';
import type { Coordinator } from '@/lib/coordinator';

export function coordinatorRoutes(coordinator: Coordinator): Router {
    const router = Router();

    router.get('/status', (_req, res) => {
        res.json(coordinator.status());
    });

    router.get('/workers', (_req, res) => {
        res.json({ workers: coordinator.status().workers });
    });

    return router;
}
