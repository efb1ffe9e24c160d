import { Router } from 'express';
import { z } from 'zod';
import type { Coordinator } from '@/lib/coordinator';

const calculateSchema = z.object({
    reward_type: z.string().min(1).default('rule_based'),
    trajectory_id: z.string().min(1).optional(),
    trajectory_data: z.record(z.unknown()),
});

export function rewardRoutes(coordinator: Coordinator): Router {
    const router = Router();

    router.post('/calculate', (req, res) => {
        const body = calculateSchema.parse(req.body);
        const result = coordinator.resolve('reward').calculate(body.reward_type, body.trajectory_data, body.trajectory_id ?? null);
        res.json(result);
    });

    router.get('/types', (_req, res) => {
        res.json({ rewardTypes: coordinator.resolve('reward').listRewardTypes() });
    });

    return router;
}
