import { Router } from 'express';
import asyncHandler from 'express-async-handler';
import { z } from 'zod';
import { listActionTypes } from '@/lib/action-normalizer';
import type { Coordinator } from '@/lib/coordinator';

const trajectorySchema = z.object({
    trajectory_id: z.string().min(1),
});

// `command` is the older field name and wins when both are sent.
const stepSchema = trajectorySchema.extend({
    command: z.unknown().optional(),
    action: z.unknown().optional(),
}).transform(({ trajectory_id, command, action }) => ({ trajectoryId: trajectory_id, action: command ?? action }))
    .refine((body) => body.action !== undefined && body.action !== null, {
        message: 'action or command is required',
        path: ['action'],
    });

const loadSchema = trajectorySchema.extend({
    snapshot_ref: z.string().min(1).optional(),
});

export function envRoutes(coordinator: Coordinator): Router {
    const router = Router();
    const environment = () => coordinator.resolve('environment');

    router.post('/create', asyncHandler(async (_req, res) => {
        res.status(201).json(await environment().create());
    }));

    router.post('/step', asyncHandler(async (req, res) => {
        const { trajectoryId, action } = stepSchema.parse(req.body);
        res.json(await environment().step(trajectoryId, action));
    }));

    router.post('/save', asyncHandler(async (req, res) => {
        const { trajectory_id } = trajectorySchema.parse(req.body);
        const snapshotRef = await environment().save(trajectory_id);
        res.json({ trajectoryId: trajectory_id, snapshotRef });
    }));

    router.post('/load', asyncHandler(async (req, res) => {
        const { trajectory_id, snapshot_ref } = loadSchema.parse(req.body);
        const observation = await environment().load(trajectory_id, snapshot_ref);
        res.json({ trajectoryId: trajectory_id, observation });
    }));

    router.post('/remove', asyncHandler(async (req, res) => {
        const { trajectory_id } = trajectorySchema.parse(req.body);
        res.json(await environment().remove(trajectory_id));
    }));

    router.get('/trajectories', (_req, res) => {
        res.json({ trajectories: environment().list() });
    });

    router.get('/trajectories/:id', (req, res) => {
        res.json(environment().describeTrajectory(req.params.id));
    });

    router.get('/actions', (_req, res) => {
        res.json({ actionTypes: listActionTypes() });
    });

    return router;
}
