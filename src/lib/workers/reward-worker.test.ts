import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { RewardWorker, parseTrajectoryData } from './reward-worker';
import { UnknownRewardTypeError } from '../errors';

describe('RewardWorker', () => {
    const worker = new RewardWorker();

    describe('rule_based', () => {
        it('scores a successful one-step trajectory', () => {
            expect(worker.calculate('rule_based', { actions: ['click 1 1'], states: [], success: true }, 'traj-1')).toEqual({
                rewardType: 'rule_based',
                trajectoryId: 'traj-1',
                reward: 0.99,
                breakdown: { action_penalty: -0.01, target_bonus: 0, success_bonus: 1 },
            });
        });

        it('never scores success below failure', () => {
            const data = { actions: ['click 1 1'], states: [] };
            const succeeded = worker.calculate('rule_based', { ...data, success: true }).reward;
            const failed = worker.calculate('rule_based', { ...data, success: false }).reward;

            expect(failed).toBe(-0.01);
            expect(succeeded).toBeGreaterThanOrEqual(failed);
        });

        it('adds the target bonus once for a clicked target', () => {
            const result = worker.calculate('rule_based', {
                actions: ['click 1 1', 'click 2 2', 'key back'],
                states: [
                    { target_element: 'save', interaction: 'click' },
                    { target_element: 'cancel', interaction: 'click' },
                ],
            });

            expect(result.reward).toBe(0.47);
            expect(result.breakdown).toEqual({ action_penalty: -0.03, target_bonus: 0.5, success_bonus: 0 });
        });

        it('ignores targets that were not clicked', () => {
            const result = worker.calculate('rule_based', { states: [{ target_element: 'save', interaction: 'swipe' }] });
            expect(result.reward).toBe(0);
        });
    });

    describe('task_completion', () => {
        it('pays out only when every goal key matches the final state', () => {
            const goal = { screen: 'settings', toggles: ['wifi'] };
            expect(worker.calculate('task_completion', { goal, final_state: { ...goal, extra: true } }).reward).toBe(1);
            expect(worker.calculate('task_completion', { goal, final_state: { screen: 'settings', toggles: [] } }).reward).toBe(0);
            expect(worker.calculate('task_completion', { goal: {}, final_state: { screen: 'settings' } }).reward).toBe(0);
        });
    });

    describe('efficiency', () => {
        it('rewards shorter successful trajectories', () => {
            expect(worker.calculate('efficiency', { actions: [1, 2, 3, 4], goal_reached: true }).reward).toBe(0.25);
            expect(worker.calculate('efficiency', { actions: [1, 2, 3], goal_reached: true }).reward).toBe(0.333333);
            expect(worker.calculate('efficiency', { actions: [], goal_reached: true }).reward).toBe(0);
            expect(worker.calculate('efficiency', { actions: [1], goal_reached: false })).toMatchObject({
                reward: -0.1,
                breakdown: { num_actions: 1, goal_reached: 0 },
            });
        });
    });

    it('rejects unknown reward types', () => {
        expect(() => worker.calculate('vibes', {})).toThrow(UnknownRewardTypeError);
    });

    it('lists the reward types it supports', () => {
        expect(worker.listRewardTypes()).toEqual(['rule_based', 'task_completion', 'efficiency']);
    });

    it('uses updated weights', async () => {
        const tuned = new RewardWorker({ config: { stepPenalty: -0.05 } });
        expect(tuned.calculate('rule_based', { actions: ['a', 'b'] }).reward).toBe(-0.1);

        await tuned.updateConfig({ successBonus: 2 });
        expect(tuned.calculate('rule_based', { actions: [], success: true }).reward).toBe(2);
    });

    it('rejects weights that would rank failure above success', async () => {
        const tuned = new RewardWorker();

        await expect(tuned.updateConfig({ successBonus: -1 })).rejects.toThrow(ZodError);
        await expect(tuned.updateConfig({ stepPenalty: 0.1 })).rejects.toThrow(ZodError);
        expect(tuned.getConfig()).toMatchObject({ stepPenalty: -0.01, successBonus: 1 });
        expect(() => new RewardWorker({ config: { failurePenalty: 0.5 } })).toThrow(ZodError);
    });
});

describe('parseTrajectoryData', () => {
    it('falls back to empty values for missing or malformed fields', () => {
        expect(parseTrajectoryData({ actions: 'oops', states: [1, { ok: true }], success: 'yes' })).toEqual({
            actions: [],
            states: [{ ok: true }],
            success: false,
            goal: {},
            finalState: {},
            goalReached: false,
        });
        expect(parseTrajectoryData(null)).toEqual({
            actions: [],
            states: [],
            success: false,
            goal: {},
            finalState: {},
            goalReached: false,
        });
    });
});
