import { isDeepStrictEqual } from 'node:util';
import { z } from 'zod';
import { config as appConfig } from '@/config/app';
import { createLogger } from '../logger';
import { UnknownRewardTypeError } from '../errors';
import { BaseWorker } from './base-worker';
import type { RewardResult, RewardType, TrajectoryData, WorkerConfig, WorkerHealth } from '@/types';

const logger = createLogger('reward-worker');

// Signs are fixed so that succeeding never scores below failing.
export const rewardWorkerConfigSchema = z.object({
    stepPenalty: z.number().nonpositive().default(appConfig.reward.ruleBased.stepPenalty),
    targetBonus: z.number().nonnegative().default(appConfig.reward.ruleBased.targetBonus),
    successBonus: z.number().nonnegative().default(appConfig.reward.ruleBased.successBonus),
    failurePenalty: z.number().nonpositive().default(appConfig.reward.efficiency.failurePenalty),
}).passthrough();

export type RewardWorkerConfig = z.infer<typeof rewardWorkerConfigSchema>;

const record = z.record(z.unknown());

// Malformed optional fields fall back to their empty value instead of failing the call.
const trajectoryDataSchema = z.object({
    actions: z.array(z.unknown()).catch([]),
    states: z.array(z.unknown()).catch([])
        .transform((states) => states.filter((state): state is Record<string, unknown> => record.safeParse(state).success)),
    success: z.boolean().catch(false),
    goal: record.catch({}),
    final_state: record.catch({}),
    goal_reached: z.boolean().catch(false),
});

export function parseTrajectoryData(raw: unknown): TrajectoryData {
    const data = trajectoryDataSchema.parse(record.catch({}).parse(raw));
    return {
        actions: data.actions,
        states: data.states,
        success: data.success,
        goal: data.goal,
        finalState: data.final_state,
        goalReached: data.goal_reached,
    };
}

type RewardFunction = (data: TrajectoryData, weights: RewardWorkerConfig) => {
    reward: number;
    breakdown: Record<string, number>;
};

function ruleBased(data: TrajectoryData, weights: RewardWorkerConfig) {
    const actionPenalty = weights.stepPenalty * data.actions.length;
    const targetReached = data.states.some((state) => 'target_element' in state && state.interaction === 'click');
    const targetBonus = targetReached ? weights.targetBonus : 0;
    const successBonus = data.success ? weights.successBonus : 0;

    return {
        reward: actionPenalty + targetBonus + successBonus,
        breakdown: {
            action_penalty: actionPenalty,
            target_bonus: targetBonus,
            success_bonus: successBonus,
        },
    };
}

function taskCompletion(data: TrajectoryData) {
    const keys = Object.keys(data.goal);
    const completed = keys.length > 0 && keys.every((key) =>
        Object.prototype.hasOwnProperty.call(data.finalState, key) && isDeepStrictEqual(data.finalState[key], data.goal[key])
    );

    return {
        reward: completed ? 1 : 0,
        breakdown: { task_completed: completed ? 1 : 0 },
    };
}

function efficiency(data: TrajectoryData, weights: RewardWorkerConfig) {
    const actionCount = data.actions.length;
    let reward: number;
    if (!data.goalReached) {
        reward = weights.failurePenalty;
    } else {
        reward = actionCount === 0 ? 0 : 1 / actionCount;
    }

    return {
        reward,
        breakdown: {
            num_actions: actionCount,
            goal_reached: data.goalReached ? 1 : 0,
        },
    };
}

const REWARD_FUNCTIONS: Record<RewardType, RewardFunction> = {
    rule_based: ruleBased,
    task_completion: taskCompletion,
    efficiency,
};

function isRewardType(value: string): value is RewardType {
    return Object.prototype.hasOwnProperty.call(REWARD_FUNCTIONS, value);
}

function round(value: number): number {
    const rounded = Math.round(value * 1e6) / 1e6;
    return Object.is(rounded, -0) ? 0 : rounded;
}

export interface RewardWorkerOptions {
    id?: string;
    config?: WorkerConfig;
}

/** Scores recorded trajectories. Holds no per-trajectory state. */
export class RewardWorker extends BaseWorker<RewardWorkerConfig> {
    private calculations = 0;

    constructor(options: RewardWorkerOptions = {}) {
        super({
            id: options.id,
            kind: 'reward',
            schema: rewardWorkerConfigSchema,
            config: options.config,
        });
    }

    listRewardTypes(): RewardType[] {
        return Object.keys(REWARD_FUNCTIONS).filter(isRewardType);
    }

    calculate(rewardType: string, trajectoryData: unknown, trajectoryId: string | null = null): RewardResult {
        if (!isRewardType(rewardType)) {
            throw new UnknownRewardTypeError(rewardType, this.listRewardTypes());
        }

        const data = parseTrajectoryData(trajectoryData);
        const { reward, breakdown } = REWARD_FUNCTIONS[rewardType](data, this.config);
        this.calculations += 1;

        const result: RewardResult = {
            rewardType,
            trajectoryId,
            reward: round(reward),
            breakdown: Object.fromEntries(Object.entries(breakdown).map(([key, value]) => [key, round(value)])),
        };
        logger.debug(`Calculated ${rewardType} reward`, { trajectoryId, reward: result.reward });
        return result;
    }

    async probe(): Promise<WorkerHealth> {
        return { healthy: true, details: { calculations: this.calculations } };
    }

    describe(): Record<string, unknown> {
        return { rewardTypes: this.listRewardTypes(), calculations: this.calculations };
    }
}
