export type RewardType = 'rule_based' | 'task_completion' | 'efficiency';

export interface TrajectoryData {
    actions: unknown[];
    states: Record<string, unknown>[];
    success: boolean;
    goal: Record<string, unknown>;
    finalState: Record<string, unknown>;
    goalReached: boolean;
}

export interface RewardResult {
    rewardType: RewardType;
    trajectoryId: string | null;
    reward: number;
    breakdown: Record<string, number>;
}
