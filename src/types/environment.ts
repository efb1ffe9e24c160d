import type { Observation } from './android';

export type TrajectoryState = 'created' | 'running' | 'saved' | 'removed';

export interface SnapshotMetadata {
    snapshotRef: string;
    trajectoryId: string;
    deviceBinding: string;
    deviceRef: string;
    createdAt: string;
}

export interface TrajectorySummary {
    trajectoryId: string;
    deviceBinding: string;
    state: TrajectoryState;
    snapshotRef: string | null;
    createdAt: number;
    lastActiveAt: number;
}

export interface CreatedTrajectory {
    trajectoryId: string;
    deviceBinding: string;
}

export interface StepResult {
    trajectoryId: string;
    observation: Observation;
}

export interface RemoveResult {
    trajectoryId: string;
    deviceBinding: string;
    teardownError: string | null;
    snapshotError: string | null;
    releaseError: string | null;
}
