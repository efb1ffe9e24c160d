import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger } from './logger';
import type { SnapshotMetadata } from '@/types';

const logger = createLogger('snapshot-store');

const SNAPSHOT_REF_PATTERN = /^[a-zA-Z0-9._-]{1,200}$/;

const snapshotMetadataSchema = z.object({
    snapshotRef: z.string(),
    trajectoryId: z.string(),
    deviceBinding: z.string(),
    deviceRef: z.string(),
    createdAt: z.string(),
});

export function isValidSnapshotRef(snapshotRef: string): boolean {
    return SNAPSHOT_REF_PATTERN.test(snapshotRef) && snapshotRef !== '.' && snapshotRef !== '..';
}

/** Session metadata kept beside each device snapshot, one JSON file per ref. */
export class SnapshotStore {
    constructor(private readonly directory: string) {}

    async write(metadata: SnapshotMetadata): Promise<string> {
        if (!isValidSnapshotRef(metadata.snapshotRef)) {
            throw new Error(`Invalid snapshot ref "${metadata.snapshotRef}"`);
        }
        await fs.mkdir(this.directory, { recursive: true });
        const filePath = this.pathFor(metadata.snapshotRef);
        await fs.writeFile(filePath, JSON.stringify(metadata, null, 2), 'utf8');
        return filePath;
    }

    async read(snapshotRef: string): Promise<SnapshotMetadata | null> {
        if (!isValidSnapshotRef(snapshotRef)) {
            return null;
        }

        let raw: string;
        try {
            raw = await fs.readFile(this.pathFor(snapshotRef), 'utf8');
        } catch (error) {
            if (isNotFound(error)) return null;
            throw error;
        }

        try {
            return snapshotMetadataSchema.parse(JSON.parse(raw));
        } catch (error) {
            logger.warn(`Ignoring unreadable snapshot metadata ${snapshotRef}`, error);
            return null;
        }
    }

    async remove(snapshotRef: string): Promise<void> {
        if (!isValidSnapshotRef(snapshotRef)) return;
        await fs.rm(this.pathFor(snapshotRef), { force: true });
    }

    private pathFor(snapshotRef: string): string {
        return path.join(this.directory, `${snapshotRef}.json`);
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
