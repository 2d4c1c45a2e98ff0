/**
 * Per-request scratch directory
 */
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { logger } from '../observability/logger.js';

export const WORKSPACE_PREFIX = 'video_dl_';

export interface Workspace {
    readonly dir: string;
    /** Recursive, best-effort and safe to call more than once */
    cleanup(): Promise<void>;
}

export async function createWorkspace(parentDir?: string | null): Promise<Workspace> {
    const dir = await mkdtemp(join(parentDir || tmpdir(), WORKSPACE_PREFIX));

    return {
        dir,
        async cleanup(): Promise<void> {
            try {
                await rm(dir, { recursive: true, force: true });
            } catch (error) {
                logger.warn('Failed to remove workspace', { dir, error });
            }
        },
    };
}
