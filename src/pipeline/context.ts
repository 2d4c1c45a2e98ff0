/**
 * Pipeline context, built once at start-up and passed to every request
 */
import { maxFileSizeBytes, type Config } from '../config/index.js';
import { logger as rootLogger, type Logger } from '../observability/logger.js';
import { createMediaTools, type MediaTools } from '../media/tools.js';
import { WorkerPool } from './worker-pool.js';

export interface PipelineContext {
    /** Delivery cap in bytes */
    maxFileSizeBytes: number;
    /** Parent directory for request workspaces */
    tempDir: string | null;
    pool: WorkerPool;
    tools: MediaTools;
    logger: Logger;
}

export function createPipelineContext(cfg: Config, overrides: Partial<PipelineContext> = {}): PipelineContext {
    return {
        maxFileSizeBytes: maxFileSizeBytes(cfg),
        tempDir: cfg.tempDir,
        pool: new WorkerPool({
            concurrency: cfg.workerConcurrency,
            timeoutMs: cfg.stageTimeoutMs,
        }),
        tools: createMediaTools(cfg),
        logger: rootLogger,
        ...overrides,
    };
}
