/**
 * Pipeline module exports
 */
export { runPipeline, processRequest, VIDEO_CAPTION, AUDIO_CAPTION } from './orchestrator.js';
export { createPipelineContext, type PipelineContext } from './context.js';
export { parseMediaRequest } from './request.js';
export { fetchMedia } from './fetcher.js';
export { hasVideoStream } from './classifier.js';
export { normalizeMedia, isCanonicalVideo } from './normalizer.js';
export { reduceIfNeeded } from './size-reducer.js';
export { classifyFailure, userMessageFor, FAILURE_RULES, BOT_CHECK_PATTERNS } from './failure-reasons.js';
export { createWorkspace, WORKSPACE_PREFIX, type Workspace } from './workspace.js';
export { WorkerPool, type WorkerPoolOptions } from './worker-pool.js';
export * from './errors.js';
export type * from './types.js';
