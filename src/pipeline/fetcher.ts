/**
 * Fetcher - downloads the requested media into the workspace
 */
import { stat } from 'fs/promises';
import type { PipelineContext } from './context.js';
import { FetchError, StageTimeoutError, errorMessage } from './errors.js';
import type { MediaArtifact, MediaRequest } from './types.js';

/**
 * Download the media behind request.sourceUrl.
 * The artifact is provisionally marked as video until it is classified.
 */
export async function fetchMedia(
    request: MediaRequest,
    workspaceDir: string,
    ctx: PipelineContext
): Promise<MediaArtifact> {
    let path: string;
    let sizeBytes: number;

    try {
        path = await ctx.pool.run('fetch', (signal) =>
            ctx.tools.download(request.sourceUrl, workspaceDir, signal)
        );
        sizeBytes = (await stat(path)).size;
    } catch (error) {
        if (error instanceof StageTimeoutError) {
            throw error;
        }
        throw new FetchError(errorMessage(error), { cause: error });
    }

    ctx.logger.info('Download complete', { path, sizeBytes });

    return { path, sizeBytes, hasVideo: true, kind: 'video' };
}
