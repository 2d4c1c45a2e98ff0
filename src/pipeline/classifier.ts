/**
 * Stream Classifier
 */
import type { PipelineContext } from './context.js';
import { errorMessage } from './errors.js';

/**
 * True when the file has a video stream. Fails open: an unavailable or
 * failing probe counts as video, so visual content is never stripped.
 */
export async function hasVideoStream(path: string, ctx: PipelineContext): Promise<boolean> {
    try {
        return await ctx.pool.run('classify', (signal) => ctx.tools.probeVideoStream(path, signal));
    } catch (error) {
        ctx.logger.warn('Stream probe failed, assuming video', { path, error: errorMessage(error) });
        return true;
    }
}
