/**
 * Size Reducer - one compression pass for oversized video
 */
import { stat } from 'fs/promises';
import type { PipelineContext } from './context.js';
import { StageTimeoutError } from './errors.js';
import { siblingPath } from './paths.js';
import type { MediaArtifact } from './types.js';

/**
 * Return the artifact when it fits, otherwise re-encode it once at a lower
 * resolution and quality. Null means the single pass did not get under the
 * cap; there is no second attempt. Audio passes through untouched.
 */
export async function reduceIfNeeded(
    artifact: MediaArtifact,
    capBytes: number,
    ctx: PipelineContext
): Promise<MediaArtifact | null> {
    if (artifact.kind !== 'video' || artifact.sizeBytes <= capBytes) {
        return artifact;
    }

    const outputPath = siblingPath(artifact.path, '_compressed', '.mp4');
    ctx.logger.info('Video exceeds delivery cap, compressing', {
        path: artifact.path,
        sizeBytes: artifact.sizeBytes,
        capBytes,
    });

    try {
        await ctx.pool.run('reduce', (signal) =>
            ctx.tools.encode('compressed', artifact.path, outputPath, signal)
        );
    } catch (error) {
        if (error instanceof StageTimeoutError) {
            throw error;
        }
        ctx.logger.error('Compression failed', error, { path: artifact.path });
        return null;
    }

    let sizeBytes: number;
    try {
        sizeBytes = (await stat(outputPath)).size;
    } catch (error) {
        ctx.logger.warn('Compressed file is missing', { outputPath, error });
        return null;
    }

    if (sizeBytes > capBytes) {
        ctx.logger.info('Compressed video is still too large', { outputPath, sizeBytes, capBytes });
        return null;
    }

    return { path: outputPath, sizeBytes, hasVideo: true, kind: 'video' };
}
