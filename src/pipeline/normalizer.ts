/**
 * Normalizer - turns a classified download into a deliverable file:
 * MP4 (H.264/AAC) for video, MP3 for everything else
 */
import { stat } from 'fs/promises';
import type { EncodeProfile } from '../media/transcoder.js';
import type { PipelineContext } from './context.js';
import { StageTimeoutError, TranscodeError, errorMessage } from './errors.js';
import { hasExtension, siblingPath } from './paths.js';
import type { MediaArtifact, MediaKind } from './types.js';

export const CANONICAL_VIDEO_EXTENSION = '.mp4';
export const AUDIO_EXTENSION = '.mp3';

export function isCanonicalVideo(artifact: MediaArtifact): boolean {
    return artifact.hasVideo && hasExtension(artifact.path, CANONICAL_VIDEO_EXTENSION);
}

interface NormalizePlan {
    profile: EncodeProfile;
    outputPath: string;
    kind: MediaKind;
}

function planFor(artifact: MediaArtifact): NormalizePlan {
    if (artifact.hasVideo) {
        return {
            profile: 'mp4',
            outputPath: siblingPath(artifact.path, '_normalized', CANONICAL_VIDEO_EXTENSION),
            kind: 'video',
        };
    }

    // Never let the encoder write over its own input
    const suffix = hasExtension(artifact.path, AUDIO_EXTENSION) ? '_audio' : '';
    return {
        profile: 'mp3',
        outputPath: siblingPath(artifact.path, suffix, AUDIO_EXTENSION),
        kind: 'audio',
    };
}

export async function normalizeMedia(artifact: MediaArtifact, ctx: PipelineContext): Promise<MediaArtifact> {
    if (isCanonicalVideo(artifact)) {
        ctx.logger.debug('Already a canonical mp4, skipping normalization', { path: artifact.path });
        return { ...artifact, kind: 'video' };
    }

    const plan = planFor(artifact);
    ctx.logger.info('Normalizing media', { inputPath: artifact.path, ...plan });

    try {
        await ctx.pool.run('normalize', (signal) =>
            ctx.tools.encode(plan.profile, artifact.path, plan.outputPath, signal)
        );
    } catch (error) {
        if (error instanceof StageTimeoutError) {
            throw error;
        }
        throw new TranscodeError(errorMessage(error), { cause: error });
    }

    let sizeBytes: number;
    try {
        sizeBytes = (await stat(plan.outputPath)).size;
    } catch (error) {
        throw new TranscodeError(`Encoder produced no output at ${plan.outputPath}`, { cause: error });
    }

    return {
        path: plan.outputPath,
        sizeBytes,
        hasVideo: artifact.hasVideo,
        kind: plan.kind,
    };
}
