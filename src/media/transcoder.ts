/**
 * Media Transcoder
 * FFmpeg-based normalization and compression
 */
import ffmpeg from 'fluent-ffmpeg';

export type EncodeProfile = 'mp4' | 'mp3' | 'compressed';

export interface EncodeOptions {
    ffmpegPath?: string | null;
    signal?: AbortSignal;
}

// Longer edge cap for the compression pass; -2 keeps the height even for yuv420p
export const COMPRESSION_SCALE_FILTER = "scale='min(1280,iw)':-2";

const PROFILE_OPTIONS: Record<EncodeProfile, string[]> = {
    // H.264/AAC in a streamable mp4
    mp4: [
        '-c:v libx264',
        '-preset fast',
        '-crf 23',
        '-c:a aac',
        '-b:a 128k',
        '-movflags +faststart',
        '-pix_fmt yuv420p',
    ],
    // Audio only
    mp3: [
        '-vn',
        '-c:a libmp3lame',
        '-b:a 192k',
    ],
    // Single size-reduction pass
    compressed: [
        `-vf ${COMPRESSION_SCALE_FILTER}`,
        '-c:v libx264',
        '-preset veryfast',
        '-crf 28',
        '-c:a aac',
        '-b:a 128k',
        '-movflags +faststart',
    ],
};

export function getProfileOptions(profile: EncodeProfile): string[] {
    return [...PROFILE_OPTIONS[profile]];
}

/**
 * Encode inputPath into outputPath with one of the fixed profiles
 */
export function encode(
    profile: EncodeProfile,
    inputPath: string,
    outputPath: string,
    options: EncodeOptions = {}
): Promise<void> {
    return new Promise((resolve, reject) => {
        const { signal } = options;

        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }

        const cmd = ffmpeg(inputPath);
        if (options.ffmpegPath) {
            cmd.setFfmpegPath(options.ffmpegPath);
        }
        cmd
            .outputOptions(getProfileOptions(profile))
            .output(outputPath);

        const onAbort = () => {
            cmd.kill('SIGKILL');
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        cmd
            .on('end', () => {
                signal?.removeEventListener('abort', onAbort);
                resolve();
            })
            .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
                signal?.removeEventListener('abort', onAbort);
                reject(new EncodeFailedError(profile, err.message, stderr || '', { cause: err }));
            })
            .run();
    });
}

export class EncodeFailedError extends Error {
    constructor(
        public readonly profile: EncodeProfile,
        message: string,
        public readonly stderr: string,
        options?: { cause?: unknown }
    ) {
        super(`ffmpeg ${profile} encode failed: ${message}`, options);
        this.name = 'EncodeFailedError';
    }
}
