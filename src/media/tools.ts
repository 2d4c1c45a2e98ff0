/**
 * External media tools used by the pipeline.
 * Tests substitute this seam with in-process fakes.
 */
import type { Config } from '../config/index.js';
import { toolInvocationsTotal } from '../observability/metrics.js';
import { downloadMedia } from './downloader.js';
import { probeVideoStream } from './probe.js';
import { encode, type EncodeProfile } from './transcoder.js';

export interface MediaTools {
    /** Run yt-dlp; resolves with the path of the downloaded file */
    download(url: string, workspaceDir: string, signal?: AbortSignal): Promise<string>;
    /** Run ffprobe; resolves true when a video stream is reported */
    probeVideoStream(path: string, signal?: AbortSignal): Promise<boolean>;
    /** Run ffmpeg with a fixed profile */
    encode(profile: EncodeProfile, inputPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
}

async function counted<T>(tool: string, fn: () => Promise<T>): Promise<T> {
    try {
        const result = await fn();
        toolInvocationsTotal.inc({ tool, status: 'success' });
        return result;
    } catch (error) {
        toolInvocationsTotal.inc({ tool, status: 'failed' });
        throw error;
    }
}

export function createMediaTools(cfg: Config): MediaTools {
    return {
        download: (url, workspaceDir, signal) =>
            counted('yt-dlp', () =>
                downloadMedia(url, workspaceDir, {
                    ytDlpPath: cfg.ytDlpPath,
                    proxy: cfg.downloadProxy,
                    signal,
                })
            ),
        probeVideoStream: (path, signal) =>
            counted('ffprobe', () => probeVideoStream(path, { ffprobePath: cfg.ffprobePath, signal })),
        encode: (profile, inputPath, outputPath, signal) =>
            counted('ffmpeg', () => encode(profile, inputPath, outputPath, { ffmpegPath: cfg.ffmpegPath, signal })),
    };
}
