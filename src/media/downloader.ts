/**
 * Media Downloader
 * Downloads the best available media for a URL with yt-dlp
 */
import { stat } from 'fs/promises';
import { isAbsolute, join } from 'path';
import { runTool } from './process.js';

// Best merged mp4 first, then best single mp4, then anything
export const FORMAT_SELECTOR = 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best';

// yt-dlp sanitizes the title; .200s bounds its length
export const OUTPUT_TEMPLATE = '%(title).200s.%(ext)s';

export interface DownloadOptions {
    ytDlpPath?: string;
    proxy?: string | null;
    signal?: AbortSignal;
}

/**
 * Build the yt-dlp argument list.
 *
 * stdout carries the planned filename (before download) followed by the
 * final path (after merging/moving), one per line.
 */
export function buildDownloadArgs(url: string, workspaceDir: string, proxy?: string | null): string[] {
    const args = [
        '-f', FORMAT_SELECTOR,
        '--merge-output-format', 'mp4',
        '-o', join(workspaceDir, OUTPUT_TEMPLATE),
        '--no-playlist',
        '--quiet',
        '--no-warnings',
        '--ignore-config',
        '--no-simulate',
        '--print', 'before_dl:filename',
        '--print', 'after_move:filepath',
    ];

    if (proxy) {
        args.push('--proxy', proxy);
    }

    args.push(url);
    return args;
}

/**
 * Pick the reported output path from yt-dlp stdout: the final path when
 * yt-dlp printed one, otherwise the planned filename.
 */
export function resolveReportedPath(stdout: string, workspaceDir: string): string | null {
    const lines = stdout
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0 && line !== 'NA');

    const reported = lines.at(-1);
    if (!reported) {
        return null;
    }

    return isAbsolute(reported) ? reported : join(workspaceDir, reported);
}

export class DownloadFailedError extends Error {
    constructor(message: string, public readonly stderr: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DownloadFailedError';
    }
}

/**
 * Download media into workspaceDir and return the path of the file on disk
 */
export async function downloadMedia(
    url: string,
    workspaceDir: string,
    options: DownloadOptions = {}
): Promise<string> {
    const args = buildDownloadArgs(url, workspaceDir, options.proxy);
    const result = await runTool(options.ytDlpPath || 'yt-dlp', args, { signal: options.signal });

    if (result.code !== 0) {
        const detail = result.stderr.trim() || `exit code ${result.code}`;
        throw new DownloadFailedError(`yt-dlp failed: ${detail}`, result.stderr);
    }

    const filePath = resolveReportedPath(result.stdout, workspaceDir);
    if (!filePath) {
        throw new DownloadFailedError('yt-dlp completed but reported no output file', result.stderr);
    }

    try {
        await stat(filePath);
    } catch (error) {
        throw new DownloadFailedError(`yt-dlp output file is missing: ${filePath}`, result.stderr, { cause: error });
    }

    return filePath;
}
