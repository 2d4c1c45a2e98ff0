/**
 * Stream probe
 * Runs ffprobe directly so an aborted probe kills its process.
 */
import { z } from 'zod';
import { runTool } from './process.js';

// First video stream only, reported as JSON
export const PROBE_ARGS = [
    '-v', 'error',
    '-select_streams', 'v:0',
    '-show_entries', 'stream=codec_type',
    '-of', 'json',
];

const probeOutputSchema = z.object({
    streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
});

export interface ProbeOptions {
    ffprobePath?: string | null;
    signal?: AbortSignal;
}

export class ProbeFailedError extends Error {
    constructor(message: string, public readonly stderr: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProbeFailedError';
    }
}

function parseProbeOutput(stdout: string, stderr: string): z.infer<typeof probeOutputSchema> {
    let json: unknown;
    try {
        json = JSON.parse(stdout);
    } catch (error) {
        throw new ProbeFailedError('ffprobe returned invalid JSON', stderr, { cause: error });
    }

    const parsed = probeOutputSchema.safeParse(json);
    if (!parsed.success) {
        throw new ProbeFailedError('ffprobe returned an unexpected shape', stderr, { cause: parsed.error });
    }
    return parsed.data;
}

/**
 * Resolves true when ffprobe reports a codec type for the first video stream
 */
export async function probeVideoStream(inputPath: string, options: ProbeOptions = {}): Promise<boolean> {
    const result = await runTool(options.ffprobePath || 'ffprobe', [...PROBE_ARGS, inputPath], {
        signal: options.signal,
    });

    if (result.code !== 0) {
        const detail = result.stderr.trim() || `exit code ${result.code}`;
        throw new ProbeFailedError(`ffprobe failed: ${detail}`, result.stderr);
    }

    const { streams } = parseProbeOutput(result.stdout, result.stderr);
    return Boolean(streams[0]?.codec_type);
}
