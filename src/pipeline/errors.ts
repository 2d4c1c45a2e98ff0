/**
 * Pipeline error taxonomy
 */
export type PipelineStage = 'fetch' | 'classify' | 'normalize' | 'reduce' | 'deliver';

export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly stage: PipelineStage,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'PipelineError';
    }
}

/**
 * yt-dlp failed: network, geo/bot check, unsupported URL, unavailable media
 */
export class FetchError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'fetch', options);
        this.name = 'FetchError';
    }
}

/**
 * ffmpeg exited non-zero while normalizing
 */
export class TranscodeError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'normalize', options);
        this.name = 'TranscodeError';
    }
}

export class SizeExceededError extends PipelineError {
    constructor(
        public readonly sizeBytes: number | null,
        public readonly capBytes: number,
        stage: PipelineStage
    ) {
        super(
            sizeBytes === null
                ? `No output within ${capBytes} bytes`
                : `Output is ${sizeBytes} bytes, cap is ${capBytes} bytes`,
            stage
        );
        this.name = 'SizeExceededError';
    }
}

export class DeliveryError extends PipelineError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'deliver', options);
        this.name = 'DeliveryError';
    }
}

export class StageTimeoutError extends Error {
    constructor(public readonly label: string, public readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`);
        this.name = 'StageTimeoutError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
