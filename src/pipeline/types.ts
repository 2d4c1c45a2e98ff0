/**
 * Pipeline data model
 * All entities are transient and live for one request only.
 */

export type MediaKind = 'video' | 'audio';

export interface MediaRequest {
    sourceUrl: string;
}

/**
 * A media file produced by one pipeline stage. Files are owned by the
 * request workspace; a superseded artifact is never referenced again.
 */
export interface MediaArtifact {
    path: string;
    sizeBytes: number;
    hasVideo: boolean;
    kind: MediaKind;
}

export type FailureReason =
    | 'bot_check'
    | 'fetch_failed'
    | 'transcode_failed'
    | 'size_exceeded'
    | 'delivery_failed'
    | 'timeout'
    | 'internal';

export type DeliveryResult =
    | { ok: true; kind: MediaKind; path: string }
    | { ok: false; reason: FailureReason; message: string };

export type PipelineState =
    | 'idle'
    | 'fetching'
    | 'classifying'
    | 'normalizing'
    | 'reducing'
    | 'delivering'
    | 'done'
    | 'failed';

/**
 * Outbound side of a request. Exactly one method is invoked per accepted
 * request (plus a best-effort reportFailure after a rejected delivery).
 */
export interface DeliveryChannel {
    deliverVideo(path: string, caption: string, streaming: boolean): Promise<void>;
    deliverAudio(path: string, caption: string): Promise<void>;
    reportFailure(message: string): Promise<void>;
}
