/**
 * Pipeline Orchestrator
 *
 * One run per request:
 *   idle → fetching → classifying → normalizing → reducing? → delivering → done
 * or failed from any state. The workspace is removed on every exit path.
 */
import { v4 as uuid } from 'uuid';
import type { Logger } from '../observability/logger.js';
import { recordStage, requestsTotal } from '../observability/metrics.js';
import { hasVideoStream } from './classifier.js';
import type { PipelineContext } from './context.js';
import { DeliveryError, SizeExceededError, errorMessage } from './errors.js';
import { classifyFailure, userMessageFor } from './failure-reasons.js';
import { fetchMedia } from './fetcher.js';
import { normalizeMedia } from './normalizer.js';
import { parseMediaRequest } from './request.js';
import { reduceIfNeeded } from './size-reducer.js';
import type {
    DeliveryChannel,
    DeliveryResult,
    MediaArtifact,
    MediaRequest,
    PipelineState,
} from './types.js';
import { createWorkspace, type Workspace } from './workspace.js';

export const VIDEO_CAPTION = 'Done! 🎬 Here is your video.';
export const AUDIO_CAPTION = 'Done! 🎵 Here is your audio.';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
    idle: ['fetching', 'failed'],
    fetching: ['classifying', 'failed'],
    classifying: ['normalizing', 'failed'],
    normalizing: ['reducing', 'delivering', 'failed'],
    reducing: ['delivering', 'failed'],
    delivering: ['done', 'failed'],
    done: [],
    failed: [],
};

class PipelineRun {
    private current: PipelineState = 'idle';
    private enteredAt = Date.now();

    constructor(private readonly log: Logger) { }

    get state(): PipelineState {
        return this.current;
    }

    transition(next: PipelineState): void {
        if (!TRANSITIONS[this.current].includes(next)) {
            throw new Error(`Illegal pipeline transition ${this.current} → ${next}`);
        }

        const now = Date.now();
        if (this.current !== 'idle') {
            recordStage(this.current, (now - this.enteredAt) / 1000, next === 'failed' ? 'failed' : 'success');
        }

        this.log.debug('Pipeline transition', { from: this.current, to: next });
        this.current = next;
        this.enteredAt = now;
    }
}

async function deliver(artifact: MediaArtifact, delivery: DeliveryChannel): Promise<void> {
    try {
        if (artifact.kind === 'video') {
            await delivery.deliverVideo(artifact.path, VIDEO_CAPTION, true);
        } else {
            await delivery.deliverAudio(artifact.path, AUDIO_CAPTION);
        }
    } catch (error) {
        throw new DeliveryError(errorMessage(error), { cause: error });
    }
}

/**
 * Run the pipeline for an accepted request and hand the result to delivery.
 * Exactly one of deliverVideo, deliverAudio or reportFailure is called,
 * except that a rejected delivery is followed by a best-effort reportFailure.
 */
export async function runPipeline(
    request: MediaRequest,
    delivery: DeliveryChannel,
    ctx: PipelineContext
): Promise<DeliveryResult> {
    const log = ctx.logger.child({ requestId: uuid() });
    const stageCtx: PipelineContext = { ...ctx, logger: log };
    const run = new PipelineRun(log);
    const capBytes = ctx.maxFileSizeBytes;
    let workspace: Workspace | null = null;

    log.info('Processing media request', { sourceUrl: request.sourceUrl });

    try {
        run.transition('fetching');
        workspace = await createWorkspace(ctx.tempDir);
        let artifact = await fetchMedia(request, workspace.dir, stageCtx);

        run.transition('classifying');
        const hasVideo = await hasVideoStream(artifact.path, stageCtx);
        artifact = { ...artifact, hasVideo, kind: hasVideo ? 'video' : 'audio' };

        run.transition('normalizing');
        artifact = await normalizeMedia(artifact, stageCtx);

        if (artifact.kind === 'video') {
            run.transition('reducing');
            const reduced = await reduceIfNeeded(artifact, capBytes, stageCtx);
            if (!reduced) {
                throw new SizeExceededError(null, capBytes, 'reduce');
            }
            artifact = reduced;
        } else if (artifact.sizeBytes > capBytes) {
            throw new SizeExceededError(artifact.sizeBytes, capBytes, 'normalize');
        }

        run.transition('delivering');
        await deliver(artifact, delivery);

        run.transition('done');
        requestsTotal.inc({ outcome: artifact.kind });
        log.info('Media delivered', { kind: artifact.kind, path: artifact.path, sizeBytes: artifact.sizeBytes });

        return { ok: true, kind: artifact.kind, path: artifact.path };
    } catch (error) {
        const failedIn = run.state;
        run.transition('failed');

        const reason = classifyFailure(error);
        const message = userMessageFor(reason, capBytes);
        requestsTotal.inc({ outcome: reason });
        log.error('Media request failed', error, { reason, state: failedIn });

        try {
            await delivery.reportFailure(message);
        } catch (reportError) {
            log.warn('Could not report failure to user', { error: errorMessage(reportError) });
        }

        return { ok: false, reason, message };
    } finally {
        await workspace?.cleanup();
    }
}

/**
 * Entry point for raw user text. Non-URL text is ignored: no workspace,
 * no outbound call, null result.
 */
export async function processRequest(
    text: string,
    delivery: DeliveryChannel,
    ctx: PipelineContext
): Promise<DeliveryResult | null> {
    const request = parseMediaRequest(text);
    if (!request) {
        return null;
    }
    return runPipeline(request, delivery, ctx);
}
