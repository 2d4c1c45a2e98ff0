/**
 * Pipeline Orchestrator Tests
 * End-to-end request handling with fake media tools
 */
import { existsSync } from 'fs';
import { join } from 'path';
import { describe, it, expect } from 'vitest';
import {
    AUDIO_CAPTION,
    VIDEO_CAPTION,
    processRequest,
    runPipeline,
} from '../../src/pipeline/orchestrator.js';
import { GENERIC_FAILURE_MESSAGE, userMessageFor } from '../../src/pipeline/failure-reasons.js';
import { WorkerPool } from '../../src/pipeline/worker-pool.js';
import {
    CAP_BYTES,
    MB,
    createFakeTools,
    createRecordingDelivery,
    createTestContext,
} from '../helpers/fakes.js';

const URL = 'https://video.example.com/watch?v=abc123';

function workspaceOf(tools: ReturnType<typeof createFakeTools>): string {
    return tools.download.mock.calls[0][1];
}

function outboundCallCount(delivery: ReturnType<typeof createRecordingDelivery>): number {
    return delivery.deliverVideo.mock.calls.length
        + delivery.deliverAudio.mock.calls.length
        + delivery.reportFailure.mock.calls.length;
}

describe('Pipeline Orchestrator', () => {
    describe('input validation', () => {
        it.each([
            'hello there',
            'ftp://files.example.com/video.mp4',
            'www.example.com/video',
            '',
            'https://',
        ])('should ignore %j without any outbound call', async (text) => {
            const tools = createFakeTools();
            const delivery = createRecordingDelivery();

            const result = await processRequest(text, delivery, createTestContext(tools));

            expect(result).toBeNull();
            expect(outboundCallCount(delivery)).toBe(0);
            expect(tools.download).not.toHaveBeenCalled();
        });
    });

    describe('Scenario A: small mp4', () => {
        it('should deliver the downloaded file unchanged', async () => {
            const tools = createFakeTools({ download: { fileName: 'clip.mp4', sizeBytes: 10 * MB } });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            const workspace = workspaceOf(tools);
            const expectedPath = join(workspace, 'clip.mp4');
            expect(tools.download).toHaveBeenCalledTimes(1);
            expect(tools.download.mock.calls[0][0]).toBe(URL);
            expect(tools.probeVideoStream.mock.calls[0][0]).toBe(expectedPath);
            expect(tools.encode).not.toHaveBeenCalled();
            expect(delivery.deliverVideo).toHaveBeenCalledTimes(1);
            expect(delivery.deliverVideo).toHaveBeenCalledWith(expectedPath, VIDEO_CAPTION, true);
            expect(outboundCallCount(delivery)).toBe(1);
            expect(result).toEqual({ ok: true, kind: 'video', path: expectedPath });
            expect(existsSync(workspace)).toBe(false);
        });
    });

    describe('Scenario B: oversized mp4 compressed under the cap', () => {
        it('should deliver the compressed file', async () => {
            const tools = createFakeTools({
                download: { fileName: 'clip.mp4', sizeBytes: 120 * MB },
                encodeSizes: { compressed: 45 * MB },
            });
            const delivery = createRecordingDelivery();

            await processRequest(URL, delivery, createTestContext(tools));

            const workspace = workspaceOf(tools);
            expect(tools.encode).toHaveBeenCalledTimes(1);
            expect(tools.encode.mock.calls[0][0]).toBe('compressed');
            expect(delivery.deliverVideo).toHaveBeenCalledWith(
                join(workspace, 'clip_compressed.mp4'),
                VIDEO_CAPTION,
                true
            );
            expect(outboundCallCount(delivery)).toBe(1);
            expect(existsSync(workspace)).toBe(false);
        });
    });

    describe('Scenario C: compression not enough', () => {
        it('should report the size limit', async () => {
            const tools = createFakeTools({
                download: { fileName: 'clip.mp4', sizeBytes: 120 * MB },
                encodeSizes: { compressed: 60 * MB },
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(tools.encode).toHaveBeenCalledTimes(1);
            expect(delivery.deliverVideo).not.toHaveBeenCalled();
            expect(delivery.reportFailure).toHaveBeenCalledTimes(1);
            expect(delivery.reportFailure).toHaveBeenCalledWith(
                'Could not prepare the file: it is larger than 50 MB even after compression.'
            );
            expect(result).toMatchObject({ ok: false, reason: 'size_exceeded' });
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });
    });

    describe('Scenario D: audio-only source', () => {
        it('should convert to mp3 and deliver audio', async () => {
            const tools = createFakeTools({
                download: { fileName: 'podcast.m4a', sizeBytes: 30 * MB },
                probe: false,
                encodeSizes: { mp3: 28 * MB },
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            const workspace = workspaceOf(tools);
            const expectedPath = join(workspace, 'podcast.mp3');
            expect(tools.encode).toHaveBeenCalledTimes(1);
            expect(tools.encode.mock.calls[0][0]).toBe('mp3');
            expect(delivery.deliverAudio).toHaveBeenCalledWith(expectedPath, AUDIO_CAPTION);
            expect(outboundCallCount(delivery)).toBe(1);
            expect(result).toEqual({ ok: true, kind: 'audio', path: expectedPath });
            expect(existsSync(workspace)).toBe(false);
        });

        it('should report the size limit for an oversized mp3 without compressing', async () => {
            const tools = createFakeTools({
                download: { fileName: 'lecture.opus', sizeBytes: 40 * MB },
                probe: false,
                encodeSizes: { mp3: 70 * MB },
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(tools.encode).toHaveBeenCalledTimes(1);
            expect(delivery.deliverAudio).not.toHaveBeenCalled();
            expect(delivery.reportFailure).toHaveBeenCalledWith(userMessageFor('size_exceeded', CAP_BYTES));
            expect(result).toMatchObject({ ok: false, reason: 'size_exceeded' });
        });
    });

    describe('Scenario E: bot verification', () => {
        it('should send the bot-check message instead of the generic one', async () => {
            const tools = createFakeTools({
                download: {
                    error: new Error(
                        'yt-dlp failed: ERROR: [youtube] abc123: Sign in to confirm you’re not a bot. '
                        + 'Use --cookies-from-browser or --cookies for the authentication.'
                    ),
                },
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(delivery.reportFailure).toHaveBeenCalledTimes(1);
            expect(delivery.reportFailure).toHaveBeenCalledWith(userMessageFor('bot_check', CAP_BYTES));
            expect(delivery.reportFailure).not.toHaveBeenCalledWith(GENERIC_FAILURE_MESSAGE);
            expect(result).toMatchObject({ ok: false, reason: 'bot_check' });
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });
    });

    describe('failures', () => {
        it('should report a generic message when the download fails', async () => {
            const tools = createFakeTools({
                download: { error: new Error('yt-dlp failed: ERROR: Unsupported URL') },
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(delivery.reportFailure).toHaveBeenCalledWith(GENERIC_FAILURE_MESSAGE);
            expect(result).toEqual({ ok: false, reason: 'fetch_failed', message: GENERIC_FAILURE_MESSAGE });
        });

        it('should report a generic message when normalization fails', async () => {
            const tools = createFakeTools({
                download: { fileName: 'clip.webm', sizeBytes: 5 * MB },
                encodeError: new Error('ffmpeg exited with code 1'),
            });
            const delivery = createRecordingDelivery();

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(tools.encode).toHaveBeenCalledTimes(1);
            expect(delivery.deliverVideo).not.toHaveBeenCalled();
            expect(delivery.reportFailure).toHaveBeenCalledWith(GENERIC_FAILURE_MESSAGE);
            expect(result).toMatchObject({ ok: false, reason: 'transcode_failed' });
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });

        it('should try to report a rejected delivery and still clean up', async () => {
            const tools = createFakeTools();
            const delivery = createRecordingDelivery();
            delivery.deliverVideo.mockRejectedValueOnce(new Error('Request Entity Too Large'));

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(delivery.deliverVideo).toHaveBeenCalledTimes(1);
            expect(delivery.reportFailure).toHaveBeenCalledWith(GENERIC_FAILURE_MESSAGE);
            expect(result).toMatchObject({ ok: false, reason: 'delivery_failed' });
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });

        it('should swallow an error from the failure report itself', async () => {
            const tools = createFakeTools({ download: { error: new Error('network unreachable') } });
            const delivery = createRecordingDelivery();
            delivery.reportFailure.mockRejectedValueOnce(new Error('message to edit not found'));

            const result = await processRequest(URL, delivery, createTestContext(tools));

            expect(result).toMatchObject({ ok: false, reason: 'fetch_failed' });
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });

        it('should fail with a timeout when a stage exceeds its deadline', async () => {
            const tools = createFakeTools();
            tools.download.mockImplementationOnce(
                (_url: string, _dir: string, signal?: AbortSignal) =>
                    new Promise<string>((_resolve, reject) => {
                        signal?.addEventListener('abort', () => reject(new Error('killed')));
                    })
            );
            const delivery = createRecordingDelivery();
            const ctx = createTestContext(tools, {
                pool: new WorkerPool({ concurrency: 1, timeoutMs: 20 }),
            });

            const result = await runPipeline({ sourceUrl: URL }, delivery, ctx);

            expect(result).toMatchObject({ ok: false, reason: 'timeout' });
            expect(delivery.reportFailure).toHaveBeenCalledWith(userMessageFor('timeout', CAP_BYTES));
            expect(existsSync(workspaceOf(tools))).toBe(false);
        });
    });

    describe('concurrency', () => {
        it('should give every request its own workspace', async () => {
            const toolsA = createFakeTools();
            const toolsB = createFakeTools({ download: { fileName: 'song.m4a', sizeBytes: MB }, probe: false, encodeSizes: { mp3: MB } });

            const [a, b] = await Promise.all([
                processRequest(URL, createRecordingDelivery(), createTestContext(toolsA)),
                processRequest(URL, createRecordingDelivery(), createTestContext(toolsB)),
            ]);

            expect(a).toMatchObject({ ok: true, kind: 'video' });
            expect(b).toMatchObject({ ok: true, kind: 'audio' });
            expect(workspaceOf(toolsA)).not.toBe(workspaceOf(toolsB));
        });
    });
});
