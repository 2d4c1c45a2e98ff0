/**
 * Stream Probe Tests
 * ffprobe is replaced by a mocked runTool
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PROBE_ARGS, ProbeFailedError, probeVideoStream, runTool } from '../../src/media/index.js';

vi.mock('../../src/media/process.js', () => ({
    runTool: vi.fn(),
}));

describe('probeVideoStream', () => {
    const mockRunTool = vi.mocked(runTool);

    beforeEach(() => {
        mockRunTool.mockReset();
    });

    it('should ask ffprobe for the first video stream as JSON', async () => {
        mockRunTool.mockResolvedValueOnce({
            code: 0,
            stdout: '{"programs":[],"streams":[{"codec_type":"video"}]}',
            stderr: '',
        });

        await expect(probeVideoStream('/tmp/ws/clip.mkv')).resolves.toBe(true);
        expect(mockRunTool).toHaveBeenCalledWith(
            'ffprobe',
            ['-v', 'error', '-select_streams', 'v:0', '-show_entries', 'stream=codec_type', '-of', 'json', '/tmp/ws/clip.mkv'],
            { signal: undefined }
        );
        expect(PROBE_ARGS).toContain('v:0');
    });

    it('should report no video when no stream comes back', async () => {
        mockRunTool.mockResolvedValueOnce({ code: 0, stdout: '{"programs":[],"streams":[]}', stderr: '' });

        await expect(probeVideoStream('/tmp/ws/song.m4a')).resolves.toBe(false);
    });

    it('should treat a missing streams list as no video', async () => {
        mockRunTool.mockResolvedValueOnce({ code: 0, stdout: '{}', stderr: '' });

        await expect(probeVideoStream('/tmp/ws/song.m4a')).resolves.toBe(false);
    });

    it('should pass the binary path and abort signal to the runner', async () => {
        mockRunTool.mockResolvedValueOnce({ code: 0, stdout: '{"streams":[]}', stderr: '' });
        const controller = new AbortController();

        await probeVideoStream('/tmp/ws/a.mp4', { ffprobePath: '/opt/ffprobe', signal: controller.signal });

        expect(mockRunTool.mock.calls[0][0]).toBe('/opt/ffprobe');
        expect(mockRunTool.mock.calls[0][2]).toEqual({ signal: controller.signal });
    });

    it('should reject with stderr on a non-zero exit', async () => {
        mockRunTool.mockResolvedValueOnce({
            code: 1,
            stdout: '',
            stderr: '/tmp/ws/broken: Invalid data found when processing input\n',
        });

        const error = await probeVideoStream('/tmp/ws/broken').catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProbeFailedError);
        expect(error).toMatchObject({
            message: 'ffprobe failed: /tmp/ws/broken: Invalid data found when processing input',
        });
    });

    it('should reject output that is not JSON', async () => {
        mockRunTool.mockResolvedValueOnce({ code: 0, stdout: 'not json', stderr: '' });

        await expect(probeVideoStream('/tmp/ws/a.mp4')).rejects.toThrow('ffprobe returned invalid JSON');
    });
});
