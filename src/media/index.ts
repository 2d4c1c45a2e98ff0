/**
 * Media module exports
 */
export {
    downloadMedia,
    buildDownloadArgs,
    resolveReportedPath,
    DownloadFailedError,
    FORMAT_SELECTOR,
    OUTPUT_TEMPLATE,
    type DownloadOptions,
} from './downloader.js';

export {
    probeVideoStream,
    ProbeFailedError,
    PROBE_ARGS,
    type ProbeOptions,
} from './probe.js';

export {
    encode,
    getProfileOptions,
    EncodeFailedError,
    COMPRESSION_SCALE_FILTER,
    type EncodeProfile,
    type EncodeOptions,
} from './transcoder.js';

export { runTool, type ToolResult } from './process.js';
export { createMediaTools, type MediaTools } from './tools.js';
