/**
 * Configuration module with Zod schema validation
 * Fail-fast with actionable error messages
 */
import { z } from 'zod';

const PROXY_PROTOCOLS = ['http:', 'https:', 'socks5:'];

// Custom validators
const portSchema = z.coerce.number().int().min(1).max(65535);
const positiveIntSchema = z.coerce.number().int().positive();

function hasProxyProtocol(value: string): boolean {
    try {
        return PROXY_PROTOCOLS.includes(new URL(value).protocol);
    } catch {
        return false;
    }
}

const proxySchema = z
    .string()
    .refine(hasProxyProtocol, 'Proxy must be an http://, https:// or socks5:// URL');

// Configuration schema
const configSchema = z.object({
    // Required - Telegram
    botToken: z.string().min(1, 'Telegram bot token is required'),

    // Optional - Download proxy (credentials may be embedded in the URL)
    downloadProxy: proxySchema.nullable().default(null),

    // Health server
    port: portSchema.default(8000),

    // Logging
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Media Processing
    maxFileSizeMb: positiveIntSchema.default(50),
    tempDir: z.string().nullable().default(null),
    ytDlpPath: z.string().min(1).default('yt-dlp'),
    ffmpegPath: z.string().nullable().default(null),
    ffprobePath: z.string().nullable().default(null),

    // Worker Pool
    workerConcurrency: positiveIntSchema.default(2),
    stageTimeoutMs: positiveIntSchema.nullable().default(null),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration:\n${problems.join('\n')}`);
        this.name = 'ConfigError';
    }
}

/**
 * Map environment variables to config object
 */
function mapEnvToConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
    return {
        botToken: env.BOT_TOKEN,
        downloadProxy: env.DOWNLOAD_PROXY || null,
        port: env.PORT,
        logLevel: env.LOG_LEVEL,

        maxFileSizeMb: env.MAX_FILE_SIZE_MB,
        tempDir: env.TEMP_DIR || null,
        ytDlpPath: env.YT_DLP_PATH || undefined,
        ffmpegPath: env.FFMPEG_PATH || null,
        ffprobePath: env.FFPROBE_PATH || null,

        workerConcurrency: env.WORKER_CONCURRENCY,
        stageTimeoutMs: env.STAGE_TIMEOUT_MS || null,
    };
}

/**
 * Load and validate configuration.
 * Throws a ConfigError listing every offending environment variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = configSchema.safeParse(mapEnvToConfig(env));

    if (!result.success) {
        const problems = result.error.issues.map(issue => {
            const envVar = pathToEnvVar(issue.path.join('.'));
            return `  - ${envVar}: ${issue.message}`;
        });
        throw new ConfigError(problems);
    }

    return result.data;
}

/**
 * Convert config path to environment variable name
 */
export function pathToEnvVar(path: string): string {
    return path
        .replace(/([A-Z])/g, '_$1')
        .toUpperCase()
        .replace(/^_/, '');
}

/**
 * Delivery cap in bytes
 */
export function maxFileSizeBytes(cfg: Config): number {
    return cfg.maxFileSizeMb * 1024 * 1024;
}

/**
 * Redact sensitive values for logging
 */
export function getRedactedConfig(cfg: Config): Record<string, unknown> {
    return {
        botToken: '[REDACTED]',
        downloadProxy: cfg.downloadProxy ? cfg.downloadProxy.replace(/\/\/.*@/, '//<redacted>@') : null,
        port: cfg.port,
        logLevel: cfg.logLevel,
        maxFileSizeMb: cfg.maxFileSizeMb,
        tempDir: cfg.tempDir,
        workerConcurrency: cfg.workerConcurrency,
        stageTimeoutMs: cfg.stageTimeoutMs,
    };
}
