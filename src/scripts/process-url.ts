/**
 * Process URL Script
 * Runs the media pipeline for one URL without Telegram and copies the
 * prepared file into a local directory.
 */
import { copyFile, mkdir } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { loadConfig } from '../config/index.js';
import { logger, setLogLevel } from '../observability/logger.js';
import { createPipelineContext, processRequest, type DeliveryChannel } from '../pipeline/index.js';

interface ProcessUrlArgs {
    url: string;
    outDir: string;
}

function parseArgs(): ProcessUrlArgs {
    const args = process.argv.slice(2);
    const result: ProcessUrlArgs = {
        url: '',
        outDir: 'downloads',
    };

    for (let i = 0; i < args.length; i++) {
        if (args[i] === '--url' && args[i + 1]) {
            result.url = args[i + 1];
            i++;
        } else if (args[i] === '--out' && args[i + 1]) {
            result.outDir = args[i + 1];
            i++;
        }
    }

    return result;
}

function createLocalDelivery(outDir: string): DeliveryChannel {
    async function keep(path: string, caption: string): Promise<void> {
        await mkdir(outDir, { recursive: true });
        const target = join(outDir, basename(path));
        await copyFile(path, target);
        logger.info(caption, { target });
    }

    return {
        deliverVideo: (path, caption) => keep(path, caption),
        deliverAudio: (path, caption) => keep(path, caption),
        async reportFailure(message) {
            logger.warn('Request failed', { message });
        },
    };
}

async function processUrl(): Promise<void> {
    const args = parseArgs();

    if (!args.url) {
        console.log(`
Usage: npm run process-url -- --url <URL> [--out <directory>]

Examples:
  npm run process-url -- --url "https://example.com/watch?v=abc123"
  npm run process-url -- --url "https://example.com/clip" --out ./media
`);
        process.exit(1);
    }

    // The token is only needed by the bot
    const config = loadConfig({ ...process.env, BOT_TOKEN: process.env.BOT_TOKEN || 'unused' });
    setLogLevel(config.logLevel);

    const pipeline = createPipelineContext(config);
    const outDir = resolve(args.outDir);
    const result = await processRequest(args.url, createLocalDelivery(outDir), pipeline);

    if (!result) {
        logger.error('Not an http(s) URL', undefined, { url: args.url });
        process.exit(1);
    }

    process.exit(result.ok ? 0 : 1);
}

processUrl().catch((error: unknown) => {
    logger.error('Process URL script failed', error);
    process.exit(1);
});
