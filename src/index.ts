/**
 * Media Relay Bot - Main entry point
 *
 * - Runs the Telegram bot (long polling, updates handled concurrently)
 * - Exposes Fastify endpoints for health and metrics
 */
import { run, type RunnerHandle } from '@grammyjs/runner';
import { ConfigError, getRedactedConfig, loadConfig, type Config } from './config/index.js';
import { logger, setLogLevel } from './observability/logger.js';
import { createPipelineContext } from './pipeline/context.js';
import { startServer, stopServer } from './server/index.js';
import { createBot } from './telegram/bot.js';

let runner: RunnerHandle | null = null;

function readConfig(): Config {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error('\n❌ Configuration Error\n');
            console.error('The following environment variables are missing or invalid:\n');
            console.error(error.problems.join('\n'));
            console.error('\nSee .env.example for required configuration.\n');
            process.exit(1);
        }
        throw error;
    }
}

async function main(): Promise<void> {
    const config = readConfig();
    setLogLevel(config.logLevel);

    logger.info('Starting Media Relay Bot...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        const pipeline = createPipelineContext(config);

        // Start HTTP server
        logger.info('Starting HTTP server...');
        await startServer(config.port);

        // Start bot
        logger.info('Starting Telegram bot...');
        const bot = createBot(config.botToken, pipeline);
        await bot.init();
        runner = run(bot);

        runner.task()?.catch((error: unknown) => {
            logger.error('Bot runner stopped with an error', error);
            process.exit(1);
        });

        logger.info('Media Relay Bot started successfully', { username: bot.botInfo.username });
    } catch (error) {
        logger.error('Failed to start Media Relay Bot', error);
        process.exit(1);
    }
}

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        // Stop fetching updates
        if (runner?.isRunning()) {
            await runner.stop();
        }

        await stopServer();

        logger.info('Media Relay Bot stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

// Start the service
void main();
