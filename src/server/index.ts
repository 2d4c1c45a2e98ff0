/**
 * Fastify server setup
 */
import Fastify, { FastifyInstance } from 'fastify';
import { logger } from '../observability/logger.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';

let server: FastifyInstance | null = null;

/**
 * Create and configure Fastify server with all routes registered
 */
export async function createServer(): Promise<FastifyInstance> {
    const fastify = Fastify({
        logger: false,
    });

    await fastify.register(healthRoutes);
    await fastify.register(metricsRoutes);

    return fastify;
}

/**
 * Start the server
 */
export async function startServer(port: number): Promise<FastifyInstance> {
    server = await createServer();

    const host = '0.0.0.0';

    await server.listen({ port, host });
    logger.info(`Server listening on http://${host}:${port}`);
    logger.info('Routes registered: /, /health, /metrics');

    return server;
}

/**
 * Stop the server
 */
export async function stopServer(): Promise<void> {
    if (server) {
        await server.close();
        server = null;
        logger.info('Server stopped');
    }
}
