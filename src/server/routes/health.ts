/**
 * Health endpoints - liveness checks
 * GET|HEAD /health, GET|HEAD /
 */
import { FastifyInstance } from 'fastify';

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    // HEAD is registered automatically for every GET route
    fastify.get('/health', async (_request, reply) => {
        return reply.type('text/plain; charset=utf-8').send('OK');
    });

    fastify.get('/', async (_request, reply) => {
        return reply.type('text/plain; charset=utf-8').send('Bot is running');
    });
}
