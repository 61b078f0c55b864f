/**
 * Health Check Routes
 */
import type { FastifyPluginAsync } from 'fastify';
import type { FileSystemOutputStore } from '../../utils/output-store.js';

export interface HealthRoutesOptions {
  store: FileSystemOutputStore;
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { store }) => {
  // Basic health check (liveness)
  fastify.get('/', async (request, reply) => {
    reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Readiness check (output directory)
  fastify.get('/ready', async (request, reply) => {
    const writable = await store.isWritable();
    reply.code(writable ? 200 : 503).send({
      status: writable ? 'ready' : 'not_ready',
      timestamp: new Date().toISOString(),
      checks: {
        outputDirectory: writable ? 'ok' : 'failed',
      },
    });
  });
};
