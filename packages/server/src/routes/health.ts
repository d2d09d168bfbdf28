/**
 * Health check routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';

export interface HealthResponse {
  status: 'ok' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: string;
}

const startTime = Date.now();

export const healthRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  // GET /api/health
  fastify.get('/health', async () => {
    const response: HealthResponse = {
      status: databaseReachable(fastify) ? 'ok' : 'degraded',
      version: process.env['npm_package_version'] ?? '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      timestamp: new Date().toISOString()
    };
    return response;
  });

  // GET /api/health/ready - readiness probe
  fastify.get('/health/ready', async (_request, reply) => {
    if (!databaseReachable(fastify)) {
      return reply.status(503).send({ ready: false });
    }
    return reply.status(200).send({ ready: true });
  });

  // GET /api/health/live - liveness probe
  fastify.get('/health/live', async (_request, reply) => {
    return reply.status(200).send({ alive: true });
  });
};

function databaseReachable(fastify: FastifyInstance): boolean {
  try {
    return fastify.deployment.db().ping();
  } catch (err) {
    fastify.log.warn({ err }, 'Database ping failed');
    return false;
  }
}
