/**
 * Fastify app setup
 *
 * The deployment is decorated onto the instance, so every route reaches
 * services as `fastify.deployment`.
 */

import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { Deployment } from '@pixhold/deployment';
import { errorResponse } from '@pixhold/utils';

import { toHttpError } from './error.js';
import { healthRoutes } from './routes/health.js';
import { imageRoutes } from './routes/images.js';

export interface ServerConfig {
  deployment: Deployment;
  /** Per-request access logs; on by default */
  logRequests?: boolean;
}

export async function createApp(config: ServerConfig): Promise<FastifyInstance> {
  const { deployment } = config;
  const appConfig = deployment.config();

  const app = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({
    loggerInstance: deployment.logger(),
    disableRequestLogging: config.logRequests === false
  });

  await app.register(cors, {
    origin: appConfig.corsOrigin
  });

  // One file per request, capped at the upload limit
  await app.register(multipart, {
    limits: {
      fileSize: appConfig.maxFileSize,
      files: 1,
      fields: 10
    }
  });

  app.decorate('deployment', deployment);

  app.setErrorHandler((error, request, reply) => {
    const { statusCode, message } = toHttpError(error);
    if (statusCode >= 500) {
      request.log.error({ err: error, url: request.url }, 'Request failed');
    } else {
      request.log.warn({ url: request.url, statusCode }, message);
    }
    return reply.status(statusCode).send(errorResponse(message));
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ method: request.method, url: request.url }, 'Unknown route');
    return reply.status(404).send(errorResponse('Not Found'));
  });

  // Health
  await app.register(healthRoutes, { prefix: '/api' });

  // Upload, listing, deletion and file serving
  await app.register(imageRoutes);

  return app;
}

export async function startServer(config: ServerConfig): Promise<FastifyInstance> {
  const app = await createApp(config);
  const { host, port } = config.deployment.config();

  try {
    await app.listen({ port, host });
    return app;
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

declare module 'fastify' {
  interface FastifyInstance {
    deployment: Deployment;
  }
}
