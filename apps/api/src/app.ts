import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import fastifyWebsocket from '@fastify/websocket';
import type { Config } from './config.js';
import { Rendezvous } from './relay/rendezvous.js';
import { healthRoutes } from './routes/health.js';
import { websocketRoutes } from './websocket/routes.js';

export interface RelayServer {
  app: FastifyInstance;
  rendezvous: Rendezvous;
}

export async function buildApp(config: Config): Promise<RelayServer> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  const rendezvous = new Rendezvous({
    logger: app.log.child({ component: 'rendezvous' }),
    welcome: config.welcome,
  });

  // Per-IP limit; also covers WebSocket upgrade requests
  await app.register(rateLimit, {
    global: true,
    max: config.rateLimitMax,
    timeWindow: '1 minute',
  });

  await app.register(fastifyWebsocket, {
    options: { maxPayload: config.maxPayloadBytes },
  });

  // Global error handler — sanitize unexpected errors
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      app.log.error(error);
      reply.status(statusCode).send({ error: 'Internal server error' });
    } else {
      reply.status(statusCode).send({ error: error.message });
    }
  });

  await app.register(healthRoutes, { prefix: '/api', rendezvous });
  await app.register(websocketRoutes, {
    rendezvous,
    path: config.wsPath,
    logRequests: config.logRequests,
  });

  return { app, rendezvous };
}
