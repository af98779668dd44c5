import type { FastifyPluginAsync } from 'fastify';
import type { Rendezvous } from '../relay/rendezvous.js';

export interface HealthRouteOptions {
  rendezvous: Rendezvous;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, opts) => {
  app.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptimeSeconds: Math.round(process.uptime()),
    };
  });

  app.get('/stats', async () => {
    return opts.rendezvous.stats();
  });
};
