import { afterEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { loadConfig } from './config.js';

describe('buildApp', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('serves the health check', async () => {
    const server = await buildApp(loadConfig({ LOG_LEVEL: 'silent' }));
    app = server.app;

    const response = await app.inject({ method: 'GET', url: '/api/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok' });
  });

  it('reports relay statistics from the shared rendezvous', async () => {
    const server = await buildApp(loadConfig({ LOG_LEVEL: 'silent' }));
    app = server.app;

    const directory = server.rendezvous.getDirectory('x');
    directory.claim('1', 'a1');
    directory.claim('1', 'b1');
    directory.claim('2', 'c1');

    const response = await app.inject({ method: 'GET', url: '/api/stats' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      apps: 1,
      mailboxes: 2,
      waiting: 1,
      claims: 3,
      messages: 0,
      subscribers: 0,
    });
  });

  it('returns 404 for unknown routes', async () => {
    const server = await buildApp(loadConfig({ LOG_LEVEL: 'silent' }));
    app = server.app;

    const response = await app.inject({ method: 'GET', url: '/api/nope' });
    expect(response.statusCode).toBe(404);
  });
});
