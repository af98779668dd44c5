import type { FastifyPluginAsync } from 'fastify';
import type { WebSocket } from 'ws';
import type { Rendezvous } from '../relay/rendezvous.js';
import { attachRelaySocket } from './relaySocket.js';

export interface RelayRouteOptions {
  rendezvous: Rendezvous;
  path: string;
  logRequests: boolean;
}

export const websocketRoutes: FastifyPluginAsync<RelayRouteOptions> = async (app, opts) => {
  // One relay session per connection; claims outlive the socket.
  app.get(opts.path, { websocket: true }, (socket: WebSocket, request) => {
    attachRelaySocket(socket, opts.rendezvous, {
      logger: request.log,
      logRequests: opts.logRequests,
      peer: request.ip,
    });
  });
};
