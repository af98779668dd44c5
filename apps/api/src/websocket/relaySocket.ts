import type { FastifyBaseLogger } from 'fastify';
import type { RawData } from 'ws';
import type { RelayFrame } from '@rendezvous-relay/shared';
import type { Rendezvous } from '../relay/rendezvous.js';
import { RelaySession, type ResponseSink } from '../relay/session.js';

/** The slice of a `ws` WebSocket the relay needs. */
export interface RelaySocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export interface AttachOptions {
  logger: FastifyBaseLogger;
  logRequests?: boolean;
  peer?: string;
}

const OPEN = 1; // WebSocket.OPEN
const NORMAL_CLOSURE = 1000;

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Bind a freshly opened WebSocket to a new relay session: frames in are
 * JSON-decoded and handed to the session, responses out are JSON-encoded.
 */
export function attachRelaySocket(socket: RelaySocket, rendezvous: Rendezvous, options: AttachOptions): RelaySession {
  const sessionLog = options.logger.child({ component: 'relay' });

  const sink: ResponseSink = {
    send(frame: RelayFrame) {
      if (socket.readyState !== OPEN) return;
      try {
        socket.send(JSON.stringify(frame));
      } catch (err) {
        sessionLog.error({ err, type: frame.type }, 'Failed to send relay frame');
      }
    },
    close(reason?: string) {
      if (socket.readyState !== OPEN) return;
      socket.close(NORMAL_CLOSURE, reason);
    },
  };

  const session = new RelaySession(rendezvous, sink, { logger: sessionLog });
  if (options.logRequests) {
    sessionLog.info({ session: session.id, peer: options.peer }, 'Relay client connecting');
  } else {
    sessionLog.debug({ session: session.id }, 'Relay client connected');
  }

  socket.on('message', (data) => {
    const text = rawDataToString(data);
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      session.sendError('invalid JSON', text);
      return;
    }

    try {
      session.handle(parsed);
    } catch (err) {
      sessionLog.error({ err, session: session.id }, 'Relay command handler failed');
    }
  });

  socket.on('close', () => {
    session.close();
  });

  socket.on('error', (err) => {
    sessionLog.error({ err, session: session.id }, 'Relay socket error');
    session.close();
  });

  session.sendWelcome();
  return session;
}
