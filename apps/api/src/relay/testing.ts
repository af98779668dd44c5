/**
 * Test doubles shared by the relay and transport test suites.
 */

import { pino } from 'pino';
import type { RelayFrame } from '@rendezvous-relay/shared';
import { Rendezvous } from './rendezvous.js';
import { RelaySession, type ResponseSink } from './session.js';

export const silentLogger = pino({ level: 'silent' });

/** Fixed clock: 1700000000 seconds since epoch. */
export const FIXED_NOW_MS = 1_700_000_000_000;
export const FIXED_NOW_SECONDS = FIXED_NOW_MS / 1000;

export class RecordingSink implements ResponseSink {
  frames: RelayFrame[] = [];
  closeReasons: Array<string | undefined> = [];

  send(frame: RelayFrame): void {
    this.frames.push(frame);
  }

  close(reason?: string): void {
    this.closeReasons.push(reason);
  }

  /** Frames received since the last call, without `serverTx`. */
  take(): Array<Record<string, unknown>> {
    const taken = this.frames.map(({ serverTx: _serverTx, ...rest }) => rest);
    this.frames = [];
    return taken;
  }

  types(): string[] {
    return this.frames.map((frame) => frame.type);
  }
}

export function createRendezvous(): Rendezvous {
  return new Rendezvous({ logger: silentLogger, now: () => FIXED_NOW_MS });
}

export function createSession(rendezvous: Rendezvous, id?: string): { session: RelaySession; sink: RecordingSink } {
  const sink = new RecordingSink();
  const session = new RelaySession(rendezvous, sink, { logger: silentLogger, id });
  return { session, sink };
}
