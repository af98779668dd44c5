import type { FastifyBaseLogger } from 'fastify';
import type { Welcome } from '@rendezvous-relay/shared';
import { Directory } from './directory.js';

export interface RendezvousOptions {
  logger: FastifyBaseLogger;
  welcome?: Welcome;
  /** Millisecond clock, overridable in tests. */
  now?: () => number;
}

export interface RendezvousStats {
  apps: number;
  mailboxes: number;
  waiting: number;
  claims: number;
  messages: number;
  subscribers: number;
}

/**
 * Process-wide registry of application directories. One instance is
 * created by the server and handed to every connection's session.
 */
export class Rendezvous {
  private readonly directories = new Map<string, Directory>();
  private readonly log: FastifyBaseLogger;
  readonly welcome: Welcome;
  readonly now: () => number;

  constructor(options: RendezvousOptions) {
    this.log = options.logger;
    this.welcome = { ...options.welcome };
    this.now = options.now ?? Date.now;
  }

  getDirectory(appId: string): Directory {
    let directory = this.directories.get(appId);
    if (!directory) {
      this.log.info({ appId }, 'Spawning app directory');
      directory = new Directory(appId, this.log.child({ appId }), this.now);
      this.directories.set(appId, directory);
    }
    return directory;
  }

  hasDirectory(appId: string): boolean {
    return this.directories.has(appId);
  }

  stats(): RendezvousStats {
    const totals: RendezvousStats = {
      apps: this.directories.size,
      mailboxes: 0,
      waiting: 0,
      claims: 0,
      messages: 0,
      subscribers: 0,
    };
    for (const directory of this.directories.values()) {
      const stats = directory.stats();
      totals.mailboxes += stats.mailboxes;
      totals.waiting += stats.waiting;
      totals.claims += stats.claims;
      totals.messages += stats.messages;
      totals.subscribers += stats.subscribers;
    }
    return totals;
  }
}
