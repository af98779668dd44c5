/**
 * Directory — the channel namespace of one application id.
 *
 * Maps channel ids to live Mailboxes, hands out numeric ids and owns the
 * claim/release bookkeeping that decides when a Mailbox is deleted.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { ReleaseStatus } from '@rendezvous-relay/shared';
import { Mailbox } from './mailbox.js';

export interface DirectoryStats {
  mailboxes: number;
  waiting: number;
  claims: number;
  messages: number;
  subscribers: number;
}

export class Directory {
  private readonly mailboxes = new Map<string, Mailbox>();

  constructor(
    readonly appId: string,
    private readonly log: FastifyBaseLogger,
    private readonly now: () => number = Date.now,
  ) {}

  get(channelId: string): Mailbox | undefined {
    return this.mailboxes.get(channelId);
  }

  /** Channel ids claimed by exactly one distinct side, sorted. */
  listWaiting(): string[] {
    const waiting: string[] = [];
    for (const [channelId, mailbox] of this.mailboxes) {
      if (mailbox.isWaiting) waiting.push(channelId);
    }
    return waiting.sort();
  }

  /** Smallest positive integer not currently in use, as a string. */
  findAvailableChannelId(): string {
    for (let candidate = 1; ; candidate++) {
      const channelId = String(candidate);
      if (!this.mailboxes.has(channelId)) return channelId;
    }
  }

  /** Pick a free numeric id, create its mailbox and claim it for `side`. */
  allocate(side: string): Mailbox {
    const channelId = this.findAvailableChannelId();
    this.log.debug({ appId: this.appId, channelId, side }, 'Allocated channel');
    return this.claim(channelId, side);
  }

  claim(channelId: string, side: string): Mailbox {
    let mailbox = this.mailboxes.get(channelId);
    if (!mailbox) {
      mailbox = new Mailbox(channelId, this.log, this.now);
      this.mailboxes.set(channelId, mailbox);
    }
    mailbox.claim(side);
    return mailbox;
  }

  /**
   * Drop one claim of `side`. When it was the last claim the mailbox is
   * destroyed and its id becomes free again.
   */
  release(mailbox: Mailbox, side: string, mood?: string): ReleaseStatus {
    const empty = mailbox.release(side);
    const status: ReleaseStatus = empty ? 'deleted' : 'waiting';

    if (empty) {
      if (this.mailboxes.get(mailbox.channelId) === mailbox) {
        this.mailboxes.delete(mailbox.channelId);
      }
      mailbox.destroy();
    }

    this.log.info({ appId: this.appId, channelId: mailbox.channelId, side, mood, status }, 'Channel released');
    return status;
  }

  stats(): DirectoryStats {
    const totals: DirectoryStats = { mailboxes: this.mailboxes.size, waiting: 0, claims: 0, messages: 0, subscribers: 0 };
    for (const mailbox of this.mailboxes.values()) {
      const stats = mailbox.stats();
      if (mailbox.isWaiting) totals.waiting++;
      totals.claims += stats.claims;
      totals.messages += stats.messages;
      totals.subscribers += stats.subscribers;
    }
    return totals;
  }
}
