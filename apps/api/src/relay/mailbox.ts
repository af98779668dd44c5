/**
 * Mailbox — a named, reference-counted message channel.
 *
 * Holds an append-only log plus the set of live subscribers. Every
 * operation is synchronous, so "append + fan-out" and "subscribe + replay"
 * each run as one step on the event loop and can never interleave.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { MailboxMessage } from '@rendezvous-relay/shared';

export interface MailboxSubscriber {
  /** Subscriber identity; subscribing twice with the same id replaces the first registration. */
  readonly id: string;
  deliver(channelId: string, message: MailboxMessage): void;
  /** The mailbox was deleted; no further deliveries will follow. */
  closed(channelId: string): void;
}

export interface MailboxStats {
  claims: number;
  sides: number;
  messages: number;
  subscribers: number;
}

export class Mailbox {
  // side → number of outstanding claims
  private readonly claims = new Map<string, number>();
  private messages: MailboxMessage[] = [];
  private readonly subscribers = new Map<string, MailboxSubscriber>();
  private deleted = false;
  readonly createdAt: number;
  private lastActivity: number;

  constructor(
    readonly channelId: string,
    private readonly log: FastifyBaseLogger,
    private readonly now: () => number = Date.now,
  ) {
    this.createdAt = now();
    this.lastActivity = this.createdAt;
  }

  get isDeleted(): boolean {
    return this.deleted;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /** True while exactly one distinct side holds claims, i.e. waiting for a partner. */
  get isWaiting(): boolean {
    return this.claims.size === 1;
  }

  claim(side: string): void {
    this.assertLive('claim');
    this.claims.set(side, (this.claims.get(side) ?? 0) + 1);
    this.touch();
  }

  /**
   * Drop one claim held by `side`. Returns true when no claims remain,
   * at which point the owner must destroy the mailbox.
   */
  release(side: string): boolean {
    this.assertLive('release');
    const count = this.claims.get(side);
    if (count === undefined) {
      throw new Error(`Side ${side} holds no claim on mailbox ${this.channelId}`);
    }
    if (count > 1) {
      this.claims.set(side, count - 1);
    } else {
      this.claims.delete(side);
    }
    this.touch();
    return this.claims.size === 0;
  }

  /**
   * Replay the whole log to the subscriber in arrival order, then register
   * it for future appends.
   */
  subscribe(subscriber: MailboxSubscriber): void {
    this.assertLive('subscribe');
    for (const message of this.messages) {
      this.deliverTo(subscriber, message);
    }
    this.subscribers.set(subscriber.id, subscriber);
  }

  unsubscribe(subscriberId: string): boolean {
    return this.subscribers.delete(subscriberId);
  }

  append(message: MailboxMessage): void {
    this.assertLive('append');
    this.messages.push(message);
    this.touch();

    // Subscribers registered during fan-out only see later appends.
    const targets = [...this.subscribers.values()];
    for (const subscriber of targets) {
      this.deliverTo(subscriber, message);
    }
  }

  /** Discard the log and tell every subscriber the mailbox is gone. */
  destroy(): void {
    if (this.deleted) return;
    this.deleted = true;
    this.messages = [];
    this.claims.clear();

    const targets = [...this.subscribers.values()];
    this.subscribers.clear();
    for (const subscriber of targets) {
      try {
        subscriber.closed(this.channelId);
      } catch (err) {
        this.log.error({ err, channelId: this.channelId, subscriber: subscriber.id }, 'Mailbox close notification failed');
      }
    }
  }

  stats(): MailboxStats {
    let claims = 0;
    for (const count of this.claims.values()) {
      claims += count;
    }
    return {
      claims,
      sides: this.claims.size,
      messages: this.messages.length,
      subscribers: this.subscribers.size,
    };
  }

  private deliverTo(subscriber: MailboxSubscriber, message: MailboxMessage): void {
    try {
      subscriber.deliver(this.channelId, message);
    } catch (err) {
      this.log.error({ err, channelId: this.channelId, subscriber: subscriber.id }, 'Mailbox delivery failed');
    }
  }

  private assertLive(operation: string): void {
    if (this.deleted) {
      throw new Error(`Cannot ${operation} on deleted mailbox ${this.channelId}`);
    }
  }

  private touch(): void {
    this.lastActivity = this.now();
  }
}
