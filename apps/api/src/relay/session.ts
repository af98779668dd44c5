/**
 * RelaySession — per-connection protocol state machine.
 *
 * States: unbound → bound (with zero or more claimed channels) → closed.
 * Each inbound object is validated completely before anything is mutated,
 * so a rejected command leaves no trace beyond its `ack` and `error`.
 */

import { nanoid } from 'nanoid';
import type { FastifyBaseLogger } from 'fastify';
import type {
  AddCommand,
  BindCommand,
  ClaimCommand,
  CorrelationId,
  PingCommand,
  RelayCommand,
  RelayFrame,
  RelayResponse,
  RelayCommandType,
  ReleaseCommand,
  WatchCommand,
} from '@rendezvous-relay/shared';
import type { Directory } from './directory.js';
import type { Mailbox, MailboxSubscriber } from './mailbox.js';
import type { Rendezvous } from './rendezvous.js';
import {
  allowedBeforeBind,
  decodeCommand,
  isCommandType,
  readCorrelationId,
  readRawCommand,
} from './commands.js';
import { RelayError, isRelayError } from './errors.js';

/** Where a session writes its responses; implemented by the transport. */
export interface ResponseSink {
  send(frame: RelayFrame): void;
  close(reason?: string): void;
}

export interface RelaySessionOptions {
  logger: FastifyBaseLogger;
  id?: string;
}

const CLAIM_ACTIONS = {
  watch: 'watching',
  add: 'adding',
  release: 'releasing',
} as const;

interface Binding {
  appId: string;
  side: string;
  directory: Directory;
}

export class RelaySession {
  readonly id: string;
  private readonly log: FastifyBaseLogger;
  private readonly subscriber: MailboxSubscriber;
  private binding: Binding | null = null;
  private hasAllocated = false;
  // channel id → mailbox this session holds one claim on
  private readonly claimed = new Map<string, Mailbox>();
  // channel id → mailbox this session is subscribed to
  private readonly watched = new Map<string, Mailbox>();
  private closed = false;

  constructor(
    private readonly rendezvous: Rendezvous,
    private readonly sink: ResponseSink,
    options: RelaySessionOptions,
  ) {
    this.id = options.id ?? nanoid();
    this.log = options.logger.child({ session: this.id });
    this.subscriber = {
      id: this.id,
      deliver: (channelId, message) => this.send({ type: 'message', channelId, message }),
      closed: (channelId) => this.handleMailboxDeleted(channelId),
    };
  }

  get isBound(): boolean {
    return this.binding !== null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get claimedChannelIds(): string[] {
    return [...this.claimed.keys()];
  }

  get watchedChannelIds(): string[] {
    return [...this.watched.keys()];
  }

  /** First frame of every connection, sent before any command is read. */
  sendWelcome(): void {
    this.send({ type: 'welcome', welcome: this.rendezvous.welcome });
  }

  /** Process one decoded JSON value received from the client. */
  handle(raw: unknown): void {
    if (this.closed) return;
    const serverRx = this.rendezvous.now() / 1000;

    try {
      const { type, fields } = readRawCommand(raw);
      if ('id' in fields) {
        this.send({ type: 'ack', id: fields.id });
      }
      if (!this.binding && !allowedBeforeBind(type)) {
        throw new RelayError('not_bound', 'Must bind first');
      }
      if (!isCommandType(type)) {
        throw new RelayError('unknown_type', 'Unknown type');
      }
      this.checkState(type, fields);
      const command = decodeCommand(type, fields);
      this.dispatch(command, readCorrelationId(fields), serverRx);
    } catch (err) {
      if (!isRelayError(err)) throw err;
      this.log.debug({ code: err.code, orig: raw }, err.message);
      this.sendError(err.message, raw);
    }
  }

  /** Report a frame the transport could not turn into a JSON value. */
  sendError(error: string, orig: unknown): void {
    this.send({ type: 'error', error, orig });
  }

  /**
   * Stop sending and drop every subscription. Claims stay in place: a
   * client that reconnects with the same side may keep using them.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const mailbox of this.watched.values()) {
      mailbox.unsubscribe(this.id);
    }
    this.watched.clear();
    this.log.debug({ claims: this.claimedChannelIds }, 'Relay session closed');
  }

  private dispatch(command: RelayCommand, correlationId: CorrelationId | null, serverRx: number): void {
    switch (command.type) {
      case 'ping':
        return this.handlePing(command);
      case 'bind':
        return this.handleBind(command);
      case 'list':
        return this.handleList();
      case 'allocate':
        return this.handleAllocate();
      case 'claim':
        return this.handleClaim(command);
      case 'watch':
        return this.handleWatch(command);
      case 'add':
        return this.handleAdd(command, correlationId, serverRx);
      case 'release':
        return this.handleRelease(command);
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled relay command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /**
   * Session-state preconditions that outrank field validation: a second
   * `bind` is refused whatever it carries, and a command naming a channel
   * this session never claimed is refused before its other fields are read.
   */
  private checkState(type: RelayCommandType, fields: Record<string, unknown>): void {
    switch (type) {
      case 'bind':
        if (this.binding) throw new RelayError('already_bound', 'already bound');
        return;
      case 'watch':
      case 'add':
      case 'release': {
        const { channelId } = fields;
        if (typeof channelId === 'string' && !this.claimed.has(channelId)) {
          throw new RelayError('not_claimed', `must claim channel before ${CLAIM_ACTIONS[type]}`);
        }
        return;
      }
      default:
        return;
    }
  }

  private handlePing(command: PingCommand): void {
    this.send({ type: 'pong', pong: command.ping });
  }

  private handleBind(command: BindCommand): void {
    this.binding = {
      appId: command.appId,
      side: command.side,
      directory: this.rendezvous.getDirectory(command.appId),
    };
    this.log.debug({ appId: command.appId, side: command.side }, 'Session bound');
  }

  private handleList(): void {
    const { directory } = this.requireBinding();
    this.send({ type: 'nameplates', nameplates: directory.listWaiting() });
  }

  private handleAllocate(): void {
    const { directory, side } = this.requireBinding();
    if (this.hasAllocated) {
      throw new RelayError('already_allocated', "You already allocated one channel, don't be greedy");
    }
    const mailbox = directory.allocate(side);
    this.hasAllocated = true;
    this.claimed.set(mailbox.channelId, mailbox);
    this.send({ type: 'nameplate', nameplate: mailbox.channelId });
  }

  private handleClaim(command: ClaimCommand): void {
    const { directory, side } = this.requireBinding();
    if (this.claimed.has(command.channelId)) return;
    this.claimed.set(command.channelId, directory.claim(command.channelId, side));
  }

  private handleWatch(command: WatchCommand): void {
    const mailbox = this.requireClaim(command.channelId, CLAIM_ACTIONS.watch);
    const previous = this.watched.get(command.channelId);
    if (previous && previous !== mailbox) {
      previous.unsubscribe(this.id);
    }
    this.watched.set(command.channelId, mailbox);
    mailbox.subscribe(this.subscriber);
  }

  private handleAdd(command: AddCommand, correlationId: CorrelationId | null, serverRx: number): void {
    const mailbox = this.requireClaim(command.channelId, CLAIM_ACTIONS.add);
    const { side } = this.requireBinding();
    mailbox.append({
      side,
      phase: command.phase,
      body: command.body,
      serverRx,
      id: command.msgId ?? correlationId,
    });
  }

  private handleRelease(command: ReleaseCommand): void {
    const mailbox = this.requireClaim(command.channelId, CLAIM_ACTIONS.release);
    const { directory, side } = this.requireBinding();
    this.claimed.delete(command.channelId);
    const status = directory.release(mailbox, side, command.mood);
    this.send({ type: 'released', status });
  }

  private handleMailboxDeleted(channelId: string): void {
    this.watched.delete(channelId);
    if (this.closed) return;
    this.log.debug({ channelId }, 'Watched mailbox deleted, closing connection');
    // Next turn, so responses queued in this one (e.g. `released`) go out first.
    setImmediate(() => {
      if (!this.closed) this.sink.close('mailbox deleted');
    });
  }

  private requireBinding(): Binding {
    if (!this.binding) {
      throw new RelayError('not_bound', 'Must bind first');
    }
    return this.binding;
  }

  private requireClaim(channelId: string, action: string): Mailbox {
    const mailbox = this.claimed.get(channelId);
    if (!mailbox) {
      throw new RelayError('not_claimed', `must claim channel before ${action}`);
    }
    return mailbox;
  }

  private send(response: RelayResponse): void {
    if (this.closed) return;
    this.sink.send({ ...response, serverTx: this.rendezvous.now() / 1000 });
  }
}
