/**
 * Rendezvous wire protocol: JSON objects exchanged over one WebSocket.
 *
 * Commands flow client → server, responses server → client. They are not
 * one-to-one: every command carrying `id` provokes an `ack`, and `watch`
 * keeps producing `message` responses until the connection closes.
 */

/** Correlation token a client may attach to any command. */
export type CorrelationId = string | number;

// ── Inbound commands ──────────────────────────────────────────

export type RelayCommand =
  | PingCommand
  | BindCommand
  | ListCommand
  | AllocateCommand
  | ClaimCommand
  | WatchCommand
  | AddCommand
  | ReleaseCommand;

export type RelayCommandType = RelayCommand['type'];

export interface PingCommand {
  type: 'ping';
  ping: number;
}

export interface BindCommand {
  type: 'bind';
  appId: string;
  side: string;
}

export interface ListCommand {
  type: 'list';
}

export interface AllocateCommand {
  type: 'allocate';
}

export interface ClaimCommand {
  type: 'claim';
  channelId: string;
}

export interface WatchCommand {
  type: 'watch';
  channelId: string;
}

export interface AddCommand {
  type: 'add';
  channelId: string;
  phase: string;
  /** Hex-encoded bytes; never inspected by the relay. */
  body: string;
  msgId?: CorrelationId;
}

export interface ReleaseCommand {
  type: 'release';
  channelId: string;
  mood?: string;
}

// ── Outbound responses ────────────────────────────────────────

export interface Welcome {
  /** Out-of-date clients display a warning. */
  currentVersion?: string;
  /** Displayed by every client, which then continues normally. */
  motd?: string;
  /** Displayed by every client, which then terminates. */
  error?: string;
}

export interface MailboxMessage {
  side: string;
  phase: string;
  body: string;
  /** Server receive time, seconds since epoch. */
  serverRx: number;
  id: CorrelationId | null;
}

export type ReleaseStatus = 'waiting' | 'deleted';

export type RelayResponse =
  | { type: 'welcome'; welcome: Welcome }
  | { type: 'ack'; id: unknown }
  | { type: 'pong'; pong: number }
  | { type: 'nameplates'; nameplates: string[] }
  | { type: 'nameplate'; nameplate: string }
  | { type: 'message'; channelId: string; message: MailboxMessage }
  | { type: 'released'; status: ReleaseStatus }
  | { type: 'error'; error: string; orig: unknown };

/** A response as written to the socket, stamped with the send time in seconds. */
export type RelayFrame = RelayResponse & { serverTx: number };
