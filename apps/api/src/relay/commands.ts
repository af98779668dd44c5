/**
 * Inbound command decoding: turns an untyped JSON object into the
 * RelayCommand union once, at the boundary. Unknown keys are stripped.
 */

import { z } from 'zod';
import type { CorrelationId, RelayCommand, RelayCommandType } from '@rendezvous-relay/shared';
import { RelayError } from './errors.js';

const correlationIdSchema = z.union([z.string(), z.number()]);

type CommandSchemas = {
  [K in RelayCommandType]: z.ZodType<Extract<RelayCommand, { type: K }>>;
};

const commandSchemas = {
  ping: z.object({ type: z.literal('ping'), ping: z.number().int() }),
  bind: z.object({ type: z.literal('bind'), appId: z.string(), side: z.string() }),
  list: z.object({ type: z.literal('list') }),
  allocate: z.object({ type: z.literal('allocate') }),
  claim: z.object({ type: z.literal('claim'), channelId: z.string() }),
  watch: z.object({ type: z.literal('watch'), channelId: z.string() }),
  add: z.object({
    type: z.literal('add'),
    channelId: z.string(),
    phase: z.string(),
    body: z.string(),
    msgId: correlationIdSchema.optional(),
  }),
  release: z.object({
    type: z.literal('release'),
    channelId: z.string(),
    mood: z.string().optional(),
  }),
} satisfies CommandSchemas;

/** Commands accepted before `bind`. */
const UNBOUND_COMMANDS: ReadonlySet<string> = new Set<RelayCommandType>(['ping', 'bind']);

export interface RawCommand {
  type: string;
  fields: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Extract the `type` tag, rejecting anything that is not a tagged object. */
export function readRawCommand(raw: unknown): RawCommand {
  if (!isRecord(raw) || typeof raw.type !== 'string') {
    throw new RelayError('missing_type', "missing 'type'");
  }
  return { type: raw.type, fields: raw };
}

export function isCommandType(type: string): type is RelayCommandType {
  return Object.hasOwn(commandSchemas, type);
}

export function allowedBeforeBind(type: string): boolean {
  return UNBOUND_COMMANDS.has(type);
}

/** The client's correlation token, when it is a usable string or number. */
export function readCorrelationId(fields: Record<string, unknown>): CorrelationId | null {
  const parsed = correlationIdSchema.safeParse(fields.id);
  return parsed.success ? parsed.data : null;
}

export function decodeCommand(type: RelayCommandType, fields: Record<string, unknown>): RelayCommand {
  const schema: z.ZodType<RelayCommand> = commandSchemas[type];
  const result = schema.safeParse(fields);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? String(issue.path[0]) : 'type';
  if (issue && issue.code === 'invalid_type' && issue.received === 'undefined') {
    throw new RelayError('missing_field', `${type} requires '${field}'`);
  }
  throw new RelayError('invalid_field', `${type} has invalid '${field}'`);
}
