import { describe, expect, it } from 'vitest';
import {
  allowedBeforeBind,
  decodeCommand,
  isCommandType,
  readCorrelationId,
  readRawCommand,
} from './commands.js';
import { RelayError } from './errors.js';

function decodeError(fn: () => unknown): RelayError {
  try {
    fn();
  } catch (err) {
    if (err instanceof RelayError) return err;
    throw err;
  }
  throw new Error('expected a RelayError');
}

describe('readRawCommand', () => {
  it('returns the type tag and the original fields', () => {
    const raw = { type: 'claim', channelId: '4', extra: true };
    expect(readRawCommand(raw)).toEqual({ type: 'claim', fields: raw });
  });

  it.each([null, 42, 'bind', [], {}, { type: 7 }])('rejects %j as missing a type', (raw) => {
    const err = decodeError(() => readRawCommand(raw));
    expect(err.code).toBe('missing_type');
    expect(err.message).toBe("missing 'type'");
  });
});

describe('command type helpers', () => {
  it('recognizes every protocol command and nothing else', () => {
    for (const type of ['ping', 'bind', 'list', 'allocate', 'claim', 'watch', 'add', 'release']) {
      expect(isCommandType(type)).toBe(true);
    }
    expect(isCommandType('open')).toBe(false);
    expect(isCommandType('toString')).toBe(false);
  });

  it('allows only ping and bind before binding', () => {
    expect(allowedBeforeBind('ping')).toBe(true);
    expect(allowedBeforeBind('bind')).toBe(true);
    expect(allowedBeforeBind('list')).toBe(false);
  });

  it('reads string and numeric correlation ids', () => {
    expect(readCorrelationId({ id: 'abc' })).toBe('abc');
    expect(readCorrelationId({ id: 12 })).toBe(12);
    expect(readCorrelationId({ id: { nested: true } })).toBeNull();
    expect(readCorrelationId({})).toBeNull();
  });
});

describe('decodeCommand', () => {
  it('decodes add and strips unknown keys', () => {
    const command = decodeCommand('add', {
      type: 'add',
      channelId: '1',
      phase: 'pake',
      body: 'ab12',
      msgId: 'm-1',
      future: 'ignored',
    });
    expect(command).toEqual({ type: 'add', channelId: '1', phase: 'pake', body: 'ab12', msgId: 'm-1' });
  });

  it('keeps the optional release mood', () => {
    expect(decodeCommand('release', { type: 'release', channelId: '1', mood: 'happy' })).toEqual({
      type: 'release',
      channelId: '1',
      mood: 'happy',
    });
  });

  it('reports the first missing field', () => {
    const err = decodeError(() => decodeCommand('bind', { type: 'bind', side: 'a1' }));
    expect(err.code).toBe('missing_field');
    expect(err.message).toBe("bind requires 'appId'");
  });

  it('reports a missing add body', () => {
    const err = decodeError(() => decodeCommand('add', { type: 'add', channelId: '1', phase: 'pake' }));
    expect(err.message).toBe("add requires 'body'");
  });

  it('reports fields of the wrong type as invalid', () => {
    const err = decodeError(() => decodeCommand('claim', { type: 'claim', channelId: 4 }));
    expect(err.code).toBe('invalid_field');
    expect(err.message).toBe("claim has invalid 'channelId'");
  });

  it('requires an integer ping', () => {
    expect(decodeError(() => decodeCommand('ping', { type: 'ping' })).message).toBe("ping requires 'ping'");
    const fractional = decodeError(() => decodeCommand('ping', { type: 'ping', ping: 1.5 }));
    expect(fractional.code).toBe('invalid_field');
    expect(fractional.message).toBe("ping has invalid 'ping'");
  });
});
