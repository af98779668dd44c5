import { describe, expect, it } from 'vitest';
import { readFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { ENV_FILE_PATH, loadConfig, validateConfig } from './config.js';

describe('ENV_FILE_PATH', () => {
  it('points at the .env beside the workspace root package.json', () => {
    expect(basename(ENV_FILE_PATH)).toBe('.env');
    const rootPackage: unknown = JSON.parse(readFileSync(join(dirname(ENV_FILE_PATH), 'package.json'), 'utf8'));
    expect(rootPackage).toMatchObject({ name: 'rendezvous-relay', workspaces: ['shared', 'apps/api'] });
  });
});

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      nodeEnv: 'development',
      port: 4000,
      host: '0.0.0.0',
      logLevel: 'info',
      wsPath: '/v1',
      maxPayloadBytes: 1048576,
      logRequests: false,
      rateLimitMax: 300,
      welcome: {},
    });
  });

  it('logs less outside development unless told otherwise', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).logLevel).toBe('warn');
    expect(loadConfig({ NODE_ENV: 'production', LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
    expect(loadConfig({ LOG_LEVEL: 'loud' }).logLevel).toBe('info');
  });

  it('reads transport settings', () => {
    const config = loadConfig({
      PORT: '4100',
      HOST: '127.0.0.1',
      RELAY_WS_PATH: '/relay',
      RELAY_MAX_PAYLOAD_BYTES: '2048',
      RELAY_LOG_REQUESTS: 'true',
      RELAY_RATE_LIMIT_MAX: '50',
    });
    expect(config).toMatchObject({
      port: 4100,
      host: '127.0.0.1',
      wsPath: '/relay',
      maxPayloadBytes: 2048,
      logRequests: true,
      rateLimitMax: 50,
    });
  });

  it('builds the welcome payload from the fields that are set', () => {
    const config = loadConfig({
      RELAY_WELCOME_MOTD: 'Maintenance at noon',
      RELAY_WELCOME_CURRENT_VERSION: '0.9.2',
    });
    expect(config.welcome).toEqual({ motd: 'Maintenance at noon', currentVersion: '0.9.2' });
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(loadConfig({}))).toEqual({ ok: true, errors: [], warnings: [] });
  });

  it('reports each invalid setting', () => {
    const result = validateConfig(
      loadConfig({ PORT: 'abc', RELAY_WS_PATH: 'v1', RELAY_MAX_PAYLOAD_BYTES: '0', RELAY_RATE_LIMIT_MAX: '-1' }),
    );
    expect(result.ok).toBe(false);
    expect(result.errors.map((issue) => issue.key)).toEqual([
      'PORT',
      'RELAY_WS_PATH',
      'RELAY_MAX_PAYLOAD_BYTES',
      'RELAY_RATE_LIMIT_MAX',
    ]);
  });

  it('warns when every client will be turned away', () => {
    const result = validateConfig(loadConfig({ RELAY_WELCOME_ERROR: 'Relay retired' }));
    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([
      { key: 'RELAY_WELCOME_ERROR', reason: 'Every client will display the welcome error and abort.' },
    ]);
  });
});
