import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'url';
import { createUrl, loadClientConfig } from './config.js';
import { ConfigError } from '../errors.js';

const fixture = (name: string) => fileURLToPath(new URL(`../../config/${name}`, import.meta.url));

describe('loadClientConfig', () => {
  it('falls back to defaults without a file', () => {
    expect(loadClientConfig(undefined, {})).toEqual({
      url: 'ws://localhost:9090',
      reconnect: true,
      reconnectIntervalMs: 1000,
      maxReconnectIntervalMs: 30000,
      connectTimeoutMs: 10000,
      serviceTimeoutMs: 10000,
      logLevel: 'info',
      logFormat: 'text',
    });
  });

  it('reads a YAML file', () => {
    const config = loadClientConfig(fixture('lab-robot.yaml'), {});
    expect(config.url).toBe('wss://lab-robot.local:9443');
    expect(config.reconnectIntervalMs).toBe(500);
    expect(config.maxReconnectIntervalMs).toBe(8000);
    expect(config.serviceTimeoutMs).toBe(3000);
    expect(config.headers).toEqual({ Authorization: 'Bearer test-secret' });
    expect(config.logLevel).toBe('debug');
    expect(config.logFormat).toBe('json');
  });

  it('lets the environment override the file', () => {
    const config = loadClientConfig(fixture('default.yaml'), {
      ROSBRIDGE_URL: 'ws://10.0.0.5:9090',
      ROSBRIDGE_LOG_LEVEL: 'warn',
    });
    expect(config.url).toBe('ws://10.0.0.5:9090');
    expect(config.logLevel).toBe('warn');
  });

  it('lists every invalid field', () => {
    const path = fixture('invalid.yaml');
    expect(() => loadClientConfig(path, {})).toThrow(ConfigError);
    expect(() => loadClientConfig(path, {})).toThrow(
      `Invalid configuration in ${path}: serviceTimeoutMs: Number must be greater than 0; ` +
        `logLevel: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'verbose'`
    );
  });

  it('rejects a missing file', () => {
    expect(() => loadClientConfig(fixture('absent.yaml'), {})).toThrow(ConfigError);
  });

  it('rejects an invalid environment value', () => {
    expect(() => loadClientConfig(undefined, { ROSBRIDGE_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
    expect(() => loadClientConfig(undefined, { ROSBRIDGE_LOG_LEVEL: 'toString' })).toThrow(ConfigError);
  });
});

describe('createUrl', () => {
  it('builds a ws URL from host and port', () => {
    expect(createUrl('localhost', 9090)).toBe('ws://localhost:9090');
    expect(createUrl('robot.local')).toBe('ws://robot.local');
    expect(createUrl('robot.local', 443, true)).toBe('wss://robot.local:443');
  });

  it('keeps a full URL and replaces its port', () => {
    expect(createUrl('ws://robot.local:9090')).toBe('ws://robot.local:9090');
    expect(createUrl('ws://robot.local:9090', 9091)).toBe('ws://robot.local:9091');
  });
});
