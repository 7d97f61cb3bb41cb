/**
 * Load client settings from defaults, an optional YAML file and the
 * environment, in increasing order of precedence.
 */

import { readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_BRIDGE_URL,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_MAX_RECONNECT_INTERVAL_MS,
  DEFAULT_RECONNECT_INTERVAL_MS,
  DEFAULT_SERVICE_TIMEOUT_MS,
} from '../constants.js';
import { ConfigError } from '../errors.js';

export const ClientConfigSchema = z.object({
  url: z.string().min(1).default(DEFAULT_BRIDGE_URL),
  reconnect: z.boolean().default(true),
  reconnectIntervalMs: z.number().int().positive().default(DEFAULT_RECONNECT_INTERVAL_MS),
  maxReconnectIntervalMs: z.number().int().positive().default(DEFAULT_MAX_RECONNECT_INTERVAL_MS),
  connectTimeoutMs: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT_MS),
  serviceTimeoutMs: z.number().int().positive().default(DEFAULT_SERVICE_TIMEOUT_MS),
  headers: z.record(z.string()).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  logFormat: z.enum(['text', 'json']).default('text'),
}).strict();

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type Environment = Record<string, string | undefined>;

export function loadClientConfig(filePath?: string, env: Environment = process.env): ClientConfig {
  const fromFile = filePath ? readConfigFile(filePath) : {};

  const merged: Record<string, unknown> = { ...fromFile };
  if (env.ROSBRIDGE_URL) merged.url = env.ROSBRIDGE_URL;
  if (env.ROSBRIDGE_LOG_LEVEL) merged.logLevel = env.ROSBRIDGE_LOG_LEVEL;

  const result = ClientConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration${filePath ? ` in ${filePath}` : ''}: ${issues}`, filePath);
  }
  return result.data;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read ${filePath}: ${reason}`, filePath);
  }

  // An empty file parses to null
  if (data === null || data === undefined) return {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ConfigError(`Configuration in ${filePath} must be a mapping`, filePath);
  }
  return { ...data };
}

/**
 * Build a bridge URL from host and port. A host that already is a URL is
 * returned unchanged when no port is given.
 */
export function createUrl(host: string, port?: number, isSecure = false): string {
  if (/^wss?:\/\//.test(host)) {
    if (port === undefined) return host;
    const url = new URL(host);
    url.port = String(port);
    return url.toString().replace(/\/$/, '');
  }
  const scheme = isSecure ? 'wss' : 'ws';
  return port === undefined ? `${scheme}://${host}` : `${scheme}://${host}:${port}`;
}
