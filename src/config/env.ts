// Environment variable parsing

import {
  DEFAULT_GATEWAY_ADDRESS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_MESSAGE_LIMIT,
  DEFAULT_CACHE_PATH,
  clampPollInterval,
  resolveGatewayUrl,
} from './defaults.js';

export interface IGatewayEnvConfig {
  address: string;
  tunnelUrl?: string;
  baseUrl: string;
  requestTimeoutMs: number;
  messageLimit: number;
}

export interface ISyncEnvConfig {
  pollIntervalMs: number;
  autoPoll: boolean;
}

export interface ICacheEnvConfig {
  enabled: boolean;
  path: string;
}

export interface IEnvConfig {
  gateway: IGatewayEnvConfig;
  sync: ISyncEnvConfig;
  cache: ICacheEnvConfig;
}

function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseIntEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): IEnvConfig {
  const address = env.GATEWAY_ADDRESS || DEFAULT_GATEWAY_ADDRESS;
  const tunnelUrl = env.GATEWAY_TUNNEL_URL || undefined;

  return {
    gateway: {
      address,
      tunnelUrl,
      baseUrl: resolveGatewayUrl(address, tunnelUrl),
      requestTimeoutMs: parseIntEnv(env.REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
      messageLimit: parseIntEnv(env.MESSAGE_LIMIT, DEFAULT_MESSAGE_LIMIT),
    },
    sync: {
      pollIntervalMs: clampPollInterval(parseIntEnv(env.POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS)),
      autoPoll: parseBooleanEnv(env.AUTO_POLL, true),
    },
    cache: {
      enabled: parseBooleanEnv(env.CACHE_ENABLED, true),
      path: env.CACHE_PATH || DEFAULT_CACHE_PATH,
    },
  };
}
