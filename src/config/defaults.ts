// Default configuration values for the gateway connection and sync loop

import { homedir } from 'os';
import { join } from 'path';

export const DEFAULT_GATEWAY_ADDRESS = '127.0.0.1:9999';
export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
export const DEFAULT_MESSAGE_LIMIT = 50;

export const MIN_POLL_INTERVAL_MS = 250;
export const MAX_POLL_INTERVAL_MS = 5 * 60 * 1000;

export const DEFAULT_CACHE_DIR = join(homedir(), '.agent-deck');
export const DEFAULT_CACHE_PATH = join(DEFAULT_CACHE_DIR, 'cache.db');

// Tunnel URL wins over the LAN address when one is configured
export function resolveGatewayUrl(address: string, tunnelUrl?: string): string {
  if (tunnelUrl && tunnelUrl.trim() !== '') {
    return tunnelUrl.trim().replace(/\/+$/, '');
  }
  return `http://${address}`;
}

export function clampPollInterval(intervalMs: number): number {
  return Math.max(MIN_POLL_INTERVAL_MS, Math.min(intervalMs, MAX_POLL_INTERVAL_MS));
}
