// Connection, polling and sync status tools

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { getArgs, readNumber } from '../core/parsers/common.js';
import { formatOutcome, successResponse } from '../core/serializers/common.js';
import { clampPollInterval } from '../config/defaults.js';
import type { SyncStore } from '../core/sync/sync-store.js';

export function createSyncTools(getStore: () => SyncStore, getSnapshot: () => unknown) {
  const tools: Tool[] = [
    {
      name: 'connection_check',
      description: 'Probe the gateway health endpoint and update the connectivity flag',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    {
      name: 'status_poll',
      description: 'Poll the gateway status once and merge live agent status into the cache',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    {
      name: 'polling_start',
      description: 'Start (or restart) background status polling',
      inputSchema: {
        type: 'object',
        properties: {
          intervalMs: {
            type: 'number',
            description: 'Poll interval in milliseconds (default: configured POLL_INTERVAL_MS, min: 250)',
          },
        },
      },
    },
    {
      name: 'polling_stop',
      description: 'Stop background status polling',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    {
      name: 'sync_status',
      description: 'Get connectivity, polling state, cache counts and gateway configuration',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
  ];

  const handlers: Record<string, (args: unknown) => Promise<unknown>> = {
    connection_check: async () => {
      const connected = await getStore().checkConnection();
      return successResponse({ connected });
    },

    status_poll: async () => {
      const store = getStore();
      const outcome = await store.pollStatus();
      return successResponse({
        outcome: formatOutcome(outcome),
        isConnected: store.isConnected,
        lastPolledAt: store.getState().lastPolledAt,
      });
    },

    polling_start: async (args: unknown) => {
      const input = getArgs(args);
      const intervalMs = readNumber(input, 'intervalMs');
      const store = getStore();

      if (intervalMs === undefined) {
        store.startPolling();
      } else {
        store.startPolling(clampPollInterval(intervalMs));
      }

      return successResponse({
        polling: store.isPolling,
        intervalMs: intervalMs === undefined ? 'default' : clampPollInterval(intervalMs),
      });
    },

    polling_stop: async () => {
      const store = getStore();
      store.stopPolling();
      return successResponse({ polling: store.isPolling });
    },

    sync_status: async () => {
      return successResponse(getSnapshot());
    },
  };

  return { tools, handlers };
}
