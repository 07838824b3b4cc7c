// Application state: wires config, gateway client, cache and sync store

import { ToolRegistry } from '../core/registry/tool-registry.js';
import { CacheStore, type ICacheStats } from '../core/cache/cache-store.js';
import { SyncStore } from '../core/sync/sync-store.js';
import { HttpRemoteClient } from '../remote/http-client.js';
import type { IRemoteClient } from '../core/interfaces/remote-client.js';
import type { IEnvConfig } from '../config/env.js';
import { loadEnvConfig } from '../config/env.js';
import { registerSyncTools } from '../tools/definitions.js';

export interface IAppStateOptions {
  config?: IEnvConfig;
  // Replaces the HTTP client (tests, alternative transports)
  remote?: IRemoteClient;
  // Replaces the configured cache; null disables persistence
  cache?: CacheStore | null;
}

export interface IAppStateSnapshot {
  gateway: {
    baseUrl: string;
    requestTimeoutMs: number;
    messageLimit: number;
  };
  sync: {
    isConnected: boolean;
    isLoading: boolean;
    isPolling: boolean;
    pollIntervalMs: number;
    lastPolledAt: number | null;
  };
  counts: {
    projects: number;
    agents: number;
    messages: number;
    pending: number;
  };
  cache: (ICacheStats & { path: string }) | null;
  tools: {
    count: number;
  };
}

export class AppState {
  private readonly _config: IEnvConfig;
  private readonly _cache: CacheStore | null;
  private readonly _store: SyncStore;
  private readonly _toolRegistry: ToolRegistry;
  private _initialized = false;

  constructor(options?: IAppStateOptions) {
    this._config = options?.config ?? loadEnvConfig();

    if (options?.cache !== undefined) {
      this._cache = options.cache;
    } else {
      this._cache = this._config.cache.enabled ? new CacheStore(this._config.cache.path) : null;
    }

    const remote = options?.remote ?? new HttpRemoteClient({
      baseUrl: this._config.gateway.baseUrl,
      timeoutMs: this._config.gateway.requestTimeoutMs,
      messageLimit: this._config.gateway.messageLimit,
    });

    this._store = new SyncStore(remote, {
      pollIntervalMs: this._config.sync.pollIntervalMs,
      cache: this._cache,
    });

    this._toolRegistry = new ToolRegistry();
    registerSyncTools(this._toolRegistry, () => this._store, () => this.getSnapshot());
  }

  get config(): IEnvConfig {
    return this._config;
  }

  get store(): SyncStore {
    return this._store;
  }

  get tools(): ToolRegistry {
    return this._toolRegistry;
  }

  get initialized(): boolean {
    return this._initialized;
  }

  // Lifecycle
  async initialize(): Promise<void> {
    if (this._initialized) return;

    this._store.hydrate();
    await this._store.checkConnection();
    await this._store.fetchProjects();

    this._initialized = true;
  }

  start(): void {
    if (this._config.sync.autoPoll) {
      this._store.startPolling();
    }
  }

  stop(): void {
    this._store.dispose();
    if (this._cache) {
      this._cache.close();
    }
    this._initialized = false;
  }

  // Snapshot for debugging/status
  getSnapshot(): IAppStateSnapshot {
    const state = this._store.getState();
    const countValues = (record: Record<string, unknown[]>): number =>
      Object.values(record).reduce((sum, list) => sum + list.length, 0);

    return {
      gateway: {
        baseUrl: this._config.gateway.baseUrl,
        requestTimeoutMs: this._config.gateway.requestTimeoutMs,
        messageLimit: this._config.gateway.messageLimit,
      },
      sync: {
        isConnected: state.isConnected,
        isLoading: state.isLoading,
        isPolling: this._store.isPolling,
        pollIntervalMs: this._config.sync.pollIntervalMs,
        lastPolledAt: state.lastPolledAt,
      },
      counts: {
        projects: state.projects.length,
        agents: countValues(state.agents),
        messages: countValues(state.messages),
        pending: countValues(state.pending),
      },
      cache: this._cache ? { ...this._cache.getStats(), path: this._cache.path } : null,
      tools: {
        count: this._toolRegistry.size(),
      },
    };
  }
}
