// Client-side sync store: cached projects, agents and messages kept
// consistent with the gateway through fetches, status polling and
// optimistic sends

import { randomUUID } from 'crypto';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { IRemoteClient } from '../interfaces/remote-client.js';
import {
  DEFAULT_PERSONA,
  type IAgent,
  type IMessage,
  type IProject,
  type IStatusSnapshot,
} from '../interfaces/entities.js';
import type { CacheStore } from '../cache/cache-store.js';
import { describeError, toSyncError, type SyncError } from '../errors/sync-error.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../../config/defaults.js';
import { FreshnessTracker } from './freshness.js';
import {
  applyStatusSnapshot,
  carryProjectCounters,
  mergeDisplayedMessages,
  mergeFetchedAgents,
  reconcilePending,
  type DeliveryState,
  type IPendingMessage,
} from './reconcile.js';

export interface ISyncState {
  projects: IProject[];
  agents: Record<string, IAgent[]>;
  messages: Record<string, IMessage[]>;
  pending: Record<string, IPendingMessage[]>;
  isConnected: boolean;
  isLoading: boolean;
  isPolling: boolean;
  lastPolledAt: number | null;
}

// applied: false means a fresher result for the same scope already landed
export type SyncOutcome =
  | { ok: true; applied: boolean }
  | { ok: false; error: SyncError };

export type SendMessageOutcome = SyncOutcome & { message: IMessage };

export interface ISyncStoreOptions {
  pollIntervalMs?: number;
  cache?: CacheStore | null;
  now?: () => number;
  generateId?: () => string;
}

const APPLIED: SyncOutcome = { ok: true, applied: true };
const STALE: SyncOutcome = { ok: true, applied: false };

function initialState(): ISyncState {
  return {
    projects: [],
    agents: {},
    messages: {},
    pending: {},
    isConnected: false,
    isLoading: false,
    isPolling: false,
    lastPolledAt: null,
  };
}

export class SyncStore {
  private readonly remote: IRemoteClient;
  private readonly store: StoreApi<ISyncState>;
  private readonly freshness = new FreshnessTracker();
  private readonly cache: CacheStore | null;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private inFlight = 0;

  constructor(remote: IRemoteClient, options?: ISyncStoreOptions) {
    this.remote = remote;
    this.cache = options?.cache ?? null;
    this.pollIntervalMs = options?.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options?.now ?? Date.now;
    this.generateId = options?.generateId ?? randomUUID;
    this.store = createStore<ISyncState>()(() => initialState());
  }

  // Published state

  getState(): ISyncState {
    return this.store.getState();
  }

  subscribe(listener: (state: ISyncState, previous: ISyncState) => void): () => void {
    return this.store.subscribe(listener);
  }

  get isConnected(): boolean {
    return this.store.getState().isConnected;
  }

  get isLoading(): boolean {
    return this.store.getState().isLoading;
  }

  get isPolling(): boolean {
    return this.pollTimer !== null;
  }

  projects(): IProject[] {
    return this.store.getState().projects;
  }

  project(projectId: string): IProject | null {
    return this.projects().find(p => p.id === projectId) ?? null;
  }

  agentsForProject(projectId: string): IAgent[] {
    return this.store.getState().agents[projectId] ?? [];
  }

  agent(agentId: string): IAgent | null {
    for (const slice of Object.values(this.store.getState().agents)) {
      const found = slice.find(a => a.id === agentId);
      if (found) return found;
    }
    return null;
  }

  // Confirmed messages first, then optimistic ones not yet confirmed
  messagesForAgent(agentId: string): IMessage[] {
    const state = this.store.getState();
    return mergeDisplayedMessages(state.messages[agentId] ?? [], state.pending[agentId] ?? []);
  }

  pendingMessages(agentId: string): IPendingMessage[] {
    return this.store.getState().pending[agentId] ?? [];
  }

  // Lifecycle

  /**
   * Seed the cache from the persisted snapshot, if a cache is configured.
   * Returns whether anything was loaded.
   */
  hydrate(): boolean {
    if (!this.cache) return false;
    try {
      const snapshot = this.cache.loadSnapshot();
      this.store.setState({
        projects: snapshot.projects,
        agents: snapshot.agents,
        messages: snapshot.messages,
      });
      return snapshot.projects.length > 0;
    } catch (error) {
      console.error(`Failed to load cache: ${describeError(error)}`);
      return false;
    }
  }

  dispose(): void {
    this.stopPolling();
  }

  // Fetches (wholesale replace)

  async fetchProjects(): Promise<SyncOutcome> {
    const token = this.freshness.next();
    return this.track(async () => {
      let fetched: IProject[];
      try {
        fetched = await this.remote.listProjects();
      } catch (error) {
        return this.fail('fetch projects', error);
      }

      if (!this.freshness.claim('projects', token)) return STALE;

      const pollIsNewer = this.freshness.lastApplied('status') > token;
      const projects = pollIsNewer
        ? carryProjectCounters(fetched, this.store.getState().projects)
        : fetched;

      this.store.setState({ projects });
      this.persist('projects', cache => cache.replaceProjects(projects));
      return APPLIED;
    });
  }

  async fetchAgents(projectId: string): Promise<SyncOutcome> {
    const token = this.freshness.next();
    return this.track(async () => {
      let fetched: IAgent[];
      try {
        fetched = await this.remote.listAgents(projectId);
      } catch (error) {
        return this.fail(`fetch agents for project ${projectId}`, error);
      }

      if (!this.freshness.claim(`agents:${projectId}`, token)) return STALE;

      const pollIsNewer = this.freshness.lastApplied('status') > token;
      const state = this.store.getState();
      const slice = mergeFetchedAgents(fetched, state.agents[projectId] ?? [], pollIsNewer);

      this.store.setState({ agents: { ...state.agents, [projectId]: slice } });
      this.persist('agents', cache => cache.replaceAgents(projectId, slice));
      return APPLIED;
    });
  }

  async fetchMessages(agentId: string): Promise<SyncOutcome> {
    const token = this.freshness.next();
    return this.track(async () => {
      let fetched: IMessage[];
      try {
        fetched = await this.remote.listMessages(agentId);
      } catch (error) {
        return this.fail(`fetch messages for agent ${agentId}`, error);
      }

      if (!this.freshness.claim(`messages:${agentId}`, token)) return STALE;

      const state = this.store.getState();
      const pending = reconcilePending(state.pending[agentId] ?? [], fetched, token);

      this.store.setState({
        messages: { ...state.messages, [agentId]: fetched },
        pending: { ...state.pending, [agentId]: pending },
      });
      this.persist('messages', cache => cache.replaceMessages(agentId, fetched));
      return APPLIED;
    });
  }

  // Optimistic send

  /**
   * Append a user message locally, then ask the gateway to persist it.
   * A failed send is not rolled back; the pending entry is marked failed.
   */
  async sendMessage(agentId: string, projectId: string, text: string): Promise<SendMessageOutcome> {
    const message: IMessage = {
      id: this.generateId(),
      agentId,
      role: 'user',
      text,
      timestamp: this.now(),
      persona: DEFAULT_PERSONA,
    };

    const entry: IPendingMessage = { message, delivery: 'sending', ackToken: null };
    this.store.setState(state => ({
      pending: {
        ...state.pending,
        [agentId]: [...(state.pending[agentId] ?? []), entry],
      },
    }));

    try {
      await this.remote.sendMessage(agentId, projectId, text, { clientMessageId: message.id });
    } catch (error) {
      this.markDelivery(agentId, message.id, 'failed', null);
      return { ...this.fail(`send message to agent ${agentId}`, error), message };
    }

    this.markDelivery(agentId, message.id, 'sent', this.freshness.next());
    return { ok: true, applied: true, message };
  }

  // Connectivity and live status

  async checkConnection(): Promise<boolean> {
    const token = this.freshness.next();
    let connected: boolean;
    try {
      connected = await this.remote.healthCheck();
    } catch (error) {
      console.error(`Health check failed: ${describeError(error)}`);
      connected = false;
    }

    if (this.freshness.claim('connection', token)) {
      this.store.setState({ isConnected: connected });
    }
    return connected;
  }

  async pollStatus(): Promise<SyncOutcome> {
    const token = this.freshness.next();
    let snapshot: IStatusSnapshot;
    try {
      snapshot = await this.remote.getStatus();
    } catch (error) {
      const syncError = toSyncError(error);
      if (this.freshness.claim('connection', token)) {
        // Log transitions only; a dead gateway would otherwise log every tick
        if (this.store.getState().isConnected) {
          console.error(`Gateway connection lost: ${syncError.message}`);
        }
        this.store.setState({ isConnected: false });
      }
      return { ok: false, error: syncError };
    }

    const connectionFresh = this.freshness.claim('connection', token);
    if (!this.freshness.claim('status', token)) {
      if (connectionFresh) this.store.setState({ isConnected: true });
      return STALE;
    }

    this.store.setState(state => ({
      ...applyStatusSnapshot(state, snapshot),
      isConnected: connectionFresh ? true : state.isConnected,
      lastPolledAt: this.now(),
    }));
    return APPLIED;
  }

  // Poll loop

  startPolling(intervalMs: number = this.pollIntervalMs): void {
    this.stopPolling();

    this.pollTimer = setInterval(() => {
      void this.pollStatus();
    }, intervalMs);
    this.store.setState({ isPolling: true });

    // Immediate first poll
    void this.pollStatus();
  }

  stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
      this.store.setState({ isPolling: false });
    }
  }

  // Helpers

  private async track(operation: () => Promise<SyncOutcome>): Promise<SyncOutcome> {
    this.inFlight += 1;
    if (this.inFlight === 1) this.store.setState({ isLoading: true });
    try {
      return await operation();
    } finally {
      this.inFlight -= 1;
      if (this.inFlight === 0) this.store.setState({ isLoading: false });
    }
  }

  private fail(operation: string, error: unknown): { ok: false; error: SyncError } {
    const syncError = toSyncError(error);
    console.error(`Failed to ${operation}: ${syncError.message}`);
    return { ok: false, error: syncError };
  }

  private markDelivery(agentId: string, messageId: string, delivery: DeliveryState, ackToken: number | null): void {
    this.store.setState(state => {
      const list = state.pending[agentId];
      if (!list || !list.some(p => p.message.id === messageId)) {
        return state;
      }
      return {
        pending: {
          ...state.pending,
          [agentId]: list.map(p => (p.message.id === messageId ? { ...p, delivery, ackToken } : p)),
        },
      };
    });
  }

  private persist(what: string, write: (cache: CacheStore) => void): void {
    if (!this.cache) return;
    try {
      write(this.cache);
    } catch (error) {
      console.error(`Failed to persist ${what}: ${describeError(error)}`);
    }
  }
}
