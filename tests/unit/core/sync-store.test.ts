// Tests for SyncStore fetch, poll, send and polling lifecycle

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { SyncStore, type ISyncState } from '../../../src/core/sync/sync-store.js';
import { CacheStore } from '../../../src/core/cache/cache-store.js';
import { SyncErrorCode, httpStatusError } from '../../../src/core/errors/sync-error.js';
import type { IAgent, IMessage, IProject, IStatusSnapshot } from '../../../src/core/interfaces/entities.js';
import {
  FakeRemoteClient,
  deferred,
  makeAgent,
  makeMessage,
  makeProject,
} from '../../helpers/fake-remote.js';

describe('SyncStore', () => {
  let remote: FakeRemoteClient;
  let store: SyncStore;
  let errorSpy: MockInstance<typeof console.error>;
  let ids: number;

  beforeEach(() => {
    remote = new FakeRemoteClient();
    ids = 0;
    store = new SyncStore(remote, {
      now: () => 1_000,
      generateId: () => `local-${++ids}`,
    });
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    store.dispose();
    vi.restoreAllMocks();
  });

  describe('initial state', () => {
    it('starts empty and disconnected', () => {
      expect(store.projects()).toEqual([]);
      expect(store.agentsForProject('p1')).toEqual([]);
      expect(store.messagesForAgent('a1')).toEqual([]);
      expect(store.isConnected).toBe(false);
      expect(store.isLoading).toBe(false);
      expect(store.isPolling).toBe(false);
      expect(store.getState().lastPolledAt).toBeNull();
    });
  });

  describe('fetchProjects', () => {
    it('replaces the project list wholesale', async () => {
      remote.listProjects.mockResolvedValueOnce([makeProject('p1'), makeProject('p2')]);
      expect(await store.fetchProjects()).toEqual({ ok: true, applied: true });
      expect(store.projects().map(p => p.id)).toEqual(['p1', 'p2']);

      remote.listProjects.mockResolvedValueOnce([makeProject('p2')]);
      await store.fetchProjects();
      expect(store.projects().map(p => p.id)).toEqual(['p2']);
    });

    it('keeps the cached list and reports the error on failure', async () => {
      remote.listProjects.mockResolvedValueOnce([makeProject('p1')]);
      await store.fetchProjects();

      remote.listProjects.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
      const outcome = await store.fetchProjects();

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe(SyncErrorCode.NETWORK_UNREACHABLE);
        expect(outcome.error.message).toBe('connect ECONNREFUSED');
      }
      expect(store.projects().map(p => p.id)).toEqual(['p1']);
      expect(errorSpy).toHaveBeenCalledWith('Failed to fetch projects: connect ECONNREFUSED');
    });

    it('discards a response that completes after a newer one', async () => {
      const slow = deferred<IProject[]>();
      const fast = deferred<IProject[]>();
      remote.listProjects.mockReturnValueOnce(slow.promise).mockReturnValueOnce(fast.promise);

      const first = store.fetchProjects();
      const second = store.fetchProjects();

      fast.resolve([makeProject('new')]);
      expect(await second).toEqual({ ok: true, applied: true });

      slow.resolve([makeProject('old')]);
      expect(await first).toEqual({ ok: true, applied: false });

      expect(store.projects().map(p => p.id)).toEqual(['new']);
    });

    it('reports loading while any fetch is in flight', async () => {
      const projects = deferred<IProject[]>();
      const agents = deferred<IAgent[]>();
      remote.listProjects.mockReturnValueOnce(projects.promise);
      remote.listAgents.mockReturnValueOnce(agents.promise);

      const first = store.fetchProjects();
      const second = store.fetchAgents('p1');
      expect(store.isLoading).toBe(true);

      projects.resolve([]);
      await first;
      expect(store.isLoading).toBe(true);

      agents.resolve([]);
      await second;
      expect(store.isLoading).toBe(false);
    });
  });

  describe('fetchAgents', () => {
    it('stores agents per project', async () => {
      remote.listAgents.mockImplementation(async projectId =>
        projectId === 'p1' ? [makeAgent('a1', 'p1')] : [makeAgent('b1', 'p2'), makeAgent('b2', 'p2')]
      );

      await store.fetchAgents('p1');
      await store.fetchAgents('p2');

      expect(store.agentsForProject('p1').map(a => a.id)).toEqual(['a1']);
      expect(store.agentsForProject('p2').map(a => a.id)).toEqual(['b1', 'b2']);
      expect(store.agent('b2')?.projectId).toBe('p2');
      expect(store.agent('missing')).toBeNull();
    });

    it('leaves the slice and connectivity alone on failure', async () => {
      remote.healthCheck.mockResolvedValueOnce(true);
      await store.checkConnection();

      remote.listAgents.mockRejectedValueOnce(httpStatusError(500, 'Internal Server Error', '/api/projects/p1/agents'));
      const outcome = await store.fetchAgents('p1');

      expect(outcome.ok).toBe(false);
      if (!outcome.ok) {
        expect(outcome.error.code).toBe(SyncErrorCode.NETWORK_HTTP_STATUS);
      }
      expect(store.agentsForProject('p1')).toEqual([]);
      expect(store.isConnected).toBe(true);
      expect(errorSpy).toHaveBeenCalledWith(
        'Failed to fetch agents for project p1: Gateway responded 500: Internal Server Error'
      );
    });

    it('keeps live fields from a poll that landed after the fetch was dispatched', async () => {
      remote.listAgents.mockResolvedValueOnce([makeAgent('a1', 'p1')]);
      await store.fetchAgents('p1');

      const refetch = deferred<IAgent[]>();
      remote.listAgents.mockReturnValueOnce(refetch.promise);
      const pending = store.fetchAgents('p1');

      remote.getStatus.mockResolvedValueOnce({
        projects: [{ id: 'p1', agents: [{ id: 'a1', isThinking: true, focus: 'parsing', sessionRunning: true }] }],
      });
      await store.pollStatus();

      refetch.resolve([makeAgent('a1', 'p1', { title: 'Renamed', isThinking: false, focus: null, sessionRunning: false })]);
      expect(await pending).toEqual({ ok: true, applied: true });

      const [agent] = store.agentsForProject('p1');
      expect(agent.title).toBe('Renamed');
      expect(agent.isThinking).toBe(true);
      expect(agent.focus).toBe('parsing');
      expect(agent.sessionRunning).toBe(true);
    });

    it('keeps known live fields when the fetch does not report them', async () => {
      remote.getStatus.mockResolvedValueOnce({
        projects: [{ id: 'p1', agents: [{ id: 'a1', isThinking: true, focus: 'docs', sessionRunning: true }] }],
      });
      remote.listAgents.mockResolvedValueOnce([makeAgent('a1', 'p1')]);
      await store.fetchAgents('p1');
      await store.pollStatus();

      remote.listAgents.mockResolvedValueOnce([makeAgent('a1', 'p1', { title: 'Second' })]);
      await store.fetchAgents('p1');

      const [agent] = store.agentsForProject('p1');
      expect(agent.title).toBe('Second');
      expect(agent.isThinking).toBe(true);
      expect(agent.focus).toBe('docs');
    });
  });

  describe('fetchMessages', () => {
    it('replaces the conversation of one agent only', async () => {
      remote.listMessages.mockImplementation(async agentId => [makeMessage(`${agentId}-m1`, agentId)]);

      await store.fetchMessages('a1');
      await store.fetchMessages('a2');

      expect(store.messagesForAgent('a1').map(m => m.id)).toEqual(['a1-m1']);
      expect(store.messagesForAgent('a2').map(m => m.id)).toEqual(['a2-m1']);
    });
  });

  describe('sendMessage', () => {
    it('shows the message before the gateway answers', async () => {
      const send = deferred<void>();
      remote.sendMessage.mockReturnValueOnce(send.promise);

      const sending = store.sendMessage('a1', 'p1', 'hi');

      expect(store.messagesForAgent('a1')).toEqual([
        { id: 'local-1', agentId: 'a1', role: 'user', text: 'hi', timestamp: 1_000, persona: 'agent' },
      ]);
      expect(store.pendingMessages('a1')[0].delivery).toBe('sending');

      send.resolve();
      const outcome = await sending;

      expect(outcome.ok).toBe(true);
      expect(outcome.message.id).toBe('local-1');
      expect(store.pendingMessages('a1')[0].delivery).toBe('sent');
      expect(remote.sendMessage).toHaveBeenCalledWith('a1', 'p1', 'hi', { clientMessageId: 'local-1' });
    });

    it('keeps a failed message visible and marks it failed', async () => {
      remote.sendMessage.mockRejectedValueOnce(new Error('socket hang up'));

      const outcome = await store.sendMessage('a1', 'p1', 'hi');

      expect(outcome.ok).toBe(false);
      expect(outcome.message.text).toBe('hi');
      expect(store.pendingMessages('a1')[0].delivery).toBe('failed');
      expect(store.messagesForAgent('a1').map(m => m.text)).toEqual(['hi']);
      expect(errorSpy).toHaveBeenCalledWith('Failed to send message to agent a1: socket hang up');

      remote.listMessages.mockResolvedValueOnce([]);
      await store.fetchMessages('a1');
      expect(store.messagesForAgent('a1').map(m => m.text)).toEqual(['hi']);
    });

    it('drops the pending copy once a later fetch returns the server copy', async () => {
      await store.sendMessage('a1', 'p1', 'hi');

      remote.listMessages.mockResolvedValueOnce([
        makeMessage('m1', 'a1', { role: 'agent', text: 'earlier' }),
        makeMessage('srv-9', 'a1', { role: 'user', text: 'hi' }),
      ]);
      await store.fetchMessages('a1');

      expect(store.pendingMessages('a1')).toEqual([]);
      expect(store.messagesForAgent('a1').map(m => m.id)).toEqual(['m1', 'srv-9']);
    });

    it('drops the pending copy when the gateway echoes its id', async () => {
      const send = deferred<void>();
      remote.sendMessage.mockReturnValueOnce(send.promise);
      const sending = store.sendMessage('a1', 'p1', 'hi');

      remote.listMessages.mockResolvedValueOnce([makeMessage('local-1', 'a1', { role: 'user', text: 'hi' })]);
      await store.fetchMessages('a1');

      expect(store.pendingMessages('a1')).toEqual([]);
      expect(store.messagesForAgent('a1').map(m => m.id)).toEqual(['local-1']);

      send.resolve();
      await sending;
      expect(store.pendingMessages('a1')).toEqual([]);
    });

    it('keeps the pending copy when the fetch was dispatched before the send was acknowledged', async () => {
      const send = deferred<void>();
      const list = deferred<IMessage[]>();
      remote.sendMessage.mockReturnValueOnce(send.promise);
      remote.listMessages.mockReturnValueOnce(list.promise);

      const sending = store.sendMessage('a1', 'p1', 'hi');
      const fetching = store.fetchMessages('a1');

      send.resolve();
      await sending;
      list.resolve([makeMessage('m1', 'a1')]);
      await fetching;

      expect(store.messagesForAgent('a1').map(m => m.id)).toEqual(['m1', 'local-1']);
    });
  });

  describe('checkConnection', () => {
    it('sets connectivity from the health probe', async () => {
      expect(await store.checkConnection()).toBe(true);
      expect(store.isConnected).toBe(true);

      remote.healthCheck.mockResolvedValueOnce(false);
      expect(await store.checkConnection()).toBe(false);
      expect(store.isConnected).toBe(false);
    });

    it('treats a throwing probe as disconnected', async () => {
      remote.healthCheck.mockRejectedValueOnce(new Error('ENOTFOUND'));

      expect(await store.checkConnection()).toBe(false);
      expect(store.isConnected).toBe(false);
      expect(errorSpy).toHaveBeenCalledWith('Health check failed: ENOTFOUND');
    });
  });

  describe('pollStatus', () => {
    const snapshot: IStatusSnapshot = {
      projects: [
        {
          id: 'p1',
          agents: [
            { id: 'a1', isThinking: true, focus: 'writing tests', sessionRunning: true },
            { id: 'a2', isThinking: false, focus: null, sessionRunning: true },
          ],
        },
      ],
    };

    beforeEach(async () => {
      remote.listProjects.mockResolvedValueOnce([makeProject('p1'), makeProject('p2')]);
      remote.listAgents.mockResolvedValueOnce([
        makeAgent('a1', 'p1', { title: 'Fix bug' }),
        makeAgent('a2', 'p1'),
      ]);
      await store.fetchProjects();
      await store.fetchAgents('p1');
    });

    it('merges live fields without touching static ones', async () => {
      remote.getStatus.mockResolvedValueOnce(snapshot);

      expect(await store.pollStatus()).toEqual({ ok: true, applied: true });

      const [a1, a2] = store.agentsForProject('p1');
      expect(a1).toEqual(makeAgent('a1', 'p1', {
        title: 'Fix bug',
        isThinking: true,
        focus: 'writing tests',
        sessionRunning: true,
      }));
      expect(a2.isThinking).toBe(false);
      expect(store.project('p1')).toEqual(makeProject('p1', { agentCount: 2, activeAgentCount: 1 }));
      expect(store.project('p2')).toEqual(makeProject('p2'));
      expect(store.isConnected).toBe(true);
      expect(store.getState().lastPolledAt).toBe(1_000);
    });

    it('is idempotent for an identical payload', async () => {
      remote.getStatus.mockResolvedValue(snapshot);

      await store.pollStatus();
      const first = store.getState();
      await store.pollStatus();

      expect(store.getState()).toEqual(first);
    });

    it('ignores projects and agents the cache does not know', async () => {
      remote.getStatus.mockResolvedValueOnce({
        projects: [
          { id: 'p1', agents: [{ id: 'ghost', isThinking: true, focus: null, sessionRunning: true }] },
          { id: 'p9', agents: [{ id: 'x1', isThinking: true, focus: null, sessionRunning: true }] },
        ],
      });

      await store.pollStatus();

      expect(store.agentsForProject('p1').map(a => a.id)).toEqual(['a1', 'a2']);
      expect(store.agent('ghost')).toBeNull();
      expect(store.agent('x1')).toBeNull();
      expect(store.projects().map(p => p.id)).toEqual(['p1', 'p2']);
    });

    it('marks the gateway disconnected on failure and logs only the transition', async () => {
      remote.getStatus.mockResolvedValueOnce(snapshot);
      await store.pollStatus();
      errorSpy.mockClear();

      remote.getStatus.mockRejectedValue(new Error('read ECONNRESET'));
      const outcome = await store.pollStatus();
      await store.pollStatus();

      expect(outcome.ok).toBe(false);
      expect(store.isConnected).toBe(false);
      expect(store.agentsForProject('p1')[0].isThinking).toBe(true);
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('Gateway connection lost: read ECONNRESET');
    });

    it('discards a snapshot that completes after a newer one', async () => {
      const slow = deferred<IStatusSnapshot>();
      remote.getStatus.mockReturnValueOnce(slow.promise).mockResolvedValueOnce(snapshot);

      const first = store.pollStatus();
      await store.pollStatus();

      slow.resolve({
        projects: [{ id: 'p1', agents: [{ id: 'a1', isThinking: false, focus: 'stale', sessionRunning: false }] }],
      });
      expect(await first).toEqual({ ok: true, applied: false });

      expect(store.agentsForProject('p1')[0].focus).toBe('writing tests');
    });
  });

  describe('polling', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      store.stopPolling();
      vi.useRealTimers();
    });

    it('polls immediately and then on every interval', async () => {
      store.startPolling(2_000);
      expect(store.isPolling).toBe(true);
      expect(store.getState().isPolling).toBe(true);
      expect(remote.getStatus).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(2_000);
      expect(remote.getStatus).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(4_000);
      expect(remote.getStatus).toHaveBeenCalledTimes(4);
    });

    it('runs only the immediate poll when stopped right away', async () => {
      store.startPolling(2);
      store.stopPolling();

      await vi.advanceTimersByTimeAsync(100);

      expect(remote.getStatus).toHaveBeenCalledTimes(1);
      expect(store.isPolling).toBe(false);
      expect(store.getState().isPolling).toBe(false);
    });

    it('restarts with a single timer', async () => {
      store.startPolling(1_000);
      store.startPolling(1_000);
      expect(remote.getStatus).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(remote.getStatus).toHaveBeenCalledTimes(3);
    });

    it('uses the configured interval by default', async () => {
      const slowStore = new SyncStore(remote, { pollIntervalMs: 5_000 });
      slowStore.startPolling();

      await vi.advanceTimersByTimeAsync(4_999);
      expect(remote.getStatus).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(remote.getStatus).toHaveBeenCalledTimes(2);

      slowStore.dispose();
      expect(slowStore.isPolling).toBe(false);
    });
  });

  describe('cache', () => {
    let cache: CacheStore;

    beforeEach(() => {
      cache = new CacheStore(':memory:');
    });

    afterEach(() => {
      cache.close();
    });

    it('returns false from hydrate without a cache', () => {
      expect(store.hydrate()).toBe(false);
    });

    it('persists fetched collections', async () => {
      const cached = new SyncStore(remote, { cache });
      remote.listProjects.mockResolvedValueOnce([makeProject('p1')]);
      remote.listAgents.mockResolvedValueOnce([makeAgent('a1', 'p1', { isThinking: true })]);
      remote.listMessages.mockResolvedValueOnce([makeMessage('m1', 'a1')]);

      await cached.fetchProjects();
      await cached.fetchAgents('p1');
      await cached.fetchMessages('a1');

      const snapshot = cache.loadSnapshot();
      expect(snapshot.projects).toEqual([makeProject('p1')]);
      expect(snapshot.agents.p1).toEqual([makeAgent('a1', 'p1')]);
      expect(snapshot.messages.a1).toEqual([makeMessage('m1', 'a1')]);
    });

    it('applies a poll on top of a hydrated cache', async () => {
      cache.replaceProjects([makeProject('p1')]);
      cache.replaceAgents('p1', [makeAgent('a1', 'p1')]);

      const seeded = new SyncStore(remote, { cache });
      expect(seeded.hydrate()).toBe(true);

      remote.getStatus.mockResolvedValueOnce({
        projects: [{ id: 'p1', agents: [{ id: 'a1', isThinking: true, focus: 'writing tests', sessionRunning: true }] }],
      });
      await seeded.pollStatus();

      const [agent] = seeded.agentsForProject('p1');
      expect(agent.isThinking).toBe(true);
      expect(agent.focus).toBe('writing tests');
      expect(agent.sessionRunning).toBe(true);
      expect(seeded.project('p1')?.activeAgentCount).toBe(1);
    });
  });

  describe('subscribe', () => {
    it('notifies listeners of state changes', async () => {
      const listener = vi.fn<(state: ISyncState) => void>();
      const unsubscribe = store.subscribe(listener);

      remote.listProjects.mockResolvedValueOnce([makeProject('p1')]);
      await store.fetchProjects();
      unsubscribe();

      const states = listener.mock.calls.map(([state]) => state.projects.length);
      expect(states).toContain(1);
    });
  });
});
