// Pure merge rules between cached collections and gateway results

import {
  countThinking,
  pickLiveStatus,
  type IAgent,
  type IMessage,
  type IProject,
  type IStatusSnapshot,
} from '../interfaces/entities.js';

export type DeliveryState = 'sending' | 'sent' | 'failed';

export interface IPendingMessage {
  message: IMessage;
  delivery: DeliveryState;
  // Freshness token taken when the gateway acknowledged the send
  ackToken: number | null;
}

export interface IStatusTarget {
  projects: IProject[];
  agents: Record<string, IAgent[]>;
}

/**
 * Overwrite project counters and merge agent live fields from a status snapshot.
 * Projects and agents the cache does not know are ignored.
 */
export function applyStatusSnapshot(target: IStatusTarget, snapshot: IStatusSnapshot): IStatusTarget {
  const reported = new Map(snapshot.projects.map(p => [p.id, p]));

  const projects = target.projects.map(project => {
    const status = reported.get(project.id);
    if (!status) return project;
    return {
      ...project,
      agentCount: status.agents.length,
      activeAgentCount: countThinking(status.agents),
    };
  });

  const agents: Record<string, IAgent[]> = { ...target.agents };
  for (const [projectId, status] of reported) {
    const slice = agents[projectId];
    if (!slice) continue;

    const live = new Map(status.agents.map(a => [a.id, a]));
    agents[projectId] = slice.map(agent => {
      const agentStatus = live.get(agent.id);
      return agentStatus ? { ...agent, ...pickLiveStatus(agentStatus) } : agent;
    });
  }

  return { projects, agents };
}

// A fetch that lost the race to a newer poll keeps the polled counters
export function carryProjectCounters(fetched: IProject[], cached: IProject[]): IProject[] {
  const byId = new Map(cached.map(p => [p.id, p]));
  return fetched.map(project => {
    const previous = byId.get(project.id);
    if (!previous) return project;
    return {
      ...project,
      agentCount: previous.agentCount,
      activeAgentCount: previous.activeAgentCount,
    };
  });
}

/**
 * Static fields always come from the fetch. Live fields come from the cache
 * when a newer poll already landed, otherwise from the fetch where it knows them.
 */
export function mergeFetchedAgents(fetched: IAgent[], cached: IAgent[], pollIsNewer: boolean): IAgent[] {
  const byId = new Map(cached.map(a => [a.id, a]));
  return fetched.map(agent => {
    const previous = byId.get(agent.id);
    if (!previous) return agent;
    if (pollIsNewer) {
      return { ...agent, ...pickLiveStatus(previous) };
    }
    return {
      ...agent,
      isThinking: agent.isThinking ?? previous.isThinking,
      focus: agent.focus ?? previous.focus,
      sessionRunning: agent.sessionRunning ?? previous.sessionRunning,
    };
  });
}

/**
 * Drop pending messages the fetched list confirms: by identity, or because
 * the gateway acknowledged them before this fetch was dispatched.
 */
export function reconcilePending(
  pending: IPendingMessage[],
  fetched: IMessage[],
  fetchToken: number
): IPendingMessage[] {
  const confirmed = new Set(fetched.map(m => m.id));
  return pending.filter(entry => {
    if (confirmed.has(entry.message.id)) return false;
    if (entry.delivery === 'sent' && entry.ackToken !== null && entry.ackToken < fetchToken) return false;
    return true;
  });
}

export function mergeDisplayedMessages(confirmed: IMessage[], pending: IPendingMessage[]): IMessage[] {
  if (pending.length === 0) return confirmed;
  const ids = new Set(confirmed.map(m => m.id));
  return [
    ...confirmed,
    ...pending.map(p => p.message).filter(m => !ids.has(m.id)),
  ];
}
