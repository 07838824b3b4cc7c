// Remote client capability consumed by the sync store

import type { IAgent, IMessage, IProject, IStatusSnapshot } from './entities.js';

export interface ISendMessageOptions {
  // Lets the gateway keep the client identity so a later fetch confirms it
  clientMessageId?: string;
}

/**
 * Source of truth for projects, agents and messages.
 * Implementations reject with a network SyncError on transport,
 * server-side or decode failure; the sync store converts those into state.
 * `healthCheck` may resolve false or reject; both mean disconnected.
 */
export interface IRemoteClient {
  healthCheck(): Promise<boolean>;
  listProjects(): Promise<IProject[]>;
  listAgents(projectId: string): Promise<IAgent[]>;
  listMessages(agentId: string): Promise<IMessage[]>;
  sendMessage(agentId: string, projectId: string, text: string, options?: ISendMessageOptions): Promise<void>;
  getStatus(): Promise<IStatusSnapshot>;
}
