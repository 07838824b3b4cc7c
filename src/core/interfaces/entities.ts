// Entity interfaces for the project / agent / message hierarchy

export type MessageRole = 'user' | 'agent' | 'assistant';

export interface IProject {
  id: string;
  name: string;
  description: string;
  createdAt: number;
  // Derived from the status snapshot, overwritten on every poll
  agentCount: number;
  activeAgentCount: number;
}

// Live fields come from the status snapshot; null means not yet known
export interface IAgentLiveStatus {
  isThinking: boolean | null;
  focus: string | null;
  sessionRunning: boolean | null;
}

export interface IAgent extends IAgentLiveStatus {
  id: string;
  projectId: string;
  title: string;
  description: string;
  isDefault: boolean;
  isFinished: boolean;
  status: string;
  createdAt: number;
}

export interface IMessage {
  id: string;
  agentId: string;
  role: MessageRole;
  text: string;
  timestamp: number;
  persona: string;
}

export interface IAgentStatus extends IAgentLiveStatus {
  id: string;
}

export interface IProjectStatus {
  id: string;
  agents: IAgentStatus[];
}

export interface IStatusSnapshot {
  projects: IProjectStatus[];
  timestamp?: number;
}

export const DEFAULT_AGENT_STATUS = 'inactive';
export const DEFAULT_PERSONA = 'agent';

export const UNKNOWN_LIVE_STATUS: IAgentLiveStatus = {
  isThinking: null,
  focus: null,
  sessionRunning: null,
};

export function isUserMessage(message: IMessage): boolean {
  return message.role === 'user';
}

export function isAgentMessage(message: IMessage): boolean {
  return message.role === 'agent' || message.role === 'assistant';
}

export function pickLiveStatus(source: IAgentLiveStatus): IAgentLiveStatus {
  return {
    isThinking: source.isThinking,
    focus: source.focus,
    sessionRunning: source.sessionRunning,
  };
}

export function countThinking(agents: IAgentLiveStatus[]): number {
  return agents.filter(a => a.isThinking === true).length;
}
