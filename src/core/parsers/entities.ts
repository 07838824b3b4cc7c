// Decoders for gateway payloads

import {
  isRecord,
  readArray,
  readBoolean,
  readNumber,
  readString,
  readTimestamp,
  type JsonRecord,
} from './common.js';
import { decodeError, describeError } from '../errors/sync-error.js';
import {
  DEFAULT_AGENT_STATUS,
  DEFAULT_PERSONA,
  type IAgent,
  type IAgentStatus,
  type IMessage,
  type IProject,
  type IProjectStatus,
  type IStatusSnapshot,
  type MessageRole,
} from '../interfaces/entities.js';

// Readers throw invalid-params errors; on the wire those are decode failures
function decode<T>(what: string, value: unknown, read: (obj: JsonRecord) => T): T {
  if (!isRecord(value)) {
    throw decodeError(`Invalid ${what} payload: expected an object`);
  }
  try {
    return read(value);
  } catch (error) {
    throw decodeError(`Invalid ${what} payload: ${describeError(error)}`);
  }
}

function decodeList<T>(what: string, body: unknown, key: string, item: (value: unknown) => T): T[] {
  return decode(what, body, obj => readArray(obj, key, true)).map(item);
}

function readNullableBoolean(obj: JsonRecord, key: string): boolean | null {
  return readBoolean(obj, key) ?? null;
}

function readNullableString(obj: JsonRecord, key: string): string | null {
  return readString(obj, key) ?? null;
}

export function parseRole(role: string): MessageRole {
  if (role === 'user' || role === 'assistant') {
    return role;
  }
  // The gateway tags agent replies with its persona name
  return 'agent';
}

export function parseProject(value: unknown): IProject {
  return decode('project', value, obj => ({
    id: readString(obj, 'id', true),
    name: readString(obj, 'name', true),
    description: readString(obj, 'description') ?? '',
    createdAt: readTimestamp(obj, 'createdAt', 0),
    agentCount: readNumber(obj, 'agentCount') ?? 0,
    activeAgentCount: readNumber(obj, 'activeAgentCount') ?? 0,
  }));
}

export function parseAgent(value: unknown): IAgent {
  return decode('agent', value, obj => ({
    id: readString(obj, 'id', true),
    projectId: readString(obj, 'projectId', true),
    title: readString(obj, 'title', true),
    description: readString(obj, 'description') ?? '',
    isDefault: readBoolean(obj, 'isDefault') ?? false,
    isFinished: readBoolean(obj, 'isFinished') ?? false,
    status: readString(obj, 'status') ?? DEFAULT_AGENT_STATUS,
    createdAt: readTimestamp(obj, 'createdAt', 0),
    isThinking: readNullableBoolean(obj, 'isThinking'),
    focus: readNullableString(obj, 'focus'),
    sessionRunning: readNullableBoolean(obj, 'sessionRunning'),
  }));
}

export function parseMessage(value: unknown): IMessage {
  return decode('message', value, obj => ({
    id: readString(obj, 'id', true),
    agentId: readString(obj, 'agentId', true),
    role: parseRole(readString(obj, 'role', true)),
    text: readString(obj, 'text') ?? '',
    timestamp: readTimestamp(obj, 'timestamp'),
    persona: readString(obj, 'persona') ?? DEFAULT_PERSONA,
  }));
}

export function parseAgentStatus(value: unknown): IAgentStatus {
  return decode('agent status', value, obj => ({
    id: readString(obj, 'id', true),
    isThinking: readNullableBoolean(obj, 'isThinking'),
    focus: readNullableString(obj, 'focus'),
    sessionRunning: readNullableBoolean(obj, 'sessionRunning'),
  }));
}

export function parseProjectStatus(value: unknown): IProjectStatus {
  return {
    id: decode('project status', value, obj => readString(obj, 'id', true)),
    agents: decodeList('project status', value, 'agents', parseAgentStatus),
  };
}

export function parseStatusSnapshot(body: unknown): IStatusSnapshot {
  const projects = decodeList('status', body, 'projects', parseProjectStatus);
  const timestamp = decode('status', body, obj =>
    obj.timestamp === undefined ? undefined : readTimestamp(obj, 'timestamp'));
  return timestamp === undefined ? { projects } : { projects, timestamp };
}

export function parseProjectList(body: unknown): IProject[] {
  return decodeList('project list', body, 'projects', parseProject);
}

export function parseAgentList(body: unknown): IAgent[] {
  return decodeList('agent list', body, 'agents', parseAgent);
}

export function parseMessageList(body: unknown): IMessage[] {
  return decodeList('message list', body, 'messages', parseMessage);
}
