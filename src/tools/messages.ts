// Message tools

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  getArgs,
  readBoolean,
  readString,
  readStringBounded,
} from '../core/parsers/common.js';
import { formatOutcome, successResponse } from '../core/serializers/common.js';
import { invalidParamsError } from '../core/errors/sync-error.js';
import type { SyncStore } from '../core/sync/sync-store.js';

export function createMessageTools(getStore: () => SyncStore) {
  const tools: Tool[] = [];
  const handlers: Record<string, (args: unknown) => Promise<unknown>> = {};

  // messages_list
  tools.push({
    name: 'messages_list',
    description: 'List the conversation of an agent. Messages sent but not yet confirmed by the gateway are listed last.',
    inputSchema: {
      type: 'object',
      properties: {
        agentId: {
          type: 'string',
          description: 'Agent id',
        },
        refresh: {
          type: 'boolean',
          description: 'Fetch messages from the gateway before answering (default: false)',
        },
      },
      required: ['agentId'],
    },
  });
  handlers['messages_list'] = async (args: unknown) => {
    const input = getArgs(args);
    const agentId = readString(input, 'agentId', true);
    const refresh = readBoolean(input, 'refresh') ?? false;
    const store = getStore();

    const outcome = refresh ? formatOutcome(await store.fetchMessages(agentId)) : undefined;

    return successResponse({
      agentId,
      messages: store.messagesForAgent(agentId),
      pending: store.pendingMessages(agentId).map(p => ({
        id: p.message.id,
        delivery: p.delivery,
      })),
      ...(outcome ? { outcome } : {}),
    });
  };

  // message_send
  tools.push({
    name: 'message_send',
    description: 'Send a user message to an agent. The message shows up locally right away; delivery is reported in the result.',
    inputSchema: {
      type: 'object',
      properties: {
        agentId: {
          type: 'string',
          description: 'Agent id',
        },
        projectId: {
          type: 'string',
          description: 'Project id the agent belongs to',
        },
        text: {
          type: 'string',
          description: 'Message text',
        },
      },
      required: ['agentId', 'projectId', 'text'],
    },
  });
  handlers['message_send'] = async (args: unknown) => {
    const input = getArgs(args);
    const agentId = readString(input, 'agentId', true);
    const projectId = readString(input, 'projectId', true);
    const text = readStringBounded(input, 'text', true);
    if (text.trim() === '') {
      throw invalidParamsError('Parameter text must not be empty');
    }

    const result = await getStore().sendMessage(agentId, projectId, text);

    return successResponse({
      message: result.message,
      delivered: result.ok,
      outcome: formatOutcome(result),
    });
  };

  return { tools, handlers };
}
