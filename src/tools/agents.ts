// Agent tools

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { getArgs, readBoolean, readString } from '../core/parsers/common.js';
import { formatOutcome, successResponse } from '../core/serializers/common.js';
import type { SyncStore } from '../core/sync/sync-store.js';

export function createAgentTools(getStore: () => SyncStore) {
  const tools: Tool[] = [];
  const handlers: Record<string, (args: unknown) => Promise<unknown>> = {};

  // agents_list
  tools.push({
    name: 'agents_list',
    description: 'List the agents of a project, including live status (thinking, focus, session running) from the last poll',
    inputSchema: {
      type: 'object',
      properties: {
        projectId: {
          type: 'string',
          description: 'Project id',
        },
        refresh: {
          type: 'boolean',
          description: 'Fetch the agent list from the gateway before answering (default: false)',
        },
      },
      required: ['projectId'],
    },
  });
  handlers['agents_list'] = async (args: unknown) => {
    const input = getArgs(args);
    const projectId = readString(input, 'projectId', true);
    const refresh = readBoolean(input, 'refresh') ?? false;
    const store = getStore();

    const outcome = refresh ? formatOutcome(await store.fetchAgents(projectId)) : undefined;

    return successResponse({
      projectId,
      agents: store.agentsForProject(projectId),
      ...(outcome ? { outcome } : {}),
    });
  };

  return { tools, handlers };
}
