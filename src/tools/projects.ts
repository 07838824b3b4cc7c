// Project tools

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { getArgs, readBoolean, readString } from '../core/parsers/common.js';
import { formatOutcome, successResponse } from '../core/serializers/common.js';
import { notFoundError } from '../core/errors/sync-error.js';
import type { SyncStore } from '../core/sync/sync-store.js';

export function createProjectTools(getStore: () => SyncStore) {
  const tools: Tool[] = [];
  const handlers: Record<string, (args: unknown) => Promise<unknown>> = {};

  // projects_list
  tools.push({
    name: 'projects_list',
    description: 'List cached projects with their agent counts. Pass refresh to re-fetch from the gateway first.',
    inputSchema: {
      type: 'object',
      properties: {
        refresh: {
          type: 'boolean',
          description: 'Fetch the project list from the gateway before answering (default: false)',
        },
      },
    },
  });
  handlers['projects_list'] = async (args: unknown) => {
    const input = getArgs(args);
    const refresh = readBoolean(input, 'refresh') ?? false;
    const store = getStore();

    const outcome = refresh ? formatOutcome(await store.fetchProjects()) : undefined;

    return successResponse({
      projects: store.projects(),
      isConnected: store.isConnected,
      ...(outcome ? { outcome } : {}),
    });
  };

  // project_get
  tools.push({
    name: 'project_get',
    description: 'Get one cached project by id',
    inputSchema: {
      type: 'object',
      properties: {
        projectId: {
          type: 'string',
          description: 'Project id',
        },
      },
      required: ['projectId'],
    },
  });
  handlers['project_get'] = async (args: unknown) => {
    const input = getArgs(args);
    const projectId = readString(input, 'projectId', true);
    const project = getStore().project(projectId);
    if (!project) {
      throw notFoundError('Project', projectId);
    }
    return successResponse(project);
  };

  return { tools, handlers };
}
