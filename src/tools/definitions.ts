// Tool definitions aggregator

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { ToolRegistry } from '../core/registry/tool-registry.js';
import { wrapHandler } from '../core/errors/sync-error.js';
import type { SyncStore } from '../core/sync/sync-store.js';
import { createProjectTools } from './projects.js';
import { createAgentTools } from './agents.js';
import { createMessageTools } from './messages.js';
import { createSyncTools } from './sync.js';

interface IToolGroup {
  tools: Tool[];
  handlers: Record<string, (args: unknown) => Promise<unknown>>;
}

// Short names kept for hosts configured against earlier tool names
export const toolAliases: Record<string, string> = {
  get_projects: 'projects_list',
  get_agents: 'agents_list',
  get_messages: 'messages_list',
  send_message: 'message_send',
};

function registerGroup(registry: ToolRegistry, group: IToolGroup): void {
  for (const tool of group.tools) {
    const handler = group.handlers[tool.name];
    if (handler) {
      // Find aliases for this tool
      const aliases = Object.entries(toolAliases)
        .filter(([_, target]) => target === tool.name)
        .map(([alias]) => alias);

      registry.register({
        tool,
        handler: wrapHandler(handler, tool.name),
        aliases: aliases.length > 0 ? aliases : undefined,
      });
    }
  }
}

// Register all tools over a sync store
export function registerSyncTools(
  registry: ToolRegistry,
  getStore: () => SyncStore,
  getSnapshot: () => unknown
): void {
  registerGroup(registry, createProjectTools(getStore));
  registerGroup(registry, createAgentTools(getStore));
  registerGroup(registry, createMessageTools(getStore));
  registerGroup(registry, createSyncTools(getStore, getSnapshot));
}

// Get all registered tools
export function getAllTools(registry: ToolRegistry): Tool[] {
  return registry.getAll();
}
