/**
 * Basic MCP Client Setup Example
 *
 * Starts the built server over stdio, lists projects with their agents
 * and prints the latest conversation of the first agent.
 *
 * Run `npm run build` first; the gateway address comes from the
 * environment (GATEWAY_ADDRESS or GATEWAY_TUNNEL_URL).
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';

interface IProjectView {
  id: string;
  name: string;
  agentCount: number;
  activeAgentCount: number;
}

interface IAgentView {
  id: string;
  title: string;
  isThinking: boolean | null;
}

interface IMessageView {
  role: string;
  text: string;
}

/**
 * Create an MCP client connected to a child agent-deck-sync server
 */
async function createMcpClient(): Promise<{ client: Client; cleanup: () => Promise<void> }> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }

  const transport = new StdioClientTransport({
    command: 'node',
    args: ['dist/index.js'],
    env: {
      ...env,
      // Optional: point at a tunnel instead of the local gateway
      // GATEWAY_TUNNEL_URL: 'https://example.trycloudflare.com',
      AUTO_POLL: 'false',
    },
  });

  const client = new Client(
    { name: 'basic-example', version: '1.0.0' },
    { capabilities: {} }
  );

  await client.connect(transport);

  return { client, cleanup: () => client.close() };
}

/**
 * Helper to call a tool and parse the JSON text it returns
 */
async function callTool<T>(client: Client, name: string, args: Record<string, unknown>): Promise<T> {
  const result = await client.callTool({ name, arguments: args });
  const content = Array.isArray(result.content) ? result.content : [];
  const first: unknown = content[0];
  if (typeof first !== 'object' || first === null || !('text' in first) || typeof first.text !== 'string') {
    throw new Error(`Tool ${name} returned no text content`);
  }
  if (result.isError) {
    throw new Error(first.text);
  }
  return JSON.parse(first.text);
}

async function main() {
  console.log('Connecting to agent-deck-sync...');
  const { client, cleanup } = await createMcpClient();

  try {
    // ============================================
    // Example 1: Connectivity
    // ============================================
    console.log('\n--- Connection ---');

    const connection = await callTool<{ connected: boolean }>(client, 'connection_check', {});
    console.log(`Gateway reachable: ${connection.connected}`);

    // ============================================
    // Example 2: Projects and agents
    // ============================================
    console.log('\n--- Projects ---');

    const { projects } = await callTool<{ projects: IProjectView[] }>(client, 'projects_list', { refresh: true });

    for (const project of projects) {
      console.log(`  ${project.name} (${project.activeAgentCount}/${project.agentCount} thinking)`);
    }

    const firstProject = projects[0];
    if (!firstProject) {
      console.log('No projects yet');
      return;
    }

    const { agents } = await callTool<{ agents: IAgentView[] }>(client, 'agents_list', {
      projectId: firstProject.id,
      refresh: true,
    });
    for (const agent of agents) {
      console.log(`    - ${agent.title}${agent.isThinking ? ' [thinking]' : ''}`);
    }

    // ============================================
    // Example 3: Conversation of the first agent
    // ============================================
    const firstAgent = agents[0];
    if (firstAgent) {
      console.log(`\n--- Messages: ${firstAgent.title} ---`);

      const { messages } = await callTool<{ messages: IMessageView[] }>(client, 'messages_list', {
        agentId: firstAgent.id,
        refresh: true,
      });
      for (const message of messages) {
        console.log(`  [${message.role}] ${message.text}`);
      }
    }

    // ============================================
    // Example 4: Live status
    // ============================================
    console.log('\n--- Status Poll ---');

    await callTool<unknown>(client, 'status_poll', {});
    const status = await callTool<{ counts: Record<string, number> }>(client, 'sync_status', {});
    console.log(JSON.stringify(status.counts, null, 2));

    console.log('\n--- Done ---');
  } finally {
    await cleanup();
  }
}

main().catch(console.error);
