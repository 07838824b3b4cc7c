#!/usr/bin/env node

// agent-deck-sync - MCP server exposing a synced view of a command-center gateway

import 'dotenv/config';

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { AppState } from './state/app-state.js';
import { getAllTools } from './tools/definitions.js';
import { formatOutput, errorResponse } from './core/serializers/common.js';
import { isRecord } from './core/parsers/common.js';

const SERVER_NAME = 'agent-deck-sync';
const SERVER_VERSION = '0.1.0';

type TextContent = { type: 'text'; text: string };

function isPreformatted(result: unknown): result is { content: TextContent[] } {
  return isRecord(result) && Array.isArray(result.content);
}

async function main() {
  const app = new AppState();

  // Create MCP server
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  // Warm start from cache, first connectivity probe and project fetch
  await app.initialize();
  app.start();

  // Handle list tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getAllTools(app.tools) };
  });

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = app.tools.getHandler(name);
    if (!handler) {
      return {
        content: [{ type: 'text', text: `Unknown tool: ${name}` }],
        isError: true,
      };
    }

    try {
      const result = await handler(args);

      if (isPreformatted(result)) {
        return result;
      }

      return {
        content: [{ type: 'text', text: formatOutput(result) }],
      };
    } catch (error) {
      return errorResponse(error);
    }
  });

  // Cleanup on exit
  process.on('SIGINT', () => {
    app.stop();
    process.exit(0);
  });

  process.on('SIGTERM', () => {
    app.stop();
    process.exit(0);
  });

  // Start server
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const snapshot = app.getSnapshot();
  console.error(`${SERVER_NAME} v${SERVER_VERSION} started`);
  console.error(`Gateway: ${snapshot.gateway.baseUrl} (${snapshot.sync.isConnected ? 'connected' : 'unreachable'})`);
  console.error(`Polling: ${snapshot.sync.isPolling ? `every ${snapshot.sync.pollIntervalMs}ms` : 'off (use polling_start)'}`);
  console.error(`Cache: ${snapshot.cache ? snapshot.cache.path : 'disabled'}`);
  console.error(`Tools registered: ${snapshot.tools.count}`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
