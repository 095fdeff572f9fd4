import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { TOOLS, handleToolCall } from './tools.js';
import type { ToolContext } from './tools.js';

export const SERVER_NAME = 'tutor-persona';
export const SERVER_VERSION = '0.1.0';

/**
 * MCP server exposing the tutor tools. Transport is left to the caller.
 */
export function createServer(ctx: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(ctx, name, args);
  });

  return server;
}
