// MCP server exposing the memory store as tools
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_INSTRUCTIONS, type KnowledgeGraphManager } from './knowledge-graph-manager.js';
import { silentLogger, type Logger } from './logger.js';
import { TOOLS, handleToolCall } from './tools.js';

export const SERVER_NAME = "mongo-memory";
export const SERVER_VERSION = "0.3.2";

export function createMemoryServer(manager: KnowledgeGraphManager, logger: Logger = silentLogger): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug("Tool call", { tool: name });
    return handleToolCall(manager, name, args);
  });

  return server;
}
