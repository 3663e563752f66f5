import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { initializeSchema } from '../db/schema.js';
import { createLogger, reserveStdout } from '../utils/logger.js';
import { callTool, tools, type ToolScope } from './tools.js';

export function createBoardServer(scope: ToolScope): Server {
  const server = new Server(
    {
      name: 'taskflow-board',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return callTool(name, args, scope);
  });

  return server;
}

/** Serves the board tools over stdio until the worker closes the pipe. */
export async function runBoardServer(scope: ToolScope): Promise<void> {
  reserveStdout();
  initializeSchema();
  const server = createBoardServer(scope);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  createLogger('mcp').info(`Board tools ready${scope.taskId ? ` for task ${scope.taskId}` : ''}`);
}
