// src/server.ts

/**
 * MCP server exposing the iteration loop tools over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerIterationLoopTools } from './tools/index.js';
import { config } from './config.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'iteration-loop';
export const SERVER_VERSION = '0.1.0';

export function createServer(): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerIterationLoopTools(server);
  return server;
}

export async function startServer(): Promise<McpServer> {
  const server = createServer();
  await server.connect(new StdioServerTransport());
  logger.info({ root: config.rootDirectory, stateFile: config.stateFile }, 'Iteration loop MCP server started');
  return server;
}
