/**
 * MCP Server Factory
 *
 * Creates the framevault MCP server with its tools wired to one shared
 * configuration and remote store.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { register as registerProcessRecording } from './tools/processRecording.js';
import { register as registerListFolders } from './tools/listFolders.js';
import type { ToolContext } from './types.js';

export const SERVER_NAME = 'framevault';

export function createServer(context: ToolContext, version: string): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version,
  });

  registerProcessRecording(server, context);
  registerListFolders(server, context);

  return server;
}
