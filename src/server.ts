/**
 * MCP server factory
 *
 * Builds a fully registered McpServer around a ManusClient. The HTTP host
 * calls this once per request; stdio calls it once per process.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ManusClient, SERVER_NAME, SERVER_VERSION } from './manus-client.js';
import { registerTaskTools } from './tools/index.js';

export function createMcpServer(client: ManusClient): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION
  });

  registerTaskTools(server, client);  // create_task, get_task_status, list_tasks, continue_task, get_server_info

  return server;
}
