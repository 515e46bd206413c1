#!/usr/bin/env node
/**
 * Manus Task MCP Server
 *
 * Exposes the Manus AI task API as MCP tools:
 * - create_task / continue_task
 * - get_task_status / list_tasks
 * - get_server_info
 *
 * Transport is chosen by MCP_TRANSPORT: `http` (default, POST /mcp on PORT)
 * or `stdio`.
 *
 * Run with: npx manus-task-mcp
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { createHttpServer, MCP_PATH } from './http-server.js';
import { ManusClient } from './manus-client.js';
import { createMcpServer } from './server.js';

const HOST = '0.0.0.0';

async function main() {
  const config = loadConfig();
  const client = new ManusClient(config);

  console.error('[manus-task-mcp] Starting...');
  console.error(`[manus-task-mcp] Manus API: ${config.apiBase} (profile ${config.agentProfile})`);
  if (!config.apiKey) {
    console.error('[manus-task-mcp] MANUS_API_KEY is not set; upstream requests will be rejected');
  }

  if (config.transport === 'stdio') {
    const server = createMcpServer(client);
    await server.connect(new StdioServerTransport());
    console.error('[manus-task-mcp] Server connected over stdio');
    return;
  }

  const httpServer = createHttpServer(client);

  const shutdown = (signal: string) => {
    console.error(`[manus-task-mcp] ${signal} received, shutting down`);
    httpServer.close(err => {
      if (err) {
        console.error('[manus-task-mcp] Error during shutdown:', err);
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  httpServer.on('error', (err: Error) => {
    console.error('[manus-task-mcp] HTTP server error:', err);
    process.exit(1);
  });

  httpServer.listen(config.port, HOST, () => {
    console.error(`[manus-task-mcp] Listening on ${HOST}:${config.port}`);
    console.error(`[manus-task-mcp] MCP endpoint: http://${HOST}:${config.port}${MCP_PATH}`);
  });
}

main().catch((err: unknown) => {
  console.error('[manus-task-mcp] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
});
