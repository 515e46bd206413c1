/**
 * HTTP Server Mode for Manus Task MCP
 *
 * Serves the MCP endpoint over Streamable HTTP in stateless mode: every
 * POST /mcp gets its own McpServer and transport, so no session affinity
 * is needed between requests.
 */

import { createServer, IncomingMessage, ServerResponse, type Server } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ManusClient } from './manus-client.js';
import { createMcpServer } from './server.js';

export const MCP_PATH = '/mcp';

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type, Accept, Mcp-Protocol-Version'
};

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', chunk => body += chunk.toString());
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function json(res: ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    ...CORS_HEADERS
  });
  res.end(JSON.stringify(data, null, 2));
}

function jsonRpcError(res: ServerResponse, status: number, code: number, message: string) {
  json(res, { jsonrpc: '2.0', error: { code, message }, id: null }, status);
}

async function handleMcp(req: IncomingMessage, res: ServerResponse, client: ManusClient) {
  const raw = await readBody(req);
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch {
    return jsonRpcError(res, 400, -32700, 'Parse error: request body is not valid JSON');
  }

  const server = createMcpServer(client);
  const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

  res.on('close', () => {
    server.close().catch((err: unknown) => {
      console.error('[HTTP] Failed to close MCP server:', err);
    });
  });

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

export function createHttpServer(client: ManusClient): Server {
  return createServer(async (req, res) => {
    const method = req.method || 'GET';
    const url = req.url || '/';
    const path = url.split('?')[0];

    // CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      return res.end();
    }

    console.log(`[HTTP] ${method} ${path}`);

    try {
      if (path === MCP_PATH) {
        if (method !== 'POST') {
          return jsonRpcError(res, 405, -32000, 'Method not allowed.');
        }
        return await handleMcp(req, res, client);
      }

      if (path === '/health' && method === 'GET') {
        return json(res, { status: 'ok' });
      }

      if (path === '/' && method === 'GET') {
        return json(res, {
          ...client.getServerInfo(),
          endpoints: [
            `POST ${MCP_PATH}`,
            'GET  /health'
          ]
        });
      }

      return json(res, { error: 'Not found' }, 404);
    } catch (err) {
      console.error(`[HTTP] ${method} ${path} failed:`, err);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, 'Internal server error');
      } else {
        res.end();
      }
    }
  });
}
