/**
 * MCP Tool Tests
 *
 * Calls the registered tools through an in-memory MCP client.
 * Run with: npx tsx --test test/tools.test.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { ManusClient } from '../src/manus-client.js';
import { createMcpServer } from '../src/server.js';
import { fakeFetch, jsonResponse, testConfig, type Responder } from './fake-fetch.js';

async function connect(responder?: Responder) {
  const fake = fakeFetch(responder);
  const server = createMcpServer(new ManusClient(testConfig, fake.fetchImpl));
  const client = new Client({ name: 'tools-test', version: '0.0.0' });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  await client.connect(clientTransport);

  const call = async (name: string, args: Record<string, unknown> = {}) => {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    assert.ok(first && first.type === 'text', 'Expected text content');
    const data: unknown = JSON.parse(first.text);
    return { isError: result.isError === true, data };
  };

  const close = async () => {
    await client.close();
    await server.close();
  };

  return { client, call, close, requests: fake.requests };
}

describe('task tools', () => {
  it('lists all five tools', async () => {
    const { client, close } = await connect();

    const { tools } = await client.listTools();

    assert.deepEqual(tools.map(tool => tool.name).sort(), [
      'continue_task',
      'create_task',
      'get_server_info',
      'get_task_status',
      'list_tasks'
    ]);
    await close();
  });

  it('create_task forwards snake_case arguments as the upstream payload', async () => {
    const { call, close, requests } = await connect(() => jsonResponse({ task_id: 'task-1', task_url: 'https://manus.test/app/task-1' }));

    const result = await call('create_task', { prompt: 'Write a haiku', agent_profile: 'manus-1.6-lite', project_id: 'proj-3' });

    assert.deepEqual(result, {
      isError: false,
      data: { task_id: 'task-1', task_url: 'https://manus.test/app/task-1' }
    });
    assert.deepEqual(requests[0].body, {
      prompt: 'Write a haiku',
      agentProfile: 'manus-1.6-lite',
      taskMode: 'agent',
      projectId: 'proj-3'
    });
    await close();
  });

  it('get_task_status returns the error envelope for a missing task', async () => {
    const { call, close } = await connect(() => jsonResponse({ message: 'not found' }, 404));

    const result = await call('get_task_status', { task_id: 'nope' });

    assert.deepEqual(result, {
      isError: true,
      data: { error: 'Manus API Error: not found', status_code: 404 }
    });
    await close();
  });

  it('list_tasks passes filters into the query', async () => {
    const { call, close, requests } = await connect(() => jsonResponse({ data: [] }));

    const result = await call('list_tasks', { status: 'completed', limit: 3 });

    assert.deepEqual(result, { isError: false, data: { data: [] } });
    assert.equal(requests[0].url.toString(), 'https://manus.test/v1/tasks?limit=3&status=completed');
    await close();
  });

  it('continue_task uses the configured profile', async () => {
    const { call, close, requests } = await connect();

    await call('continue_task', { task_id: 'task-5', prompt: 'Keep going' });

    assert.deepEqual(requests[0].body, { prompt: 'Keep going', agentProfile: 'manus-1.6', taskId: 'task-5' });
    await close();
  });

  it('get_server_info makes no upstream request', async () => {
    const { call, close, requests } = await connect();

    const result = await call('get_server_info');

    assert.deepEqual(result, {
      isError: false,
      data: {
        server_name: 'Manus AI MCP Server',
        version: '1.0.0',
        description: 'Bridge between MCP clients and the Manus AI task API',
        manus_api_base: 'https://manus.test/v1',
        agent_profile: 'manus-1.6'
      }
    });
    assert.equal(requests.length, 0);
    await close();
  });

  it('rejects calls missing prompt without contacting the API', async () => {
    const { client, close, requests } = await connect();

    // Depending on SDK release, bad arguments surface as a protocol error or an isError result
    const fails = (name: string, args: Record<string, unknown>) =>
      client.callTool({ name, arguments: args }).then(
        result => CallToolResultSchema.parse(result).isError === true,
        () => true
      );

    assert.equal(await fails('create_task', {}), true);
    assert.equal(await fails('continue_task', { task_id: 'task-5' }), true);
    assert.equal(requests.length, 0);
    await close();
  });

  it('transport failures come back as an error envelope', async () => {
    const { call, close } = await connect(() => {
      throw new TypeError('fetch failed');
    });

    const result = await call('get_task_status', { task_id: 'task-1' });

    assert.deepEqual(result, { isError: true, data: { error: 'Manus API request failed: fetch failed' } });
    await close();
  });
});
