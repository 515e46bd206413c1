/**
 * Task Tools - Manus task lifecycle over MCP
 *
 * Tools: create_task, get_task_status, list_tasks, continue_task, get_server_info
 *
 * Every tool returns the response envelope as pretty-printed JSON text:
 * the upstream body on success, { error, status_code? } on failure.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { ManusClient, toEnvelope } from '../manus-client.js';
import { AGENT_PROFILES, TASK_MODES, type BridgeResult } from '../types.js';

function textResult(data: unknown, isError = false): CallToolResult {
  const result: CallToolResult = { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

function envelopeResult(result: BridgeResult): CallToolResult {
  if (!result.ok) {
    console.error(`[manus-task-mcp] ${result.kind} failure: ${result.message}`);
  }
  return textResult(toEnvelope(result), !result.ok);
}

export function registerTaskTools(server: McpServer, client: ManusClient) {
  // ============================================================================
  // CREATE-TASK TOOL
  // ============================================================================

  server.tool(
    'create_task',
    'Create a new Manus AI task. Manus is an AI agent that can browse the web, write code, create files, and complete complex tasks autonomously.',
    {
      prompt: z.string().describe('The task instructions for the Manus AI agent'),
      agent_profile: z.string().optional()
        .describe(`Agent profile: ${AGENT_PROFILES.join(', ')} (defaults to the server's configured profile)`),
      task_mode: z.string().optional()
        .describe(`Task mode: ${TASK_MODES.join(', ')} (defaults to agent)`),
      project_id: z.string().optional().describe('Optional project ID to organize tasks')
    },
    async (args) => {
      const result = await client.createTask({
        prompt: args.prompt,
        agentProfile: args.agent_profile,
        taskMode: args.task_mode,
        projectId: args.project_id
      });
      return envelopeResult(result);
    }
  );

  // ============================================================================
  // GET-TASK-STATUS TOOL
  // ============================================================================

  server.tool(
    'get_task_status',
    'Get the current status and output of a Manus task',
    {
      task_id: z.string().describe('Task ID returned by create_task')
    },
    async ({ task_id }) => envelopeResult(await client.getTaskStatus(task_id))
  );

  // ============================================================================
  // LIST-TASKS TOOL
  // ============================================================================

  server.tool(
    'list_tasks',
    'List recent Manus tasks with optional filtering',
    {
      status: z.string().optional().describe('Only return tasks in this status (e.g. "completed")'),
      limit: z.number().int().optional().describe('Max tasks to return (default 20)'),
      project_id: z.string().optional().describe('Only return tasks in this project')
    },
    async (args) => {
      const result = await client.listTasks({
        status: args.status,
        limit: args.limit,
        projectId: args.project_id
      });
      return envelopeResult(result);
    }
  );

  // ============================================================================
  // CONTINUE-TASK TOOL
  // ============================================================================

  server.tool(
    'continue_task',
    'Continue an existing Manus task with additional instructions',
    {
      task_id: z.string().describe('Task ID to continue'),
      prompt: z.string().describe('Follow-up instructions for the task')
    },
    async ({ task_id, prompt }) => envelopeResult(await client.continueTask(task_id, prompt))
  );

  // ============================================================================
  // GET-SERVER-INFO TOOL
  // ============================================================================

  server.tool(
    'get_server_info',
    'Get information about this MCP server',
    async () => textResult(client.getServerInfo())
  );
}
