/**
 * Manus API Client
 *
 * Each method is one HTTP request against the Manus task API. Responses are
 * reduced to a BridgeResult; nothing here throws for upstream or network
 * failures.
 */

import type {
  BridgeFailure,
  BridgeResult,
  Config,
  ContinueTaskPayload,
  CreateTaskOptions,
  CreateTaskPayload,
  ErrorEnvelope,
  ListTasksOptions,
  ResponseEnvelope,
  ServerInfo
} from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const SERVER_NAME = 'Manus AI MCP Server';
export const SERVER_VERSION = '1.0.0';

export const READ_TIMEOUT_MS = 30_000;
export const WRITE_TIMEOUT_MS = 60_000;
export const DEFAULT_TASK_MODE = 'agent';
export const DEFAULT_LIST_LIMIT = 20;

const ERROR_PREFIX = 'Manus API Error';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeStatus(response: Response, url: string): string {
  const kind = response.status >= 500 ? 'Server error'
    : response.status >= 400 ? 'Client error'
    : 'Unexpected status';
  const reason = response.statusText ? ` ${response.statusText}` : '';
  return `${kind} '${response.status}${reason}' for url '${url}'`;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

export async function handleResponse(response: Response, url: string): Promise<BridgeResult> {
  const text = await response.text();

  if (response.ok) {
    if (!text.trim()) return { ok: true, status: response.status, data: {} };
    const body = parseJson(text);
    if (!body.ok) {
      return {
        ok: false,
        kind: 'api',
        message: `${ERROR_PREFIX}: invalid JSON in response body`,
        statusCode: response.status
      };
    }
    return { ok: true, status: response.status, data: body.value };
  }

  let detail = describeStatus(response, url);
  const body = parseJson(text);
  if (body.ok && isRecord(body.value) && typeof body.value.message === 'string') {
    detail = body.value.message;
  }
  return { ok: false, kind: 'api', message: `${ERROR_PREFIX}: ${detail}`, statusCode: response.status };
}

export function toEnvelope(result: BridgeFailure): ErrorEnvelope;
export function toEnvelope<T>(result: BridgeResult<T>): ResponseEnvelope<T>;
export function toEnvelope<T>(result: BridgeResult<T>): ResponseEnvelope<T> {
  if (result.ok) return result.data;
  const envelope: ErrorEnvelope = { error: result.message };
  if (result.kind === 'api') envelope.status_code = result.statusCode;
  return envelope;
}

export class ManusClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly config: Readonly<Config>, fetchImpl?: FetchLike) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  private headers(): Record<string, string> {
    return {
      'API_KEY': this.config.apiKey,
      'Content-Type': 'application/json'
    };
  }

  private async request(
    method: 'GET' | 'POST',
    url: string,
    timeoutMs: number,
    payload?: CreateTaskPayload | ContinueTaskPayload
  ): Promise<BridgeResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers(),
        body: payload === undefined ? undefined : JSON.stringify(payload),
        // Redirects come back as api failures; API_KEY never goes to another host
        redirect: 'manual',
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        return { ok: false, kind: 'transport', message: `Manus API request timed out after ${timeoutMs}ms` };
      }
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, kind: 'transport', message: `Manus API request failed: ${reason}` };
    }

    try {
      return await handleResponse(response, url);
    } catch (error) {
      // Body stream broke after headers arrived
      const reason = error instanceof Error ? error.message : String(error);
      return { ok: false, kind: 'transport', message: `Manus API request failed: ${reason}` };
    }
  }

  async createTask(options: CreateTaskOptions): Promise<BridgeResult> {
    const payload: CreateTaskPayload = {
      prompt: options.prompt,
      agentProfile: options.agentProfile || this.config.agentProfile,
      taskMode: options.taskMode || DEFAULT_TASK_MODE
    };
    if (options.projectId) payload.projectId = options.projectId;

    return this.request('POST', `${this.config.apiBase}/tasks`, WRITE_TIMEOUT_MS, payload);
  }

  async getTaskStatus(taskId: string): Promise<BridgeResult> {
    const url = `${this.config.apiBase}/tasks/${encodeURIComponent(taskId)}`;
    return this.request('GET', url, READ_TIMEOUT_MS);
  }

  async listTasks(options: ListTasksOptions = {}): Promise<BridgeResult> {
    const params = new URLSearchParams();
    params.set('limit', String(options.limit || DEFAULT_LIST_LIMIT));
    // Upstream takes status as a list filter; one repeated key per element
    if (options.status) params.append('status', options.status);
    if (options.projectId) params.set('project_id', options.projectId);

    return this.request('GET', `${this.config.apiBase}/tasks?${params.toString()}`, READ_TIMEOUT_MS);
  }

  /** Always uses the configured agent profile; there is no per-call override. */
  async continueTask(taskId: string, prompt: string): Promise<BridgeResult> {
    const payload: ContinueTaskPayload = {
      prompt,
      agentProfile: this.config.agentProfile,
      taskId
    };
    return this.request('POST', `${this.config.apiBase}/tasks`, WRITE_TIMEOUT_MS, payload);
  }

  getServerInfo(): ServerInfo {
    return {
      server_name: SERVER_NAME,
      version: SERVER_VERSION,
      description: 'Bridge between MCP clients and the Manus AI task API',
      manus_api_base: this.config.apiBase,
      agent_profile: this.config.agentProfile
    };
  }
}
