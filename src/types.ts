/**
 * Manus Task MCP - Core Types
 */

export type TransportMode = 'http' | 'stdio';

export interface Config {
  apiKey: string;
  apiBase: string;
  agentProfile: string;
  port: number;
  transport: TransportMode;
}

// Known values, passed through unvalidated; the remote API is the authority.
export const AGENT_PROFILES = ['manus-1.6', 'manus-1.6-lite', 'manus-1.6-max'] as const;
export const TASK_MODES = ['agent', 'chat', 'adaptive'] as const;

export interface CreateTaskOptions {
  prompt: string;
  /** Falls back to the configured profile */
  agentProfile?: string;
  /** Defaults to 'agent' */
  taskMode?: string;
  projectId?: string;
}

export interface ListTasksOptions {
  status?: string;
  /** Defaults to 20 */
  limit?: number;
  projectId?: string;
}

export interface CreateTaskPayload {
  prompt: string;
  agentProfile: string;
  taskMode: string;
  projectId?: string;
}

export interface ContinueTaskPayload {
  prompt: string;
  agentProfile: string;
  taskId: string;
}

/**
 * Outcome of a single upstream request.
 * `api` covers non-2xx responses, `transport` covers requests that never got one.
 */
export type BridgeResult<T = unknown> =
  | { ok: true; status: number; data: T }
  | { ok: false; kind: 'api'; message: string; statusCode: number }
  | { ok: false; kind: 'transport'; message: string };

export interface ErrorEnvelope {
  error: string;
  status_code?: number;
}

export type BridgeFailure = Extract<BridgeResult, { ok: false }>;

/** Raw upstream body on success, ErrorEnvelope otherwise */
export type ResponseEnvelope<T = unknown> = T | ErrorEnvelope;

export interface ServerInfo {
  server_name: string;
  version: string;
  description: string;
  manus_api_base: string;
  agent_profile: string;
}
