/**
 * Environment configuration
 *
 * Read once at startup; the frozen result is passed into the client and
 * server factories instead of being looked up ad hoc.
 */

import { z } from 'zod';
import type { Config } from './types.js';

export const DEFAULT_API_BASE = 'https://api.manus.im/v1';
export const DEFAULT_AGENT_PROFILE = 'manus-1.6';
export const DEFAULT_PORT = 8000;

const envSchema = z.object({
  MANUS_API_KEY: z.string().default(''),
  MANUS_API_BASE: z.string().url().default(DEFAULT_API_BASE),
  MANUS_AGENT_PROFILE: z.string().min(1).default(DEFAULT_AGENT_PROFILE),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  MCP_TRANSPORT: z.enum(['http', 'stdio']).default('http')
});

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings count as unset, so `PORT=` behaves like no PORT at all
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') result[key] = value;
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    apiKey: vars.MANUS_API_KEY,
    apiBase: vars.MANUS_API_BASE.replace(/\/+$/, ''),
    agentProfile: vars.MANUS_AGENT_PROFILE,
    port: vars.PORT,
    transport: vars.MCP_TRANSPORT
  });
}
