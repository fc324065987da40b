import type { AgentRegistry } from '@/agents/types.js';
import type { Settings } from '@/config/loader.js';
import type { Logger } from '@/observability/logger.js';

// ─── Error Body ─────────────────────────────────────────────────

/** JSON body of every error response. */
export interface ErrorResponse {
  /** Error class name, e.g. `ValidationError`. */
  error: string;
  message: string;
  /** Request path that failed. */
  path: string;
}

// ─── Invoke ─────────────────────────────────────────────────────

export interface InvokeResponse {
  content: string;
  thread_id: string;
  run_id: string;
}

// ─── Health / Info ──────────────────────────────────────────────

export interface HealthResponse {
  status: 'ok';
  version: string;
  message: string;
}

export interface InfoResponse {
  agents: { key: string; description: string }[];
  default_agent: string;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  agentRegistry: AgentRegistry;
  logger: Logger;
  settings: Pick<Settings, 'requestTimeoutMs'>;
}
