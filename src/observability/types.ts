// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  runId?: string;
  threadId?: string;
  agentId?: string;
  component: string;
  [key: string]: unknown;
}
