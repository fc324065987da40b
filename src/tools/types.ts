import type { z } from 'zod';
import type { Result } from '@/core/result.js';
import type { AgentError } from '@/core/errors.js';
import type { RunId, ThreadId } from '@/core/types.js';

// ─── Tool Definition ────────────────────────────────────────────

export interface ToolDefinition {
  readonly id: string;
  readonly description: string;
  readonly inputSchema: z.ZodType;
  /** When set, the registry rejects output that does not match. */
  readonly outputSchema?: z.ZodType;
}

// ─── Tool Result ────────────────────────────────────────────────

export interface ToolResult {
  output: unknown;
  durationMs: number;
}

// ─── Execution Context ──────────────────────────────────────────

/** Per-call context handed to a tool by the agent loop. */
export interface ToolContext {
  readonly runId: RunId;
  readonly threadId: ThreadId;
  readonly toolCallId: string;
  readonly abortSignal?: AbortSignal;
  /** Publish an out-of-band event on the run's custom channel. */
  emit(eventType: string, data: unknown): void;
  /** Pause the run and surface `value` to the client. Never returns. */
  interrupt(value: string): never;
}

// ─── Executable Tool ────────────────────────────────────────────

export interface ExecutableTool extends ToolDefinition {
  execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, AgentError>>;
}
