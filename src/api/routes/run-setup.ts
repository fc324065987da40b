/**
 * Shared run setup for the invoke and stream routes: request validation,
 * agent lookup and the per-request run input and config.
 */
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { AgentNotFoundError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { runId, threadId } from '@/core/types.js';
import type { AgentDefinition, AgentRegistry, RunConfig, RunInput } from '@/agents/types.js';

// ─── Zod Schemas ────────────────────────────────────────────────

export const agentParamsSchema = z.object({
  agentId: z.string().min(1),
});

/** Body of both run endpoints. */
export const userInputSchema = z.object({
  message: z.string().min(1).max(100_000),
  thread_id: z.string().min(1).optional(),
});

export type UserInput = z.infer<typeof userInputSchema>;

/** Stand-in identity until authentication exists. */
export const MOCK_USER_INFO = 'Operator';

// ─── Date Formatting ────────────────────────────────────────────

const runDateFormat = new Intl.DateTimeFormat('en-US', {
  weekday: 'long',
  month: 'long',
  day: '2-digit',
  year: 'numeric',
  hour: '2-digit',
  minute: '2-digit',
  hour12: true,
  timeZone: 'UTC',
});

/** Format as `Monday, January 05, 2026 09:30 AM` (UTC). */
export function formatRunDate(date: Date): string {
  const parts: Record<string, string> = {};
  for (const part of runDateFormat.formatToParts(date)) {
    parts[part.type] = part.value;
  }
  const get = (type: string): string => parts[type] ?? '';
  return `${get('weekday')}, ${get('month')} ${get('day')}, ${get('year')} ${get('hour')}:${get('minute')} ${get('dayPeriod').toUpperCase()}`;
}

// ─── Setup ──────────────────────────────────────────────────────

export interface PreparedRun {
  agent: AgentDefinition;
  input: RunInput;
  config: RunConfig;
}

/**
 * Resolve the agent and build the run input. A missing thread id is replaced
 * by a fresh UUID; every run gets its own run id.
 */
export function prepareRun(
  agentId: string,
  body: UserInput,
  agentRegistry: AgentRegistry,
  options: { abortSignal?: AbortSignal; now?: Date } = {},
): Result<PreparedRun, AgentNotFoundError> {
  const agent = agentRegistry.get(agentId);
  if (!agent) {
    return err(new AgentNotFoundError(agentId, agentRegistry.list().map((info) => info.key)));
  }

  return ok({
    agent,
    input: {
      messages: [{ type: 'human', id: `human-${randomUUID()}`, content: body.message }],
      userInfo: MOCK_USER_INFO,
      todayDate: formatRunDate(options.now ?? new Date()),
    },
    config: {
      runId: runId(randomUUID()),
      threadId: threadId(body.thread_id ?? randomUUID()),
      abortSignal: options.abortSignal,
    },
  });
}

// ─── Cancellation ───────────────────────────────────────────────

export interface RunAbort {
  signal: AbortSignal;
  /** Why the run was aborted, once it has been. */
  readonly reason: 'client_disconnected' | 'timeout' | undefined;
  /** Stop the timer and the disconnect listener. Also runs when the response closes. */
  dispose(): void;
}

/**
 * Abort the run when the client goes away before the response is finished,
 * or when the request outlives `timeoutMs`.
 */
export function createRunAbort(response: NodeJS.EventEmitter & { writableFinished: boolean }, timeoutMs: number): RunAbort {
  const controller = new AbortController();
  let reason: RunAbort['reason'];

  const abort = (why: NonNullable<RunAbort['reason']>): void => {
    if (controller.signal.aborted) return;
    reason = why;
    controller.abort();
  };

  const timer = setTimeout(() => abort('timeout'), timeoutMs);

  const dispose = (): void => {
    clearTimeout(timer);
    response.off('close', onClose);
  };

  // A closed response needs neither the timer nor the listener, even when
  // its body was never read.
  function onClose(): void {
    if (!response.writableFinished) abort('client_disconnected');
    dispose();
  }
  response.on('close', onClose);

  return {
    signal: controller.signal,
    get reason() {
      return reason;
    },
    dispose,
  };
}
