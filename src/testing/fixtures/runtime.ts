/**
 * Fake AgentRuntime that replays canned events, for translator and driver tests.
 */
import { vi } from 'vitest';
import type { AgentRuntime, FinalEvent, RunConfig, RunInput, RuntimeEvent, StreamMode } from '@/agents/types.js';

export interface FakeRuntimeOptions {
  /** Events yielded by `stream`, in order. */
  events?: RuntimeEvent[];
  /** Thrown by `stream` after the events. */
  failWith?: Error;
  /** Called before each event is yielded, e.g. to abort the run mid-stream. */
  beforeEach?: (index: number, config: RunConfig) => void;
  /** Result of `invoke`. */
  final?: FinalEvent;
}

export function createFakeRuntime(options: FakeRuntimeOptions = {}): AgentRuntime {
  const events = options.events ?? [];

  return {
    invoke: vi.fn(() =>
      Promise.resolve<FinalEvent>(options.final ?? { kind: 'values', messages: [] }),
    ),

    stream: vi.fn(async function* (_input: RunInput, config: RunConfig, _modes: readonly StreamMode[]) {
      for (const [index, event] of events.entries()) {
        await Promise.resolve();
        options.beforeEach?.(index, config);
        yield event;
      }
      if (options.failWith) throw options.failWith;
    }),
  };
}

// ─── Event builders ─────────────────────────────────────────────

export function tokenEvent(id: string, content: string, tags: string[] = []): RuntimeEvent {
  return { channel: 'messages', chunk: { type: 'ai_chunk', id, content }, metadata: { node: 'agent', tags } };
}

export function updateEvent(node: string, messages: unknown[]): RuntimeEvent {
  return { channel: 'updates', kind: 'messages', node, messages };
}

export function toolCallUpdate(callId: string, name: string, args: Record<string, unknown>): RuntimeEvent {
  return updateEvent('agent', [
    { type: 'ai', id: `ai-${callId}`, content: '', toolCalls: [{ id: callId, name, args }] },
  ]);
}

export function toolResultUpdate(
  callId: string,
  name: string,
  content: string,
  status: 'success' | 'error' = 'success',
): RuntimeEvent {
  return updateEvent('tools', [{ type: 'tool', id: `tool-${callId}`, content, toolCallId: callId, name, status }]);
}
