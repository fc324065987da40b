/**
 * In-process LLM providers for tests. None of them touch the network.
 */
import type { ChatEvent, ChatParams, LLMProvider, Message, StopReason } from '@/providers/types.js';

// ─── Scripted Provider ──────────────────────────────────────────

export interface ScriptedToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/** One model turn: streamed text chunks, tool calls, or a provider failure. */
export type ScriptedTurn =
  | { chunks?: string[]; toolCalls?: ScriptedToolCall[]; stopReason?: StopReason }
  | { error: Error };

export interface ScriptedLLMProvider extends LLMProvider {
  /** Parameters of every chat() call, in order. */
  readonly calls: ChatParams[];
}

/**
 * Create a provider that replays `turns`, one per chat() call.
 * Running out of turns is a test bug and throws.
 */
export function createScriptedLLMProvider(turns: ScriptedTurn[]): ScriptedLLMProvider {
  const calls: ChatParams[] = [];
  let index = 0;

  return {
    id: 'test:scripted',
    displayName: 'Scripted Test Provider',
    calls,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      calls.push(params);
      const turn = turns[index++];
      if (!turn) {
        throw new Error(`No scripted turn left (call ${String(index)})`);
      }

      if ('error' in turn) {
        yield { type: 'error', error: turn.error };
        return;
      }

      yield* replay(`scripted-${String(index)}`, turn.chunks ?? [], turn.toolCalls ?? [], turn.stopReason);
    },
  };
}

// ─── Scenario Provider ──────────────────────────────────────────

const ADDITION = /(-?\d+)\s*\+\s*(-?\d+)/;
const WEATHER = /weather in ([\p{L}][\p{L} '-]*)/iu;

/**
 * A rule-based stand-in for a real model, used for end-to-end route tests:
 * "N+M" calls `add`, "weather in X" calls `get_weather`, and a tool result
 * is turned into a final answer.
 */
export function createScenarioLLMProvider(): LLMProvider {
  let callCounter = 0;

  return {
    id: 'test:scenario',
    displayName: 'Scenario Test Provider',

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const messageId = `scenario-${String(++callCounter)}`;
      const last = params.messages[params.messages.length - 1];

      const toolResult = last ? lastToolResult(last) : undefined;
      if (toolResult !== undefined) {
        yield* replay(messageId, splitWords(answerFromToolResult(toolResult)), []);
        return;
      }

      const text = last && typeof last.content === 'string' ? last.content : '';

      const addition = ADDITION.exec(text);
      if (addition) {
        yield* replay(messageId, [], [
          {
            id: `call_${String(callCounter)}`,
            name: 'add',
            input: { first: Number(addition[1]), second: Number(addition[2]) },
          },
        ]);
        return;
      }

      const weather = WEATHER.exec(text);
      const city = weather?.[1]?.trim();
      if (city) {
        yield* replay(messageId, [], [{ id: `call_${String(callCounter)}`, name: 'get_weather', input: { city } }]);
        return;
      }

      yield* replay(messageId, splitWords('I can help with arithmetic and weather questions.'), []);
    },
  };
}

// ─── Hanging Provider ───────────────────────────────────────────

/**
 * Streams `chunks`, then waits until the request's abort signal fires.
 * Used to cancel a run mid-stream.
 */
export function createHangingLLMProvider(chunks: string[]): LLMProvider {
  return {
    id: 'test:hanging',
    displayName: 'Hanging Test Provider',

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      yield { type: 'message_start', messageId: 'hanging-1' };
      for (const text of chunks) {
        yield { type: 'content_delta', text };
      }
      await new Promise<void>((_resolve, reject) => {
        const signal = params.abortSignal;
        if (!signal) return;
        if (signal.aborted) {
          reject(new Error('Request was aborted.'));
          return;
        }
        signal.addEventListener('abort', () => reject(new Error('Request was aborted.')), { once: true });
      });
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────

async function* replay(
  messageId: string,
  chunks: string[],
  toolCalls: ScriptedToolCall[],
  stopReason?: StopReason,
): AsyncGenerator<ChatEvent> {
  yield { type: 'message_start', messageId };
  for (const text of chunks) {
    // Yield to the event loop between chunks like a real network stream.
    await Promise.resolve();
    yield { type: 'content_delta', text };
  }
  for (const call of toolCalls) {
    yield { type: 'tool_use_end', id: call.id, name: call.name, input: call.input };
  }
  yield {
    type: 'message_end',
    stopReason: stopReason ?? (toolCalls.length > 0 ? 'tool_use' : 'end_turn'),
    usage: { inputTokens: 0, outputTokens: 0 },
  };
}

/** Split into words, each keeping its trailing space. */
function splitWords(text: string): string[] {
  return text.split(/(?<= )/);
}

function lastToolResult(message: Message): string | undefined {
  if (message.role !== 'tool' || typeof message.content === 'string') return undefined;
  for (const part of message.content) {
    if (part.type === 'tool_result') return part.content;
  }
  return undefined;
}

function answerFromToolResult(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (parsed !== null && typeof parsed === 'object') {
    if ('result' in parsed && typeof parsed.result === 'number') {
      return `The answer is ${String(parsed.result)}.`;
    }
    if ('description' in parsed && typeof parsed.description === 'string') {
      return parsed.description;
    }
  }
  return raw;
}
