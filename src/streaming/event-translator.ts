/**
 * Translates runtime events into SSE frames for one run.
 *
 * Text reaches the client once: token deltas from the `messages` channel are
 * forwarded as they arrive, and an AI message published on the `updates`
 * channel is only forwarded when none of its tokens were streamed. Tool
 * frames, interrupts and per-message errors come from `updates`.
 *
 * An interrupt ends the run with its tool calls unfinished, so every call
 * still pending is settled with `tool_execution_error` before the
 * interrupt's content goes out.
 */
import type { Logger } from '@/observability/logger.js';
import type {
  CustomEvent,
  InterruptUpdateEvent,
  MessageChunkEvent,
  MessagesUpdateEvent,
  RuntimeEvent,
} from '@/agents/types.js';
import { agentMessageSchema, contentToText, removeToolUseParts } from '@/agents/messages.js';
import type { AgentMessage } from '@/agents/messages.js';
import type { SseFrame } from './sse.js';
import type { StreamState } from './stream-state.js';
import type { ToolCallTracker } from './tool-call-tracker.js';

/** Tag that keeps a token chunk off the wire. */
export const SKIP_STREAM_TAG = 'skip_stream';

export const MESSAGE_ERROR_TEXT = 'Unexpected error';

export const INTERRUPTED_TOOL_TEXT = 'Interrupted';

export interface EventTranslatorOptions {
  /** The user's input text; a human message repeating it is not echoed. */
  requestMessage: string;
  tracker: ToolCallTracker;
  state: StreamState;
  logger: Logger;
  runId: string;
}

export interface EventTranslator {
  /** Frames for one event, in emission order. May be empty. */
  translate(event: RuntimeEvent): SseFrame[];
}

export function createEventTranslator(options: EventTranslatorOptions): EventTranslator {
  const { requestMessage, tracker, state, logger, runId } = options;
  const streamedMessageIds = new Set<string>();

  function open(frames: SseFrame[]): void {
    if (state.markOpened()) frames.push({ type: 'stream_start' });
  }

  function token(frames: SseFrame[], text: string): void {
    open(frames);
    state.append(text);
    frames.push({ type: 'stream_token', content: { token: text } });
  }

  // ─── updates: interrupt ─────────────────────────────────────

  function translateInterrupt(event: InterruptUpdateEvent, frames: SseFrame[]): void {
    for (const callId of tracker.pending()) {
      const call = tracker.resolve(callId);
      if (call) frames.push({ type: 'tool_execution_error', content: { name: call.name, error: INTERRUPTED_TOOL_TEXT } });
    }
    for (const interrupt of event.interrupts) {
      if (interrupt.value !== '') token(frames, interrupt.value);
    }
  }

  // ─── updates: messages ──────────────────────────────────────

  function translateMessage(message: AgentMessage, frames: SseFrame[]): void {
    switch (message.type) {
      case 'human': {
        const text = contentToText(message.content);
        if (text !== '' && text !== requestMessage) token(frames, text);
        return;
      }

      case 'ai': {
        if (message.toolCalls.length > 0) {
          for (const call of message.toolCalls) {
            tracker.recordStart(call.id, call.name, call.args);
            open(frames);
            frames.push({ type: 'tool_execution_start', content: { name: call.name, params: call.args } });
          }
          return;
        }
        if (streamedMessageIds.has(message.id)) return;
        const text = contentToText(removeToolUseParts(message.content));
        if (text !== '') token(frames, text);
        return;
      }

      case 'tool': {
        const call = tracker.resolve(message.toolCallId);
        if (!call) {
          logger.warn('Tool result without a matching tool start', {
            component: 'event-translator',
            runId,
            toolCallId: message.toolCallId,
            toolName: message.name,
          });
          return;
        }
        if (message.status === 'error') {
          frames.push({
            type: 'tool_execution_error',
            content: { name: call.name, error: contentToText(message.content) },
          });
        } else {
          frames.push({ type: 'tool_execution_complete', content: { name: call.name, params: call.args } });
        }
        return;
      }
    }
  }

  /** A malformed tool result still settles its call so the client is not left waiting. */
  function settleMalformedToolResult(raw: unknown, frames: SseFrame[]): void {
    if (raw === null || typeof raw !== 'object' || !('toolCallId' in raw)) return;
    const callId = raw.toolCallId;
    if (typeof callId !== 'string') return;
    const call = tracker.resolve(callId);
    if (call) {
      frames.push({ type: 'tool_execution_error', content: { name: call.name, error: 'Malformed tool result' } });
    }
  }

  function translateMessages(event: MessagesUpdateEvent, frames: SseFrame[]): void {
    for (const raw of event.messages) {
      const parsed = agentMessageSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn('Skipping malformed message', {
          component: 'event-translator',
          runId,
          node: event.node,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        open(frames);
        frames.push({ type: 'error', content: MESSAGE_ERROR_TEXT });
        settleMalformedToolResult(raw, frames);
        continue;
      }
      translateMessage(parsed.data, frames);
    }
  }

  // ─── messages ───────────────────────────────────────────────

  function translateChunk(event: MessageChunkEvent, frames: SseFrame[]): void {
    if (event.metadata.tags.includes(SKIP_STREAM_TAG)) return;
    const chunk = event.chunk;
    if (chunk.type !== 'ai_chunk') return;

    const text = contentToText(removeToolUseParts(chunk.content));
    if (text === '') return;

    streamedMessageIds.add(chunk.id);
    token(frames, text);
  }

  // ─── custom ─────────────────────────────────────────────────

  function translateCustom(event: CustomEvent, frames: SseFrame[]): void {
    const payload = event.payload;
    if (payload.kind === 'error') {
      open(frames);
      frames.push({ type: 'error', content: payload.error.message });
      return;
    }
    frames.push({ type: 'custom', event: payload.eventType, content: payload.data });
  }

  return {
    translate(event: RuntimeEvent): SseFrame[] {
      const frames: SseFrame[] = [];
      switch (event.channel) {
        case 'updates':
          if (event.kind === 'interrupt') translateInterrupt(event, frames);
          else translateMessages(event, frames);
          break;
        case 'messages':
          translateChunk(event, frames);
          break;
        case 'custom':
          translateCustom(event, frames);
          break;
      }
      return frames;
    },
  };
}
