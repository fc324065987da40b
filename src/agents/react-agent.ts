/**
 * ReAct agent runtime: call the model, run the tools it asks for, feed the
 * results back, repeat until the model answers without tool calls.
 *
 * Every step is published as a tagged RuntimeEvent so callers can either
 * stream the run (`stream`) or wait for its final state (`invoke`).
 */
import { randomUUID } from 'node:crypto';

import { AgentExecutionError, RunCancelledError } from '@/core/errors.js';
import { createLogger, type Logger } from '@/observability/logger.js';
import type { LLMProvider, Message } from '@/providers/types.js';
import { InterruptSignal } from '@/tools/interrupt.js';
import type { ToolRegistry } from '@/tools/registry/index.js';
import type { ToolContext } from '@/tools/types.js';
import { contentToText } from './messages.js';
import type { AgentMessage, AIMessage, ToolCall, ToolMessage } from './messages.js';
import type {
  AgentRuntime,
  CustomEvent,
  FinalEvent,
  RunConfig,
  RunInput,
  RuntimeEvent,
  StreamMode,
} from './types.js';

const defaultLogger = createLogger({ name: 'react-agent' });

export const AGENT_NODE = 'agent';
export const TOOLS_NODE = 'tools';
export const START_NODE = '__start__';

// ─── Options ────────────────────────────────────────────────────────

export interface ReactAgentOptions {
  provider: LLMProvider;
  toolRegistry: ToolRegistry;
  /** Builds the system prompt before every model call from the run's messages so far. */
  renderSystemPrompt: (input: RunInput, messages: readonly AgentMessage[]) => string;
  maxSteps: number;
  temperature: number;
  maxOutputTokens: number;
  logger?: Logger;
}

// ─── Runtime ────────────────────────────────────────────────────────

/**
 * Create a ReAct AgentRuntime. The runtime holds no per-run state and can
 * serve concurrent requests.
 */
export function createReactAgent(options: ReactAgentOptions): AgentRuntime {
  const { provider, toolRegistry, renderSystemPrompt, maxSteps } = options;
  const logger = options.logger ?? defaultLogger;

  function throwIfAborted(config: RunConfig): void {
    if (config.abortSignal?.aborted) {
      throw new RunCancelledError(config.runId);
    }
  }

  async function* callModel(
    input: RunInput,
    messages: AgentMessage[],
    config: RunConfig,
  ): AsyncGenerator<RuntimeEvent, AIMessage> {
    const id = `ai-${randomUUID()}`;
    const textParts: string[] = [];
    const toolCalls: ToolCall[] = [];

    try {
      const chatStream = provider.chat({
        messages: messages.map(toProviderMessage),
        systemPrompt: renderSystemPrompt(input, messages),
        tools: toolRegistry.formatForProvider(),
        maxTokens: options.maxOutputTokens,
        temperature: options.temperature,
        abortSignal: config.abortSignal,
        runId: config.runId,
      });

      for await (const event of chatStream) {
        throwIfAborted(config);

        switch (event.type) {
          case 'content_delta':
            textParts.push(event.text);
            yield {
              channel: 'messages',
              chunk: { type: 'ai_chunk', id, content: event.text },
              metadata: { node: AGENT_NODE, tags: [] },
            };
            break;
          case 'tool_use_end':
            toolCalls.push({ id: event.id, name: event.name, args: event.input });
            break;
          case 'error':
            throw event.error;
          case 'message_end':
            if (event.stopReason === 'max_tokens') {
              logger.warn('Model output truncated at the token limit', {
                component: 'react-agent',
                runId: config.runId,
                outputTokens: event.usage.outputTokens,
              });
            }
            break;
          case 'message_start':
            break;
        }
      }
    } catch (error) {
      // The SDK reports an aborted request as its own error type.
      throwIfAborted(config);
      throw error;
    }

    return { type: 'ai', id, content: textParts.join(''), toolCalls };
  }

  async function runTool(
    call: ToolCall,
    config: RunConfig,
    pending: CustomEvent[],
  ): Promise<ToolMessage> {
    const context: ToolContext = {
      runId: config.runId,
      threadId: config.threadId,
      toolCallId: call.id,
      abortSignal: config.abortSignal,
      emit(eventType, data) {
        pending.push({ channel: 'custom', payload: { kind: 'event', eventType, data } });
      },
      interrupt(value): never {
        throw new InterruptSignal(value);
      },
    };

    const base = { type: 'tool' as const, id: `tool-${randomUUID()}`, toolCallId: call.id, name: call.name };

    try {
      const result = await toolRegistry.resolve(call.name, call.args, context);
      if (result.ok) {
        return { ...base, content: JSON.stringify(result.value.output), status: 'success' };
      }
      return { ...base, content: `Error: ${result.error.message}`, status: 'error' };
    } catch (error) {
      if (error instanceof InterruptSignal) throw error;
      throwIfAborted(config);
      // Tool failures go back to the model as an error result
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Tool threw during execution', {
        component: 'react-agent',
        runId: config.runId,
        toolName: call.name,
        error: message,
      });
      return { ...base, content: `Error: ${message}`, status: 'error' };
    }
  }

  async function* execute(input: RunInput, config: RunConfig): AsyncGenerator<RuntimeEvent, FinalEvent> {
    const messages: AgentMessage[] = [...input.messages];

    logger.info('Starting agent run', {
      component: 'react-agent',
      runId: config.runId,
      threadId: config.threadId,
      provider: provider.id,
    });

    yield { channel: 'updates', kind: 'messages', node: START_NODE, messages: [...input.messages] };

    for (let step = 1; step <= maxSteps; step++) {
      throwIfAborted(config);

      const aiMessage = yield* callModel(input, messages, config);
      messages.push(aiMessage);
      yield { channel: 'updates', kind: 'messages', node: AGENT_NODE, messages: [aiMessage] };

      if (aiMessage.toolCalls.length === 0) {
        logger.info('Agent run completed', {
          component: 'react-agent',
          runId: config.runId,
          steps: step,
        });
        return { kind: 'values', messages };
      }

      const toolMessages: ToolMessage[] = [];
      for (const call of aiMessage.toolCalls) {
        throwIfAborted(config);
        const pending: CustomEvent[] = [];
        try {
          const toolMessage = await runTool(call, config, pending);
          yield* pending;
          yield { channel: 'messages', chunk: toolMessage, metadata: { node: TOOLS_NODE, tags: [] } };
          toolMessages.push(toolMessage);
        } catch (error) {
          if (!(error instanceof InterruptSignal)) throw error;
          yield* pending;
          if (toolMessages.length > 0) {
            messages.push(...toolMessages);
            yield { channel: 'updates', kind: 'messages', node: TOOLS_NODE, messages: toolMessages };
          }
          const interrupts = [{ id: call.id, value: error.value }];
          logger.info('Agent run interrupted', {
            component: 'react-agent',
            runId: config.runId,
            toolName: call.name,
          });
          yield { channel: 'updates', kind: 'interrupt', interrupts };
          return { kind: 'interrupt', interrupts };
        }
      }

      messages.push(...toolMessages);
      yield { channel: 'updates', kind: 'messages', node: TOOLS_NODE, messages: toolMessages };
    }

    throw new AgentExecutionError(`Agent did not produce a final answer within ${String(maxSteps)} steps`, {
      runId: config.runId,
      maxSteps,
    });
  }

  return {
    async invoke(input, config) {
      const run = execute(input, config);
      for (;;) {
        const next = await run.next();
        if (next.done) return next.value;
      }
    },

    async *stream(input: RunInput, config: RunConfig, modes: readonly StreamMode[]) {
      const wanted = new Set(modes);
      for await (const event of execute(input, config)) {
        if (wanted.has(event.channel)) yield event;
      }
    },
  };
}

// ─── Helpers ────────────────────────────────────────────────────────

function toProviderMessage(message: AgentMessage): Message {
  switch (message.type) {
    case 'human':
      return { role: 'user', content: contentToText(message.content) };
    case 'ai': {
      const text = contentToText(message.content);
      if (message.toolCalls.length === 0) {
        return { role: 'assistant', content: text };
      }
      return {
        role: 'assistant',
        content: [
          ...(text ? [{ type: 'text' as const, text }] : []),
          ...message.toolCalls.map((call) => ({
            type: 'tool_use' as const,
            id: call.id,
            name: call.name,
            input: call.args,
          })),
        ],
      };
    }
    case 'tool':
      return {
        role: 'tool',
        content: [
          {
            type: 'tool_result',
            toolUseId: message.toolCallId,
            content: contentToText(message.content),
            isError: message.status === 'error',
          },
        ],
      };
  }
}
