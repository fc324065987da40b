/**
 * OpenAI-compatible LLM provider adapter.
 * Wraps the openai SDK to implement the LLMProvider interface.
 * Also serves LM Studio and Ollama, which expose the same API via baseUrl.
 */
import OpenAI from 'openai';

import { ProviderError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';
import type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  StopReason,
  ToolDefinitionForProvider,
} from './types.js';

const logger = createLogger({ name: 'openai-provider' });

/** Configuration for the OpenAI provider. */
export interface OpenAIProviderOptions {
  /** API key. Resolved from env at construction time. */
  apiKey: string;
  /** Model identifier (e.g. 'gpt-4o-mini'). */
  model: string;
  /** Custom base URL (LM Studio, Ollama, proxies). */
  baseUrl?: string;
  /** Provider label for logging/display. Defaults to 'openai'. */
  providerLabel?: string;
}

/**
 * Convert our internal Message format to OpenAI's chat completion format.
 */
function toOpenAIMessages(
  messages: Message[],
  systemPrompt?: string,
): OpenAI.Chat.Completions.ChatCompletionMessageParam[] {
  const result: OpenAI.Chat.Completions.ChatCompletionMessageParam[] = [];

  if (systemPrompt) {
    result.push({ role: 'system', content: systemPrompt });
  }

  for (const msg of messages) {
    if (typeof msg.content === 'string') {
      if (msg.role === 'system') {
        result.push({ role: 'system', content: msg.content });
      } else if (msg.role === 'assistant') {
        result.push({ role: 'assistant', content: msg.content });
      } else {
        result.push({ role: 'user', content: msg.content });
      }
      continue;
    }

    const toolCalls: OpenAI.Chat.Completions.ChatCompletionMessageToolCall[] = [];
    const textParts: string[] = [];

    for (const part of msg.content) {
      switch (part.type) {
        case 'text':
          textParts.push(part.text);
          break;
        case 'tool_use':
          toolCalls.push({
            id: part.id,
            type: 'function',
            function: { name: part.name, arguments: JSON.stringify(part.input) },
          });
          break;
        case 'tool_result':
          // Tool results are individual "tool" role messages in OpenAI's format
          result.push({
            role: 'tool',
            tool_call_id: part.toolUseId,
            content: part.isError ? `Error: ${part.content}` : part.content,
          });
          break;
      }
    }

    const text = textParts.join('');
    if (msg.role === 'assistant') {
      result.push({
        role: 'assistant',
        content: text === '' ? null : text,
        ...(toolCalls.length ? { tool_calls: toolCalls } : {}),
      });
    } else if (text !== '') {
      result.push({ role: 'user', content: text });
    }
  }

  return result;
}

function toOpenAITools(
  tools: ToolDefinitionForProvider[],
): OpenAI.Chat.Completions.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.inputSchema,
    },
  }));
}

function toStopReason(finishReason: string): StopReason {
  if (finishReason === 'tool_calls') return 'tool_use';
  if (finishReason === 'length') return 'max_tokens';
  return 'end_turn';
}

function parseArguments(json: string, label: string, toolName: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json === '' ? '{}' : json);
  } catch {
    parsed = undefined;
  }
  if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  logger.warn('Failed to parse tool call arguments', { component: label, toolName });
  return {};
}

/**
 * OpenAI provider implementing the LLMProvider interface.
 */
export function createOpenAIProvider(options: OpenAIProviderOptions): LLMProvider {
  const label = options.providerLabel ?? 'openai';
  const client = new OpenAI({
    apiKey: options.apiKey,
    ...(options.baseUrl ? { baseURL: options.baseUrl } : {}),
  });

  return {
    id: `${label}:${options.model}`,
    displayName: `${label.charAt(0).toUpperCase()}${label.slice(1)} ${options.model}`,

    async *chat(params: ChatParams): AsyncGenerator<ChatEvent> {
      const openaiMessages = toOpenAIMessages(params.messages, params.systemPrompt);
      const tools = params.tools?.length ? toOpenAITools(params.tools) : undefined;

      logger.debug('Starting OpenAI chat stream', {
        component: label,
        model: options.model,
        messageCount: openaiMessages.length,
        hasTools: tools !== undefined,
        runId: params.runId,
      });

      try {
        const stream = await client.chat.completions.create(
          {
            model: options.model,
            messages: openaiMessages,
            max_tokens: params.maxTokens,
            temperature: params.temperature,
            stream: true,
            ...(tools ? { tools } : {}),
          },
          params.abortSignal ? { signal: params.abortSignal } : undefined,
        );

        let messageId = '';
        // Tool calls arrive as argument fragments keyed by index
        const toolCallBuffers = new Map<number, { id: string; name: string; argumentsJson: string }>();

        for await (const chunk of stream) {
          const choice = chunk.choices[0];
          if (!choice) continue;

          if (chunk.id && !messageId) {
            messageId = chunk.id;
            yield { type: 'message_start', messageId };
          }

          const delta = choice.delta;

          if (delta.content) {
            yield { type: 'content_delta', text: delta.content };
          }

          for (const tc of delta.tool_calls ?? []) {
            let buffer = toolCallBuffers.get(tc.index);
            if (!buffer && tc.id) {
              buffer = { id: tc.id, name: tc.function?.name ?? '', argumentsJson: '' };
              toolCallBuffers.set(tc.index, buffer);
            }
            if (buffer && tc.function?.arguments) {
              buffer.argumentsJson += tc.function.arguments;
            }
          }

          if (choice.finish_reason) {
            for (const [, buffer] of toolCallBuffers) {
              yield {
                type: 'tool_use_end',
                id: buffer.id,
                name: buffer.name,
                input: parseArguments(buffer.argumentsJson, label, buffer.name),
              };
            }
            toolCallBuffers.clear();

            yield {
              type: 'message_end',
              stopReason: toStopReason(choice.finish_reason),
              usage: {
                inputTokens: chunk.usage?.prompt_tokens ?? 0,
                outputTokens: chunk.usage?.completion_tokens ?? 0,
              },
            };
          }
        }
      } catch (error) {
        // Cancellation is the caller's decision; let it surface unchanged.
        if (params.abortSignal?.aborted) throw error;

        if (error instanceof OpenAI.APIError) {
          logger.error('OpenAI API error', {
            component: label,
            status: error.status,
            errorMessage: error.message,
            runId: params.runId,
          });
          yield {
            type: 'error',
            error: new ProviderError(label, `${String(error.status)}: ${error.message}`, error),
          };
        } else {
          throw error;
        }
      }
    },
  };
}
