// LLM provider adapters (OpenAI-compatible: openai, lmstudio, ollama)
export type {
  ChatEvent,
  ChatParams,
  LLMProvider,
  Message,
  MessageContent,
  MessageRole,
  StopReason,
  TextContent,
  TokenUsage,
  ToolDefinitionForProvider,
  ToolResultContent,
  ToolUseContent,
} from './types.js';

export { createProvider } from './factory.js';
export { createOpenAIProvider } from './openai.js';
export type { OpenAIProviderOptions } from './openai.js';
