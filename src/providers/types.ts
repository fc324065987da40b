// ─── Messages ───────────────────────────────────────────────────

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolUseContent {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultContent {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  isError?: boolean;
}

export type MessageContent = TextContent | ToolUseContent | ToolResultContent;

export interface Message {
  role: MessageRole;
  content: string | MessageContent[];
}

// ─── Tool Formatting ────────────────────────────────────────────

export interface ToolDefinitionForProvider {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

// ─── Chat Parameters ────────────────────────────────────────────

export interface ChatParams {
  messages: Message[];
  systemPrompt?: string;
  tools?: ToolDefinitionForProvider[];
  maxTokens: number;
  temperature: number;
  /** Aborts the underlying HTTP request when fired. */
  abortSignal?: AbortSignal;
  runId?: string;
}

// ─── Streaming Events ───────────────────────────────────────────

export type StopReason = 'end_turn' | 'tool_use' | 'max_tokens';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type ChatEvent =
  | { type: 'message_start'; messageId: string }
  | { type: 'content_delta'; text: string }
  | { type: 'tool_use_end'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'message_end'; stopReason: StopReason; usage: TokenUsage }
  | { type: 'error'; error: Error };

// ─── Provider Interface ─────────────────────────────────────────

export interface LLMProvider {
  readonly id: string;
  readonly displayName: string;

  /** Stream a chat completion. */
  chat(params: ChatParams): AsyncGenerator<ChatEvent>;
}
