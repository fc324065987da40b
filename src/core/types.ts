// ─── Branded ID Types ────────────────────────────────────────────
// Branded types prevent accidentally passing a ThreadId where a RunId is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

export type RunId = Brand<string, 'RunId'>;
export type ThreadId = Brand<string, 'ThreadId'>;

/** Brand a raw string as a RunId. */
export function runId(value: string): RunId {
  return value as RunId;
}

/** Brand a raw string as a ThreadId. */
export function threadId(value: string): ThreadId {
  return value as ThreadId;
}

// ─── LLM Provider Config ────────────────────────────────────────

export type LLMProviderKind = 'openai' | 'lmstudio' | 'ollama';

export interface LLMProviderConfig {
  /** Provider identifier. */
  provider: LLMProviderKind;
  /** Model identifier (e.g. 'gpt-4o-mini', 'dolphin3.0-llama3.1-8b'). */
  model: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** References an env var name, never the raw key. */
  apiKeyEnvVar?: string;
  /** Custom base URL for self-hosted providers (LM Studio, Ollama). */
  baseUrl?: string;
}
