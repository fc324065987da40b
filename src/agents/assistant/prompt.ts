/**
 * System prompt for the Agent-AI assistant: template loading, placeholder
 * rendering, and the conversation-history block.
 */
import { readFile } from 'node:fs/promises';

import { ConfigError } from '@/core/errors.js';
import type { AgentMessage } from '../messages.js';
import { contentToText } from '../messages.js';

export const DEFAULT_PROMPT_PATH = new URL('./prompt.md', import.meta.url);

export const NO_HISTORY_TEXT = 'No conversation history available.';

const MAX_HISTORY_ENTRIES = 10;

// ─── Types ──────────────────────────────────────────────────────

export interface HistoryEntry {
  role: 'user' | 'assistant';
  content: string;
}

export interface PromptVariables {
  user_info: string;
  today_date: string;
  conversation_history: string;
}

// ─── Template ───────────────────────────────────────────────────

/** Read the prompt template. A missing file is a startup failure. */
export async function loadPromptTemplate(path: URL | string = DEFAULT_PROMPT_PATH): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Prompt template not found at ${String(path)}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Substitute `{name}` placeholders. Unknown placeholders are left as written
 * so literal braces in the template survive.
 */
export function renderPrompt(template: string, variables: PromptVariables): string {
  const values: Record<string, string> = { ...variables };
  return template.replace(/\{([a-z_]+)\}/g, (match, name: string) => values[name] ?? match);
}

// ─── History ────────────────────────────────────────────────────

/**
 * The last `maxEntries` user and assistant turns before the current message.
 * Tool traffic and assistant turns without text are left out.
 */
export function extractConversationHistory(
  messages: readonly AgentMessage[],
  maxEntries = MAX_HISTORY_ENTRIES,
): HistoryEntry[] {
  if (messages.length <= 1) return [];

  const recent = messages.slice(-(maxEntries + 1), -1);
  const history: HistoryEntry[] = [];

  for (const message of recent) {
    if (message.type === 'tool') continue;
    const content = contentToText(message.content);
    if (message.type === 'ai' && content === '') continue;
    history.push({ role: message.type === 'human' ? 'user' : 'assistant', content });
  }

  return history;
}

export function formatConversationHistory(history: readonly HistoryEntry[]): string {
  if (history.length === 0) return NO_HISTORY_TEXT;
  return history
    .map((entry) => `${entry.role.charAt(0).toUpperCase()}${entry.role.slice(1)}: ${entry.content}`)
    .join('\n');
}
