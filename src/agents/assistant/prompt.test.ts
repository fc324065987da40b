import { describe, it, expect } from 'vitest';
import {
  NO_HISTORY_TEXT,
  extractConversationHistory,
  formatConversationHistory,
  loadPromptTemplate,
  renderPrompt,
} from './prompt.js';
import type { AgentMessage } from '../messages.js';

describe('renderPrompt', () => {
  it('substitutes known placeholders', () => {
    const rendered = renderPrompt('Hi {user_info}, today is {today_date}.\n{conversation_history}', {
      user_info: 'Operator',
      today_date: 'Monday, January 05, 2026 09:30 AM',
      conversation_history: NO_HISTORY_TEXT,
    });

    expect(rendered).toBe(
      'Hi Operator, today is Monday, January 05, 2026 09:30 AM.\nNo conversation history available.',
    );
  });

  it('leaves unknown placeholders untouched', () => {
    const rendered = renderPrompt('{unknown} {user_info}', {
      user_info: 'Operator',
      today_date: '',
      conversation_history: '',
    });

    expect(rendered).toBe('{unknown} Operator');
  });
});

describe('loadPromptTemplate', () => {
  it('reads the bundled template with all placeholders', async () => {
    const template = await loadPromptTemplate();

    expect(template).toContain('{user_info}');
    expect(template).toContain('{today_date}');
    expect(template).toContain('{conversation_history}');
  });

  it('fails with a ConfigError for a missing file', async () => {
    await expect(loadPromptTemplate('/nonexistent/prompt.md')).rejects.toMatchObject({
      name: 'ConfigError',
      message: 'Prompt template not found at /nonexistent/prompt.md',
    });
  });
});

describe('extractConversationHistory', () => {
  const conversation: AgentMessage[] = [
    { type: 'human', id: 'h1', content: 'What is 2+2?' },
    { type: 'ai', id: 'a1', content: '', toolCalls: [{ id: 'c1', name: 'add', args: { first: 2, second: 2 } }] },
    { type: 'tool', id: 't1', content: '{"result":4}', toolCallId: 'c1', name: 'add', status: 'success' },
    { type: 'ai', id: 'a2', content: [{ type: 'text', text: 'It is 4.' }], toolCalls: [] },
    { type: 'human', id: 'h2', content: 'Thanks' },
  ];

  it('returns nothing for a single message', () => {
    expect(extractConversationHistory(conversation.slice(0, 1))).toEqual([]);
  });

  it('excludes the current message, tool traffic and empty assistant turns', () => {
    expect(extractConversationHistory(conversation)).toEqual([
      { role: 'user', content: 'What is 2+2?' },
      { role: 'assistant', content: 'It is 4.' },
    ]);
  });

  it('keeps only the most recent entries', () => {
    expect(extractConversationHistory(conversation, 1)).toEqual([
      { role: 'assistant', content: 'It is 4.' },
    ]);
  });
});

describe('formatConversationHistory', () => {
  it('uses the fixed sentence when there is no history', () => {
    expect(formatConversationHistory([])).toBe(NO_HISTORY_TEXT);
  });

  it('renders one capitalized "Role: content" line per entry', () => {
    expect(
      formatConversationHistory([
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hi!' },
      ]),
    ).toBe('User: Hello\nAssistant: Hi!');
  });
});
