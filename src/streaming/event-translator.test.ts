import { describe, it, expect } from 'vitest';
import { createMockLogger, toolCallUpdate, toolResultUpdate, tokenEvent, updateEvent } from '@/testing/index.js';
import type { Logger } from '@/observability/logger.js';
import { createEventTranslator, INTERRUPTED_TOOL_TEXT, MESSAGE_ERROR_TEXT, SKIP_STREAM_TAG } from './event-translator.js';
import type { EventTranslator } from './event-translator.js';
import { createStreamState } from './stream-state.js';
import type { StreamState } from './stream-state.js';
import { createToolCallTracker } from './tool-call-tracker.js';
import type { ToolCallTracker } from './tool-call-tracker.js';

interface Harness {
  translator: EventTranslator;
  tracker: ToolCallTracker;
  state: StreamState;
  logger: Logger;
}

function setup(requestMessage = 'What is 2+2?'): Harness {
  const tracker = createToolCallTracker();
  const state = createStreamState();
  const logger = createMockLogger();
  const translator = createEventTranslator({ requestMessage, tracker, state, logger, runId: 'run-1' });
  return { translator, tracker, state, logger };
}

describe('createEventTranslator', () => {
  describe('token deltas', () => {
    it('opens the stream before the first token only', () => {
      const { translator, state } = setup();

      expect(translator.translate(tokenEvent('ai-1', 'Hel'))).toEqual([
        { type: 'stream_start' },
        { type: 'stream_token', content: { token: 'Hel' } },
      ]);
      expect(translator.translate(tokenEvent('ai-1', 'lo'))).toEqual([
        { type: 'stream_token', content: { token: 'lo' } },
      ]);
      expect(state.text).toBe('Hello');
    });

    it('skips chunks tagged skip_stream', () => {
      const { translator, state } = setup();

      expect(translator.translate(tokenEvent('ai-1', 'hidden', [SKIP_STREAM_TAG]))).toEqual([]);
      expect(state.opened).toBe(false);
    });

    it('strips tool-use parts and ignores chunks left empty', () => {
      const { translator } = setup();
      const frames = translator.translate({
        channel: 'messages',
        chunk: {
          type: 'ai_chunk',
          id: 'ai-1',
          content: [{ type: 'tool_use', id: 'call_1', name: 'add', input: { first: 1, second: 2 } }],
        },
        metadata: { node: 'agent', tags: [] },
      });

      expect(frames).toEqual([]);
    });

    it('keeps the text parts of mixed content', () => {
      const { translator } = setup();
      const frames = translator.translate({
        channel: 'messages',
        chunk: {
          type: 'ai_chunk',
          id: 'ai-1',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'tool_use', id: 'call_1', name: 'add', input: {} },
          ],
        },
        metadata: { node: 'agent', tags: [] },
      });

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'stream_token', content: { token: 'Let me check.' } },
      ]);
    });

    it('ignores tool message chunks', () => {
      const { translator } = setup();
      const frames = translator.translate({
        channel: 'messages',
        chunk: { type: 'tool', id: 't-1', content: '4', toolCallId: 'call_1', name: 'add', status: 'success' },
        metadata: { node: 'tools', tags: [] },
      });

      expect(frames).toEqual([]);
    });
  });

  describe('message updates', () => {
    it('suppresses the echo of the request message', () => {
      const { translator } = setup('hello');
      const frames = translator.translate(updateEvent('__start__', [{ type: 'human', id: 'h-1', content: 'hello' }]));

      expect(frames).toEqual([]);
    });

    it('forwards other human text as a token', () => {
      const { translator } = setup('hello');
      const frames = translator.translate(updateEvent('agent', [{ type: 'human', id: 'h-2', content: 'injected' }]));

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'stream_token', content: { token: 'injected' } },
      ]);
    });

    it('forwards an AI message whose tokens were not streamed', () => {
      const { translator } = setup();
      const frames = translator.translate(
        updateEvent('agent', [{ type: 'ai', id: 'ai-9', content: 'The answer is 4.', toolCalls: [] }]),
      );

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'stream_token', content: { token: 'The answer is 4.' } },
      ]);
    });

    it('does not repeat an AI message already streamed as tokens', () => {
      const { translator, state } = setup();
      translator.translate(tokenEvent('ai-9', 'The answer '));
      translator.translate(tokenEvent('ai-9', 'is 4.'));

      const frames = translator.translate(
        updateEvent('agent', [{ type: 'ai', id: 'ai-9', content: 'The answer is 4.', toolCalls: [] }]),
      );

      expect(frames).toEqual([]);
      expect(state.text).toBe('The answer is 4.');
    });

    it('ignores an AI message with empty text', () => {
      const { translator } = setup();

      expect(translator.translate(updateEvent('agent', [{ type: 'ai', id: 'ai-1', content: '', toolCalls: [] }]))).toEqual(
        [],
      );
    });

    it('emits a start frame per tool call and records it', () => {
      const { translator, tracker } = setup();
      const frames = translator.translate(toolCallUpdate('call_1', 'add', { first: 2, second: 2 }));

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'tool_execution_start', content: { name: 'add', params: { first: 2, second: 2 } } },
      ]);
      expect(tracker.pending()).toEqual(['call_1']);
    });

    it('pairs a successful tool result with its start', () => {
      const { translator, tracker } = setup();
      translator.translate(toolCallUpdate('call_1', 'add', { first: 2, second: 2 }));

      expect(translator.translate(toolResultUpdate('call_1', 'add', '{"result":4}'))).toEqual([
        { type: 'tool_execution_complete', content: { name: 'add', params: { first: 2, second: 2 } } },
      ]);
      expect(tracker.pending()).toEqual([]);
    });

    it('reports a failed tool result as a tool error', () => {
      const { translator } = setup();
      translator.translate(toolCallUpdate('call_1', 'divide', { first: 1, second: 0 }));

      expect(translator.translate(toolResultUpdate('call_1', 'divide', 'Error: Division by zero', 'error'))).toEqual([
        { type: 'tool_execution_error', content: { name: 'divide', error: 'Error: Division by zero' } },
      ]);
    });

    it('logs and skips a tool result without a recorded start', () => {
      const { translator, logger } = setup();

      expect(translator.translate(toolResultUpdate('call_x', 'add', '4'))).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        'Tool result without a matching tool start',
        expect.objectContaining({ component: 'event-translator', toolCallId: 'call_x' }),
      );
    });

    it('isolates a malformed message and keeps translating the rest', () => {
      const { translator } = setup();
      const frames = translator.translate(
        updateEvent('agent', [{ type: 'ai', id: 'ai-1' }, { type: 'ai', id: 'ai-2', content: 'still here', toolCalls: [] }]),
      );

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'error', content: MESSAGE_ERROR_TEXT },
        { type: 'stream_token', content: { token: 'still here' } },
      ]);
    });

    it('settles the pending call of a malformed tool result', () => {
      const { translator, tracker } = setup();
      translator.translate(toolCallUpdate('call_1', 'add', { first: 1, second: 1 }));

      const frames = translator.translate(updateEvent('tools', [{ type: 'tool', toolCallId: 'call_1' }]));

      expect(frames).toEqual([
        { type: 'error', content: MESSAGE_ERROR_TEXT },
        { type: 'tool_execution_error', content: { name: 'add', error: 'Malformed tool result' } },
      ]);
      expect(tracker.pending()).toEqual([]);
    });
  });

  describe('interrupts', () => {
    it('forwards non-empty interrupt content as a token', () => {
      const { translator } = setup();
      const frames = translator.translate({
        channel: 'updates',
        kind: 'interrupt',
        interrupts: [{ id: 'i-1', value: 'Which city?' }],
      });

      expect(frames).toEqual([
        { type: 'stream_start' },
        { type: 'stream_token', content: { token: 'Which city?' } },
      ]);
    });

    it('settles the interrupted tool call before forwarding the question', () => {
      const { translator, tracker } = setup();
      translator.translate(toolCallUpdate('call_q', 'ask_user', { message: 'Which city?' }));

      const frames = translator.translate({
        channel: 'updates',
        kind: 'interrupt',
        interrupts: [{ id: 'call_q', value: 'Which city?' }],
      });

      expect(frames).toEqual([
        { type: 'tool_execution_error', content: { name: 'ask_user', error: INTERRUPTED_TOOL_TEXT } },
        { type: 'stream_token', content: { token: 'Which city?' } },
      ]);
      expect(tracker.pending()).toEqual([]);
    });

    it('settles pending calls even when the interrupt has no content', () => {
      const { translator } = setup();
      translator.translate(toolCallUpdate('call_q', 'ask_user', { message: '' }));

      expect(translator.translate({ channel: 'updates', kind: 'interrupt', interrupts: [{ id: 'call_q', value: '' }] })).toEqual([
        { type: 'tool_execution_error', content: { name: 'ask_user', error: 'Interrupted' } },
      ]);
    });

    it('emits nothing for empty interrupt content', () => {
      const { translator, state } = setup();

      expect(translator.translate({ channel: 'updates', kind: 'interrupt', interrupts: [{ id: 'i-1', value: '' }] })).toEqual(
        [],
      );
      expect(state.opened).toBe(false);
    });
  });

  describe('custom events', () => {
    it('passes custom events through without opening the stream', () => {
      const { translator, state } = setup();
      const frames = translator.translate({
        channel: 'custom',
        payload: { kind: 'event', eventType: 'progress', data: { step: 1 } },
      });

      expect(frames).toEqual([{ type: 'custom', event: 'progress', content: { step: 1 } }]);
      expect(state.opened).toBe(false);
    });

    it('turns an error payload into an error frame', () => {
      const { translator } = setup();
      const frames = translator.translate({ channel: 'custom', payload: { kind: 'error', error: new Error('lookup failed') } });

      expect(frames).toEqual([{ type: 'stream_start' }, { type: 'error', content: 'lookup failed' }]);
    });
  });
});
