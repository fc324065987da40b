/**
 * Drives one streaming run from the agent runtime to SSE frames.
 *
 *   INIT ──► STREAMING ──► CLOSED           source exhausted
 *                     ├──► CLOSED_ON_ERROR  unhandled failure, one generic error frame
 *                     └──► CANCELLED        abort signal or consumer stopped early
 *
 * `stream_end` is sent on every terminal state, but only when `stream_start` was.
 */
import { RunCancelledError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { ALL_STREAM_MODES } from '@/agents/types.js';
import type { AgentRuntime, RunConfig, RunInput } from '@/agents/types.js';
import { createEventTranslator } from './event-translator.js';
import type { SseFrame } from './sse.js';
import { createStreamState } from './stream-state.js';
import { createToolCallTracker } from './tool-call-tracker.js';

export const STREAM_ERROR_TEXT = 'An unexpected error occurred';

export type StreamDriverState = 'INIT' | 'STREAMING' | 'CLOSED' | 'CLOSED_ON_ERROR' | 'CANCELLED';

export interface StreamRunSummary {
  state: StreamDriverState;
  runId: string;
  threadId: string;
  /** Text streamed to the client. */
  text: string;
  /** Tool calls started but never completed. */
  pendingToolCalls: string[];
  frameCount: number;
}

export interface StreamDriverOptions {
  runtime: AgentRuntime;
  input: RunInput;
  config: RunConfig;
  /** The request text, used to suppress its echo. */
  requestMessage: string;
  logger: Logger;
  /** Called once with the run summary when the frame sequence ends for any reason. */
  onFinish?: (summary: StreamRunSummary) => void;
}

export interface StreamDriver {
  readonly state: StreamDriverState;
  readonly summary: StreamRunSummary;
  /** The run's frames. Can be consumed once. */
  frames(): AsyncGenerator<SseFrame>;
}

type PumpOutcome = { error: unknown } | undefined;

export function createStreamDriver(options: StreamDriverOptions): StreamDriver {
  const { runtime, input, config, requestMessage, logger } = options;
  const tracker = createToolCallTracker();
  const streamState = createStreamState();
  let current: StreamDriverState = 'INIT';
  let frameCount = 0;

  function isAborted(): boolean {
    return config.abortSignal?.aborted ?? false;
  }

  function count(frame: SseFrame): SseFrame {
    frameCount++;
    return frame;
  }

  function summary(): StreamRunSummary {
    return {
      state: current,
      runId: config.runId,
      threadId: config.threadId,
      text: streamState.text,
      pendingToolCalls: tracker.pending(),
      frameCount,
    };
  }

  /** Forward translated frames until the source ends. Returns the failure, if any. */
  async function* pump(): AsyncGenerator<SseFrame, PumpOutcome> {
    const translator = createEventTranslator({
      requestMessage,
      tracker,
      state: streamState,
      logger,
      runId: config.runId,
    });

    try {
      for await (const event of runtime.stream(input, config, ALL_STREAM_MODES)) {
        if (isAborted()) break;
        for (const frame of translator.translate(event)) {
          yield count(frame);
        }
      }
    } catch (error) {
      return { error };
    }

    current = isAborted() ? 'CANCELLED' : 'CLOSED';
    return undefined;
  }

  /** Settle the terminal state for a failure and return the frames it calls for. */
  function failureFrames(outcome: PumpOutcome): SseFrame[] {
    if (outcome === undefined) return [];
    const failure = outcome.error;

    if (failure instanceof RunCancelledError || isAborted()) {
      current = 'CANCELLED';
      return [];
    }

    current = 'CLOSED_ON_ERROR';
    logger.error('Stream run failed', {
      component: 'stream-driver',
      runId: config.runId,
      threadId: config.threadId,
      error: failure instanceof Error ? failure.message : String(failure),
      errorName: failure instanceof Error ? failure.name : undefined,
    });

    const frames: SseFrame[] = [];
    if (streamState.markOpened()) frames.push({ type: 'stream_start' });
    frames.push({ type: 'error', content: STREAM_ERROR_TEXT });
    return frames;
  }

  function finish(): void {
    const result = summary();
    const level = result.state === 'CLOSED_ON_ERROR' ? 'warn' : 'info';
    logger[level]('Stream run finished', {
      component: 'stream-driver',
      runId: result.runId,
      threadId: result.threadId,
      state: result.state,
      frames: result.frameCount,
      textLength: result.text.length,
      pendingToolCalls: result.pendingToolCalls,
    });
    options.onFinish?.(result);
  }

  return {
    get state() {
      return current;
    },

    get summary() {
      return summary();
    },

    async *frames() {
      if (current !== 'INIT') {
        throw new Error(`Stream driver already ${current}`);
      }
      current = 'STREAMING';

      try {
        for (const frame of failureFrames(yield* pump())) {
          yield count(frame);
        }
        if (streamState.opened) {
          yield count({ type: 'stream_end', content: { thread_id: config.threadId } });
        }
      } finally {
        // The consumer stopping early leaves no terminal state behind
        if (current === 'STREAMING') current = 'CANCELLED';
        finish();
      }
    },
  };
}
