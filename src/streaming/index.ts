// SSE streaming: frame encoding, per-run state and the stream driver
export { encodeFrame, parseFrames, serializeFrame } from './sse.js';
export type {
  CustomFrame,
  ErrorFrame,
  ParsedFrame,
  SseFrame,
  StreamEndFrame,
  StreamStartFrame,
  StreamTokenFrame,
  ToolExecutionCompleteFrame,
  ToolExecutionErrorFrame,
  ToolExecutionStartFrame,
} from './sse.js';
export { createToolCallTracker } from './tool-call-tracker.js';
export type { PendingToolCall, ToolCallTracker } from './tool-call-tracker.js';
export { createStreamState } from './stream-state.js';
export type { StreamState } from './stream-state.js';
export { createEventTranslator, INTERRUPTED_TOOL_TEXT, MESSAGE_ERROR_TEXT, SKIP_STREAM_TAG } from './event-translator.js';
export type { EventTranslator, EventTranslatorOptions } from './event-translator.js';
export { createStreamDriver, STREAM_ERROR_TEXT } from './stream-driver.js';
export type { StreamDriver, StreamDriverOptions, StreamDriverState, StreamRunSummary } from './stream-driver.js';
