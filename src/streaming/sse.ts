/**
 * SSE frames emitted by the stream endpoint, and their wire encoding.
 *
 * Wire grammar, one frame per block:
 *
 *   event: <type>
 *   data: <compact JSON>     (omitted when the frame has no content)
 *   <blank line>
 */

// ─── Frames ─────────────────────────────────────────────────────

/** First frame of a stream that has visible content. No data line. */
export interface StreamStartFrame {
  readonly type: 'stream_start';
}

export interface StreamTokenFrame {
  readonly type: 'stream_token';
  readonly content: { readonly token: string };
}

export interface ToolExecutionStartFrame {
  readonly type: 'tool_execution_start';
  readonly content: { readonly name: string; readonly params: Record<string, unknown> };
}

export interface ToolExecutionCompleteFrame {
  readonly type: 'tool_execution_complete';
  readonly content: { readonly name: string; readonly params: Record<string, unknown> };
}

export interface ToolExecutionErrorFrame {
  readonly type: 'tool_execution_error';
  readonly content: { readonly name: string; readonly error: string };
}

export interface ErrorFrame {
  readonly type: 'error';
  readonly content: string;
}

export interface StreamEndFrame {
  readonly type: 'stream_end';
  readonly content: { readonly thread_id: string };
}

/** Out-of-band event published by a tool, forwarded under its own event type. */
export interface CustomFrame {
  readonly type: 'custom';
  readonly event: string;
  readonly content: unknown;
}

export type SseFrame =
  | StreamStartFrame
  | StreamTokenFrame
  | ToolExecutionStartFrame
  | ToolExecutionCompleteFrame
  | ToolExecutionErrorFrame
  | ErrorFrame
  | StreamEndFrame
  | CustomFrame;

/** A frame read back from the wire. `data` is the parsed JSON, or null when absent. */
export interface ParsedFrame {
  event: string;
  data: unknown;
}

// ─── Encoding ───────────────────────────────────────────────────

/** Encode one frame. `content` must be JSON-serializable. */
export function encodeFrame(type: string, content?: unknown): string {
  const data = content === null || content === undefined ? '' : `data: ${JSON.stringify(content)}\n`;
  return `event: ${type}\n${data}\n`;
}

export function serializeFrame(frame: SseFrame): string {
  switch (frame.type) {
    case 'stream_start':
      return encodeFrame(frame.type);
    case 'custom':
      return encodeFrame(frame.event, frame.content);
    default:
      return encodeFrame(frame.type, frame.content);
  }
}

// ─── Parsing ────────────────────────────────────────────────────

/**
 * Parse every complete frame in `text`. A trailing block without its
 * terminating blank line is ignored.
 */
export function parseFrames(text: string): ParsedFrame[] {
  const blocks = text.replace(/\r\n/g, '\n').split('\n\n');
  // The last element is either empty or an incomplete frame
  blocks.pop();

  const frames: ParsedFrame[] = [];
  for (const block of blocks) {
    const frame = parseBlock(block);
    if (frame) frames.push(frame);
  }
  return frames;
}

function parseBlock(block: string): ParsedFrame | undefined {
  let event: string | undefined;
  const dataLines: string[] = [];

  for (const line of block.split('\n')) {
    if (line.startsWith('event:')) {
      event = line.slice('event:'.length).trim();
    } else if (line.startsWith('data:')) {
      dataLines.push(line.slice('data:'.length).trimStart());
    }
  }

  if (event === undefined) return undefined;
  const data: unknown = dataLines.length > 0 ? JSON.parse(dataLines.join('\n')) : null;
  return { event, data };
}
