/**
 * Incremental server-sent-event reader for the CLI. Feed it decoded text as
 * it arrives; it returns every event completed by that text.
 */

export interface ServerEvent {
  event: string;
  /** Parsed JSON data, or the raw string when it is not JSON; null without a data line. */
  data: unknown;
}

export class SseReader {
  private buffer = '';

  push(text: string): ServerEvent[] {
    this.buffer += text.replace(/\r\n/g, '\n');
    const events: ServerEvent[] = [];

    let boundary = this.buffer.indexOf('\n\n');
    while (boundary !== -1) {
      const block = this.buffer.slice(0, boundary);
      this.buffer = this.buffer.slice(boundary + 2);
      const event = parseBlock(block);
      if (event) events.push(event);
      boundary = this.buffer.indexOf('\n\n');
    }

    return events;
  }

  /** Text received but not yet terminated by a blank line. */
  get pending(): string {
    return this.buffer;
  }
}

function parseBlock(block: string): ServerEvent | undefined {
  let event = 'message';
  const dataLines: string[] = [];
  let sawField = false;

  for (const line of block.split('\n')) {
    if (line === '' || line.startsWith(':')) continue;
    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    const value = colon === -1 ? '' : line.slice(colon + 1).replace(/^ /, '');
    if (field === 'event') {
      event = value;
      sawField = true;
    } else if (field === 'data') {
      dataLines.push(value);
      sawField = true;
    }
  }

  if (!sawField) return undefined;
  return { event, data: dataLines.length > 0 ? decodeData(dataLines.join('\n')) : null };
}

function decodeData(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}
