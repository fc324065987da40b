/**
 * Per-run stream state: whether `stream_start` went out, and the text
 * streamed so far (kept for logs, never re-sent).
 */
export interface StreamState {
  /** True exactly once: on the first call. */
  markOpened(): boolean;
  append(text: string): void;
  readonly opened: boolean;
  readonly text: string;
}

export function createStreamState(): StreamState {
  let hasOpened = false;
  let accumulated = '';

  return {
    markOpened() {
      if (hasOpened) return false;
      hasOpened = true;
      return true;
    },

    append(text) {
      accumulated += text;
    },

    get opened() {
      return hasOpened;
    },

    get text() {
      return accumulated;
    },
  };
}
