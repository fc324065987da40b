/**
 * In-flight tool calls of one run, keyed by call id.
 */
export interface PendingToolCall {
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export interface ToolCallTracker {
  /** Record a call start. A repeated id replaces the earlier entry. */
  recordStart(callId: string, name: string, args: Record<string, unknown>): void;

  /** Remove and return the call, or undefined when no start was recorded. */
  resolve(callId: string): PendingToolCall | undefined;

  /** Ids of calls started but not yet completed, in start order. */
  pending(): string[];
}

export function createToolCallTracker(): ToolCallTracker {
  const calls = new Map<string, PendingToolCall>();

  return {
    recordStart(callId, name, args) {
      calls.set(callId, { name, args });
    },

    resolve(callId) {
      const call = calls.get(callId);
      if (call === undefined) return undefined;
      calls.delete(callId);
      return call;
    },

    pending() {
      return [...calls.keys()];
    },
  };
}
