import type { RunId, ThreadId } from '@/core/types.js';
import type { AgentMessage, HumanMessage, MessageContent, ToolMessage } from './messages.js';

// ─── Run Input ──────────────────────────────────────────────────

export interface RunInput {
  /** The new user turn. The runtime keeps no history between runs. */
  messages: HumanMessage[];
  /** Display name of the user the agent is talking to. */
  userInfo: string;
  /** Pre-formatted current date, rendered into the system prompt. */
  todayDate: string;
}

export interface RunConfig {
  runId: RunId;
  threadId: ThreadId;
  abortSignal?: AbortSignal;
}

// ─── Runtime Events ─────────────────────────────────────────────

export type StreamMode = 'updates' | 'messages' | 'custom';

export const ALL_STREAM_MODES: readonly StreamMode[] = ['updates', 'messages', 'custom'];

export interface InterruptInfo {
  id: string;
  value: string;
}

/** Incremental model output. Carries the id of the AI message it belongs to. */
export interface AIMessageChunk {
  type: 'ai_chunk';
  id: string;
  content: MessageContent;
}

export interface ChunkMetadata {
  /** Graph node that produced the chunk. */
  node: string;
  /** `skip_stream` suppresses the chunk on the wire. */
  tags: string[];
}

/**
 * A node finished and published its messages. Messages are left undecoded:
 * the consumer validates each one and isolates malformed entries.
 */
export interface MessagesUpdateEvent {
  channel: 'updates';
  kind: 'messages';
  node: string;
  messages: unknown[];
}

export interface InterruptUpdateEvent {
  channel: 'updates';
  kind: 'interrupt';
  interrupts: InterruptInfo[];
}

export interface MessageChunkEvent {
  channel: 'messages';
  chunk: AIMessageChunk | ToolMessage;
  metadata: ChunkMetadata;
}

export type CustomPayload =
  | { kind: 'event'; eventType: string; data: unknown }
  | { kind: 'error'; error: Error };

export interface CustomEvent {
  channel: 'custom';
  payload: CustomPayload;
}

export type UpdateEvent = MessagesUpdateEvent | InterruptUpdateEvent;

export type RuntimeEvent = UpdateEvent | MessageChunkEvent | CustomEvent;

// ─── Final Event ────────────────────────────────────────────────

export type FinalEvent =
  | { kind: 'values'; messages: AgentMessage[] }
  | { kind: 'interrupt'; interrupts: InterruptInfo[] };

// ─── Runtime ────────────────────────────────────────────────────

export interface AgentRuntime {
  /** Run to completion and return the final state. */
  invoke(input: RunInput, config: RunConfig): Promise<FinalEvent>;

  /** Run and yield the events of the requested channels as they happen. */
  stream(input: RunInput, config: RunConfig, modes: readonly StreamMode[]): AsyncIterable<RuntimeEvent>;
}

// ─── Registry ───────────────────────────────────────────────────

export interface AgentDefinition {
  id: string;
  description: string;
  runtime: AgentRuntime;
}

export interface AgentInfo {
  key: string;
  description: string;
}

export interface AgentRegistry {
  readonly defaultAgentId: string;
  /** Look up an agent; undefined when the id is not registered. */
  get(agentId: string): AgentDefinition | undefined;
  list(): AgentInfo[];
}
