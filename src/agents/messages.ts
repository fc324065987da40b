/**
 * Conversation message model shared by the agent runtime and the stream
 * translator. Schemas double as the decoder for messages arriving on the
 * runtime's update channel.
 */
import { z } from 'zod';

// ─── Content ────────────────────────────────────────────────────

export const textPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const toolUsePartSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string(),
  name: z.string(),
  input: z.record(z.unknown()),
});

export const messageContentSchema = z.union([
  z.string(),
  z.array(z.discriminatedUnion('type', [textPartSchema, toolUsePartSchema])),
]);

export type MessageContent = z.infer<typeof messageContentSchema>;

// ─── Messages ───────────────────────────────────────────────────

export const toolCallSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  args: z.record(z.unknown()),
});

export const humanMessageSchema = z.object({
  type: z.literal('human'),
  id: z.string(),
  content: messageContentSchema,
});

export const aiMessageSchema = z.object({
  type: z.literal('ai'),
  id: z.string(),
  content: messageContentSchema,
  toolCalls: z.array(toolCallSchema),
});

export const toolMessageSchema = z.object({
  type: z.literal('tool'),
  id: z.string(),
  content: messageContentSchema,
  toolCallId: z.string().min(1),
  name: z.string(),
  status: z.enum(['success', 'error']),
});

export const agentMessageSchema = z.discriminatedUnion('type', [
  humanMessageSchema,
  aiMessageSchema,
  toolMessageSchema,
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type HumanMessage = z.infer<typeof humanMessageSchema>;
export type AIMessage = z.infer<typeof aiMessageSchema>;
export type ToolMessage = z.infer<typeof toolMessageSchema>;
export type AgentMessage = z.infer<typeof agentMessageSchema>;

// ─── Helpers ────────────────────────────────────────────────────

/** Drop tool-use parts, keeping text. Strings pass through unchanged. */
export function removeToolUseParts(content: MessageContent): MessageContent {
  if (typeof content === 'string') return content;
  return content.filter((part) => part.type !== 'tool_use');
}

/** Flatten content to its text, ignoring non-text parts. */
export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content
    .map((part) => (part.type === 'text' ? part.text : ''))
    .join('');
}
