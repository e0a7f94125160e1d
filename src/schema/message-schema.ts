/**
 * Conversation messages as a closed, tagged union.
 *
 * Messages live in state as plain objects, so they can be stored as-is.
 * Reading them back goes through {@link deserializeMessage}, which only ever
 * builds one of the four variants below and rejects any other tag.
 */

import { z } from 'zod';
import { MESSAGE_TYPES } from '../constants';
import { CorruptedStateError, UnknownMessageVariantError } from '../errors';

export type MessageType = (typeof MESSAGE_TYPES)[number];

export const toolCallSchema = z.object({
  /** Correlation id, echoed back by the matching tool message */
  id: z.string().min(1),
  name: z.string().min(1),
  args: z.record(z.unknown()),
});

const baseMessageShape = {
  content: z.string(),
  id: z.string().optional(),
  name: z.string().optional(),
};

export const systemMessageSchema = z.object({
  type: z.literal('system'),
  ...baseMessageShape,
});

export const humanMessageSchema = z.object({
  type: z.literal('human'),
  ...baseMessageShape,
});

export const aiMessageSchema = z.object({
  type: z.literal('ai'),
  ...baseMessageShape,
  tool_calls: z.array(toolCallSchema).default([]),
});

export const toolMessageSchema = z.object({
  type: z.literal('tool'),
  ...baseMessageShape,
  tool_call_id: z.string().min(1),
});

export const messageSchema = z.discriminatedUnion('type', [
  systemMessageSchema,
  humanMessageSchema,
  aiMessageSchema,
  toolMessageSchema,
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type SystemMessage = z.infer<typeof systemMessageSchema>;
export type HumanMessage = z.infer<typeof humanMessageSchema>;
export type AIMessage = z.infer<typeof aiMessageSchema>;
export type ToolMessage = z.infer<typeof toolMessageSchema>;
export type Message = z.infer<typeof messageSchema>;

/** Plain, storage-safe form of a message */
export type SerializedMessage = z.input<typeof messageSchema>;

type MessageFields = { id?: string; name?: string };

export function systemMessage(
  content: string,
  fields: MessageFields = {}
): SystemMessage {
  return { type: 'system', content, ...fields };
}

export function humanMessage(
  content: string,
  fields: MessageFields = {}
): HumanMessage {
  return { type: 'human', content, ...fields };
}

export function aiMessage(
  content: string,
  fields: MessageFields & { tool_calls?: ToolCall[] } = {}
): AIMessage {
  const { tool_calls = [], ...rest } = fields;
  return { type: 'ai', content, tool_calls, ...rest };
}

export function toolMessage(
  content: string,
  toolCallId: string,
  fields: MessageFields = {}
): ToolMessage {
  return { type: 'tool', content, tool_call_id: toolCallId, ...fields };
}

export function isAIMessage(message: Message | undefined): message is AIMessage {
  return message?.type === 'ai';
}

/** Whether the message is an AI message requesting at least one tool call */
export function hasToolCalls(message: Message | undefined): message is AIMessage {
  return isAIMessage(message) && message.tool_calls.length > 0;
}

export function isMessageType(tag: unknown): tag is MessageType {
  return MESSAGE_TYPES.some((type) => type === tag);
}

export function serializeMessage(message: Message): SerializedMessage {
  switch (message.type) {
    case 'system':
    case 'human':
      return { ...message };
    case 'ai':
      return {
        ...message,
        tool_calls: message.tool_calls.map((call) => ({
          ...call,
          args: structuredClone(call.args),
        })),
      };
    case 'tool':
      return { ...message };
    default: {
      const unhandled: never = message;
      throw new UnknownMessageVariantError(unhandled);
    }
  }
}

/**
 * Rebuild a message from untrusted data.
 * The tag is checked against the closed variant set before anything is parsed.
 */
export function deserializeMessage(record: unknown): Message {
  if (typeof record !== 'object' || record === null || Array.isArray(record)) {
    throw new UnknownMessageVariantError(record);
  }
  const tag: unknown = Reflect.get(record, 'type');
  if (!isMessageType(tag)) {
    throw new UnknownMessageVariantError(tag);
  }

  const parsed = messageSchema.safeParse(record);
  if (!parsed.success) {
    throw new CorruptedStateError(
      `Malformed '${tag}' message: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
        .join(', ')}`,
      parsed.error
    );
  }
  return parsed.data;
}

/**
 * Tool messages whose call id was not emitted by an earlier AI message
 */
export function findOrphanToolMessages(
  messages: readonly Message[]
): ToolMessage[] {
  const requested = new Set<string>();
  const orphans: ToolMessage[] = [];

  for (const message of messages) {
    if (message.type === 'ai') {
      for (const call of message.tool_calls) requested.add(call.id);
    } else if (message.type === 'tool' && !requested.has(message.tool_call_id)) {
      orphans.push(message);
    }
  }
  return orphans;
}
