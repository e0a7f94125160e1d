import type { AIMessage, Message } from '../schema/message-schema';
import type { WorkflowState } from '../schema/state-schema';
import type { Tool } from '../tools/tool';

/**
 * What a workflow hands the chat model for one call
 */
export type ChatModelRequest = {
  /** Full prompt: system preamble followed by the conversation history */
  messages: readonly Message[];
  /** Tools the model may request */
  tools: readonly Tool[];
  /** Current workflow state, for models that read workflow settings */
  state: Readonly<WorkflowState>;
  signal: AbortSignal;
};

export type ChatModelChunk =
  | { type: 'token'; delta: string }
  | { type: 'message'; message: AIMessage };

/**
 * Chat model collaborator.
 * `stream` is optional; when present it must end with exactly one `message` chunk.
 */
export interface ChatModel {
  invoke(request: ChatModelRequest): Promise<AIMessage>;
  stream?(request: ChatModelRequest): AsyncIterable<ChatModelChunk>;
}
