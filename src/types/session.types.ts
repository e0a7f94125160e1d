import type { CompiledGraph } from '../graph';
import type { WorkflowState } from '../schema/state-schema';
import type { Workflow } from '../workflows/base-workflow';
import type { ChatSetting } from '../workflows/chat-settings';

/**
 * Everything one active conversation needs between turns.
 * Operations never modify a context; they return a new one.
 */
export type SessionContext = Readonly<{
  threadId: string;
  workflowName: string;
  workflow: Workflow;
  graph: CompiledGraph<WorkflowState>;
  state: WorkflowState;
  /** Settings as shown to the client */
  settings: ChatSetting[];
}>;

/**
 * Events of one turn, in order: at most one open/close pair around the
 * streamed tokens, then `turn_complete`
 */
export type TurnEvent =
  | { type: 'message_open'; content: string }
  | { type: 'message_token'; delta: string }
  | { type: 'message_close'; content: string }
  | { type: 'turn_complete'; context: SessionContext };

export type TurnOptions = {
  /** Abort to cancel the turn; its partial output is discarded */
  signal?: AbortSignal;
};

/**
 * Outbound side of the client connection
 */
export interface ClientTransport {
  /** Start a new assistant message with its first token */
  openMessage(content: string): void | Promise<void>;
  appendToken(delta: string): void | Promise<void>;
  /** The assistant message is complete */
  closeMessage(content: string): void | Promise<void>;
}
