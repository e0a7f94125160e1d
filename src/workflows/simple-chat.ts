import { z } from 'zod';
import { START } from '../constants';
import { StateGraph } from '../graph';
import { systemMessage } from '../schema/message-schema';
import {
  InferState,
  WorkflowState,
  baseStateSchema,
  registry,
} from '../schema/state-schema';
import { getDatetimeNow } from '../tools/datetime';
import { ToolNode } from '../tools/tool-node';
import type { NodeContext, NodeStream } from '../types/graph.types';
import { Workflow, WorkflowProfile } from './base-workflow';
import { callChatModel } from './chat-node';
import { ChatSetting } from './chat-settings';

export const SIMPLE_CHAT_SYSTEM_PROMPT = "You're a helpful assistant.";

export const simpleChatStateSchema = baseStateSchema.extend({
  /** Model override picked in the client settings; empty means the default model */
  chat_model: z.string().default(''),
});

export type SimpleChatState = InferState<typeof simpleChatStateSchema>;

/**
 * ChatGPT-like chat: the model answers, calling tools as often as it needs.
 *
 * ```
 * START -> chat -(tool calls)-> tools -> chat
 *               -(no calls)---> END
 * ```
 */
export class SimpleChatWorkflow extends Workflow {
  static readonly profile: WorkflowProfile = {
    name: 'Simple Chat',
    description: 'A ChatGPT-like chatbot.',
    default: true,
  };

  readonly profile = SimpleChatWorkflow.profile;
  readonly stateSchema = simpleChatStateSchema;
  readonly tools = [getDatetimeNow];

  get chatSettings(): ChatSetting[] {
    return [
      {
        type: 'text',
        id: 'chat_model',
        label: 'Chat model',
        description: 'Leave empty to use the default model',
        initial: '',
      },
    ];
  }

  createGraph(): StateGraph<WorkflowState, 'chat' | 'tools'> {
    const toolNode = new ToolNode(this.tools, {
      mode: this.toolDispatch,
      logger: this.logger,
    });

    return new StateGraph<WorkflowState>({ schema: this.stateSchema, registry })
      .addNode({
        id: 'chat',
        action: (state: WorkflowState, context: NodeContext) =>
          this.chat(state, context),
      })
      .addNode({ id: 'tools', action: toolNode.action })
      .addEdge(START, 'chat')
      .addEdge('chat', (state) => this.toolRouting(state))
      .addEdge('tools', 'chat');
  }

  private async *chat(
    state: WorkflowState,
    context: NodeContext
  ): NodeStream<WorkflowState> {
    const reply = yield* callChatModel(this.chatModel, {
      messages: [systemMessage(SIMPLE_CHAT_SYSTEM_PROMPT), ...state.messages],
      tools: this.tools,
      state,
      signal: context.signal,
    });
    return { messages: [reply] };
  }
}
