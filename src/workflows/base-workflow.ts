import { END } from '../constants';
import type { StateGraph } from '../graph';
import { defaultLogger, Logger } from '../logger';
import {
  HumanMessage,
  hasToolCalls,
  humanMessage,
} from '../schema/message-schema';
import {
  BaseState,
  StateSchema,
  WorkflowState,
  createInitialState,
  registry,
} from '../schema/state-schema';
import type { ChatModel } from '../types/chat-model.types';
import type { Tool } from '../tools/tool';
import type { ToolDispatchMode } from '../tools/tool-node';
import { ChatSetting, resumeSettings } from './chat-settings';

/**
 * How a workflow is presented in the client's selection menu
 */
export type WorkflowProfile = {
  /** Registry key; stored with every persisted thread */
  name: string;
  description: string;
  icon?: string;
  default?: boolean;
};

/**
 * Collaborators a workflow needs at construction time
 */
export type WorkflowDependencies = {
  chatModel: ChatModel;
  logger?: Logger;
  /** How the tool node runs several calls from one AI message */
  toolDispatch?: ToolDispatchMode;
};

/**
 * A workflow class, as registered with the {@link WorkflowRegistry}
 */
export interface WorkflowConstructor {
  readonly profile: WorkflowProfile;
  new (dependencies: WorkflowDependencies): Workflow;
}

export type ToolRoute = 'tools' | typeof END;

/**
 * Base class for conversation workflows.
 *
 * A workflow owns its state shape, the graph that runs one turn, and the
 * settings it shows to the client.
 */
export abstract class Workflow {
  protected readonly chatModel: ChatModel;
  protected readonly logger: Logger;
  protected readonly toolDispatch: ToolDispatchMode;

  constructor(dependencies: WorkflowDependencies) {
    this.chatModel = dependencies.chatModel;
    this.logger = dependencies.logger ?? defaultLogger;
    this.toolDispatch = dependencies.toolDispatch ?? 'sequential';
  }

  abstract readonly profile: WorkflowProfile;

  /** Schema of this workflow's state, usually `baseStateSchema.extend(...)` */
  abstract readonly stateSchema: StateSchema<WorkflowState>;

  /** Tools the model may call */
  abstract readonly tools: readonly Tool[];

  /** Declared settings with their default values */
  abstract get chatSettings(): ChatSetting[];

  abstract createGraph(): StateGraph<WorkflowState, string>;

  get name(): string {
    return this.profile.name;
  }

  /**
   * Fresh state: empty history, `chat_profile` set to this workflow,
   * every other field at its schema default
   */
  createDefaultState(): WorkflowState {
    return createInitialState(this.stateSchema, registry, {
      messages: [],
      chat_profile: this.name,
    });
  }

  formatMessage(text: string): HumanMessage {
    return humanMessage(text);
  }

  /**
   * Route to `tools` when the last message asks for tool calls; end otherwise
   */
  toolRouting(state: Pick<BaseState, 'messages'>): ToolRoute {
    const messages = state.messages ?? [];
    const last = messages.length > 0 ? messages[messages.length - 1] : undefined;
    return hasToolCalls(last) ? 'tools' : END;
  }

  /**
   * Settings to show the client; values found in `state` replace the defaults
   */
  resolveChatSettings(state?: Readonly<Record<string, unknown>>): ChatSetting[] {
    return resumeSettings(this.chatSettings, state);
  }
}
