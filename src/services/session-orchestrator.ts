/**
 * Drives conversations: start, streamed turns, settings, save and resume.
 *
 * Session state lives in {@link SessionContext} values that the host keeps
 * between calls (typically in a map keyed by thread id). The orchestrator
 * only remembers which threads have a turn in flight.
 */

import {
  GraphValidationError,
  InvalidSettingsError,
  PersistenceError,
  SessionBusyError,
  TurnCancelledError,
} from '../errors';
import { defaultLogger, Logger } from '../logger';
import type { PersistedGraphRecord } from '../persistence/graph-state-store';
import { GraphStateStore } from '../persistence/graph-state-store';
import type { WorkflowState } from '../schema/state-schema';
import { deserializeState, serializeState } from '../serializer/state-serializer';
import type {
  ClientTransport,
  SessionContext,
  TurnEvent,
  TurnOptions,
} from '../types/session.types';
import type { WorkflowProfile } from '../workflows/base-workflow';
import { withInitialValue } from '../workflows/chat-settings';
import { GraphService } from './graph-service';

/** State fields owned by the engine; settings updates never touch them */
const RESERVED_FIELDS = new Set(['messages', 'chat_profile']);

export type SessionOrchestratorOptions = {
  graphService: GraphService;
  store: GraphStateStore;
  logger?: Logger;
  /**
   * Reject settings updates for undeclared settings or values of the
   * wrong type, instead of ignoring unknown keys
   */
  strictSettings?: boolean;
  /** Workflow flagged as default in {@link SessionOrchestrator.listWorkflows} */
  defaultWorkflow?: string;
};

export class SessionOrchestrator {
  private readonly graphService: GraphService;
  private readonly store: GraphStateStore;
  private readonly logger: Logger;
  private readonly strictSettings: boolean;
  private readonly defaultWorkflow?: string;
  private readonly activeTurns = new Set<string>();

  constructor(options: SessionOrchestratorOptions) {
    this.graphService = options.graphService;
    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
    this.strictSettings = options.strictSettings ?? false;
    this.defaultWorkflow = options.defaultWorkflow;
  }

  /**
   * Workflows the client can pick from when a conversation starts
   */
  listWorkflows(): WorkflowProfile[] {
    return this.graphService.listProfiles(this.defaultWorkflow);
  }

  /**
   * Begin a conversation with a fresh state of the chosen workflow
   */
  start(threadId: string, workflowName: string): SessionContext {
    const { workflow, graph } = this.graphService.compile(workflowName);
    const state = this.graphService.createNewState(workflowName);

    this.logger.info(`[session ${threadId}] started '${workflowName}'`);
    return {
      threadId,
      workflowName,
      workflow,
      graph,
      state,
      settings: workflow.resolveChatSettings(state),
    };
  }

  /**
   * Run one turn for `text`, yielding the reply as it streams.
   * The final event carries the updated context. If the turn fails or is
   * cancelled, `context` still holds the pre-turn state.
   */
  async *streamTurn(
    context: SessionContext,
    text: string,
    options: TurnOptions = {}
  ): AsyncGenerator<TurnEvent, SessionContext, undefined> {
    const { threadId } = context;
    if (this.activeTurns.has(threadId)) {
      throw new SessionBusyError(threadId);
    }
    this.activeTurns.add(threadId);
    this.logger.debug(`[session ${threadId}] turn started`);

    try {
      const input: WorkflowState = {
        ...context.state,
        messages: [...context.state.messages, context.workflow.formatMessage(text)],
      };

      let content = '';
      let opened = false;
      let finalState: WorkflowState | undefined;

      for await (const event of context.graph.stream(input, options)) {
        if (event.event === 'token' && event.delta) {
          content += event.delta;
          if (opened) {
            yield { type: 'message_token', delta: event.delta };
          } else {
            opened = true;
            yield { type: 'message_open', content: event.delta };
          }
        } else if (event.event === 'graph_end') {
          finalState = event.state;
        }
      }

      if (!finalState) {
        throw new GraphValidationError('Graph run ended without a final state');
      }
      if (opened) {
        yield { type: 'message_close', content };
      }

      const next: SessionContext = { ...context, state: finalState };
      this.logger.debug(
        `[session ${threadId}] turn complete (${finalState.messages.length} messages)`
      );
      yield { type: 'turn_complete', context: next };
      return next;
    } catch (error) {
      if (error instanceof TurnCancelledError) {
        this.logger.info(`[session ${threadId}] turn cancelled`);
      } else {
        this.logger.error(`[session ${threadId}] turn failed:`, error);
      }
      throw error;
    } finally {
      this.activeTurns.delete(threadId);
    }
  }

  /**
   * Run one turn, relaying the streamed reply to `transport`
   *
   * @returns The context after the turn
   */
  async handleMessage(
    context: SessionContext,
    text: string,
    transport: ClientTransport,
    options: TurnOptions = {}
  ): Promise<SessionContext> {
    let next = context;
    for await (const event of this.streamTurn(context, text, options)) {
      switch (event.type) {
        case 'message_open':
          await transport.openMessage(event.content);
          break;
        case 'message_token':
          await transport.appendToken(event.delta);
          break;
        case 'message_close':
          await transport.closeMessage(event.content);
          break;
        case 'turn_complete':
          next = event.context;
          break;
      }
    }
    return next;
  }

  /**
   * Apply settings chosen by the client. Keys that are not fields of the
   * state are ignored unless `strictSettings` is on.
   */
  updateSettings(
    context: SessionContext,
    values: Readonly<Record<string, unknown>>
  ): SessionContext {
    if (this.strictSettings) {
      this.validateSettings(context, values);
    }

    const updated: Record<string, unknown> = { ...context.state };
    for (const [key, value] of Object.entries(values)) {
      if (RESERVED_FIELDS.has(key) || !Object.hasOwn(updated, key)) {
        this.logger.debug(`[session ${context.threadId}] ignoring setting '${key}'`);
        continue;
      }
      updated[key] = value;
    }

    const parsed = context.workflow.stateSchema.safeParse(updated);
    if (!parsed.success) {
      throw new InvalidSettingsError(
        parsed.error.issues.map(
          (issue) => `${issue.path.join('.')}: ${issue.message}`
        )
      );
    }

    return {
      ...context,
      state: parsed.data,
      settings: context.workflow.resolveChatSettings(parsed.data),
    };
  }

  /**
   * Persist the conversation so it can be resumed later.
   * Rejects with {@link PersistenceError} if the store fails.
   */
  async end(context: SessionContext): Promise<void> {
    const serialized = serializeState(context.state);
    try {
      await this.store.upsert(context.threadId, context.workflowName, serialized);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('upsert', context.threadId, error);
    }
    this.logger.info(
      `[session ${context.threadId}] saved state (${context.state.messages.length} messages)`
    );
  }

  /**
   * Rebuild a conversation from its persisted record
   *
   * @returns The context, or null when the thread has never been saved
   */
  async resume(threadId: string): Promise<SessionContext | null> {
    let record: PersistedGraphRecord | null;
    try {
      record = await this.store.get(threadId);
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError('get', threadId, error);
    }

    if (!record) {
      this.logger.info(`[session ${threadId}] nothing to resume`);
      return null;
    }

    const { workflow, graph } = this.graphService.compile(record.workflow);
    const state = deserializeState(record.state, workflow.stateSchema);

    this.logger.info(
      `[session ${threadId}] resumed '${record.workflow}' (${state.messages.length} messages)`
    );
    return {
      threadId,
      workflowName: record.workflow,
      workflow,
      graph,
      state,
      settings: workflow.resolveChatSettings(state),
    };
  }

  /** Whether a turn is currently running for the thread */
  isBusy(threadId: string): boolean {
    return this.activeTurns.has(threadId);
  }

  private validateSettings(
    context: SessionContext,
    values: Readonly<Record<string, unknown>>
  ): void {
    const declared = new Map(
      context.workflow.chatSettings.map((setting) => [setting.id, setting])
    );
    const issues: string[] = [];

    for (const [key, value] of Object.entries(values)) {
      const setting = declared.get(key);
      if (!setting) {
        issues.push(`'${key}' is not a setting of '${context.workflowName}'`);
      } else if (!withInitialValue(setting, value)) {
        issues.push(`'${key}' does not accept ${JSON.stringify(value)}`);
      }
    }

    if (issues.length > 0) {
      throw new InvalidSettingsError(issues);
    }
  }
}
