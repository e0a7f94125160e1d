/**
 * Converts workflow state to and from the plain document kept by a
 * graph state store. Reading never trusts type information from the
 * document beyond the closed message variant set.
 */

import { ZodError } from 'zod';
import { CorruptedStateError, WorkflowEngineError } from '../errors';
import {
  deserializeMessage,
  findOrphanToolMessages,
  SerializedMessage,
  serializeMessage,
} from '../schema/message-schema';
import { StateSchema, WorkflowState } from '../schema/state-schema';

export type SerializedState = {
  messages: SerializedMessage[];
  chat_profile: string;
  [field: string]: unknown;
};

export function serializeState(state: WorkflowState): SerializedState {
  return {
    ...state,
    messages: state.messages.map(serializeMessage),
  };
}

/**
 * Rebuild state from a stored document.
 * Either the whole state is rebuilt or an error is thrown.
 */
export function deserializeState<S extends WorkflowState>(
  raw: unknown,
  schema: StateSchema<S>
): S {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new CorruptedStateError('Persisted state is not an object');
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    fields[key] = value;
  }

  const storedMessages = fields.messages ?? [];
  if (!Array.isArray(storedMessages)) {
    throw new CorruptedStateError('Persisted state messages is not a list');
  }
  const messages = storedMessages.map((record: unknown) =>
    deserializeMessage(record)
  );
  const orphans = findOrphanToolMessages(messages);
  if (orphans.length > 0) {
    throw new CorruptedStateError(
      `Persisted tool messages answer calls never requested: ${orphans
        .map((message) => message.tool_call_id)
        .join(', ')}`
    );
  }
  fields.messages = messages;

  try {
    return schema.parse(fields);
  } catch (error) {
    if (error instanceof WorkflowEngineError) throw error;
    if (error instanceof ZodError) {
      throw new CorruptedStateError(
        `Persisted state does not match the workflow state: ${error.issues
          .map((issue) => `${issue.path.join('.') || '<root>'} ${issue.message}`)
          .join(', ')}`,
        error
      );
    }
    throw error;
  }
}
