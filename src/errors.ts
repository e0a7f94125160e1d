/**
 * Error taxonomy for the workflow engine.
 * Every error carries a stable `code` that hosts can switch on.
 */

export type WorkflowErrorCode =
  | 'UNREGISTERED_WORKFLOW'
  | 'UNKNOWN_TOOL'
  | 'TOOL_DISPATCH_FAILED'
  | 'TOOL_EXECUTION_FAILED'
  | 'DUPLICATE_TOOL'
  | 'UNKNOWN_MESSAGE_VARIANT'
  | 'CORRUPTED_STATE'
  | 'MODEL_INVOCATION_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'INVALID_GRAPH'
  | 'GRAPH_RECURSION_LIMIT'
  | 'TURN_CANCELLED'
  | 'SESSION_BUSY'
  | 'INVALID_SETTINGS'
  | 'INVALID_CONFIGURATION';

export class WorkflowEngineError extends Error {
  readonly code: WorkflowErrorCode;

  constructor(code: WorkflowErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnregisteredWorkflowError extends WorkflowEngineError {
  constructor(readonly workflowName: string) {
    super('UNREGISTERED_WORKFLOW', `Workflow '${workflowName}' is not registered`);
  }
}

export class UnknownToolError extends WorkflowEngineError {
  constructor(
    readonly toolName: string,
    readonly toolCallId: string
  ) {
    super(
      'UNKNOWN_TOOL',
      `Tool call ${toolCallId} requested unknown tool '${toolName}'`
    );
  }
}

export class ToolDispatchError extends WorkflowEngineError {
  constructor(message: string) {
    super('TOOL_DISPATCH_FAILED', message);
  }
}

export class ToolExecutionError extends WorkflowEngineError {
  constructor(
    readonly toolName: string,
    readonly toolCallId: string,
    cause: unknown
  ) {
    super(
      'TOOL_EXECUTION_FAILED',
      `Tool '${toolName}' failed for call ${toolCallId}: ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class DuplicateToolError extends WorkflowEngineError {
  constructor(readonly toolName: string) {
    super('DUPLICATE_TOOL', `Tool '${toolName}' is declared more than once`);
  }
}

export class UnknownMessageVariantError extends WorkflowEngineError {
  constructor(readonly tag: unknown) {
    super(
      'UNKNOWN_MESSAGE_VARIANT',
      `Unknown message variant: ${JSON.stringify(tag) ?? String(tag)}`
    );
  }
}

export class CorruptedStateError extends WorkflowEngineError {
  constructor(message: string, cause?: unknown) {
    super('CORRUPTED_STATE', message, { cause });
  }
}

export class ModelInvocationError extends WorkflowEngineError {
  constructor(message: string, cause?: unknown) {
    super('MODEL_INVOCATION_FAILED', message, { cause });
  }
}

export class PersistenceError extends WorkflowEngineError {
  constructor(
    readonly operation: 'connect' | 'get' | 'upsert',
    readonly threadId: string | null,
    cause?: unknown
  ) {
    super(
      'PERSISTENCE_FAILED',
      threadId === null
        ? `Graph state store failed to ${operation}: ${describeCause(cause)}`
        : `Graph state store failed to ${operation} thread ${threadId}: ${describeCause(cause)}`,
      { cause }
    );
  }
}

export class GraphValidationError extends WorkflowEngineError {
  constructor(message: string) {
    super('INVALID_GRAPH', message);
  }
}

export class GraphRecursionError extends WorkflowEngineError {
  constructor(readonly limit: number) {
    super(
      'GRAPH_RECURSION_LIMIT',
      `Graph run exceeded ${limit} steps without reaching an end`
    );
  }
}

export class TurnCancelledError extends WorkflowEngineError {
  constructor(cause?: unknown) {
    super('TURN_CANCELLED', 'Turn was cancelled', { cause });
  }
}

export class SessionBusyError extends WorkflowEngineError {
  constructor(readonly threadId: string) {
    super('SESSION_BUSY', `Thread ${threadId} already has a turn in flight`);
  }
}

export class InvalidSettingsError extends WorkflowEngineError {
  constructor(readonly issues: string[]) {
    super('INVALID_SETTINGS', `Invalid settings: ${issues.join('; ')}`);
  }
}

export class ConfigurationError extends WorkflowEngineError {
  constructor(readonly issues: string[]) {
    super(
      'INVALID_CONFIGURATION',
      `Invalid environment configuration:\n  ${issues.join('\n  ')}`
    );
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return cause === undefined ? 'unknown error' : String(cause);
}
