/**
 * State schema builder for strongly-typed state management using Zod
 * Supports both simple Zod types and reducer-enabled fields via registry
 */

import { z } from 'zod';
import { Message, messageSchema } from './message-schema';

/**
 * Reducer configuration for a field
 */
export type ReducerConfig<T> = {
  /** Reducer function that merges previous and new values */
  fn(prevValue: T, newValue: T): T;
};

/**
 * Field configuration with optional reducer and default value
 */
export type FieldConfig<T> = {
  reducer?: ReducerConfig<T>;
  default?(): T;
};

/**
 * Registry for field reducers and defaults
 * Stores metadata for how fields should be merged
 */
export class StateRegistry {
  private fieldConfigs = new WeakMap<z.ZodTypeAny, FieldConfig<unknown>>();

  /**
   * Register a field configuration (reducer and/or default)
   */
  registerField<T extends z.ZodTypeAny>(
    schema: T,
    config: FieldConfig<z.infer<T>>
  ): T {
    this.fieldConfigs.set(schema, config);
    return schema;
  }

  /**
   * Get field configuration for a schema
   */
  getConfig(schema: z.ZodTypeAny): FieldConfig<unknown> | undefined {
    return this.fieldConfigs.get(schema);
  }

  /**
   * Check if a schema has a reducer
   */
  hasReducer(schema: z.ZodTypeAny): boolean {
    return !!this.getConfig(schema)?.reducer;
  }

  /**
   * Get the default value for a schema if configured
   */
  getDefault(schema: z.ZodTypeAny): unknown {
    return this.getConfig(schema)?.default?.();
  }
}

export const registry = new StateRegistry();

/**
 * Appends new messages after the existing history
 */
export function appendMessages(
  prev: Message[],
  next: Message[]
): Message[] {
  return [...prev, ...next];
}

/**
 * Fields every workflow state carries.
 * Workflows add their own with `.extend()`; keys outside the shape pass through.
 */
export const baseStateSchema = z
  .object({
    messages: registry.registerField(z.array(messageSchema), {
      reducer: { fn: appendMessages },
      default: () => [],
    }),
    chat_profile: z.string(),
  })
  .passthrough();

export type BaseState = {
  messages: Message[];
  chat_profile: string;
};

/**
 * State threaded through a workflow graph: the base fields plus
 * whatever named fields the workflow adds
 */
export type WorkflowState = BaseState & { [field: string]: unknown };

/**
 * Any schema whose output is a workflow state
 */
export type StateSchema<S = WorkflowState> = z.ZodType<S, z.ZodTypeDef, unknown>;

/**
 * Infer the TypeScript type from a Zod state schema
 */
export type InferState<Schema extends z.ZodTypeAny> = z.infer<Schema>;

/**
 * Create initial state from a Zod schema with default values
 * Applies defaults from registry, then validates with the schema
 */
export function createInitialState<S>(
  schema: StateSchema<S>,
  stateRegistry: StateRegistry = registry,
  overrides: Record<string, unknown> = {}
): S {
  const initialState: Record<string, unknown> = { ...overrides };

  if (schema instanceof z.ZodObject) {
    for (const [key, fieldSchema] of Object.entries(shapeOf(schema))) {
      if (!Object.hasOwn(initialState, key)) {
        const defaultValue = stateRegistry.getDefault(fieldSchema);
        if (defaultValue !== undefined) {
          initialState[key] = defaultValue;
        }
      }
    }
  }

  return schema.parse(initialState);
}

/**
 * Merge state updates using the schema's registered reducers
 * If a field has a reducer, apply it; otherwise the update replaces the value
 */
export function mergeState<S extends Record<string, unknown>>(
  schema: StateSchema<S>,
  stateRegistry: StateRegistry,
  currentState: S,
  updates: Partial<S>
): S {
  const shape: Record<string, z.ZodTypeAny> =
    schema instanceof z.ZodObject ? shapeOf(schema) : {};
  const mergedState: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(currentState)) {
    mergedState[key] = value;
  }

  for (const [key, newValue] of Object.entries(updates)) {
    if (newValue === undefined) continue;

    const fieldSchema = shape[key];
    const config = fieldSchema ? stateRegistry.getConfig(fieldSchema) : undefined;

    if (config?.reducer) {
      let prevValue = mergedState[key];
      if (prevValue === undefined && config.default) {
        prevValue = config.default();
      }
      mergedState[key] = config.reducer.fn(prevValue, newValue);
    } else {
      mergedState[key] = newValue;
    }
  }

  return schema.parse(mergedState);
}

function shapeOf(schema: z.AnyZodObject): Record<string, z.ZodTypeAny> {
  return schema.shape;
}
