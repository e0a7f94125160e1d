/**
 * Storage interface for persisted workflow state
 * One record per thread, replaced wholesale on every save
 */

import type { SerializedState } from '../serializer/state-serializer';

/**
 * Persisted workflow state of one conversation thread
 */
export interface PersistedGraphRecord {
  /** Conversation thread identifier (primary key) */
  threadId: string;
  /** Registry name of the workflow that produced the state */
  workflow: string;
  /** Stored state document; untrusted until deserialized */
  state: Record<string, unknown>;
  /** When the record was last written */
  updatedAt: Date;
}

/**
 * Abstract graph state store
 * Implement this class to create custom storage backends
 */
export abstract class GraphStateStore {
  /**
   * Load the record for a thread
   * @returns The record or null if the thread was never saved
   */
  abstract get(threadId: string): Promise<PersistedGraphRecord | null>;

  /**
   * Insert the record for a thread, or replace its workflow and state.
   * Must be atomic per thread; concurrent writers resolve last-writer-wins.
   */
  abstract upsert(
    threadId: string,
    workflow: string,
    state: SerializedState
  ): Promise<void>;

  /**
   * Release connections held by the store
   */
  async close(): Promise<void> {}
}
