/**
 * In-memory graph state store for development and testing
 * Data is lost when the process ends
 */

import type { SerializedState } from '../serializer/state-serializer';
import { GraphStateStore, PersistedGraphRecord } from './graph-state-store';

export class MemoryGraphStateStore extends GraphStateStore {
  private storage: Map<string, PersistedGraphRecord> = new Map();

  async get(threadId: string): Promise<PersistedGraphRecord | null> {
    const record = this.storage.get(threadId);
    if (!record) return null;
    // Hand out copies so callers never alias stored documents
    return {
      ...record,
      state: structuredClone(record.state),
      updatedAt: new Date(record.updatedAt),
    };
  }

  async upsert(
    threadId: string,
    workflow: string,
    state: SerializedState
  ): Promise<void> {
    this.storage.set(threadId, {
      threadId,
      workflow,
      state: structuredClone(state),
      updatedAt: new Date(),
    });
  }

  /**
   * Clear all data (useful for testing)
   */
  clearAll(): void {
    this.storage.clear();
  }

  /**
   * Get all thread IDs in storage (useful for debugging)
   */
  getAllThreadIds(): string[] {
    return Array.from(this.storage.keys());
  }
}
