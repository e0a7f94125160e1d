/**
 * MongoDB graph state store
 * One document per thread, keyed by `_id = threadId`
 */

import { Collection, MongoClient } from 'mongodb';
import { PersistenceError } from '../errors';
import { defaultLogger, Logger } from '../logger';
import type { SerializedState } from '../serializer/state-serializer';
import { GraphStateStore, PersistedGraphRecord } from './graph-state-store';

/**
 * MongoDB configuration options
 */
export interface MongoStoreOptions {
  /** MongoDB connection URI */
  uri: string;
  /** Database name */
  database: string;
  /** Collection name for graph states (defaults to 'graph_states') */
  collection?: string;
  logger?: Logger;
}

/**
 * Shape of a stored document
 */
export interface GraphStateDocument {
  _id: string;
  workflow: string;
  state: Record<string, unknown>;
  updatedAt: Date;
}

export class MongoGraphStateStore extends GraphStateStore {
  private client: MongoClient | null = null;
  private collection: Collection<GraphStateDocument> | null = null;
  private readonly options: Required<Omit<MongoStoreOptions, 'logger'>>;
  private readonly logger: Logger;

  constructor(options: MongoStoreOptions) {
    super();
    this.options = {
      uri: options.uri,
      database: options.database,
      collection: options.collection || 'graph_states',
    };
    this.logger = options.logger ?? defaultLogger;
  }

  get isConnected(): boolean {
    return this.collection !== null;
  }

  /**
   * Connect to MongoDB
   * Must be called before using the store
   */
  async connect(): Promise<void> {
    if (this.collection) {
      return;
    }

    const client = new MongoClient(this.options.uri);
    try {
      await client.connect();
    } catch (error) {
      throw new PersistenceError('connect', null, error);
    }

    this.client = client;
    this.collection = client
      .db(this.options.database)
      .collection<GraphStateDocument>(this.options.collection);
    this.logger.info(
      `[store] connected to MongoDB ${this.options.database}.${this.options.collection}`
    );
  }

  /**
   * Disconnect from MongoDB
   */
  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.collection = null;
    }
  }

  async get(threadId: string): Promise<PersistedGraphRecord | null> {
    const collection = this.requireCollection('get', threadId);

    const doc = await collection.findOne({ _id: threadId });
    if (!doc) {
      return null;
    }

    return {
      threadId: doc._id,
      workflow: doc.workflow,
      state: doc.state,
      updatedAt: doc.updatedAt,
    };
  }

  async upsert(
    threadId: string,
    workflow: string,
    state: SerializedState
  ): Promise<void> {
    const collection = this.requireCollection('upsert', threadId);

    await collection.updateOne(
      { _id: threadId },
      { $set: { workflow, state, updatedAt: new Date() } },
      { upsert: true }
    );
  }

  private requireCollection(
    operation: 'get' | 'upsert',
    threadId: string
  ): Collection<GraphStateDocument> {
    if (!this.collection) {
      throw new PersistenceError(
        operation,
        threadId,
        new Error('MongoGraphStateStore is not connected. Call connect() first.')
      );
    }
    return this.collection;
  }
}
