/**
 * Chat Workflow Engine
 *
 * Resumable conversational workflows: typed message history, graph-driven
 * turns with tool calls, streamed replies and persisted thread state.
 *
 * @packageDocumentation
 */

export { z } from 'zod';

export * from './constants';
export * from './errors';
export * from './logger';
export * from './config';
export * from './app';

// Messages and state
export * from './schema/message-schema';
export * from './schema/state-schema';
export * from './serializer/state-serializer';

// Graph engine
export * from './graph';
export type * from './types/graph.types';
export type * from './types/chat-model.types';
export type * from './types/session.types';

// Tools and workflows
export * from './tools/tool';
export * from './tools/tool-node';
export * from './tools/datetime';
export * from './workflows';

// Services and persistence
export * from './services/graph-service';
export * from './services/session-orchestrator';
export * from './persistence/graph-state-store';
export * from './persistence/memory-store';
export * from './persistence/mongo-store';
