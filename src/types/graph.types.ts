import { START, END } from '../constants';

/**
 * Context handed to every node action
 */
export type NodeContext = {
  /** ID of the node being executed */
  nodeId: string;
  /** Aborted when the caller cancels the run */
  signal: AbortSignal;
};

/**
 * A partial state returned by a node, merged with the schema's reducers
 */
export type NodeUpdate<S> = Partial<S>;

/**
 * Incremental output yielded by a streaming node
 */
export type TokenEmission = {
  delta: string;
};

/**
 * A node that streams tokens while it runs and returns its update at the end
 */
export type NodeStream<S> = AsyncGenerator<
  TokenEmission,
  NodeUpdate<S>,
  undefined
>;

export type NodeResult<S> = NodeUpdate<S> | Promise<NodeUpdate<S>> | NodeStream<S>;

export type NodeAction<S> = (state: S, context: NodeContext) => NodeResult<S>;

export type Node<S, Id extends string = string> = {
  id: Id;
  /** Work done when the graph enters this node */
  action: NodeAction<S>;
};

/**
 * Conditional edge: picks the next node from the current state.
 * Must be pure and must not throw.
 */
export type Router<S, Id extends string = string> = (state: S) => Id | typeof END;

export type EdgeFrom<Id extends string> = Id | typeof START;

export type EdgeTo<S, Id extends string> = Id | Router<S, Id> | typeof END;

export type CompileOptions = {
  /** Maximum node executions in one run */
  maxSteps?: number;
};

export type StreamOptions = {
  signal?: AbortSignal;
};

/**
 * Events produced while a compiled graph runs
 */
export type GraphEvent<S> =
  | { event: 'node_start'; node: string; step: number }
  | { event: 'token'; node: string; delta: string }
  | { event: 'node_end'; node: string; update: NodeUpdate<S> }
  | { event: 'graph_end'; state: S; steps: number };
