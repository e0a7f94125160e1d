import type {
  CompileOptions,
  EdgeFrom,
  EdgeTo,
  GraphEvent,
  Node,
  NodeResult,
  NodeStream,
  NodeUpdate,
  StreamOptions,
} from './types/graph.types';

import { START, END, DEFAULT_MAX_STEPS } from './constants';
import {
  GraphRecursionError,
  GraphValidationError,
  TurnCancelledError,
} from './errors';
import {
  StateSchema,
  StateRegistry,
  mergeState,
  registry as defaultRegistry,
} from './schema/state-schema';

/**
 * Typed graph builder over a Zod state schema
 *
 * @example
 * ```typescript
 * const graph = new StateGraph({ schema: baseStateSchema })
 *   .addNode({ id: 'chat', action: chatNode })
 *   .addNode({ id: 'tools', action: toolNode.action })
 *   .addEdge(START, 'chat')
 *   .addEdge('chat', (state) => (hasToolCalls(state.messages.at(-1)) ? 'tools' : END))
 *   .addEdge('tools', 'chat')
 *   .compile();
 * ```
 */
export class StateGraph<
  S extends Record<string, unknown>,
  Nodes extends string = never,
> {
  private readonly schema: StateSchema<S>;
  private readonly registry: StateRegistry;
  private readonly nodes = new Map<string, Node<S>>();
  private readonly edges = new Map<string, EdgeTo<S, string>>();

  constructor({
    schema,
    registry,
  }: {
    schema: StateSchema<S>;
    registry?: StateRegistry;
  }) {
    this.schema = schema;
    this.registry = registry ?? defaultRegistry;
  }

  /**
   * Adds a node to the graph
   *
   * @returns The builder, now aware of the new node ID
   */
  addNode<const Id extends string>(node: Node<S, Id>): StateGraph<S, Nodes | Id> {
    if (node.id === START || node.id === END) {
      throw new GraphValidationError(`Node ID '${node.id}' is reserved`);
    }
    if (this.nodes.has(node.id)) {
      throw new GraphValidationError(`Node '${node.id}' is already defined`);
    }
    this.nodes.set(node.id, node);
    return this;
  }

  /**
   * Adds an edge out of a node (or START). `to` is either a fixed target
   * or a router picking the target from state.
   * Each node has at most one outgoing edge; a node without one ends the run.
   */
  addEdge(from: EdgeFrom<Nodes>, to: EdgeTo<S, Nodes>): this {
    if (this.edges.has(from)) {
      throw new GraphValidationError(`Node '${from}' already has an outgoing edge`);
    }
    this.edges.set(from, to);
    return this;
  }

  /** Shorthand for `addEdge(START, id)` */
  setEntryPoint(id: Nodes): this {
    return this.addEdge(START, id);
  }

  /**
   * Validate the structure and produce an executable graph
   */
  compile(options: CompileOptions = {}): CompiledGraph<S> {
    if (!this.edges.has(START)) {
      throw new GraphValidationError(
        'Graph has no entry point: add an edge from START'
      );
    }

    for (const [from, to] of this.edges) {
      if (from !== START && !this.nodes.has(from)) {
        throw new GraphValidationError(`Edge starts at unknown node '${from}'`);
      }
      if (typeof to === 'string' && to !== END && !this.nodes.has(to)) {
        throw new GraphValidationError(`Edge from '${from}' targets unknown node '${to}'`);
      }
    }

    return new CompiledGraph<S>({
      schema: this.schema,
      registry: this.registry,
      nodes: new Map(this.nodes),
      edges: new Map(this.edges),
      maxSteps: options.maxSteps ?? DEFAULT_MAX_STEPS,
    });
  }
}

/**
 * Executable graph. Holds no run state, so one instance can serve
 * any number of runs.
 */
export class CompiledGraph<S extends Record<string, unknown>> {
  private readonly schema: StateSchema<S>;
  private readonly registry: StateRegistry;
  private readonly nodes: ReadonlyMap<string, Node<S>>;
  private readonly edges: ReadonlyMap<string, EdgeTo<S, string>>;
  readonly maxSteps: number;

  constructor(config: {
    schema: StateSchema<S>;
    registry: StateRegistry;
    nodes: ReadonlyMap<string, Node<S>>;
    edges: ReadonlyMap<string, EdgeTo<S, string>>;
    maxSteps: number;
  }) {
    this.schema = config.schema;
    this.registry = config.registry;
    this.nodes = config.nodes;
    this.edges = config.edges;
    this.maxSteps = config.maxSteps;
  }

  get nodeIds(): string[] {
    return [...this.nodes.keys()];
  }

  /**
   * Edges as declared; routers are reported as conditional
   */
  describeEdges(): Array<{ from: string; to: string | null; conditional: boolean }> {
    return [...this.edges].map(([from, to]) =>
      typeof to === 'function'
        ? { from, to: null, conditional: true }
        : { from, to, conditional: false }
    );
  }

  /**
   * Run the graph from its entry point, yielding events as nodes execute.
   * Closing the iterator or aborting `signal` stops the run at the next
   * suspension point; the input state is never modified.
   */
  async *stream(
    input: S,
    options: StreamOptions = {}
  ): AsyncGenerator<GraphEvent<S>, S, undefined> {
    const signal = options.signal ?? new AbortController().signal;
    let state = input;
    let steps = 0;
    let current = this.resolveNext(START, state);

    while (current !== END) {
      throwIfCancelled(signal);
      if (steps >= this.maxSteps) {
        throw new GraphRecursionError(this.maxSteps);
      }

      const node = this.nodes.get(current);
      if (!node) {
        throw new GraphValidationError(`Router selected unknown node '${current}'`);
      }

      steps += 1;
      yield { event: 'node_start', node: node.id, step: steps };

      const result = node.action(state, { nodeId: node.id, signal });
      const update = yield* this.drainNode(result, node.id, signal);

      state = mergeState(this.schema, this.registry, state, update);
      yield { event: 'node_end', node: node.id, update };

      current = this.resolveNext(node.id, state);
    }

    yield { event: 'graph_end', state, steps };
    return state;
  }

  /**
   * Run the graph to completion and return the final state
   */
  async invoke(input: S, options: StreamOptions = {}): Promise<S> {
    let finalState = input;
    for await (const event of this.stream(input, options)) {
      if (event.event === 'graph_end') finalState = event.state;
    }
    return finalState;
  }

  private async *drainNode(
    result: NodeResult<S>,
    nodeId: string,
    signal: AbortSignal
  ): AsyncGenerator<GraphEvent<S>, NodeUpdate<S>, undefined> {
    if (!isNodeStream(result)) {
      const update = await result;
      throwIfCancelled(signal);
      return update;
    }

    try {
      for (;;) {
        const next = await result.next();
        throwIfCancelled(signal);
        if (next.done) return next.value;
        yield { event: 'token', node: nodeId, delta: next.value.delta };
      }
    } finally {
      await result.return({});
    }
  }

  private resolveNext(from: string, state: S): string {
    const to = this.edges.get(from);
    if (to === undefined) return END;
    return typeof to === 'function' ? to(state) : to;
  }
}

function isNodeStream<S>(result: NodeResult<S>): result is NodeStream<S> {
  return (
    typeof result === 'object' &&
    result !== null &&
    Symbol.asyncIterator in result
  );
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new TurnCancelledError(signal.reason);
  }
}
