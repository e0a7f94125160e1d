/**
 * Graph node that runs the tool calls requested by the latest AI message
 */

import type { NodeContext } from '../types/graph.types';
import {
  DuplicateToolError,
  ToolDispatchError,
  ToolExecutionError,
  UnknownToolError,
} from '../errors';
import { defaultLogger, Logger } from '../logger';
import {
  Message,
  ToolCall,
  ToolMessage,
  hasToolCalls,
  toolMessage,
} from '../schema/message-schema';
import { Tool } from './tool';

export type ToolDispatchMode = 'sequential' | 'parallel';

export type ToolNodeOptions = {
  /** `parallel` starts every call at once; results keep call order either way */
  mode?: ToolDispatchMode;
  logger?: Logger;
};

export class ToolNode {
  private readonly toolsByName = new Map<string, Tool>();
  private readonly mode: ToolDispatchMode;
  private readonly logger: Logger;

  constructor(tools: readonly Tool[], options: ToolNodeOptions = {}) {
    for (const tool of tools) {
      if (this.toolsByName.has(tool.name)) {
        throw new DuplicateToolError(tool.name);
      }
      this.toolsByName.set(tool.name, tool);
    }
    this.mode = options.mode ?? 'sequential';
    this.logger = options.logger ?? defaultLogger;
  }

  get toolNames(): string[] {
    return [...this.toolsByName.keys()];
  }

  /**
   * Node action bound to this dispatcher
   */
  readonly action = (
    state: { messages: readonly Message[] },
    context: NodeContext
  ): Promise<{ messages: ToolMessage[] }> => this.invoke(state, context);

  async invoke(
    state: { messages: readonly Message[] },
    context: NodeContext
  ): Promise<{ messages: ToolMessage[] }> {
    const { messages } = state;
    if (messages.length === 0) {
      throw new ToolDispatchError('No messages found in input');
    }

    const last = messages[messages.length - 1];
    if (!hasToolCalls(last)) {
      return { messages: [] };
    }

    // An unknown name fails the batch before any tool runs
    const resolved = last.tool_calls.map((call) => {
      const tool = this.toolsByName.get(call.name);
      if (!tool) throw new UnknownToolError(call.name, call.id);
      return { call, tool };
    });

    this.logger.debug(
      `[tools] dispatching ${resolved.length} call(s) (${this.mode}): ${resolved
        .map(({ call }) => call.name)
        .join(', ')}`
    );

    const outputs =
      this.mode === 'parallel'
        ? await Promise.all(
            resolved.map(({ call, tool }) => this.runCall(call, tool, context))
          )
        : await this.runSequentially(resolved, context);

    return { messages: outputs };
  }

  private async runSequentially(
    resolved: Array<{ call: ToolCall; tool: Tool }>,
    context: NodeContext
  ): Promise<ToolMessage[]> {
    const outputs: ToolMessage[] = [];
    for (const { call, tool } of resolved) {
      outputs.push(await this.runCall(call, tool, context));
    }
    return outputs;
  }

  private async runCall(
    call: ToolCall,
    tool: Tool,
    context: NodeContext
  ): Promise<ToolMessage> {
    const args = tool.schema.safeParse(call.args);
    if (!args.success) {
      throw new ToolExecutionError(call.name, call.id, args.error);
    }

    let result: unknown;
    try {
      result = await tool.call(args.data, {
        toolCallId: call.id,
        signal: context.signal,
      });
    } catch (error) {
      throw new ToolExecutionError(call.name, call.id, error);
    }

    return toolMessage(JSON.stringify(result ?? null), call.id, {
      name: call.name,
    });
  }
}
