import { z } from 'zod';

export type ToolContext = {
  toolCallId: string;
  signal: AbortSignal;
};

/**
 * A callable the model can request by name.
 * Arguments are validated with `schema` before `call` runs; the result must be
 * JSON-serializable.
 */
export type Tool<Args extends z.AnyZodObject = z.AnyZodObject> = {
  name: string;
  description: string;
  schema: Args;
  call(args: z.infer<Args>, context: ToolContext): unknown;
};

export function defineTool<Args extends z.AnyZodObject>(
  tool: Tool<Args>
): Tool<Args> {
  return tool;
}
