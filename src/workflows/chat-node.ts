import { ZodError } from 'zod';
import {
  ModelInvocationError,
  TurnCancelledError,
  WorkflowEngineError,
} from '../errors';
import { AIMessage, aiMessageSchema } from '../schema/message-schema';
import type { TokenEmission } from '../types/graph.types';
import type {
  ChatModel,
  ChatModelRequest,
} from '../types/chat-model.types';

/**
 * Call the chat model, yielding token deltas as they arrive and returning
 * the final AI message. A model without `stream` is invoked once and its
 * whole reply is yielded as a single delta.
 */
export async function* callChatModel(
  model: ChatModel,
  request: ChatModelRequest
): AsyncGenerator<TokenEmission, AIMessage, undefined> {
  try {
    if (!model.stream) {
      const reply = aiMessageSchema.parse(await model.invoke(request));
      if (reply.content) yield { delta: reply.content };
      return reply;
    }

    let reply: AIMessage | undefined;
    for await (const chunk of model.stream(request)) {
      if (chunk.type === 'message') {
        reply = aiMessageSchema.parse(chunk.message);
      } else if (chunk.delta) {
        yield { delta: chunk.delta };
      }
    }
    if (!reply) {
      throw new ModelInvocationError(
        'Chat model stream ended without a final message'
      );
    }
    return reply;
  } catch (error) {
    if (error instanceof WorkflowEngineError) throw error;
    if (request.signal.aborted) throw new TurnCancelledError(error);
    if (error instanceof ZodError) {
      throw new ModelInvocationError('Chat model returned a malformed message', error);
    }
    throw new ModelInvocationError(
      `Chat model call failed: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
