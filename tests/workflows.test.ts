/**
 * Workflow Tests
 * Base workflow behaviour, the Simple Chat graph, settings and model calls
 */

import { describe, it, expect } from '@jest/globals';
import { END } from '../src/constants';
import {
  ModelInvocationError,
  TurnCancelledError,
  UnknownToolError,
} from '../src/errors';
import { silentLogger } from '../src/logger';
import {
  aiMessage,
  humanMessage,
  systemMessage,
  toolMessage,
} from '../src/schema/message-schema';
import type {
  ChatModel,
  ChatModelChunk,
  ChatModelRequest,
} from '../src/types/chat-model.types';
import { callChatModel } from '../src/workflows/chat-node';
import {
  ChatSetting,
  resumeSettings,
  withInitialValue,
} from '../src/workflows/chat-settings';
import {
  SIMPLE_CHAT_SYSTEM_PROMPT,
  SimpleChatWorkflow,
} from '../src/workflows/simple-chat';
import { ScriptedChatModel, StreamingChatModel } from './helpers/scripted-chat-model';

const newWorkflow = (chatModel: ChatModel = new ScriptedChatModel([])) =>
  new SimpleChatWorkflow({ chatModel, logger: silentLogger });

const datetimeCall = { id: 'call_1', name: 'get_datetime_now', args: {} };

describe('Workflow', () => {
  describe('toolRouting', () => {
    const workflow = newWorkflow();

    it('should route to tools when the last message requests a call', () => {
      const state = {
        messages: [humanMessage('time?'), aiMessage('', { tool_calls: [datetimeCall] })],
      };
      expect(workflow.toolRouting(state)).toBe('tools');
    });

    it('should end when the last message has no calls', () => {
      expect(workflow.toolRouting({ messages: [aiMessage('done')] })).toBe(END);
      expect(workflow.toolRouting({ messages: [humanMessage('hi')] })).toBe(END);
      expect(workflow.toolRouting({ messages: [] })).toBe(END);
    });

    it('should only look at the last message', () => {
      const state = {
        messages: [
          aiMessage('', { tool_calls: [datetimeCall] }),
          toolMessage('"now"', 'call_1'),
        ],
      };
      expect(workflow.toolRouting(state)).toBe(END);
    });
  });

  describe('Defaults', () => {
    it('should create a fresh state stamped with the workflow name', () => {
      expect(newWorkflow().createDefaultState()).toEqual({
        messages: [],
        chat_profile: 'Simple Chat',
        chat_model: '',
      });
    });

    it('should format user text as a human message', () => {
      expect(newWorkflow().formatMessage('hello')).toEqual(humanMessage('hello'));
    });
  });

  describe('resolveChatSettings', () => {
    it('should show declared defaults for a fresh state', () => {
      const workflow = newWorkflow();
      expect(workflow.resolveChatSettings(workflow.createDefaultState())).toEqual(
        workflow.chatSettings
      );
    });

    it('should show stored values in place of the defaults', () => {
      const workflow = newWorkflow();
      const [setting] = workflow.resolveChatSettings({
        ...workflow.createDefaultState(),
        chat_model: 'large',
      });

      expect(setting.initial).toBe('large');
    });
  });
});

describe('SimpleChatWorkflow', () => {
  it('should answer directly when the model calls no tools', async () => {
    const model = new ScriptedChatModel([aiMessage('Hi there!')]);
    const workflow = newWorkflow(model);
    const graph = workflow.createGraph().compile();

    const state = await graph.invoke({
      ...workflow.createDefaultState(),
      messages: [humanMessage('Hello')],
    });

    expect(state.messages).toEqual([humanMessage('Hello'), aiMessage('Hi there!')]);
    expect(model.requests[0].messages).toEqual([
      systemMessage(SIMPLE_CHAT_SYSTEM_PROMPT),
      humanMessage('Hello'),
    ]);
    expect(model.requests[0].tools.map((tool) => tool.name)).toEqual(['get_datetime_now']);
  });

  it('should run the datetime tool and call the model again', async () => {
    const model = new ScriptedChatModel([
      aiMessage('', { tool_calls: [datetimeCall] }),
      (request: ChatModelRequest) => {
        const last = request.messages[request.messages.length - 1];
        return aiMessage(`The time is ${last.content}`);
      },
    ]);
    const workflow = newWorkflow(model);
    const graph = workflow.createGraph().compile();

    const state = await graph.invoke({
      ...workflow.createDefaultState(),
      messages: [humanMessage('What time is it?')],
    });

    expect(state.messages.map((message) => message.type)).toEqual([
      'human',
      'ai',
      'tool',
      'ai',
    ]);
    const result = state.messages[2];
    expect(result.type === 'tool' && result.tool_call_id).toBe('call_1');
    expect(model.callCount).toBe(2);
  });

  it('should fail the run when the model asks for an unknown tool', async () => {
    const model = new ScriptedChatModel([
      aiMessage('', { tool_calls: [{ id: 'call_1', name: 'nonexistent_tool', args: {} }] }),
    ]);
    const workflow = newWorkflow(model);
    const graph = workflow.createGraph().compile();

    await expect(
      graph.invoke({ ...workflow.createDefaultState(), messages: [humanMessage('hi')] })
    ).rejects.toThrow(UnknownToolError);
  });

  it('should declare its graph shape', () => {
    const graph = newWorkflow().createGraph().compile();
    expect(graph.nodeIds).toEqual(['chat', 'tools']);
  });
});

describe('chat settings', () => {
  const model: ChatSetting = {
    type: 'select',
    id: 'model',
    label: 'Model',
    values: ['small', 'large'],
    initial: 'small',
  };
  const temperature: ChatSetting = {
    type: 'slider',
    id: 'temperature',
    label: 'Temperature',
    min: 0,
    max: 2,
    step: 0.1,
    initial: 1,
  };

  it('should accept values that fit the setting', () => {
    expect(withInitialValue(model, 'large')).toEqual({ ...model, initial: 'large' });
    expect(withInitialValue(temperature, 0.5)).toEqual({ ...temperature, initial: 0.5 });
  });

  it('should reject values that do not fit', () => {
    expect(withInitialValue(model, 'huge')).toBeUndefined();
    expect(withInitialValue(temperature, 3)).toBeUndefined();
    expect(withInitialValue(temperature, '1')).toBeUndefined();
  });

  it('should resume stored values and keep defaults for the rest', () => {
    const resumed = resumeSettings([model, temperature], { model: 'large', temperature: 'hot' });

    expect(resumed).toEqual([{ ...model, initial: 'large' }, temperature]);
    expect(resumed[1]).not.toBe(temperature);
  });
});

describe('callChatModel', () => {
  const request = (signal = new AbortController().signal): ChatModelRequest => ({
    messages: [humanMessage('hi')],
    tools: [],
    state: { messages: [], chat_profile: 'Simple Chat' },
    signal,
  });

  async function drain(model: ChatModel, req: ChatModelRequest) {
    const deltas: string[] = [];
    const stream = callChatModel(model, req);
    for (;;) {
      const next = await stream.next();
      if (next.done) return { deltas, reply: next.value };
      deltas.push(next.value.delta);
    }
  }

  it('should yield the whole reply once for invoke-only models', async () => {
    const result = await drain(new ScriptedChatModel([aiMessage('Hello there')]), request());

    expect(result).toEqual({ deltas: ['Hello there'], reply: aiMessage('Hello there') });
  });

  it('should relay streamed tokens', async () => {
    const result = await drain(new StreamingChatModel([aiMessage('Hello there')]), request());

    expect(result.deltas).toEqual(['Hello ', 'there']);
    expect(result.reply).toEqual(aiMessage('Hello there'));
  });

  it('should yield nothing for a reply without content', async () => {
    const reply = aiMessage('', { tool_calls: [datetimeCall] });
    const result = await drain(new ScriptedChatModel([reply]), request());

    expect(result).toEqual({ deltas: [], reply });
  });

  it('should wrap model failures', async () => {
    await expect(
      drain(new ScriptedChatModel([new Error('rate limited')]), request())
    ).rejects.toThrow('Chat model call failed: rate limited');
  });

  it('should report a stream without a final message', async () => {
    const model: ChatModel = {
      invoke: async () => aiMessage('unused'),
      async *stream(): AsyncIterable<ChatModelChunk> {
        yield { type: 'token', delta: 'partial' };
      },
    };

    await expect(drain(model, request())).rejects.toThrow(ModelInvocationError);
  });

  it('should report failures after cancellation as cancelled', async () => {
    const controller = new AbortController();
    const model: ChatModel = {
      invoke: async () => {
        controller.abort();
        throw new Error('socket closed');
      },
    };

    await expect(drain(model, request(controller.signal))).rejects.toThrow(TurnCancelledError);
  });
});
