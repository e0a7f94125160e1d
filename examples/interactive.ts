import * as readline from 'readline';
import {
  AIMessage,
  ChatModel,
  ChatModelChunk,
  ChatModelRequest,
  ClientTransport,
  MemoryGraphStateStore,
  SessionContext,
  WorkflowEngineError,
  aiMessage,
  createApp,
  loadConfig,
} from '../src';

/**
 * Interactive demo of the workflow engine.
 *
 * A scripted model stands in for a real provider: it echoes the user, and
 * asks for the datetime tool whenever the user mentions "time".
 * Commands: /settings <json>, /save, /resume, /quit
 */

class ScriptedChatModel implements ChatModel {
  private callCount = 0;

  async invoke(request: ChatModelRequest): Promise<AIMessage> {
    this.callCount += 1;
    const last = request.messages[request.messages.length - 1];

    if (last?.type === 'human' && /\btime\b/i.test(last.content)) {
      return aiMessage('', {
        tool_calls: [
          { id: `call_${this.callCount}`, name: 'get_datetime_now', args: {} },
        ],
      });
    }
    if (last?.type === 'tool') {
      return aiMessage(`It is ${JSON.parse(last.content)}.`);
    }

    const model = String(request.state.chat_model || 'echo');
    return aiMessage(`[${model}] You said: ${last?.content ?? ''}`);
  }

  async *stream(request: ChatModelRequest): AsyncIterable<ChatModelChunk> {
    const reply = await this.invoke(request);
    for (const word of reply.content.split(/(?<= )/)) {
      yield { type: 'token', delta: word };
    }
    yield { type: 'message', message: reply };
  }
}

const consoleTransport: ClientTransport = {
  openMessage: (content) => {
    process.stdout.write(`Bot: ${content}`);
  },
  appendToken: (delta) => {
    process.stdout.write(delta);
  },
  closeMessage: () => {
    process.stdout.write('\n');
  },
};

async function demo() {
  console.log('=== Chat Workflow Interactive Demo ===\n');

  const store = new MemoryGraphStateStore();
  const app = await createApp({
    config: loadConfig(),
    chatModel: new ScriptedChatModel(),
    store,
  });
  const { orchestrator } = app;

  const threadId = 'demo-thread';
  const [profile] = orchestrator.listWorkflows();
  let context: SessionContext = orchestrator.start(threadId, profile.name);
  console.log(`Workflow: ${profile.name} - ${profile.description}`);
  console.log('Settings:', JSON.stringify(context.settings));

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const ask = (question: string) =>
    new Promise<string>((resolve) => rl.question(question, resolve));

  try {
    for (;;) {
      const input = (await ask('You: ')).trim();
      if (!input) continue;

      try {
        if (input === '/quit') break;

        if (input === '/save') {
          await orchestrator.end(context);
          console.log(`Saved ${context.state.messages.length} messages.`);
        } else if (input === '/resume') {
          const resumed = await orchestrator.resume(threadId);
          if (resumed) {
            context = resumed;
            console.log(`Resumed ${context.state.messages.length} messages.`);
          } else {
            console.log('Nothing saved yet.');
          }
        } else if (input.startsWith('/settings ')) {
          const values: unknown = JSON.parse(input.slice('/settings '.length));
          if (typeof values !== 'object' || values === null || Array.isArray(values)) {
            console.log('Settings must be a JSON object.');
            continue;
          }
          context = orchestrator.updateSettings(context, Object.fromEntries(Object.entries(values)));
          console.log('Settings:', JSON.stringify(context.settings));
        } else {
          context = await orchestrator.handleMessage(context, input, consoleTransport);
        }
      } catch (error) {
        if (error instanceof SyntaxError) {
          console.log(`Invalid JSON: ${error.message}`);
        } else if (error instanceof WorkflowEngineError) {
          console.log(`\n[${error.code}] ${error.message}`);
        } else {
          throw error;
        }
      }
    }
  } finally {
    rl.close();
    await app.close();
  }

  console.log('\n=== Demo Complete ===');
}

demo().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
