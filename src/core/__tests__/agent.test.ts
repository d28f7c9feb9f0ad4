import { describe, it, expect, vi } from 'vitest';
import { AgentLoop, EMPTY_RESPONSE_NOTICE, type AgentDeps, type TextGenerator } from '../agent.js';
import { CommandDispatcher } from '../dispatcher.js';
import { CronScheduler } from '../scheduler.js';
import { PhraseSearchIntentDetector } from '../search_query.js';
import { SessionStore } from '../session_store.js';
import { GenerationRouter, type GenerationHooks } from '../llm.js';
import { LLMError } from '../errors.js';
import type {
  ConversationMessage,
  GenerationProvider,
  GenerationRequest,
  MemoryBackend,
  MemoryItem,
  ToolExecutor,
} from '../../types/index.js';

type Round = string[] | Error | ((hooks: GenerationHooks) => AsyncGenerator<string>);

/** Plays one scripted round per generate call; the last round repeats. */
class ScriptedRouter implements TextGenerator {
  readonly requests: ConversationMessage[][] = [];

  constructor(private readonly rounds: Round[]) {}

  async *generate(request: GenerationRequest, hooks: GenerationHooks = {}): AsyncGenerator<string> {
    this.requests.push([...request.messages]);
    const round = this.rounds[Math.min(this.requests.length, this.rounds.length) - 1];
    if (round === undefined) return;
    if (round instanceof Error) throw round;
    if (typeof round === 'function') {
      yield* round(hooks);
      return;
    }
    yield* round;
  }
}

function fakeMemory(recalled: MemoryItem[] = []): MemoryBackend {
  return {
    addMemory: vi.fn(async (userId: string, content: string, category: string, source: string) => ({
      id: 'm1', userId, content, category, source, createdAt: '2026-01-01T00:00:00.000Z',
    })),
    retrieveMemory: vi.fn(async () => recalled),
  };
}

function setup(rounds: Round[], overrides: Partial<AgentDeps> & { tools?: ToolExecutor } = {}) {
  const router = new ScriptedRouter(rounds);
  const tools: ToolExecutor = overrides.tools ?? { callTool: vi.fn(async () => 'data') };
  const memory = overrides.memory ?? fakeMemory();
  const sessions = new SessionStore({ persistDir: null });
  const dispatcher = new CommandDispatcher({
    tools,
    memory,
    scheduler: new CronScheduler(null),
    searchServer: 'ddg-search',
    searchTool: 'search',
  });
  const agent = new AgentLoop({
    router,
    dispatcher,
    sessions,
    memory,
    searchDetector: null,
    maxIterations: 5,
    maxSessionMessages: 20,
    proactiveSearchMinChars: 50,
    searchServer: 'ddg-search',
    searchTool: 'search',
    ...overrides,
  });
  return { agent, router, tools, memory, sessions };
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const chunks: string[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

function transcript(messages: readonly ConversationMessage[]): Array<[string, unknown]> {
  return messages.map((m): [string, unknown] => [m.role, m.content]);
}

const TOOL_REPLY = 'TOOL_CALL = {"mcp": "files", "tool": "read", "arguments": {"path": "/tmp/a"}}';

describe('AgentLoop', () => {
  it('answers in one round when the reply has no commands', async () => {
    const { agent, router, sessions } = setup([['Hello', ' there!']]);

    expect(await collect(agent.processMessage('u1', 'hi'))).toEqual(['Hello', ' there!']);
    expect(router.requests).toHaveLength(1);
    expect(transcript(sessions.get('u1'))).toEqual([['user', 'hi'], ['assistant', 'Hello there!']]);
  });

  it('stops after the iteration ceiling when every reply calls a tool', async () => {
    const { agent, router, tools, sessions } = setup([[TOOL_REPLY]]);

    await collect(agent.processMessage('u1', 'read it forever'));

    expect(router.requests).toHaveLength(5);
    expect(tools.callTool).toHaveBeenCalledTimes(5);
    expect(sessions.get('u1')).toHaveLength(2);
  });

  it('feeds tool results back to the next round', async () => {
    const { agent, router } = setup([[TOOL_REPLY], ['The file says data.']]);

    const chunks = await collect(agent.processMessage('u1', 'what is in /tmp/a?'));

    expect(chunks).toEqual([TOOL_REPLY, '\n\n**🔧 files.read**\ndata\n', 'The file says data.']);
    const second = router.requests[1] ?? [];
    expect(second.at(-2)).toMatchObject({ role: 'assistant', content: TOOL_REPLY });
    const feedback = second.at(-1);
    expect(feedback?.role).toBe('user');
    expect(feedback?.content).toMatch(/^\[Tool result files\.read\]\ndata\n\nIf the results above are not enough/);
  });

  it('adds a hint when a tool fails', async () => {
    const { agent, router } = setup([[TOOL_REPLY], ['Sorry, no luck.']], {
      tools: { callTool: vi.fn(async () => { throw new Error('missing file'); }) },
    });

    await collect(agent.processMessage('u1', 'read /tmp/a'));

    const feedback = router.requests[1]?.at(-1)?.content;
    expect(feedback).toMatch(/^\[Tool error\]\nfiles\.read: missing file\n\n[\s\S]*or rephrase\.$/);
  });

  it('searches proactively once for a short first reply', async () => {
    const callTool = vi.fn(async () => 'High tide 14:02');
    const { agent, router, sessions } = setup([['Sure.'], ['High tide is at 14:02.']], {
      tools: { callTool },
      searchDetector: new PhraseSearchIntentDetector(),
    });

    const chunks = await collect(agent.processMessage('u1', 'search for tide times in Lisbon'));

    const display = 'Let me search for that.\n\n**🔧 ddg-search.search**\nHigh tide 14:02\n';
    expect(chunks).toEqual(['Sure.', display, 'High tide is at 14:02.']);
    expect(callTool).toHaveBeenCalledWith('ddg-search', 'search', { query: 'tide times in lisbon' });
    expect(router.requests).toHaveLength(2);
    expect(router.requests[1]?.at(-1)?.content).toBe(
      '[Tool result ddg-search.search]\nHigh tide 14:02\n\nUse this to continue your response.'
    );
    expect(sessions.get('u1').at(-1)?.content).toBe(`Sure.High tide is at 14:02.\n${display}`);
  });

  it('explains a failed proactive search and stops', async () => {
    const { agent, router } = setup([['Sure.']], {
      tools: { callTool: vi.fn(async () => { throw new Error('MCP server "ddg-search" is not configured'); }) },
      searchDetector: new PhraseSearchIntentDetector(),
    });

    const chunks = await collect(agent.processMessage('u1', 'search for tide times'));

    expect(chunks).toEqual([
      'Sure.',
      'I tried to search but encountered an error: MCP server "ddg-search" is not configured. ' +
        'Make sure the ddg-search tool server is configured.',
    ]);
    expect(router.requests).toHaveLength(1);
  });

  it('runs memory and schedule commands once after the loop', async () => {
    const reply = 'Noted, I will remember that.\nMEMORY_SAVE = {"content": "Likes tea", "category": "preferences"}\n' +
      'SCHEDULE_TASK = {"action": "list"}';
    const { agent, memory, sessions } = setup([[reply]]);

    const chunks = await collect(agent.processMessage('u1', 'I like tea'));

    const schedule = '\n\n**⏰ Scheduler**\n📋 No scheduled tasks.\n';
    expect(chunks).toEqual([reply, schedule]);
    expect(memory.addMemory).toHaveBeenCalledWith('u1', 'Likes tea', 'preferences', 'explicit_save');
    expect(sessions.get('u1').at(-1)?.content).toBe(reply + schedule);
  });

  it('reports an empty first reply without saving the turn', async () => {
    const { agent, router, sessions } = setup([['  ']]);

    expect(await collect(agent.processMessage('u1', 'hi'))).toEqual(['  ', '  ', EMPTY_RESPONSE_NOTICE]);
    expect(router.requests).toHaveLength(2);
    expect(sessions.get('u1')).toEqual([]);
  });

  it('regenerates once after an empty first reply', async () => {
    const { agent, router, sessions } = setup([[], ['Hello.']]);

    expect(await collect(agent.processMessage('u1', 'hi'))).toEqual(['Hello.']);
    expect(router.requests).toHaveLength(2);
    expect(transcript(sessions.get('u1'))).toEqual([['user', 'hi'], ['assistant', 'Hello.']]);
  });

  it('apologizes when generation fails', async () => {
    const { agent, sessions } = setup([new Error('No LLM providers available. a failed: bad key')]);

    expect(await collect(agent.processMessage('u1', 'hi'))).toEqual([
      'Sorry, I encountered an error. No LLM providers available. a failed: bad key',
    ]);
    expect(sessions.get('u1')).toEqual([]);
  });

  it('discards a failed attempt on retry', async () => {
    const { agent, sessions } = setup([
      async function* (hooks) {
        yield 'Hel';
        hooks.onRetry?.({ provider: 'a', model: 'm', attempt: 1, backoffMs: 0, error: new Error('reset') });
        yield 'Hello.';
      },
    ]);

    expect(await collect(agent.processMessage('u1', 'hi'))).toEqual(['Hel', 'Hello.']);
    expect(sessions.get('u1').at(-1)?.content).toBe('Hello.');
  });

  it('ignores commands streamed by a provider that failed over', async () => {
    const failing: GenerationProvider = {
      async *stream() {
        yield 'TOOL_CALL = {"mcp": "files", "tool": "delete", "arguments": {"path": "/x"}}';
        throw new LLMError('connection reset');
      },
      healthCheck: async () => true,
      listModels: async () => [],
    };
    const backup: GenerationProvider = {
      async *stream() {
        yield 'Fine answer.';
      },
      healthCheck: async () => true,
      listModels: async () => [],
    };
    const router = new GenerationRouter({ maxRetries: 0, sleep: async () => {}, metrics: null });
    router.configure([
      { name: 'a', provider: failing, defaultModel: 'm', isDefault: true },
      { name: 'b', provider: backup, defaultModel: 'm' },
    ]);
    const { agent, tools, sessions } = setup([], { router });

    await collect(agent.processMessage('u1', 'hi'));

    expect(tools.callTool).not.toHaveBeenCalled();
    expect(transcript(sessions.get('u1'))).toEqual([['user', 'hi'], ['assistant', 'Fine answer.']]);
  });

  it('puts recalled memories in the system prompt', async () => {
    const memory = fakeMemory([{
      id: 'm1', userId: 'u1', content: 'Lives in Lisbon', category: 'home', source: 'explicit_save', createdAt: '2026-01-01T00:00:00.000Z',
    }]);
    const { agent, router } = setup([['Hi!']], { memory });

    await collect(agent.processMessage('u1', 'where do I live?'));

    expect(memory.retrieveMemory).toHaveBeenCalledWith('u1', 'where do I live?', 5);
    const system = router.requests[0]?.[0];
    expect(system?.role).toBe('system');
    expect(system?.content).toContain('## WHAT YOU REMEMBER ABOUT THE USER\n- [home] Lives in Lisbon');
  });

  it('sends images as parts of the user message', async () => {
    const { agent, router } = setup([['A cat.']]);

    await collect(agent.processMessage('u1', 'what is this?', { images: [{ type: 'image', data: 'aW1n', mimeType: 'image/png' }] }));

    expect(router.requests[0]?.at(-1)?.content).toEqual([
      { type: 'text', text: 'what is this?' },
      { type: 'image', data: 'aW1n', mimeType: 'image/png' },
    ]);
  });

  it('keeps the session within its bound', async () => {
    const { agent, sessions } = setup([['ok']], { maxSessionMessages: 4 });

    for (const message of ['one', 'two', 'three']) {
      await collect(agent.processMessage('u1', message));
    }

    expect(transcript(sessions.get('u1'))).toEqual([['user', 'three'], ['assistant', 'ok']]);
  });

  it('clears history', async () => {
    const { agent } = setup([['ok']]);
    await collect(agent.processMessage('u1', 'hi'));

    agent.clearHistory('u1');
    expect(agent.getHistory('u1')).toEqual([]);
  });
});
