// src/runtime.ts
/**
 * Wires the collaborators together for the CLI.
 */
import { config, type Config } from './config.js';
import { logger } from './utils/logger.js';
import { AgentLoop } from './core/agent.js';
import { CommandDispatcher, reminderHandler } from './core/dispatcher.js';
import { router } from './core/llm.js';
import { MCPClient } from './core/mcp.js';
import { FileMemoryStore } from './core/memory_store.js';
import { CronScheduler } from './core/scheduler.js';
import { PhraseSearchIntentDetector } from './core/search_query.js';
import { SessionStore } from './core/session_store.js';
import { OllamaProvider } from './core/providers/ollama.js';
import { OpenAICompatibleProvider } from './core/providers/openai.js';
import type { ProviderRegistration } from './types/index.js';

/**
 * Provider list from configuration. Ollama and LM Studio are always
 * registered; OpenAI only when an API key is set.
 */
export function providerRegistrations(llm: Config['llm']): ProviderRegistration[] {
  const registrations: ProviderRegistration[] = [
    {
      name: 'ollama',
      provider: new OllamaProvider({ host: llm.ollama.host, timeoutMs: llm.timeoutMs, healthTimeoutMs: llm.healthTimeoutMs }),
      defaultModel: llm.ollama.model,
    },
    {
      name: 'lmstudio',
      provider: new OpenAICompatibleProvider({
        name: 'lmstudio',
        baseUrl: llm.lmstudio.baseUrl,
        timeoutMs: llm.timeoutMs,
        healthTimeoutMs: llm.healthTimeoutMs,
      }),
      defaultModel: llm.lmstudio.model,
    },
  ];

  if (llm.openai.apiKey) {
    registrations.push({
      name: 'openai',
      provider: new OpenAICompatibleProvider({
        name: 'openai',
        baseUrl: llm.openai.baseUrl,
        apiKey: llm.openai.apiKey,
        timeoutMs: llm.timeoutMs,
        healthTimeoutMs: llm.healthTimeoutMs,
      }),
      defaultModel: llm.openai.model,
    });
  }

  const preferred = registrations.some(r => r.name === llm.defaultProvider) ? llm.defaultProvider : 'ollama';
  if (preferred !== llm.defaultProvider) {
    logger.warn('Default provider is not configured, using ollama', { requested: llm.defaultProvider });
  }
  return registrations.map(r => ({ ...r, isDefault: r.name === preferred }));
}

export interface Runtime {
  agent: AgentLoop;
  memory: FileMemoryStore;
  scheduler: CronScheduler;
  sessions: SessionStore;
  mcp: MCPClient;
  /** Model used when a turn names none */
  defaultModel: string;
  shutdown(): Promise<void>;
}

/**
 * Builds every collaborator, restores scheduled tasks and starts the
 * session reaper.
 */
export function createRuntime(): Runtime {
  const registrations = providerRegistrations(config.llm);
  router.configure(registrations);

  const memory = new FileMemoryStore();
  const scheduler = new CronScheduler();
  const sessions = new SessionStore();
  const mcp = new MCPClient();

  const restored = scheduler.restore(() => reminderHandler(memory));
  if (restored > 0) {
    logger.info('Scheduled tasks restored', { count: restored });
  }
  sessions.startReaper();

  const dispatcher = new CommandDispatcher({ tools: mcp, memory, scheduler });
  const agent = new AgentLoop({
    router,
    dispatcher,
    sessions,
    memory,
    searchDetector: new PhraseSearchIntentDetector(),
    toolServers: () => mcp.listServers().filter(s => s.enabled !== false).map(s => s.name),
  });

  const primary = registrations.find(r => r.isDefault) ?? registrations[0];

  return {
    agent,
    memory,
    scheduler,
    sessions,
    mcp,
    defaultModel: primary?.defaultModel ?? config.llm.ollama.model,
    async shutdown() {
      sessions.stopReaper();
      scheduler.stopAll();
      await mcp.disconnectAll();
    },
  };
}
