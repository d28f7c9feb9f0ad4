// src/config.ts
/**
 * Central configuration for Tether.
 * All magic numbers and configurable values are defined here.
 */

import { config as dotenvConfig } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: path.join(__dirname, '../.env') });

/**
 * Parses an environment variable as an integer with a default value.
 */
function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses an environment variable as a float with a default value.
 */
function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parses an environment variable as a boolean with a default value.
 */
function envBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/** Root for everything Tether writes to disk */
const dataDir = process.env.TETHER_HOME || path.join(process.cwd(), '.tether');

/**
 * Application configuration object.
 * Values can be overridden via environment variables.
 */
export const config = {
  /** Application metadata */
  app: {
    name: 'Tether',
    version: '0.1.0',
  },

  /** LLM provider configuration */
  llm: {
    /** Provider used when a request names none */
    defaultProvider: process.env.DEFAULT_LLM_PROVIDER || 'ollama',
    ollama: {
      host: process.env.OLLAMA_HOST || 'http://127.0.0.1:11434',
      model: process.env.OLLAMA_MODEL || 'llama3.1:8b',
    },
    openai: {
      baseUrl: process.env.OPENAI_BASE_URL || 'https://api.openai.com/v1',
      apiKey: process.env.OPENAI_API_KEY || '',
      model: process.env.OPENAI_MODEL || 'gpt-4o-mini',
    },
    lmstudio: {
      baseUrl: process.env.LMSTUDIO_URL || 'http://127.0.0.1:1234/v1',
      model: process.env.LMSTUDIO_MODEL || 'local-model',
    },
    /** Temperature for generation (0-1) */
    temperature: envFloat('LLM_TEMPERATURE', 0.7),
    /** Upper bound on generated tokens */
    maxTokens: envInt('LLM_MAX_TOKENS', 2048),
    /** Retries on the same provider after the first attempt */
    maxRetries: envInt('LLM_MAX_RETRIES', 3),
    /** First backoff delay; doubles on every retry */
    initialBackoffMs: 1000,
    /** Backoff ceiling */
    maxBackoffMs: 60000,
    /** Timeout for a single request in milliseconds */
    timeoutMs: envInt('LLM_TIMEOUT_MS', 300000),
    /** Timeout for health probes */
    healthTimeoutMs: 5000,
  },

  /** Agentic loop configuration */
  agent: {
    /** Hard ceiling on generation rounds per turn */
    maxAgenticIterations: envInt('MAX_AGENTIC_ITERATIONS', 5),
    /** Session length kept after each turn */
    maxSessionMessages: envInt('MAX_SESSION_MESSAGES', 20),
    /** Tool result length fed back to the model */
    toolResultMaxChars: envInt('TOOL_RESULT_MAX_CHARS', 4000),
    /** Responses shorter than this may trigger the proactive search */
    proactiveSearchMinChars: 50,
    /** Tool used for the proactive search */
    searchServer: process.env.SEARCH_MCP_SERVER || 'ddg-search',
    searchTool: process.env.SEARCH_MCP_TOOL || 'search',
    /** Memories injected into the system prompt */
    memoryRetrievalLimit: 5,
    /** Identity for the local user's session and memories */
    userId: process.env.TETHER_USER || 'local',
  },

  /** Session store configuration */
  session: {
    /** Idle time before a session is evicted */
    ttlMs: envInt('SESSION_TTL_MS', 24 * 60 * 60 * 1000),
    /** How often the reaper looks for idle sessions */
    reaperIntervalMs: 10 * 60 * 1000,
    /** Persist sessions as JSON files */
    persist: envBool('SESSION_PERSISTENCE', true),
  },

  /** Logging configuration */
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    maxLogSize: 5 * 1024 * 1024,
    maxStringLength: 1000,
    maxBackups: 3,
  },

  /** UI configuration */
  ui: {
    /** Spinner animation frames */
    spinnerFrames: ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'],
    /** Spinner update interval in milliseconds */
    spinnerIntervalMs: 80,
    /** Box width for UI elements */
    boxWidth: 80,
    /** Status lines shown while waiting for the first token */
    waitingMessages: [
      'Thinking...',
      'Waiting for the model...',
      'Composing a reply...',
    ],
  },

  /** Paths configuration */
  paths: {
    dataDir,
    sessionsDir: path.join(dataDir, 'sessions'),
    memoryFile: path.join(dataDir, 'memory.json'),
    tasksFile: path.join(dataDir, 'scheduled_tasks.json'),
    mcpConfigFile: path.join(dataDir, 'mcp_config.json'),
    debugLogFile: path.join(dataDir, 'debug.log'),
    /** Word lists shipped with the package */
    searchLexiconFile: path.join(__dirname, '../data/search_lexicon.json'),
  },
} as const;

/** Type for the configuration object */
export type Config = typeof config;

export default config;
