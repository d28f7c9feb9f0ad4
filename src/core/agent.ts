// src/core/agent.ts
/**
 * Agentic Loop
 * One user turn: generate, run the TOOL_CALLs in the reply, feed the results
 * back and generate again, up to a fixed number of rounds. Memory, browser
 * and scheduler commands are run once over the whole transcript at the end.
 */
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { createMessage, trimSession } from './context.js';
import { describeError } from './errors.js';
import { buildSystemPrompt } from './prompts.js';
import type { CommandDispatcher } from './dispatcher.js';
import type { GenerationHooks } from './llm.js';
import type { SearchIntentDetector } from './search_query.js';
import type { SessionStore } from './session_store.js';
import type {
  CommandKeyword,
  ContentPart,
  ConversationMessage,
  GenerationRequest,
  ImagePart,
  MemoryBackend,
  MemoryItem,
  Session,
} from '../types/index.js';

/** Anything that streams one round of text; the GenerationRouter in practice */
export interface TextGenerator {
  generate(request: GenerationRequest, hooks?: GenerationHooks): AsyncIterable<string>;
}

export interface AgentDeps {
  router: TextGenerator;
  dispatcher: CommandDispatcher;
  sessions: SessionStore;
  memory: MemoryBackend;
  searchDetector?: SearchIntentDetector | null;
  /** Names of the configured tool servers, listed in the system prompt */
  toolServers?: () => readonly string[];
  browserAvailable?: boolean;
  maxIterations?: number;
  maxSessionMessages?: number;
  proactiveSearchMinChars?: number;
  memoryRetrievalLimit?: number;
  searchServer?: string;
  searchTool?: string;
}

export interface TurnOptions {
  images?: readonly ImagePart[];
  providerName?: string;
  modelName?: string;
}

/** Commands that act on the final answer rather than drive more rounds */
const POST_LOOP_KEYWORDS: readonly CommandKeyword[] = ['MEMORY_SAVE', 'BROWSER_ACTION', 'SCHEDULE_TASK'];

const REFLECTION_HINT =
  '\n\nIf the results above are not enough to fully answer, output another TOOL_CALL. ' +
  'Otherwise answer the user concisely. Do NOT repeat the same TOOL_CALL.';

const TOOL_FAILURE_HINT =
  '\n\nOne or more tools failed. If you can proceed with partial results, answer the user; ' +
  'otherwise try a different TOOL_CALL or rephrase.';

export const EMPTY_RESPONSE_NOTICE =
  'The model returned no response. It may still be loading; try again in a moment, ' +
  'or check that the selected model is available with /models.';

/**
 * AgentLoop - Drives generate / execute / feed-back rounds for a user turn.
 */
export class AgentLoop {
  private readonly router: TextGenerator;
  private readonly dispatcher: CommandDispatcher;
  private readonly sessions: SessionStore;
  private readonly memory: MemoryBackend;
  private readonly searchDetector: SearchIntentDetector | null;
  private readonly toolServers: () => readonly string[];
  private readonly browserAvailable: boolean;
  private readonly maxIterations: number;
  private readonly maxSessionMessages: number;
  private readonly proactiveSearchMinChars: number;
  private readonly memoryRetrievalLimit: number;
  private readonly searchServer: string;
  private readonly searchTool: string;

  constructor(deps: AgentDeps) {
    this.router = deps.router;
    this.dispatcher = deps.dispatcher;
    this.sessions = deps.sessions;
    this.memory = deps.memory;
    this.searchDetector = deps.searchDetector ?? null;
    this.toolServers = deps.toolServers ?? (() => []);
    this.browserAvailable = deps.browserAvailable ?? false;
    this.maxIterations = deps.maxIterations ?? config.agent.maxAgenticIterations;
    this.maxSessionMessages = deps.maxSessionMessages ?? config.agent.maxSessionMessages;
    this.proactiveSearchMinChars = deps.proactiveSearchMinChars ?? config.agent.proactiveSearchMinChars;
    this.memoryRetrievalLimit = deps.memoryRetrievalLimit ?? config.agent.memoryRetrievalLimit;
    this.searchServer = deps.searchServer ?? config.agent.searchServer;
    this.searchTool = deps.searchTool ?? config.agent.searchTool;
  }

  getHistory(userId: string): Session {
    return this.sessions.get(userId);
  }

  clearHistory(userId: string): void {
    this.sessions.delete(userId);
    logger.info('History cleared', { userId });
  }

  /**
   * Runs one turn and streams everything the user should see.
   * A turn-level failure ends the stream with an apology instead of throwing.
   */
  async *processMessage(userId: string, message: string, options: TurnOptions = {}): AsyncGenerator<string> {
    logger.info('Turn started', { userId, chars: message.length, images: options.images?.length ?? 0 });
    try {
      yield* this.runTurn(userId, message, options);
    } catch (e) {
      logger.error('Turn failed', e);
      yield `Sorry, I encountered an error. ${describeError(e)}`;
    }
  }

  private async *runTurn(userId: string, message: string, options: TurnOptions): AsyncGenerator<string> {
    const history = this.sessions.get(userId);
    const memories = await this.recallMemories(userId, message);

    const system = createMessage('system', buildSystemPrompt({
      toolServers: this.toolServers(),
      memories,
      browserAvailable: this.browserAvailable,
    }));
    const userMessage = createMessage('user', userContent(message, options.images));
    const messages: ConversationMessage[] = [system, ...history, userMessage];

    let accumulated = '';
    const toolDisplays: string[] = [];

    for (let round = 0; round < this.maxIterations; round++) {
      let response = '';
      const hooks: GenerationHooks = {
        onRetry: () => {
          response = '';
        },
        onFallback: () => {
          response = '';
        },
      };
      const request: GenerationRequest = {
        messages,
        providerName: options.providerName,
        modelName: options.modelName,
      };
      // An empty first reply is regenerated once before giving up
      const attempts = round === 0 ? 2 : 1;
      for (let attempt = 0; attempt < attempts; attempt++) {
        if (attempt > 0) {
          logger.warn('Empty response, regenerating', { userId });
          response = '';
        }
        for await (const chunk of this.router.generate(request, hooks)) {
          response += chunk;
          yield chunk;
        }
        if (response.trim()) break;
      }

      if (round === 0 && !response.trim()) {
        logger.warn('Empty first response', { userId });
        yield EMPTY_RESPONSE_NOTICE;
        return;
      }
      accumulated += response;

      const feedback: string[] = [];
      let anyFailed = false;
      for await (const result of this.dispatcher.processBlocks(userId, 'TOOL_CALL', response)) {
        yield result.displayText;
        toolDisplays.push(result.displayText);
        feedback.push(result.feedbackText);
        if (!result.succeeded) anyFailed = true;
      }

      if (feedback.length === 0) {
        const query = round === 0 && response.trim().length < this.proactiveSearchMinChars
          ? this.searchDetector?.detect(message) ?? null
          : null;
        if (!query) break;

        logger.info('Proactive search', { userId, query });
        const result = await this.dispatcher.executeToolCall({
          kind: 'tool_call',
          serverName: this.searchServer,
          toolName: this.searchTool,
          arguments: { query },
        });
        if (!result.succeeded) {
          const notice = `I tried to search but encountered an error: ${result.errorMessage ?? 'unknown error'}. ` +
            `Make sure the ${this.searchServer} tool server is configured.`;
          yield notice;
          toolDisplays.push(notice);
          break;
        }

        const display = `Let me search for that.${result.displayText}`;
        yield display;
        toolDisplays.push(display);
        messages.push(
          createMessage('assistant', response),
          createMessage('user', `${result.feedbackText}\n\nUse this to continue your response.`)
        );
        continue;
      }

      logger.debug('Tool round finished', { userId, round, calls: feedback.length, anyFailed });
      let feedbackText = feedback.join('\n\n') + REFLECTION_HINT;
      if (anyFailed) feedbackText += TOOL_FAILURE_HINT;
      messages.push(createMessage('assistant', response), createMessage('user', feedbackText));
    }

    let transcript = accumulated;
    if (toolDisplays.length > 0) {
      transcript += `\n${toolDisplays.join('')}`;
    }

    const commandDisplays: string[] = [];
    for (const keyword of POST_LOOP_KEYWORDS) {
      for await (const result of this.dispatcher.processBlocks(userId, keyword, transcript)) {
        yield result.displayText;
        commandDisplays.push(result.displayText);
      }
    }

    const assistantMessage = createMessage('assistant', transcript + commandDisplays.join(''));
    this.sessions.set(userId, trimSession([...history, userMessage, assistantMessage], this.maxSessionMessages));
    logger.info('Turn finished', { userId, chars: transcript.length });
  }

  private async recallMemories(userId: string, message: string): Promise<MemoryItem[]> {
    try {
      return await this.memory.retrieveMemory(userId, message, this.memoryRetrievalLimit);
    } catch (e) {
      logger.warn('Memory retrieval failed', { userId, error: describeError(e) });
      return [];
    }
  }
}

function userContent(message: string, images: readonly ImagePart[] | undefined): string | ContentPart[] {
  if (!images || images.length === 0) return message;
  return [{ type: 'text', text: message }, ...images];
}
