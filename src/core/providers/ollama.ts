// src/core/providers/ollama.ts
/**
 * Ollama provider: streams `/api/chat` NDJSON.
 */
import { z } from 'zod';
import { LLMError } from '../errors.js';
import { logger } from '../../utils/logger.js';
import { messageText } from '../context.js';
import type { ConversationMessage, GenerationProvider, ProviderRequest } from '../../types/index.js';
import {
  createTimeoutSignal,
  errorForStatus,
  parseJsonLine,
  readErrorDetail,
  readLines,
  send,
  type FetchLike,
} from './http.js';

const chunkSchema = z.object({
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
  eval_count: z.number().optional(),
  total_duration: z.number().optional(),
});

const tagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
});

interface OllamaMessage {
  role: string;
  content: string;
  images?: string[];
}

export interface OllamaProviderOptions {
  host: string;
  timeoutMs: number;
  healthTimeoutMs?: number;
  fetch?: FetchLike;
}

/**
 * Multi-part content becomes text plus the `images` array Ollama expects.
 */
export function toOllamaMessages(messages: readonly ConversationMessage[]): OllamaMessage[] {
  return messages.map(message => {
    if (typeof message.content === 'string') {
      return { role: message.role, content: message.content };
    }
    const images = message.content.flatMap(part => (part.type === 'image' ? [part.data] : []));
    const converted: OllamaMessage = { role: message.role, content: messageText(message.content) };
    if (images.length > 0) converted.images = images;
    return converted;
  });
}

export class OllamaProvider implements GenerationProvider {
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaProviderOptions) {
    this.host = options.host.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async *stream(request: ProviderRequest): AsyncGenerator<string> {
    const { signal, clear } = createTimeoutSignal(this.timeoutMs, request.signal);

    try {
      const response = await send(this.fetchImpl, 'Ollama', `${this.host}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: request.model,
          messages: toOllamaMessages(request.messages),
          stream: true,
          options: {
            temperature: request.temperature,
            num_predict: request.maxTokens,
          },
        }),
      }, signal);

      if (!response.ok) {
        throw errorForStatus('Ollama', response.status, await readErrorDetail(response), request.model);
      }
      if (!response.body) {
        throw new LLMError('Ollama returned no response body for streaming');
      }

      for await (const line of readLines(response.body)) {
        const parsed = chunkSchema.safeParse(parseJsonLine(line));
        if (!parsed.success) {
          logger.debug('Skipping unparseable Ollama line', { line });
          continue;
        }

        const chunk = parsed.data;
        if (chunk.error) {
          throw new LLMError(`Ollama error: ${chunk.error}`);
        }
        if (chunk.message?.content) {
          yield chunk.message.content;
        }
        if (chunk.done) {
          logger.info('LLM streaming complete', {
            provider: 'ollama',
            model: request.model,
            tokenCount: chunk.eval_count,
            duration: chunk.total_duration,
          });
          break;
        }
      }
    } finally {
      clear();
    }
  }

  /**
   * Checks if the Ollama server is reachable.
   */
  async healthCheck(): Promise<boolean> {
    const { signal, clear } = createTimeoutSignal(this.healthTimeoutMs);
    try {
      const response = await send(this.fetchImpl, 'Ollama', `${this.host}/api/tags`, { method: 'GET' }, signal);
      return response.ok;
    } catch (e) {
      logger.debug('Ollama health check failed', { error: String(e) });
      return false;
    } finally {
      clear();
    }
  }

  async listModels(): Promise<string[]> {
    const { signal, clear } = createTimeoutSignal(this.healthTimeoutMs);
    try {
      const response = await send(this.fetchImpl, 'Ollama', `${this.host}/api/tags`, { method: 'GET' }, signal);
      if (!response.ok) {
        throw new LLMError(`Ollama could not list models (${response.status})`);
      }
      const parsed = tagsSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.models.map(model => model.name) : [];
    } finally {
      clear();
    }
  }
}
