// src/core/providers/openai.ts
/**
 * OpenAI-compatible provider: streams `/chat/completions` server-sent events.
 * Also covers LM Studio and other servers speaking the same API.
 */
import { z } from 'zod';
import { LLMError } from '../errors.js';
import { logger } from '../../utils/logger.js';
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

const streamChunkSchema = z.object({
  choices: z.array(z.object({
    delta: z.object({ content: z.string().nullish() }).optional(),
    finish_reason: z.string().nullish(),
  })).default([]),
  error: z.object({ message: z.string() }).optional(),
});

const modelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
});

type OpenAIContent =
  | string
  | Array<{ type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } }>;

interface OpenAIMessage {
  role: string;
  content: OpenAIContent;
}

export interface OpenAIProviderOptions {
  /** Provider label used in errors and logs */
  name: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  healthTimeoutMs?: number;
  fetch?: FetchLike;
}

export function toOpenAIMessages(messages: readonly ConversationMessage[]): OpenAIMessage[] {
  return messages.map(message => {
    if (typeof message.content === 'string') {
      return { role: message.role, content: message.content };
    }
    return {
      role: message.role,
      content: message.content.map(part =>
        part.type === 'text'
          ? { type: 'text' as const, text: part.text }
          : {
              type: 'image_url' as const,
              image_url: { url: `data:${part.mimeType ?? 'image/png'};base64,${part.data}` },
            }
      ),
    };
  });
}

export class OpenAICompatibleProvider implements GenerationProvider {
  private readonly name: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly healthTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? '';
    this.timeoutMs = options.timeoutMs;
    this.healthTimeoutMs = options.healthTimeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  async *stream(request: ProviderRequest): AsyncGenerator<string> {
    const { signal, clear } = createTimeoutSignal(this.timeoutMs, request.signal);

    try {
      const response = await send(this.fetchImpl, this.name, `${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({
          model: request.model,
          messages: toOpenAIMessages(request.messages),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          stream: true,
        }),
      }, signal);

      if (!response.ok) {
        throw errorForStatus(this.name, response.status, await readErrorDetail(response), request.model);
      }
      if (!response.body) {
        throw new LLMError(`${this.name} returned no response body for streaming`);
      }

      for await (const line of readLines(response.body)) {
        if (!line.startsWith('data:')) continue;
        const payload = line.slice('data:'.length).trim();
        if (payload === '[DONE]') break;

        const parsed = streamChunkSchema.safeParse(parseJsonLine(payload));
        if (!parsed.success) {
          logger.debug('Skipping unparseable stream event', { provider: this.name, payload });
          continue;
        }
        if (parsed.data.error) {
          throw new LLMError(`${this.name} error: ${parsed.data.error.message}`);
        }
        for (const choice of parsed.data.choices) {
          const content = choice.delta?.content;
          if (content) yield content;
        }
      }
    } finally {
      clear();
    }
  }

  async healthCheck(): Promise<boolean> {
    const { signal, clear } = createTimeoutSignal(this.healthTimeoutMs);
    try {
      const response = await send(this.fetchImpl, this.name, `${this.baseUrl}/models`, {
        method: 'GET',
        headers: this.headers(),
      }, signal);
      return response.ok;
    } catch (e) {
      logger.debug('Health check failed', { provider: this.name, error: String(e) });
      return false;
    } finally {
      clear();
    }
  }

  async listModels(): Promise<string[]> {
    const { signal, clear } = createTimeoutSignal(this.healthTimeoutMs);
    try {
      const response = await send(this.fetchImpl, this.name, `${this.baseUrl}/models`, {
        method: 'GET',
        headers: this.headers(),
      }, signal);
      if (!response.ok) {
        throw new LLMError(`${this.name} could not list models (${response.status})`);
      }
      const parsed = modelsSchema.safeParse(await response.json());
      return parsed.success ? parsed.data.data.map(model => model.id) : [];
    } finally {
      clear();
    }
  }
}
