// src/core/llm.ts
/**
 * Generation Router
 * Streams one round of model output from a configured provider, retrying
 * transient failures with exponential backoff and falling back to other
 * healthy providers when retries run out.
 */
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { countWhitespaceTokens, metrics as defaultMetrics } from './metrics.js';
import {
  AllProvidersFailedError,
  AuthenticationError,
  ConfigurationError,
  ModelNotFoundError,
  asError,
} from './errors.js';
import type {
  GenerationRequest,
  LlmCallSample,
  MetricsSink,
  ProviderRegistration,
  RetryState,
} from '../types/index.js';

export interface RetryEvent {
  provider: string;
  model: string;
  /** 1-based number of the retry about to happen */
  attempt: number;
  backoffMs: number;
  error: Error;
}

export interface FallbackEvent {
  from: string;
  to: string;
  model: string;
  error: Error;
}

/** Observers for a single `generate` call */
export interface GenerationHooks {
  /** Called before each retry; output streamed by the failed attempt is void */
  onRetry?: (event: RetryEvent) => void;
  onFallback?: (event: FallbackEvent) => void;
}

export interface RouterOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  temperature?: number;
  maxTokens?: number;
  metrics?: MetricsSink | null;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * GenerationRouter - Routes generation requests across named providers.
 */
export class GenerationRouter {
  private registrations = new Map<string, ProviderRegistration>();
  private defaultName: string | null = null;

  private readonly maxRetries: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly metrics: MetricsSink | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: RouterOptions = {}) {
    this.maxRetries = options.maxRetries ?? config.llm.maxRetries;
    this.initialBackoffMs = options.initialBackoffMs ?? config.llm.initialBackoffMs;
    this.maxBackoffMs = options.maxBackoffMs ?? config.llm.maxBackoffMs;
    this.temperature = options.temperature ?? config.llm.temperature;
    this.maxTokens = options.maxTokens ?? config.llm.maxTokens;
    this.metrics = options.metrics === undefined ? defaultMetrics : options.metrics;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Registers the providers this router may use, replacing any earlier set.
   * Exactly one provider is the default; when none is marked the first one is.
   * @throws ConfigurationError on an empty list, duplicate names or several defaults
   */
  configure(registrations: readonly ProviderRegistration[]): void {
    if (registrations.length === 0) {
      throw new ConfigurationError('At least one generation provider must be configured');
    }

    const byName = new Map<string, ProviderRegistration>();
    for (const registration of registrations) {
      if (byName.has(registration.name)) {
        throw new ConfigurationError(`Provider "${registration.name}" is configured twice`);
      }
      byName.set(registration.name, registration);
    }

    const defaults = registrations.filter(r => r.isDefault);
    if (defaults.length > 1) {
      throw new ConfigurationError(
        `Only one default provider is allowed, got: ${defaults.map(r => r.name).join(', ')}`
      );
    }

    this.registrations = byName;
    this.defaultName = (defaults[0] ?? registrations[0]).name;
    logger.info('Generation providers configured', {
      providers: [...byName.keys()],
      default: this.defaultName,
    });
  }

  get providerNames(): string[] {
    return [...this.registrations.keys()];
  }

  get defaultProvider(): string {
    if (this.defaultName === null) {
      throw new ConfigurationError('No generation provider configured');
    }
    return this.defaultName;
  }

  private registration(name: string): ProviderRegistration {
    const registration = this.registrations.get(name);
    if (!registration) {
      throw new ConfigurationError(`Unknown provider: ${name}`);
    }
    return registration;
  }

  /**
   * Streams one round of text.
   *
   * The selected provider is retried on transient errors. Authentication
   * errors skip the retries, a missing model is rethrown as is, and anything
   * else left over goes to the fallback providers.
   *
   * @throws ModelNotFoundError when the requested model does not exist
   * @throws AllProvidersFailedError when no provider produced output
   */
  async *generate(request: GenerationRequest, hooks: GenerationHooks = {}): AsyncGenerator<string> {
    const name = request.providerName ?? this.defaultProvider;
    const primary = this.registration(name);
    const model = request.modelName ?? primary.defaultModel;

    let primaryError: Error;
    try {
      yield* this.withRetries(primary, model, request, hooks);
      return;
    } catch (e) {
      primaryError = asError(e);
      if (primaryError instanceof ModelNotFoundError || request.signal?.aborted) {
        throw primaryError;
      }
    }

    for (const fallback of this.registrations.values()) {
      if (fallback.name === name) continue;
      if (!(await this.isHealthy(fallback))) continue;

      logger.warn('Primary provider failed, attempting fallback', {
        primary: name,
        fallback: fallback.name,
        error: primaryError.message,
      });
      hooks.onFallback?.({ from: name, to: fallback.name, model: fallback.defaultModel, error: primaryError });

      let produced = false;
      try {
        for await (const chunk of this.attempt(fallback, fallback.defaultModel, request)) {
          produced = true;
          yield chunk;
        }
      } catch (e) {
        // output already reached the caller, so this provider owns the round
        if (produced) throw e;
        logger.warn('Fallback provider failed', { provider: fallback.name, error: asError(e).message });
        continue;
      }
      if (produced) return;
    }

    logger.error('All providers failed', { provider: name, error: primaryError.message });
    throw new AllProvidersFailedError(name, primaryError);
  }

  /**
   * Runs attempts against one provider until one completes or retries run out.
   */
  private async *withRetries(
    registration: ProviderRegistration,
    model: string,
    request: GenerationRequest,
    hooks: GenerationHooks
  ): AsyncGenerator<string> {
    const state: RetryState = { attempt: 0, backoffMs: this.initialBackoffMs };

    for (;;) {
      try {
        yield* this.attempt(registration, model, request);
        return;
      } catch (e) {
        const error = asError(e);
        if (
          error instanceof AuthenticationError ||
          error instanceof ModelNotFoundError ||
          request.signal?.aborted ||
          state.attempt >= this.maxRetries
        ) {
          throw error;
        }

        state.attempt++;
        logger.warn('LLM request failed, retrying', {
          provider: registration.name,
          model,
          attempt: state.attempt,
          backoffMs: state.backoffMs,
          error: error.message,
        });
        hooks.onRetry?.({
          provider: registration.name,
          model,
          attempt: state.attempt,
          backoffMs: state.backoffMs,
          error,
        });

        await this.sleep(state.backoffMs);
        state.backoffMs = Math.min(state.backoffMs * 2, this.maxBackoffMs);
      }
    }
  }

  /**
   * One streaming attempt, measured for the metrics sink.
   */
  private async *attempt(
    registration: ProviderRegistration,
    model: string,
    request: GenerationRequest
  ): AsyncGenerator<string> {
    const started = this.now();
    let output = '';
    let success = false;

    try {
      const stream = registration.provider.stream({
        messages: request.messages,
        model,
        temperature: request.temperature ?? this.temperature,
        maxTokens: request.maxTokens ?? this.maxTokens,
        signal: request.signal,
      });
      for await (const chunk of stream) {
        output += chunk;
        yield chunk;
      }
      success = true;
    } finally {
      this.record({
        provider: registration.name,
        model,
        latencyMs: this.now() - started,
        tokensOut: countWhitespaceTokens(output),
        success,
      });
    }
  }

  private record(sample: LlmCallSample): void {
    if (!this.metrics) return;
    try {
      this.metrics.recordLlmCall(sample);
    } catch (e) {
      logger.debug('Metrics sink rejected a sample', { error: asError(e).message });
    }
  }

  private async isHealthy(registration: ProviderRegistration): Promise<boolean> {
    try {
      return await registration.provider.healthCheck();
    } catch (e) {
      logger.debug('Health probe failed', { provider: registration.name, error: asError(e).message });
      return false;
    }
  }

  /**
   * Probes every configured provider.
   * @returns Provider name to reachability
   */
  async healthCheck(): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const registration of this.registrations.values()) {
      results[registration.name] = await this.isHealthy(registration);
    }
    return results;
  }

  /**
   * Lists models offered by a provider (the default one when omitted).
   */
  async listModels(providerName?: string): Promise<string[]> {
    return this.registration(providerName ?? this.defaultProvider).provider.listModels();
  }
}

/** Shared router; configured by the CLI at start-up */
export const router = new GenerationRouter();
