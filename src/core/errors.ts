// src/core/errors.ts
/**
 * Error taxonomy shared by the generation router, providers and the loop.
 */

/** Base class for provider failures. Retried by the router. */
export class LLMError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMError';
  }
}

/** The provider could not be reached at all. */
export class ProviderUnavailableError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProviderUnavailableError';
  }
}

export class RateLimitError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RateLimitError';
  }
}

/** Bad or missing credentials. Never retried against the same provider. */
export class AuthenticationError extends LLMError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/** The requested model does not exist. No retry, no fallback. */
export class ModelNotFoundError extends LLMError {
  readonly model: string;

  constructor(model: string, message?: string) {
    super(message ?? `Model not found: ${model}`);
    this.name = 'ModelNotFoundError';
    this.model = model;
  }
}

/**
 * Raised when the requested provider and every fallback failed.
 */
export class AllProvidersFailedError extends Error {
  readonly provider: string;

  constructor(provider: string, cause: Error) {
    super(`No LLM providers available. ${provider} failed: ${cause.message}`, { cause });
    this.name = 'AllProvidersFailedError';
    this.provider = provider;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalizes any thrown value into an Error.
 */
export function asError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  try {
    return new Error(JSON.stringify(value));
  } catch {
    return new Error(String(value));
  }
}

/** One-line description of a thrown value for user-facing messages. */
export function describeError(value: unknown): string {
  const error = asError(value);
  return error.message || error.name;
}
