// src/core/providers/http.ts
/**
 * HTTP plumbing shared by the providers: timeouts, status classification and
 * line-oriented stream reading.
 */
import {
  AuthenticationError,
  LLMError,
  ModelNotFoundError,
  ProviderUnavailableError,
  RateLimitError,
  asError,
} from '../errors.js';

export type FetchLike = typeof fetch;

/**
 * Creates an AbortSignal that combines the caller's signal with a timeout.
 * @param timeoutMs - Milliseconds before the request is aborted
 * @param userSignal - Optional caller signal
 * @returns The combined signal and a function that clears the timer
 */
export function createTimeoutSignal(
  timeoutMs: number,
  userSignal?: AbortSignal
): { signal: AbortSignal; clear: () => void } {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort(new Error('Request timeout'));
  }, timeoutMs);

  const onUserAbort = (): void => {
    clearTimeout(timeoutId);
    controller.abort(userSignal?.reason);
  };

  if (userSignal) {
    if (userSignal.aborted) onUserAbort();
    else userSignal.addEventListener('abort', onUserAbort, { once: true });
  }

  const clear = (): void => {
    clearTimeout(timeoutId);
    userSignal?.removeEventListener('abort', onUserAbort);
  };

  return { signal: controller.signal, clear };
}

/**
 * Maps a non-2xx status to the error class the router classifies on.
 */
export function errorForStatus(provider: string, status: number, detail: string, model: string): LLMError {
  const suffix = detail ? `: ${detail}` : '';
  if (status === 401 || status === 403) {
    return new AuthenticationError(`${provider} rejected the credentials (${status})${suffix}`);
  }
  if (status === 404) {
    return new ModelNotFoundError(model, `${provider} does not know model "${model}" (${status})${suffix}`);
  }
  if (status === 429) {
    return new RateLimitError(`${provider} rate limit exceeded (${status})${suffix}`);
  }
  return new LLMError(`${provider} API error (${status})${suffix}`);
}

/**
 * Performs a request, translating transport failures into provider errors.
 * The caller owns `signal` and its timer.
 */
export async function send(
  fetchImpl: FetchLike,
  provider: string,
  url: string,
  init: RequestInit,
  signal: AbortSignal
): Promise<Response> {
  try {
    return await fetchImpl(url, { ...init, signal });
  } catch (e) {
    const error = asError(e);
    const reason: unknown = signal.aborted ? signal.reason : undefined;
    if (reason instanceof Error && reason.message === 'Request timeout') {
      throw new LLMError(`${provider} request timed out. The model may be overloaded or the prompt too long.`, { cause: error });
    }
    if (error.name === 'AbortError') throw error;
    throw new ProviderUnavailableError(`${provider} is unreachable at ${url}: ${error.message}`, { cause: error });
  }
}

/** Reads an error body without letting a second failure mask the first. */
export async function readErrorDetail(response: Response): Promise<string> {
  try {
    return (await response.text()).trim().slice(0, 500);
  } catch {
    return response.statusText;
  }
}

/**
 * Splits a streamed body into non-empty trimmed lines.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        if (line) yield line;
        newline = buffer.indexOf('\n');
      }
    }

    buffer += decoder.decode();
    const rest = buffer.trim();
    if (rest) yield rest;
  } finally {
    reader.releaseLock();
  }
}

/** JSON.parse that reports failure as undefined */
export function parseJsonLine(line: string): unknown {
  try {
    const value: unknown = JSON.parse(line);
    return value;
  } catch {
    return undefined;
  }
}
