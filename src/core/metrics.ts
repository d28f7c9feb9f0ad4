// src/core/metrics.ts
/**
 * In-process metrics for LLM calls.
 */
import type { LlmCallSample, MetricsSink } from '../types/index.js';

export interface ProviderStats {
  calls: number;
  failures: number;
  totalLatencyMs: number;
  averageLatencyMs: number;
  tokensOut: number;
}

export interface MetricsSnapshot {
  totalCalls: number;
  totalFailures: number;
  totalTokensOut: number;
  averageLatencyMs: number;
  byProvider: Record<string, ProviderStats>;
}

/** Accumulates per-provider call totals in memory */
export class MetricsCollector implements MetricsSink {
  private readonly providers = new Map<string, ProviderStats>();

  recordLlmCall(sample: LlmCallSample): void {
    const stats = this.providers.get(sample.provider) ?? {
      calls: 0,
      failures: 0,
      totalLatencyMs: 0,
      averageLatencyMs: 0,
      tokensOut: 0,
    };
    stats.calls++;
    if (!sample.success) stats.failures++;
    stats.totalLatencyMs += sample.latencyMs;
    stats.averageLatencyMs = stats.totalLatencyMs / stats.calls;
    stats.tokensOut += sample.tokensOut;
    this.providers.set(sample.provider, stats);
  }

  getStats(): MetricsSnapshot {
    const byProvider: Record<string, ProviderStats> = {};
    let totalCalls = 0;
    let totalFailures = 0;
    let totalTokensOut = 0;
    let totalLatencyMs = 0;

    for (const [name, stats] of this.providers) {
      byProvider[name] = { ...stats };
      totalCalls += stats.calls;
      totalFailures += stats.failures;
      totalTokensOut += stats.tokensOut;
      totalLatencyMs += stats.totalLatencyMs;
    }

    return {
      totalCalls,
      totalFailures,
      totalTokensOut,
      averageLatencyMs: totalCalls > 0 ? totalLatencyMs / totalCalls : 0,
      byProvider,
    };
  }
}

/** Approximate output size: whitespace-separated tokens */
export function countWhitespaceTokens(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export const metrics = new MetricsCollector();
