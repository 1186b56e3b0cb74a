/**
 * Metrics tracking for validation outcomes
 */

import type { QueryErrorKind } from "../types.js";

export type OutcomeStatus = "ok" | "deferred" | "error";

export interface ValidationMetrics {
  ok: number;
  deferred: number;
  error: number;
  /** Rejections broken down by violation kind */
  errorsByKind: Partial<Record<QueryErrorKind, number>>;
  /** Most recent validation durations (deferred queries are not timed) */
  durationMs: number[];
}

const MAX_SAMPLES = 100;

function emptyMetrics(): ValidationMetrics {
  return { ok: 0, deferred: 0, error: 0, errorsByKind: {}, durationMs: [] };
}

class MetricsCollector {
  #metrics = emptyMetrics();

  /**
   * Record one validate() call
   */
  recordOutcome(status: OutcomeStatus, durationMs?: number, kind?: QueryErrorKind): void {
    this.#metrics[status]++;

    if (kind !== undefined) {
      this.#metrics.errorsByKind[kind] = (this.#metrics.errorsByKind[kind] ?? 0) + 1;
    }

    if (durationMs !== undefined) {
      this.#metrics.durationMs.push(durationMs);
      // Keep only the last samples to avoid unbounded memory growth
      if (this.#metrics.durationMs.length > MAX_SAMPLES) {
        this.#metrics.durationMs.shift();
      }
    }
  }

  /**
   * Snapshot of the current counters
   */
  getMetrics(): ValidationMetrics {
    return {
      ...this.#metrics,
      errorsByKind: { ...this.#metrics.errorsByKind },
      durationMs: [...this.#metrics.durationMs],
    };
  }

  /**
   * Share of non-deferred validations that were rejected
   */
  getRejectionRate(): number {
    const total = this.#metrics.ok + this.#metrics.error;
    return total > 0 ? this.#metrics.error / total : 0;
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  getP95DurationMs(): number {
    return this.getP95(this.#metrics.durationMs);
  }

  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
