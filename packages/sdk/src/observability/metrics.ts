/**
 * Metrics tracking for model config store operations
 */

import type { ModelStoreErrorCode } from "../errors.js";

export type Operation = "store" | "get" | "delete";

export interface OperationMetrics {
  successCount: number;
  failureCount: number;
  failuresByCode: Partial<Record<ModelStoreErrorCode, number>>;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<Operation, OperationMetrics>();

  /**
   * Get or create metrics for an operation
   */
  #getMetrics(op: Operation): OperationMetrics {
    let metrics = this.#metrics.get(op);
    if (!metrics) {
      metrics = {
        successCount: 0,
        failureCount: 0,
        failuresByCode: {},
        durationMs: [],
      };
      this.#metrics.set(op, metrics);
    }
    return metrics;
  }

  #recordDuration(metrics: OperationMetrics, ms: number): void {
    metrics.durationMs.push(ms);

    // Keep only the most recent samples
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Record a successful operation
   */
  recordSuccess(op: Operation, ms: number): void {
    const metrics = this.#getMetrics(op);
    metrics.successCount++;
    this.#recordDuration(metrics, ms);
  }

  /**
   * Record a failed operation under its error code
   */
  recordFailure(op: Operation, code: ModelStoreErrorCode, ms: number): void {
    const metrics = this.#getMetrics(op);
    metrics.failureCount++;
    metrics.failuresByCode[code] = (metrics.failuresByCode[code] ?? 0) + 1;
    this.#recordDuration(metrics, ms);
  }

  /**
   * Get metrics for an operation
   */
  getMetrics(op: Operation): OperationMetrics | undefined {
    return this.#metrics.get(op);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<Operation, OperationMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.max(0, Math.ceil(sorted.length * 0.95) - 1);
    return sorted[idx] ?? 0;
  }

  /**
   * Get p95 duration of an operation
   */
  getP95Duration(op: Operation): number {
    return this.getP95(this.#metrics.get(op)?.durationMs ?? []);
  }

  /**
   * Reset metrics for one operation, or all of them
   */
  reset(op?: Operation): void {
    if (op) {
      this.#metrics.delete(op);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
