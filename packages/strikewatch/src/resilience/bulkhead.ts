/**
 * Bulkhead Isolation Pattern
 *
 * Bounded worker pool: at most `maxConcurrent` executions in flight, the
 * rest wait in an unbounded FIFO queue. The ingest pipeline pushes every
 * FetchUnit through one bulkhead sized to the configured concurrency.
 */

import type { BulkheadConfig, BulkheadStats } from './types.js';

/**
 * @example
 * ```typescript
 * const pool = new Bulkhead({ name: 'ingest-units', maxConcurrent: 4 });
 * await Promise.allSettled(units.map((unit) => pool.execute(() => processUnit(unit))));
 * ```
 */
export class Bulkhead {
  private readonly config: BulkheadConfig;
  private activeCount = 0;
  // Each entry starts one queued execution
  private readonly queue: Array<() => void> = [];
  private completedCount = 0;
  private totalExecutionMs = 0;

  constructor(config: BulkheadConfig) {
    if (config.maxConcurrent < 1) {
      throw new RangeError(`Bulkhead '${config.name}' needs maxConcurrent >= 1`);
    }
    this.config = config;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.activeCount < this.config.maxConcurrent) {
      return this.run(fn);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.run(fn).then(resolve, reject);
      });
    });
  }

  private async run<T>(fn: () => Promise<T>): Promise<T> {
    this.activeCount++;
    const startTime = Date.now();

    try {
      return await fn();
    } finally {
      this.activeCount--;
      this.completedCount++;
      this.totalExecutionMs += Date.now() - startTime;

      if (this.activeCount < this.config.maxConcurrent) {
        this.queue.shift()?.();
      }
    }
  }

  getStats(): BulkheadStats {
    return {
      name: this.config.name,
      activeCount: this.activeCount,
      queuedCount: this.queue.length,
      completedCount: this.completedCount,
      avgExecutionMs:
        this.completedCount > 0 ? this.totalExecutionMs / this.completedCount : 0,
    };
  }
}
