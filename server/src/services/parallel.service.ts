/**
 * Parallel Processing Service
 *
 * Bounded parallel execution for file parsing during scans.
 * Uses p-limit to manage concurrency.
 */

import pLimit from 'p-limit';
import os from 'os';
import { parallelLogger as logger, errorMessage } from './logger.service.js';

// =============================================================================
// Concurrency Auto-Detection
// =============================================================================

let cachedConcurrency: number | null = null;

/**
 * Worker pool size for I/O-bound work (archive reads, directory listing):
 * 2x CPU cores, max 16.
 */
export function getOptimalConcurrency(): number {
  if (cachedConcurrency !== null) return cachedConcurrency;

  const cpuCount = os.cpus().length;
  const concurrency = Math.min(Math.max(cpuCount, 1) * 2, 16);
  cachedConcurrency = concurrency;

  logger.debug({
    cpuCount,
    concurrency,
  }, `Auto-detected optimal concurrency: ${concurrency}`);

  return concurrency;
}

// =============================================================================
// Types
// =============================================================================

export type ParallelResult<T> =
  | { success: true; result: T; index: number }
  | { success: false; error: string; index: number };

export interface ParallelBatchResult<T> {
  total: number;
  successful: number;
  failed: number;
  /** One entry per input item, in input order */
  results: ParallelResult<T>[];
  duration: number;
}

export interface ParallelOptions {
  /** Maximum concurrent operations (default: auto-detected) */
  concurrency?: number;
  /** Called with the failing item's index and error; failures never stop siblings */
  onError?: (error: unknown, index: number) => void;
}

// =============================================================================
// Parallel Execution Functions
// =============================================================================

/**
 * Run `fn` over every item with bounded concurrency. A rejected item is
 * recorded as a failure; the remaining items still run.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelBatchResult<R>> {
  const concurrency = options.concurrency ?? getOptimalConcurrency();
  const startTime = Date.now();
  const limit = pLimit(concurrency);
  let successful = 0;
  let failed = 0;

  const results = await Promise.all(
    items.map((item, index) =>
      limit(async (): Promise<ParallelResult<R>> => {
        try {
          const result = await fn(item, index);
          successful++;
          return { success: true, result, index };
        } catch (error) {
          failed++;
          if (options.onError) {
            options.onError(error, index);
          } else {
            logger.warn({ index, error: errorMessage(error) }, `Item ${index} failed`);
          }
          return { success: false, error: errorMessage(error), index };
        }
      })
    )
  );

  const duration = Date.now() - startTime;

  logger.debug({
    total: items.length,
    successful,
    failed,
    concurrency,
    duration,
  }, `Parallel processing complete: ${successful} succeeded, ${failed} failed in ${duration}ms`);

  return {
    total: items.length,
    successful,
    failed,
    results,
    duration,
  };
}
