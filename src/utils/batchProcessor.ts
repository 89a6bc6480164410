import { logger } from './logger';
import { config } from '../config';
import { errorMessage, getRetryDelayMs } from './errors';

/**
 * Result of a batch process, including success/failure status and timing information
 */
export interface BatchProcessResult<T> {
  success: boolean;
  result?: T;
  error?: Error;
  durationMs: number;
  retries: number;
}

/**
 * Statistics for batch processing
 */
export interface BatchProcessStats {
  totalItems: number;
  successfulItems: number;
  failedItems: number;
  totalTimeMs: number;
  averageItemTimeMs: number;
}

/**
 * Runs one async job per item with at most `concurrency` in flight
 */
export class BatchProcessor<T, R> {
  private concurrency: number;
  private maxRetries: number;
  private retryDelayMs: number;

  /**
   * @param concurrency Maximum number of concurrent operations
   * @param maxRetries Retries per item after the first attempt
   * @param retryDelayMs Base delay in milliseconds for retries
   */
  constructor(
    concurrency = config.textin.maxConcurrent,
    maxRetries = 0,
    retryDelayMs = config.processing.retryDelayMs
  ) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.maxRetries = maxRetries;
    this.retryDelayMs = retryDelayMs;
  }

  /**
   * Process items with concurrency control. Results keep the input order.
   * @param onProgress Called after every finished item
   */
  async processItems(
    items: T[],
    processFn: (item: T) => Promise<R>,
    onProgress?: (completed: number, total: number) => void
  ): Promise<BatchProcessResult<R>[]> {
    const results: BatchProcessResult<R>[] = new Array(items.length);
    let completedCount = 0;
    let currentIndex = 0;

    const processItemAtIndex = async (index: number): Promise<void> => {
      const item = items[index];
      const startTime = Date.now();
      let retries = 0;
      let lastError: Error | undefined;

      for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
        try {
          const result = await processFn(item);
          results[index] = { success: true, result, durationMs: Date.now() - startTime, retries };
          lastError = undefined;
          break;
        } catch (err) {
          lastError = err instanceof Error ? err : new Error(String(err));
          if (attempt < this.maxRetries) {
            retries++;
            const delay = getRetryDelayMs(attempt, this.retryDelayMs);
            logger.warn(`Retrying item ${index} (attempt ${retries}/${this.maxRetries}) in ${delay}ms`, {
              error: errorMessage(err),
            });
            await new Promise(resolve => setTimeout(resolve, delay));
          }
        }
      }

      if (lastError) {
        logger.error(`Failed to process item ${index} after ${retries} retries`, { error: lastError.message });
        results[index] = { success: false, error: lastError, durationMs: Date.now() - startTime, retries };
      } else {
        logger.debug(`Processed item ${index} successfully`, { durationMs: results[index].durationMs });
      }

      completedCount++;
      onProgress?.(completedCount, items.length);
    };

    // Each worker pulls the next unclaimed index until none are left
    const runWorker = async (): Promise<void> => {
      while (currentIndex < items.length) {
        const index = currentIndex++;
        await processItemAtIndex(index);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, items.length) }, () => runWorker());
    await Promise.all(workers);

    return results;
  }

  /**
   * Get batch processing statistics
   */
  getStats(results: BatchProcessResult<R>[]): BatchProcessStats {
    const successfulItems = results.filter(r => r.success).length;
    const failedItems = results.length - successfulItems;
    const totalTimeMs = results.reduce((sum, r) => sum + r.durationMs, 0);

    return {
      totalItems: results.length,
      successfulItems,
      failedItems,
      totalTimeMs,
      averageItemTimeMs: results.length > 0 ? totalTimeMs / results.length : 0,
    };
  }
}

export default BatchProcessor;
