import { EventEmitter } from 'events';
import {
  ArchiveClient,
  ArchiveProduct,
  CompletionRecord,
  CompletionSink,
  FailedDownload,
} from '../types';
import { logger } from '../utils/logger';
import { FileUtils } from '../utils/fileUtils';
import { delay, errorMessage } from '../utils/delay';
import { ReadyQueue } from './ReadyQueue';

export interface DownloadWorkerPoolOptions {
  size: number;
  /** ms an idle worker sleeps before looking at the queue again */
  idleDelay: number;
  completionSink?: CompletionSink;
}

/**
 * Fixed set of workers draining the ready queue. A failed download only costs
 * that one product: it is recorded, reported through `failed`, and the worker
 * moves on. Nothing is retried here.
 *
 * Emits `completed` (record) and `failed` (product, error).
 */
export class DownloadWorkerPool extends EventEmitter {
  private active = new Map<string, ArchiveProduct>();
  private failed = new Map<string, FailedDownload>();
  private completedCount = 0;

  constructor(
    private client: ArchiveClient,
    private readyQueue: ReadyQueue,
    private outputDir: string,
    private options: DownloadWorkerPoolOptions
  ) {
    super();
  }

  async run(signal: AbortSignal): Promise<void> {
    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.options.size; i++) {
      workers.push(this.workerLoop(i + 1, signal));
    }
    await Promise.all(workers);
  }

  private async workerLoop(workerId: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const worked = await this.processNext(workerId);
        if (!worked) {
          // An empty queue is not the end: the poller may still promote requests.
          await delay(this.options.idleDelay, signal);
        }
      } catch (error) {
        logger.error(`Download worker ${workerId} hit an unexpected error:`, error);
      }
    }
    logger.debug(`Download worker ${workerId} stopping`);
  }

  /**
   * Takes one product off the ready queue and downloads it.
   *
   * @returns false when the queue was empty
   */
  async processNext(workerId = 0): Promise<boolean> {
    const product = this.readyQueue.shift();
    if (!product) {
      return false;
    }

    const destination = FileUtils.productPath(this.outputDir, product.supplierId);
    this.active.set(product.supplierId, product);
    logger.info(`Downloading ${product.supplierId} to ${destination}`);

    let failure: { error: unknown } | null = null;
    try {
      await this.client.download(product, destination);
    } catch (error) {
      failure = { error };
    } finally {
      this.active.delete(product.supplierId);
    }

    if (failure) {
      const message = errorMessage(failure.error);
      logger.error(`Failed to download ${product.supplierId} (worker ${workerId}): ${message}`);
      this.failed.set(product.supplierId, { product, path: destination, error: message });
      this.emit('failed', product, failure.error);
      return true;
    }

    this.completedCount++;
    this.failed.delete(product.supplierId);
    const record: CompletionRecord = { product, path: destination };
    logger.success(`Downloaded ${product.supplierId}`);
    try {
      this.options.completionSink?.put(record);
    } catch (error) {
      logger.error(`Completion sink rejected the record for ${product.supplierId}:`, error);
    }
    this.emit('completed', record);
    return true;
  }

  get inFlightCount(): number {
    return this.active.size;
  }

  /** Hands back the failed downloads and forgets them. */
  takeFailed(): FailedDownload[] {
    const failed = Array.from(this.failed.values());
    this.failed.clear();
    return failed;
  }

  getStats() {
    return {
      active: this.active.size,
      completed: this.completedCount,
      failed: this.failed.size,
      failedItems: Array.from(this.failed.values()),
    };
  }
}
