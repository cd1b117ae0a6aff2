import { EventEmitter } from 'events';
import pLimit from 'p-limit';
import { ArchiveClient, ArchiveProduct } from '../types';
import { logger } from '../utils/logger';
import { delay, errorMessage } from '../utils/delay';
import { PendingRequests } from './PendingRequests';
import { ReadyQueue } from './ReadyQueue';

export interface RequestPollerOptions {
  interval: number;
  maxConcurrentPolls: number;
}

/**
 * Watches outstanding archive requests and moves products onto the ready
 * queue once the archive hands out a download url, sweeping on a fixed
 * interval. A promoted product leaves the pending map and joins the ready
 * queue in the same tick.
 *
 * Emits `ready` (product, requestId) for every promoted product.
 */
export class RequestPoller extends EventEmitter {
  private pollLimit: ReturnType<typeof pLimit>;

  constructor(
    private client: ArchiveClient,
    private pending: PendingRequests,
    private readyQueue: ReadyQueue,
    private options: RequestPollerOptions
  ) {
    super();
    this.pollLimit = pLimit(options.maxConcurrentPolls);
  }

  /**
   * Sleep, sweep, repeat. The signal is only honoured between sweeps: a sweep
   * that has started always runs to the end.
   */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await delay(this.options.interval, signal);
      if (signal.aborted) {
        break;
      }

      try {
        await this.sweep();
      } catch (error) {
        logger.error('Request sweep failed unexpectedly:', error);
      }
    }
    logger.debug('Request poller stopping');
  }

  /**
   * Checks every request pending when the sweep began. A failing status check
   * leaves its request pending for the next sweep.
   *
   * @returns how many products were promoted to the ready queue
   */
  async sweep(): Promise<number> {
    const entries = this.pending.snapshot();
    if (entries.length === 0) {
      return 0;
    }

    const results = await Promise.all(
      entries.map(([requestId, product]) =>
        this.pollLimit(() => this.checkRequest(requestId, product))
      )
    );

    return results.filter(Boolean).length;
  }

  private async checkRequest(requestId: string, product: ArchiveProduct): Promise<boolean> {
    logger.debug(`Checking state of request ${requestId} for ${product.supplierId}`);

    let downloadUrl: string | null;
    try {
      downloadUrl = await this.client.isRequestReady(requestId);
    } catch (error) {
      logger.warn(
        `Status check for request ${requestId} (${product.supplierId}) failed, will retry: ${errorMessage(error)}`
      );
      return false;
    }

    if (!downloadUrl) {
      return false;
    }

    const requested = this.pending.resolve(requestId);
    if (!requested) {
      return false;
    }
    const ready: ArchiveProduct = { ...requested, downloadUrl };
    this.readyQueue.push(ready);

    logger.info(`Request ${requestId} complete for ${ready.supplierId}`);
    this.emit('ready', ready, requestId);
    return true;
  }
}
