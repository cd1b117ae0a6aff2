import { EventEmitter } from 'events';
import {
  ArchiveClient,
  ArchiveProduct,
  BulkDownloaderEvents,
  BulkDownloaderOptions,
  BulkDownloaderStats,
  CompletionRecord,
  CompletionSink,
  DownloaderConfig,
  ProgressSnapshot,
  SessionState,
} from '../types';
import { defaultConfig } from '../config/default';
import { AlreadyStartedError } from '../errors';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/delay';
import { ReadyQueue } from './ReadyQueue';
import { PendingRequests } from './PendingRequests';
import { RequestPoller } from './RequestPoller';
import { DownloadWorkerPool } from './DownloadWorkerPool';
import { ProgressMonitor } from './ProgressMonitor';

export interface TypedBulkDownloaderEmitter {
  on<K extends keyof BulkDownloaderEvents>(event: K, listener: BulkDownloaderEvents[K]): this;
  once<K extends keyof BulkDownloaderEvents>(event: K, listener: BulkDownloaderEvents[K]): this;
  off<K extends keyof BulkDownloaderEvents>(event: K, listener: BulkDownloaderEvents[K]): this;
  emit<K extends keyof BulkDownloaderEvents>(
    event: K,
    ...args: Parameters<BulkDownloaderEvents[K]>
  ): boolean;
}

function validateOptions(options: Required<Omit<BulkDownloaderOptions, 'completionSink'>>): string[] {
  const errors: string[] = [];
  if (!Number.isInteger(options.parallel) || options.parallel < 1) {
    errors.push('parallel must be a positive integer');
  }
  if (!Number.isInteger(options.maxConcurrentPolls) || options.maxConcurrentPolls < 1) {
    errors.push('maxConcurrentPolls must be a positive integer');
  }
  if (!Number.isFinite(options.pollInterval) || options.pollInterval < 0) {
    errors.push('pollInterval must be a non-negative number');
  }
  if (!Number.isFinite(options.idleDelay) || options.idleDelay < 0) {
    errors.push('idleDelay must be a non-negative number');
  }
  if (options.monitor && !(options.monitorInterval > 0 && Number.isFinite(options.monitorInterval))) {
    errors.push('monitorInterval must be greater than 0');
  }
  return errors;
}

/**
 * Downloads batches of archive products, some of which first have to be
 * requested from the long-term archive.
 *
 * Products with a download url go straight onto the ready queue; the rest are
 * requested and tracked until the poller sees the request complete. A fixed
 * pool of workers drains the ready queue into `{outputDir}/{supplierId}.zip`.
 *
 * All state is owned by this object and only changes between `await`s, so
 * ingestion, the poller and the workers never observe a half-applied update.
 *
 * @example
 * const completions = new CompletionQueue();
 * const downloader = new BulkDownloader(client, './downloads', { parallel: 3, completionSink: completions });
 * await downloader.add(result.products);
 * while (!downloader.isDone()) {
 *   const record = await completions.take(5000);
 *   if (record) console.log(record.path);
 * }
 * downloader.shutdown();
 */
export class BulkDownloader extends EventEmitter implements TypedBulkDownloaderEmitter {
  private readonly readyQueue = new ReadyQueue();
  private readonly pending = new PendingRequests();
  private readonly poller: RequestPoller;
  private readonly workers: DownloadWorkerPool;
  private readonly monitor: ProgressMonitor | null;
  private readonly abortController = new AbortController();

  /** Supplier ids accepted this session, minus the ones that failed. */
  private readonly submitted = new Set<string>();
  /** Products accepted but not yet downloaded or given up on. */
  private outstanding = 0;
  private state: SessionState = 'unstarted';
  private loops: Promise<void> | null = null;

  static fromConfig(
    client: ArchiveClient,
    config: DownloaderConfig,
    completionSink?: CompletionSink
  ): BulkDownloader {
    return new BulkDownloader(client, config.outputDir, { ...config.download, completionSink });
  }

  constructor(
    private readonly client: ArchiveClient,
    private readonly outputDir: string,
    options: BulkDownloaderOptions = {}
  ) {
    super();

    const defaults = defaultConfig.download;
    const resolved = {
      parallel: options.parallel ?? defaults.parallel,
      pollInterval: options.pollInterval ?? defaults.pollInterval,
      idleDelay: options.idleDelay ?? defaults.idleDelay,
      maxConcurrentPolls: options.maxConcurrentPolls ?? defaults.maxConcurrentPolls,
      monitor: options.monitor ?? defaults.monitor,
      monitorInterval: options.monitorInterval ?? defaults.monitorInterval,
      autoStart: options.autoStart ?? true,
    };

    const errors = validateOptions(resolved);
    if (errors.length > 0) {
      throw new Error(`Invalid bulk downloader options: ${errors.join('; ')}`);
    }

    this.poller = new RequestPoller(client, this.pending, this.readyQueue, {
      interval: resolved.pollInterval,
      maxConcurrentPolls: resolved.maxConcurrentPolls,
    });
    this.workers = new DownloadWorkerPool(client, this.readyQueue, outputDir, {
      size: resolved.parallel,
      idleDelay: resolved.idleDelay,
      completionSink: options.completionSink,
    });
    this.monitor = resolved.monitor
      ? new ProgressMonitor(() => this.getProgress(), resolved.monitorInterval)
      : null;

    this.setupEventHandlers();

    if (resolved.autoStart) {
      this.start();
    }
  }

  private setupEventHandlers(): void {
    this.poller.on('ready', (product: ArchiveProduct, requestId: string) => {
      this.emit('ready', product, requestId);
    });

    this.workers.on('completed', (record: CompletionRecord) => {
      this.outstanding--;
      this.emit('completed', record);
    });

    this.workers.on('failed', (product: ArchiveProduct, error: unknown) => {
      this.outstanding--;
      this.submitted.delete(product.supplierId);
      this.emit('failed', product, error);
    });

    this.monitor?.on('progress', (snapshot: ProgressSnapshot) => {
      this.emit('progress', snapshot);
    });
  }

  /**
   * Starts the poller, the workers and the monitor. Only valid once.
   */
  start(): void {
    if (this.state !== 'unstarted') {
      throw new AlreadyStartedError();
    }
    this.state = 'running';

    const signal = this.abortController.signal;
    const loops = [this.poller.run(signal), this.workers.run(signal)];
    if (this.monitor) {
      loops.push(this.monitor.run(signal));
    }

    this.loops = Promise.all(loops)
      .then(() => logger.debug('Bulk downloader background loops stopped'))
      .catch(error => logger.error('Bulk downloader background loop crashed:', error));

    logger.debug(`Bulk downloader started, writing to ${this.outputDir}`);
  }

  /**
   * Asks the background loops to stop at their next safe point. Does not wait,
   * does not drain the queues, and does not interrupt a download in progress;
   * use `whenStopped()` to wait for the loops to exit.
   */
  shutdown(): void {
    if (this.state === 'shutting-down') {
      return;
    }
    this.state = 'shutting-down';
    this.abortController.abort();

    const stats = this.getStats();
    logger.info('Bulk downloader shutting down');
    logger.stats({
      'Downloads pending': stats.downloadsPending,
      'Downloads in progress': stats.downloadsInProgress,
      'Requests pending': stats.requestsPending,
      Completed: stats.completed,
      Failed: stats.failed,
    });
  }

  /** Resolves once every background loop has exited. */
  async whenStopped(): Promise<void> {
    if (this.loops) {
      await this.loops;
    }
  }

  /**
   * Adds products to the session. Products already submitted are skipped, so
   * each product is requested from the archive at most once.
   *
   * A failing archive request rejects the returned promise. Products earlier
   * in the batch stay queued; the failed product is forgotten so it can be
   * added again, and later products in the batch are not looked at.
   */
  async add(products: Iterable<ArchiveProduct>): Promise<void> {
    if (this.state === 'shutting-down') {
      throw new Error('Cannot add products to a bulk downloader that is shutting down');
    }

    for (const product of products) {
      const { supplierId } = product;
      if (this.submitted.has(supplierId)) {
        logger.debug(`${supplierId} has already been submitted, skipping`);
        continue;
      }

      this.submitted.add(supplierId);
      this.outstanding++;

      if (product.downloadUrl) {
        this.readyQueue.push({ ...product });
        continue;
      }

      let requestId: string;
      try {
        requestId = await this.client.request(product);
      } catch (error) {
        this.submitted.delete(supplierId);
        this.outstanding--;
        logger.error(`Archive request for ${supplierId} failed: ${errorMessage(error)}`);
        throw error;
      }

      this.pending.add(requestId, { ...product });
      logger.debug(`Requested ${supplierId} from the archive (request ${requestId})`);
      this.emit('requested', product, requestId);
    }
  }

  /**
   * Puts every failed download back on the ready queue; their download urls
   * are already known so no new archive request is made.
   *
   * @returns the number of products re-queued
   */
  retryFailed(): number {
    let requeued = 0;
    for (const { product } of this.workers.takeFailed()) {
      if (this.submitted.has(product.supplierId)) {
        continue;
      }
      this.submitted.add(product.supplierId);
      this.outstanding++;
      this.readyQueue.push(product);
      requeued++;
    }
    if (requeued > 0) {
      logger.info(`Re-queued ${requeued} failed downloads`);
    }
    return requeued;
  }

  /**
   * True once nothing is waiting on the archive, queued, or downloading.
   * Products are counted from the moment `add` accepts them, so a product
   * moving between stages never makes this briefly true.
   */
  isDone(): boolean {
    return this.outstanding === 0;
  }

  getState(): SessionState {
    return this.state;
  }

  getProgress(): ProgressSnapshot {
    return {
      downloadsPending: this.readyQueue.size,
      downloadsInProgress: this.workers.inFlightCount,
      requestsPending: this.pending.size,
    };
  }

  getStats(): BulkDownloaderStats {
    const workerStats = this.workers.getStats();
    return {
      ...this.getProgress(),
      outstanding: this.outstanding,
      completed: workerStats.completed,
      failed: workerStats.failed,
      failedItems: workerStats.failedItems,
    };
  }
}
