import path from 'path';
import { DownloadWorkerPool } from '../bulk/DownloadWorkerPool';
import { CompletionQueue } from '../bulk/CompletionQueue';
import { ReadyQueue } from '../bulk/ReadyQueue';
import { ArchiveProduct, CompletionRecord, CompletionSink } from '../types';
import { MockArchiveClient, waitFor } from './helpers/mockArchiveClient';

const outputDir = path.join('downloads', 'pool');

describe('DownloadWorkerPool', () => {
  let readyQueue: ReadyQueue;

  beforeEach(() => {
    readyQueue = new ReadyQueue();
  });

  function createPool(
    client: MockArchiveClient,
    size = 1,
    completionSink?: CompletionSink
  ): DownloadWorkerPool {
    return new DownloadWorkerPool(client, readyQueue, outputDir, {
      size,
      idleDelay: 5,
      completionSink,
    });
  }

  describe('processNext', () => {
    it('should report an empty queue', async () => {
      const client = new MockArchiveClient();
      const pool = createPool(client);

      expect(await pool.processNext()).toBe(false);
      expect(client.downloads).toEqual([]);
    });

    it('should download to {outputDir}/{supplierId}.zip and publish a completion record', async () => {
      const client = new MockArchiveClient();
      const completions = new CompletionQueue();
      const pool = createPool(client, 1, completions);
      const completed: CompletionRecord[] = [];
      pool.on('completed', (record: CompletionRecord) => completed.push(record));
      const product: ArchiveProduct = { supplierId: 'S2A_MSIL1C_0001', downloadUrl: 'https://files.test/x' };
      readyQueue.push(product);

      expect(await pool.processNext()).toBe(true);

      const expected = { product, path: path.join(outputDir, 'S2A_MSIL1C_0001.zip') };
      expect(client.downloads).toEqual([{ product, outputPath: expected.path }]);
      expect(completions.tryTake()).toEqual(expected);
      expect(completed).toEqual([expected]);
      expect(pool.getStats()).toEqual({ active: 0, completed: 1, failed: 0, failedItems: [] });
    });

    it('should count a download as in flight until it finishes', async () => {
      const pool = createPool(new MockArchiveClient({ downloadTime: 30 }));
      readyQueue.push({ supplierId: 'slow', downloadUrl: 'https://files.test/slow' });

      const processing = pool.processNext();

      expect(pool.inFlightCount).toBe(1);
      expect(readyQueue.size).toBe(0);

      await processing;
      expect(pool.inFlightCount).toBe(0);
    });

    it('should record a failed download and release the in-flight slot', async () => {
      const client = new MockArchiveClient({
        onDownload: () => {
          throw new Error('HTTP 502');
        },
      });
      const completions = new CompletionQueue();
      const pool = createPool(client, 1, completions);
      const failed: string[] = [];
      pool.on('failed', (product: ArchiveProduct) => failed.push(product.supplierId));
      readyQueue.push({ supplierId: 'bad', downloadUrl: 'https://files.test/bad' });

      expect(await pool.processNext()).toBe(true);

      expect(pool.inFlightCount).toBe(0);
      expect(failed).toEqual(['bad']);
      expect(completions.size).toBe(0);
      expect(pool.getStats().failed).toBe(1);

      expect(pool.takeFailed()).toEqual([
        {
          product: { supplierId: 'bad', downloadUrl: 'https://files.test/bad' },
          path: path.join(outputDir, 'bad.zip'),
          error: 'HTTP 502',
        },
      ]);
      expect(pool.takeFailed()).toEqual([]);
    });

    it('should still report completion when the sink throws', async () => {
      const sink: CompletionSink = {
        put: () => {
          throw new Error('sink full');
        },
      };
      const pool = createPool(new MockArchiveClient(), 1, sink);
      const completed: CompletionRecord[] = [];
      pool.on('completed', (record: CompletionRecord) => completed.push(record));
      readyQueue.push({ supplierId: 'a', downloadUrl: 'https://files.test/a' });

      await pool.processNext();

      expect(completed).toHaveLength(1);
    });
  });

  describe('run', () => {
    it('should drain the queue with several workers and keep waiting for more work', async () => {
      const client = new MockArchiveClient({ downloadTime: 10 });
      const pool = createPool(client, 2);
      const controller = new AbortController();
      const running = pool.run(controller.signal);

      readyQueue.push({ supplierId: 'a', downloadUrl: 'https://files.test/a' });
      readyQueue.push({ supplierId: 'b', downloadUrl: 'https://files.test/b' });
      await waitFor(() => client.downloads.length === 2);

      // a late arrival is still picked up
      readyQueue.push({ supplierId: 'c', downloadUrl: 'https://files.test/c' });
      await waitFor(() => client.downloads.length === 3);

      controller.abort();
      await running;

      expect(client.downloads.map(d => d.product.supplierId).sort()).toEqual(['a', 'b', 'c']);
      expect(client.maxConcurrentDownloads).toBeLessThanOrEqual(2);
    });
  });
});
