import { RequestPoller } from '../bulk/RequestPoller';
import { PendingRequests } from '../bulk/PendingRequests';
import { ReadyQueue } from '../bulk/ReadyQueue';
import { ArchiveProduct } from '../types';
import { MockArchiveClient, waitFor } from './helpers/mockArchiveClient';

describe('RequestPoller', () => {
  let pending: PendingRequests;
  let readyQueue: ReadyQueue;

  beforeEach(() => {
    pending = new PendingRequests();
    readyQueue = new ReadyQueue();
  });

  function createPoller(client: MockArchiveClient, interval = 10): RequestPoller {
    return new RequestPoller(client, pending, readyQueue, { interval, maxConcurrentPolls: 1 });
  }

  describe('sweep', () => {
    it('should move completed requests onto the ready queue', async () => {
      const client = new MockArchiveClient({
        ready: id => (id === 'r1' ? 'https://files.test/a' : null),
      });
      const poller = createPoller(client);
      const original: ArchiveProduct = { supplierId: 'a', title: 'first' };
      pending.add('r1', original);
      pending.add('r2', { supplierId: 'b' });

      const promoted = await poller.sweep();

      expect(promoted).toBe(1);
      expect(client.statusChecks).toEqual(['r1', 'r2']);
      expect(pending.size).toBe(1);
      expect(pending.snapshot()).toEqual([['r2', { supplierId: 'b' }]]);
      expect(readyQueue.shift()).toEqual({
        supplierId: 'a',
        title: 'first',
        downloadUrl: 'https://files.test/a',
      });
      expect(original.downloadUrl).toBeUndefined();
    });

    it('should emit ready for each promoted product', async () => {
      const poller = createPoller(new MockArchiveClient());
      const ready: string[] = [];
      poller.on('ready', (product: ArchiveProduct, requestId: string) =>
        ready.push(`${requestId}=${product.supplierId}`)
      );
      pending.add('r1', { supplierId: 'a' });
      pending.add('r2', { supplierId: 'b' });

      await poller.sweep();

      expect(ready).toEqual(['r1=a', 'r2=b']);
    });

    it('should keep a request pending when its status check fails and retry it next sweep', async () => {
      let calls = 0;
      const client = new MockArchiveClient({
        ready: () => {
          calls++;
          if (calls === 1) {
            throw new Error('status service unavailable');
          }
          return 'https://files.test/a';
        },
      });
      const poller = createPoller(client);
      pending.add('r1', { supplierId: 'a' });

      expect(await poller.sweep()).toBe(0);
      expect(pending.size).toBe(1);
      expect(readyQueue.size).toBe(0);

      expect(await poller.sweep()).toBe(1);
      expect(pending.size).toBe(0);
      expect(readyQueue.size).toBe(1);
    });

    it('should check requests added during a sweep on the following sweep', async () => {
      const client = new MockArchiveClient({
        ready: id => {
          if (id === 'r1') {
            pending.add('r2', { supplierId: 'b' });
          }
          return null;
        },
      });
      const poller = createPoller(client);
      pending.add('r1', { supplierId: 'a' });

      await poller.sweep();
      expect(client.statusChecks).toEqual(['r1']);

      await poller.sweep();
      expect(client.statusChecks).toEqual(['r1', 'r1', 'r2']);
    });

    it('should do nothing when no request is pending', async () => {
      const client = new MockArchiveClient();
      const poller = createPoller(client);

      expect(await poller.sweep()).toBe(0);
      expect(client.statusChecks).toEqual([]);
    });
  });

  describe('run', () => {
    it('should promote a ready request within one poll interval and stop when aborted', async () => {
      const poller = createPoller(new MockArchiveClient(), 20);
      const controller = new AbortController();
      const running = poller.run(controller.signal);

      pending.add('test', { supplierId: 'test' });
      await waitFor(() => readyQueue.size === 1, 1000);

      expect(pending.size).toBe(0);
      expect(readyQueue.shift()?.supplierId).toBe('test');

      controller.abort();
      await running;
    });

    it('should not sweep once aborted while sleeping', async () => {
      const client = new MockArchiveClient();
      const poller = createPoller(client, 10000);
      const controller = new AbortController();
      const running = poller.run(controller.signal);
      pending.add('r1', { supplierId: 'a' });

      controller.abort();
      await running;

      expect(client.statusChecks).toEqual([]);
      expect(pending.size).toBe(1);
    });
  });
});
