import { CompletionQueue } from '../bulk/CompletionQueue';
import { CompletionRecord } from '../types';

function record(supplierId: string): CompletionRecord {
  return { product: { supplierId }, path: `downloads/${supplierId}.zip` };
}

describe('CompletionQueue', () => {
  it('should hand out records in the order they were put', async () => {
    const queue = new CompletionQueue();
    queue.put(record('a'));
    queue.put(record('b'));

    expect(queue.size).toBe(2);
    expect(await queue.take()).toEqual(record('a'));
    expect(queue.tryTake()).toEqual(record('b'));
    expect(queue.tryTake()).toBeUndefined();
  });

  it('should wake a waiting taker when a record arrives', async () => {
    const queue = new CompletionQueue();
    const taken = queue.take();

    queue.put(record('late'));

    await expect(taken).resolves.toEqual(record('late'));
    expect(queue.size).toBe(0);
  });

  it('should resolve to null when the timeout passes first', async () => {
    const queue = new CompletionQueue();

    await expect(queue.take(10)).resolves.toBeNull();

    queue.put(record('after-timeout'));
    expect(queue.size).toBe(1);
  });

  it('should release waiters and refuse records once closed', async () => {
    const queue = new CompletionQueue();
    const taken = queue.take();

    queue.close();

    await expect(taken).resolves.toBeNull();
    expect(queue.isClosed).toBe(true);
    expect(() => queue.put(record('x'))).toThrow('Completion queue is closed');
  });

  it('should iterate until closed and drained', async () => {
    const queue = new CompletionQueue();
    queue.put(record('a'));
    queue.put(record('b'));
    queue.close();

    const seen: string[] = [];
    for await (const completed of queue) {
      seen.push(completed.product.supplierId);
    }

    expect(seen).toEqual(['a', 'b']);
  });
});
