import { ArchiveProduct } from '../types';

/**
 * FIFO of products whose download url is known. Written by ingestion and the
 * request poller, read only by the download workers.
 */
export class ReadyQueue {
  private items: ArchiveProduct[] = [];

  push(product: ArchiveProduct): void {
    this.items.push(product);
  }

  shift(): ArchiveProduct | undefined {
    return this.items.shift();
  }

  get size(): number {
    return this.items.length;
  }
}
