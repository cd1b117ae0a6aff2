import { ArchiveProduct } from '../types';

/**
 * Outstanding archive requests, keyed by the request id the archive issued.
 * An entry lives from submission until the poller sees the request complete.
 */
export class PendingRequests {
  private byRequestId = new Map<string, ArchiveProduct>();

  add(requestId: string, product: ArchiveProduct): void {
    const existing = this.byRequestId.get(requestId);
    if (existing) {
      throw new Error(
        `Request ${requestId} is already pending for ${existing.supplierId}, cannot reuse it for ${product.supplierId}`
      );
    }
    this.byRequestId.set(requestId, product);
  }

  /** Removes the entry and hands back its product. */
  resolve(requestId: string): ArchiveProduct | undefined {
    const product = this.byRequestId.get(requestId);
    if (product) {
      this.byRequestId.delete(requestId);
    }
    return product;
  }

  /** Copy of the current entries; safe to iterate while ingestion adds more. */
  snapshot(): Array<[string, ArchiveProduct]> {
    return Array.from(this.byRequestId.entries());
  }

  get size(): number {
    return this.byRequestId.size;
  }
}
