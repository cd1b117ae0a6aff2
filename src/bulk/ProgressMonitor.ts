import { EventEmitter } from 'events';
import { ProgressSnapshot } from '../types';
import { logger } from '../utils/logger';
import { delay } from '../utils/delay';

/**
 * Periodically logs queue depths. Purely observational, emits `progress`
 * with each snapshot.
 */
export class ProgressMonitor extends EventEmitter {
  constructor(
    private readSnapshot: () => ProgressSnapshot,
    private interval: number
  ) {
    super();
  }

  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.report();
      await delay(this.interval, signal);
    }
    logger.debug('Progress monitor stopping');
  }

  report(): ProgressSnapshot {
    const snapshot = this.readSnapshot();
    logger.info(
      `${snapshot.downloadsPending} downloads pending, ` +
        `${snapshot.downloadsInProgress} downloads in progress, ` +
        `${snapshot.requestsPending} requests pending`
    );
    this.emit('progress', snapshot);
    return snapshot;
  }
}
