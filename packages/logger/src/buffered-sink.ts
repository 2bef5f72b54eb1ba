import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before a synchronous write-out. Default: 256 */
  batchSize?: number | undefined;
}

const DEFAULT_BATCH_SIZE = 256;

/**
 * Sink that batches entries and writes them on a later `setImmediate` tick.
 *
 * A full batch is written out on the spot, so a burst of rejections logged
 * from microtasks is never discarded. Subclasses implement `writeEntry`.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private drainScheduled = false;
  private readonly batchSize: number;

  constructor(options?: BufferedSinkOptions) {
    this.batchSize = Math.max(1, options?.batchSize ?? DEFAULT_BATCH_SIZE);
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    this.pending.push(entry);

    if (this.pending.length >= this.batchSize) {
      this.writePending();
      return;
    }

    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => {
        this.drainScheduled = false;
        this.writePending();
      });
    }
  }

  /** Write everything pending now. Call before the process exits. */
  flush(): void {
    this.writePending();
  }

  private writePending(): void {
    if (this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];
    for (const entry of batch) {
      this.writeEntry(entry);
    }
  }
}
