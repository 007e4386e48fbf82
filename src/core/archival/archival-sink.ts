import { Logger } from '@nestjs/common';
import { toError } from '../errors';
import { ArchiveAdapter, ArchiveRecord, archiveRecordKey } from '../interfaces';
import { backoffDelay } from '../utils';

export interface ArchivalSinkOptions {
  flushIntervalMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxQueueSize: number;
  batchSize: number;
}

export interface FlushSummary {
  written: number;
  retried: number;
  dropped: number;
}

interface PendingRecord {
  key: string;
  record: ArchiveRecord;
  attempts: number;
  nextAttemptAt: number;
}

/**
 * Best-effort mirror of events and transitions into the archive store
 *
 * enqueue() only touches memory. Writes happen on flush(), each record
 * retried on its own schedule; after maxAttempts the record is dropped
 * from the mirror (the primary store still has it).
 */
export class ArchivalSink {
  private readonly logger = new Logger(ArchivalSink.name);
  private readonly options: ArchivalSinkOptions;
  private readonly queue = new Map<string, PendingRecord>();
  private intervalId?: NodeJS.Timeout;
  private isFlushing = false;
  private stats = { written: 0, dropped: 0, overflowed: 0 };

  constructor(
    private readonly archiveAdapter: ArchiveAdapter,
    options: Partial<ArchivalSinkOptions> = {},
  ) {
    this.options = {
      flushIntervalMs: 2000,
      maxAttempts: 5,
      baseDelayMs: 1000,
      maxQueueSize: 10000,
      batchSize: 100,
      ...options,
    };
  }

  /**
   * Queue a record for mirroring. Never throws, never waits.
   * A record with the same key replaces the queued one.
   */
  enqueue(record: ArchiveRecord): void {
    const key = archiveRecordKey(record);
    this.queue.delete(key);

    if (this.queue.size >= this.options.maxQueueSize) {
      const oldest = this.queue.keys().next();
      if (!oldest.done) {
        this.queue.delete(oldest.value);
        this.stats.overflowed++;
        this.logger.warn(`Archive queue full, dropped ${oldest.value}`);
      }
    }

    this.queue.set(key, { key, record, attempts: 0, nextAttemptAt: 0 });
  }

  async flush(now: number = Date.now()): Promise<FlushSummary> {
    const summary: FlushSummary = { written: 0, retried: 0, dropped: 0 };
    if (this.isFlushing) {
      return summary;
    }

    this.isFlushing = true;
    try {
      const due = [...this.queue.values()]
        .filter((pending) => pending.nextAttemptAt <= now)
        .slice(0, this.options.batchSize);

      for (const pending of due) {
        await this.write(pending, now, summary);
      }
    } finally {
      this.isFlushing = false;
    }

    return summary;
  }

  start(): void {
    if (this.intervalId) {
      return;
    }

    this.logger.log(
      `Starting archival sink (interval: ${this.options.flushIntervalMs}ms)`,
    );
    this.intervalId = setInterval(() => {
      this.flush().catch((error) =>
        this.logger.error(`Archive flush failed: ${toError(error).message}`),
      );
    }, this.options.flushIntervalMs);
  }

  /**
   * Stop the timer and give due records one last write
   */
  async stop(): Promise<void> {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped archival sink');
    }
    await this.flush();
  }

  get pending(): number {
    return this.queue.size;
  }

  getStats(): { pending: number; written: number; dropped: number; overflowed: number } {
    return { pending: this.queue.size, ...this.stats };
  }

  private async write(
    pending: PendingRecord,
    now: number,
    summary: FlushSummary,
  ): Promise<void> {
    try {
      await this.archiveAdapter.upsert(pending.record);
      this.removeIfCurrent(pending);
      summary.written++;
      this.stats.written++;
    } catch (error) {
      pending.attempts++;
      const message = toError(error).message;

      if (pending.attempts >= this.options.maxAttempts) {
        this.removeIfCurrent(pending);
        summary.dropped++;
        this.stats.dropped++;
        this.logger.error(
          `Giving up on archive record ${pending.key} after ${pending.attempts} attempts: ${message}`,
        );
        return;
      }

      pending.nextAttemptAt =
        now +
        backoffDelay(
          pending.attempts,
          this.options.baseDelayMs,
          this.options.baseDelayMs * 64,
        );
      summary.retried++;
      this.logger.warn(
        `Archive write for ${pending.key} failed (attempt ${pending.attempts}): ${message}`,
      );
    }
  }

  // A newer record under the same key may have replaced this one mid-write
  private removeIfCurrent(pending: PendingRecord): void {
    if (this.queue.get(pending.key) === pending) {
      this.queue.delete(pending.key);
    }
  }
}
