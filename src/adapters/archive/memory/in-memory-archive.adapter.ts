import {
  ArchiveAdapter,
  ArchiveRecord,
  archiveRecordKey,
} from '../../../core';

/**
 * In-memory archive for tests and local runs
 * Upserts by record key, like the document store does
 */
export class InMemoryArchiveAdapter implements ArchiveAdapter {
  private records: Map<string, ArchiveRecord> = new Map();
  private failure: Error | null = null;
  private failuresLeft = 0;
  private writes = 0;

  /**
   * Fail every write with the given error until healed with null
   */
  setFailure(error: Error | null): void {
    this.failure = error;
    this.failuresLeft = error ? Number.POSITIVE_INFINITY : 0;
  }

  /**
   * Fail only the next `count` writes
   */
  failNext(count: number, error: Error = new Error('archive unavailable')): void {
    this.failure = error;
    this.failuresLeft = count;
  }

  async upsert(record: ArchiveRecord): Promise<void> {
    this.writes++;
    if (this.failure && this.failuresLeft > 0) {
      this.failuresLeft--;
      const error = this.failure;
      if (this.failuresLeft === 0) {
        this.failure = null;
      }
      throw error;
    }
    this.records.set(archiveRecordKey(record), { ...record });
  }

  async isHealthy(): Promise<boolean> {
    return this.failure === null;
  }

  // ==================== Testing Utilities ====================

  getRecords(kind?: ArchiveRecord['kind']): ArchiveRecord[] {
    return Array.from(this.records.values()).filter(
      (record) => !kind || record.kind === kind,
    );
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Write attempts, failed ones included
   */
  get writeAttempts(): number {
    return this.writes;
  }

  clear(): void {
    this.records.clear();
    this.failure = null;
    this.failuresLeft = 0;
    this.writes = 0;
  }
}
