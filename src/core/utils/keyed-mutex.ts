import pLimit from 'p-limit';

type Limit = ReturnType<typeof pLimit>;

interface Slot {
  limit: Limit;
  users: number;
}

/**
 * One-at-a-time execution per key; different keys run in parallel.
 * A key's slot is dropped once nobody holds or waits for it.
 */
export class KeyedMutex {
  private readonly slots = new Map<string, Slot>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    let slot = this.slots.get(key);
    if (!slot) {
      slot = { limit: pLimit(1), users: 0 };
      this.slots.set(key, slot);
    }

    const current = slot;
    current.users++;
    try {
      return await current.limit(work);
    } finally {
      current.users--;
      if (current.users === 0) {
        this.slots.delete(key);
      }
    }
  }

  /**
   * Keys currently held or waited on
   */
  get size(): number {
    return this.slots.size;
  }
}
