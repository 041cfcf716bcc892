import type { Reading } from '@weather-station/domain';

/**
 * Bounded window of the most recently handled readings, evicting the
 * least-recently-touched entry when full.
 *
 * The `Map` is both the recency list (iteration order, oldest first) and the
 * index by reading id, so insert, promote and evict are all O(1). Entries are
 * keyed by storage id: two readings from the same sensor at the same instant
 * are both kept, while recording the same stored reading again promotes it.
 *
 * Reads never count as touches: `mostRecent` and `snapshotSince` leave the
 * eviction order alone.
 *
 * Each method runs to completion synchronously, which makes every call a
 * critical section on the event loop: no caller can observe an insert without
 * its matching eviction, or a size above capacity.
 */
export class RecencyCache {
  private readonly entries = new Map<number, Reading>();

  constructor(private readonly maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`cache capacity must be a positive integer, got ${maxEntries}`);
    }
  }

  /** Inserts as most recent. Returns the reading evicted to make room, if any. */
  record(reading: Reading): Reading | undefined {
    let evicted: Reading | undefined;
    if (this.entries.has(reading.id)) {
      this.entries.delete(reading.id);
    } else if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.entries().next();
      if (!oldest.done) {
        const [key, value] = oldest.value;
        this.entries.delete(key);
        evicted = value;
      }
    }
    this.entries.set(reading.id, reading);
    return evicted;
  }

  /** Up to `limit` readings, most recently recorded first. */
  mostRecent(limit: number): Reading[] {
    if (!(limit > 0)) return [];
    const all = Array.from(this.entries.values());
    const out: Reading[] = [];
    for (let i = all.length - 1; i >= 0 && out.length < limit; i--) {
      out.push(all[i]);
    }
    return out;
  }

  /**
   * Every held reading with `ts >= cutoff`, unordered. An empty result does
   * not mean storage is empty: older readings may only live there.
   */
  snapshotSince(cutoff: Date): Reading[] {
    const cutoffMs = cutoff.getTime();
    const out: Reading[] = [];
    for (const reading of this.entries.values()) {
      if (reading.ts.getTime() >= cutoffMs) out.push(reading);
    }
    return out;
  }

  size(): number {
    return this.entries.size;
  }

  capacity(): number {
    return this.maxEntries;
  }

  clear(): void {
    this.entries.clear();
  }
}
