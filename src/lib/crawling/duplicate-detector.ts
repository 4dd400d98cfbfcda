/**
 * Duplicate Detector
 * Run-scoped seen-set keyed by a stable entity identifier
 */

import { IDeduplicator } from './crawling.types';

export class InMemoryDeduplicator<T> implements IDeduplicator<T> {
  private seen: Set<string> = new Set();
  private duplicatesCount: number = 0;

  constructor(private readonly keyOf: (item: T) => string) {}

  /**
   * Return the items not seen before and mark them seen.
   * The check-and-mark runs without yielding to the event loop, so two
   * concurrent callers never both receive the same identifier.
   */
  async filterFresh(items: readonly T[]): Promise<T[]> {
    return this.filterFreshSync(items);
  }

  /**
   * Synchronous form of filterFresh
   */
  filterFreshSync(items: readonly T[]): T[] {
    const fresh: T[] = [];

    for (const item of items) {
      const key = this.keyOf(item);
      if (this.seen.has(key)) {
        this.duplicatesCount++;
        continue;
      }
      this.seen.add(key);
      fresh.push(item);
    }

    return fresh;
  }

  /**
   * Check if an identifier has been seen
   */
  has(key: string): boolean {
    return this.seen.has(key);
  }

  totalSeen(): number {
    return this.seen.size;
  }

  /**
   * Items rejected as already seen
   */
  duplicatesDetected(): number {
    return this.duplicatesCount;
  }
}
