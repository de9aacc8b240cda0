/**
 * Bounded key/value cache with per-entry expiry.
 *
 * Expiry is lazy: an entry is only purged when it is read at or after its
 * deadline. Capacity is enforced on write by evicting the oldest-inserted
 * entries (Map iteration order), not the least recently read ones.
 */

export const DEFAULT_CACHE_MAX_ENTRIES = 1000;

export type Clock = () => number;

type CacheSlot<V> = {
  value: V;
  expiresAt: number;
};

export type TtlCacheOptions = {
  /** Soft cap on stored entries (default: 1000) */
  maxEntries?: number;
  /** Millisecond clock; defaults to Date.now */
  now?: Clock;
};

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheSlot<V>>();
  private readonly maxEntries: number;
  private readonly now: Clock;

  constructor(options: TtlCacheOptions = {}) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES));
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const slot = this.entries.get(key);
    if (!slot) {
      return undefined;
    }
    if (this.now() >= slot.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return slot.value;
  }

  set(key: string, value: V, ttlMs: number): void {
    // Overwrites count as a fresh insertion for eviction order.
    this.entries.delete(key);
    this.entries.set(key, { value, expiresAt: this.now() + Math.max(0, ttlMs) });
    this.evictOverflow();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove every entry matching the predicate, or everything when none is given.
   * Returns the number of entries removed.
   */
  clear(predicate?: (key: string, value: V) => boolean): number {
    if (!predicate) {
      const removed = this.entries.size;
      this.entries.clear();
      return removed;
    }
    let removed = 0;
    for (const [key, slot] of this.entries) {
      if (predicate(key, slot.value)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  /** Stored entry count, including entries that have expired but not been read yet. */
  get size(): number {
    return this.entries.size;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        return;
      }
      this.entries.delete(oldest.value);
    }
  }
}
