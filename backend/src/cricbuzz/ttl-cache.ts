// src/cricbuzz/ttl-cache.ts
// In-process response cache with a per-entry time-to-live and a size cap.
// Keys come from user input (search terms, player ids), so the map is
// bounded: expired entries are swept on write and, when still full, the
// oldest entry is evicted.

type Entry<V> = { value: V; expiresAt: number };

export const DEFAULT_MAX_ENTRIES = 500;

export class TtlCache<V = unknown> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly maxEntries = DEFAULT_MAX_ENTRIES,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V, ttlSec: number): void {
    // Re-insert so the key moves to the newest position
    this.entries.delete(key);

    if (this.entries.size >= this.maxEntries) {
      this.sweep();
    }
    if (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + ttlSec * 1000 });
  }

  get size(): number {
    return this.entries.size;
  }

  private sweep() {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
