import {
  isEntryLive,
  resolveExpiry,
  type CacheEntry,
  type CacheStore,
} from "./cache-store.js";

export type MemoryCacheStoreOptions = {
  defaultTtlMs?: number;
};

export class MemoryCacheStore<K, V extends NonNullable<unknown>>
  implements CacheStore<K, V> {
  private entries = new Map<K, CacheEntry<V>>();
  readonly defaultTtlMs: number | undefined;

  constructor(defaultTtlMs?: number) {
    this.defaultTtlMs = defaultTtlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      console.debug("[MemoryCacheStore:get] cache miss", key);
      return undefined;
    }

    // stale entries stay until removeExpired runs
    if (!isEntryLive(entry, Date.now())) {
      console.debug("[MemoryCacheStore:get] cache expired", key);
      return undefined;
    }

    console.debug("[MemoryCacheStore:get] cache hit", key);
    return entry.value;
  }

  has(key: K): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && isEntryLive(entry, Date.now());
  }

  set(key: K, value: V, ttlMs?: number): V | undefined {
    const expiresAt = resolveExpiry(ttlMs, this.defaultTtlMs, Date.now());
    const previous = this.entries.get(key);
    this.entries.set(key, { value, expiresAt });
    console.debug("[MemoryCacheStore:set] cache set", key, expiresAt);
    return previous?.value;
  }

  remove(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    this.entries.delete(key);
    console.debug("[MemoryCacheStore:remove] cache delete", key);
    return entry.value;
  }

  removeExpired(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!isEntryLive(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    console.debug(
      "[MemoryCacheStore:removeExpired] sweep done",
      removed,
      this.entries.size,
    );
    return removed;
  }

  clear(): void {
    this.entries.clear();
    console.debug("[MemoryCacheStore:clear] cache cleared");
  }

  isEmpty(): boolean {
    return this.entries.size === 0;
  }
}

export function createMemoryCacheStore<K, V extends NonNullable<unknown>>(
  options: MemoryCacheStoreOptions = {},
): CacheStore<K, V> {
  console.log(
    "[memory-cache-store:createMemoryCacheStore] creating cache store",
    options.defaultTtlMs,
  );
  return new MemoryCacheStore<K, V>(options.defaultTtlMs);
}
