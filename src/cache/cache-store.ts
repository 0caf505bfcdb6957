// get returns undefined for absent keys, so stored values cannot be undefined
export type CacheStore<K, V extends NonNullable<unknown>> = {
  readonly defaultTtlMs: number | undefined;
  readonly size: number;
  get: (key: K) => V | undefined;
  has: (key: K) => boolean;
  set: (key: K, value: V, ttlMs?: number) => V | undefined;
  remove: (key: K) => V | undefined;
  removeExpired: () => number;
  clear: () => void;
  isEmpty: () => boolean;
};

/** `expiresAt` is epoch milliseconds; `undefined` never expires. */
export type CacheEntry<V> = {
  value: V;
  expiresAt: number | undefined;
};

export function isEntryLive<V>(entry: CacheEntry<V>, now: number): boolean {
  return entry.expiresAt === undefined || entry.expiresAt > now;
}

export function resolveExpiry(
  ttlMs: number | undefined,
  defaultTtlMs: number | undefined,
  now: number,
): number | undefined {
  const duration = ttlMs ?? defaultTtlMs;
  if (duration === undefined) {
    return undefined;
  }
  return now + duration;
}
