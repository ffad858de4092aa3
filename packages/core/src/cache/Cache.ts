/**
 * Handle to a live cache entry.
 */
export interface CacheEntry<V> {
  value(): V;
}

/**
 * Keyed cache with optional per-entry expiry.
 *
 * Implementations must be safe to call from any handler; {@link SessionStore} adds no locking around them.
 */
export interface Cache<K, V> {
  add(key: K, value: V): void;
  addWithTimeout(key: K, value: V, ttlMs: number): void;
  get(key: K): V | undefined;
  getEntry(key: K): CacheEntry<V> | null;
  remove(key: K): void;
  exist(key: K): boolean;
  /** Restarts the expiry window of an existing entry. */
  touch?(key: K, ttlMs: number): void;
  keys(): K[];
  values(): V[];
  readonly size: number;
  close?(): void;
}
