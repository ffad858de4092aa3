import type { Cache, CacheEntry } from "./Cache";

type Entry<V> = { value: V; expiresAt: number };

export type MemoryCacheOptions = {
    cleanupIntervalSeconds?: number; // default 60
    maxSize?: number; // oldest entry is evicted past this
};

/**
 * In-process {@link Cache}. Expired entries disappear on read and on a periodic sweep.
 */
export class MemoryCache<K, V> implements Cache<K, V> {
    private readonly map = new Map<K, Entry<V>>();
    private readonly cleanupTimer: NodeJS.Timeout | null;

    constructor(private readonly options?: MemoryCacheOptions) {
        const interval = (options?.cleanupIntervalSeconds ?? 60) * 1000;
        this.cleanupTimer = setInterval(() => this.cleanup(), interval);
        this.cleanupTimer.unref?.();
    }

    add(key: K, value: V): void {
        this.put(key, value, Number.POSITIVE_INFINITY);
    }

    addWithTimeout(key: K, value: V, ttlMs: number): void {
        this.put(key, value, Date.now() + ttlMs);
    }

    get(key: K): V | undefined {
        return this.live(key)?.value;
    }

    getEntry(key: K): CacheEntry<V> | null {
        const e = this.live(key);
        if (!e) return null;

        const { value } = e;
        return { value: () => value };
    }

    remove(key: K): void {
        this.map.delete(key);
    }

    exist(key: K): boolean {
        return this.live(key) !== undefined;
    }

    touch(key: K, ttlMs: number): void {
        const e = this.live(key);
        if (!e) return;

        e.expiresAt = Date.now() + ttlMs;
    }

    keys(): K[] {
        this.cleanup();
        return [...this.map.keys()];
    }

    values(): V[] {
        this.cleanup();
        return [...this.map.values()].map((e) => e.value);
    }

    get size(): number {
        this.cleanup();
        return this.map.size;
    }

    close(): void {
        if (this.cleanupTimer) clearInterval(this.cleanupTimer);
        this.map.clear();
    }

    private put(key: K, value: V, expiresAt: number): void {
        // re-insert so iteration order tracks recency for maxSize eviction
        this.map.delete(key);

        const maxSize = this.options?.maxSize;
        if (maxSize && this.map.size >= maxSize) {
            this.cleanup();
            if (this.map.size >= maxSize) {
                const oldest = this.map.keys().next();
                if (!oldest.done) this.map.delete(oldest.value);
            }
        }

        this.map.set(key, { value, expiresAt });
    }

    private live(key: K): Entry<V> | undefined {
        const e = this.map.get(key);
        if (!e) return undefined;

        if (Date.now() >= e.expiresAt) {
            this.map.delete(key);
            return undefined;
        }
        return e;
    }

    private cleanup(): void {
        const now = Date.now();
        for (const [k, e] of this.map.entries()) {
            if (now >= e.expiresAt) this.map.delete(k);
        }
    }
}
