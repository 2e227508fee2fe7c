/**
 * @fileoverview Process-local TTL cache
 * Holds Redmine dropdown choices. Entries expire after the TTL and are
 * dropped whenever the store reports a write.
 */

import { CHOICES_CACHE_TTL } from './constants.js';

interface CacheEntry<T> {
    value: T;
    /** ms since epoch */
    timestamp: number;
}

export interface TtlCacheOptions {
    /** Time to live in ms */
    ttl?: number;
    /** Clock, injectable for tests */
    now?: () => number;
}

export interface GetOrSetOptions<T> {
    /** Return false to hand the value out without storing it */
    shouldCache?: (value: T) => boolean;
}

export class TtlCache<T> {
    private readonly entries = new Map<string, CacheEntry<T>>();
    private readonly pending = new Map<string, Promise<T>>();
    /** Bumped by every invalidation; loads started before it are not stored */
    private generation = 0;
    private readonly ttl: number;
    private readonly now: () => number;

    constructor({ ttl = CHOICES_CACHE_TTL, now = Date.now }: TtlCacheOptions = {}) {
        this.ttl = ttl;
        this.now = now;
    }

    /**
     * Returns the cached value, or undefined when missing or expired.
     */
    get(key: string): T | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;

        if (this.now() - entry.timestamp > this.ttl) {
            this.entries.delete(key);
            return undefined;
        }
        return entry.value;
    }

    set(key: string, value: T): void {
        this.entries.set(key, { value, timestamp: this.now() });
    }

    /**
     * Returns the cached value or computes, stores and returns it.
     * Concurrent callers of an async loader share one load. A load that
     * overlaps an invalidation still resolves but is not stored.
     */
    async getOrSet(
        key: string,
        loader: () => T | Promise<T>,
        { shouldCache = () => true }: GetOrSetOptions<T> = {}
    ): Promise<T> {
        const cached = this.get(key);
        if (cached !== undefined) return cached;

        const inFlight = this.pending.get(key);
        if (inFlight) return inFlight;

        const generation = this.generation;
        const load: Promise<T> = Promise.resolve()
            .then(loader)
            .then((value) => {
                if (generation === this.generation && shouldCache(value)) {
                    this.set(key, value);
                }
                return value;
            })
            .finally(() => {
                if (this.pending.get(key) === load) {
                    this.pending.delete(key);
                }
            });
        this.pending.set(key, load);
        return load;
    }

    /**
     * Drops one key, or everything when no key is given.
     */
    invalidate(key?: string): void {
        this.generation++;
        if (key === undefined) {
            this.entries.clear();
            this.pending.clear();
            return;
        }
        this.entries.delete(key);
        this.pending.delete(key);
    }

    /**
     * Store write hook.
     */
    onWrite(): void {
        this.invalidate();
    }
}
