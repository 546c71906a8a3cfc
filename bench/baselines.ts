import { LRUCache } from "lru-cache";
import type { SearchBaseline } from "./types";

/**
 * Reference LRU from lru-cache with the same capacity as the list.
 * Loads the same keys in the same order; a search is a get() that only
 * refreshes recency. Misses are not filled, matching the list.
 */
export class LruCacheBaseline implements SearchBaseline {
    readonly name = "lru-cache";
    private readonly cache: LRUCache<number, true>;

    constructor(capacity: number) {
        this.cache = new LRUCache<number, true>({ max: capacity });
    }

    load(keys: readonly number[]): void {
        for (const key of keys) {
            if (!this.cache.has(key)) {
                this.cache.set(key, true);
            }
        }
    }

    search(key: number): boolean {
        return this.cache.get(key) !== undefined;
    }
}
