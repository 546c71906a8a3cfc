import type { TimeSource } from "./monotone-time";
import type { StrategyKind } from "./strategies";

export type ListKey = string | number;

export type EvictReason = "capacity" | "clear";

export interface SelfOrganizingListOptions<K extends ListKey> {
    capacity: number;
    strategy: StrategyKind;

    /**
     * Optional custom time source (primarily for testing).
     * Defaults to performance.now() if not provided.
     */
    time?: TimeSource;

    /**
     * Called after a node has left the chain. On a capacity eviction the
     * new key is already linked. The list keeps its write lock until a
     * returned promise settles.
     */
    onEvict?: (key: K, reason: EvictReason) => void | Promise<void>;
}

export interface SearchResult<K extends ListKey> {
    readonly key: K | undefined;
    readonly found: boolean;
    readonly accessCost: number;
    readonly searchTimeNs: number;
    readonly searchTimeMs: number;
    readonly operation: string;
}

export interface PerformanceReport {
    totalSearches: number;
    hits: number;
    misses: number;
    hitRate: number;          // percent, 0 when no searches
    avgAccessCost: number;    // steps per hit
    avgSearchTimeMs: number;
    operationsPerSecond: number;
    insertions: number;
    evictions: number;
    strategyChanges: number;
    operationCounts: Record<string, number>;
    uptimeMs: number;
}
