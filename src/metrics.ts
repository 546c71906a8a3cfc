import type { PerformanceReport } from "./types";
import { PerfTimeSource, type TimeSource } from "./monotone-time";
import { RECENT_LOG_LIMIT } from "./constants";

export type OperationLabel =
    | "HIT"
    | "MISS"
    | "INSERT"
    | "EVICT"
    | "BULK_LOAD"
    | `STRATEGY_CHANGE to ${string}`;

interface Counters {
    totalSearches: number;
    hits: number;
    misses: number;
    totalAccessCost: number;
    totalSearchTimeNs: number;
    insertions: number;
    evictions: number;
    strategyChanges: number;
}

function zeroCounters(): Counters {
    return {
        totalSearches: 0,
        hits: 0,
        misses: 0,
        totalAccessCost: 0,
        totalSearchTimeNs: 0,
        insertions: 0,
        evictions: 0,
        strategyChanges: 0,
    };
}

/**
 * Accumulates operation counters for one list.
 *
 * Each record* call is synchronous and completes before any other
 * caller runs, so a report never sees half an event. It can still land
 * between two events of the same list operation (e.g. EVICT then INSERT).
 */
export class MetricsRecorder {
    private readonly time: TimeSource;
    private counters: Counters;
    private readonly recent: OperationLabel[];
    private readonly operationCounts: Map<OperationLabel, number>;
    private startMs: number;

    constructor(time?: TimeSource) {
        this.time = time ?? new PerfTimeSource();
        this.counters = zeroCounters();
        this.recent = [];
        this.operationCounts = new Map();
        this.startMs = this.time.nowMs();
    }

    recordHit(accessCost: number): void {
        this.counters.totalSearches++;
        this.counters.hits++;
        this.counters.totalAccessCost += accessCost;
        this.recordOperation("HIT");
    }

    recordMiss(): void {
        this.counters.totalSearches++;
        this.counters.misses++;
        this.recordOperation("MISS");
    }

    recordInsertion(): void {
        this.counters.insertions++;
        this.recordOperation("INSERT");
    }

    recordEviction(): void {
        this.counters.evictions++;
        this.recordOperation("EVICT");
    }

    /**
     * Counts the keys offered, on top of the INSERT events of the ones applied.
     */
    recordBulkLoad(count: number): void {
        this.counters.insertions += count;
        this.recordOperation("BULK_LOAD");
    }

    recordStrategyChange(strategyName: string): void {
        this.counters.strategyChanges++;
        this.recordOperation(`STRATEGY_CHANGE to ${strategyName}`);
    }

    recordSearchTime(nanos: number): void {
        this.counters.totalSearchTimeNs += nanos;
    }

    reset(): void {
        this.counters = zeroCounters();
        this.recent.length = 0;
        this.operationCounts.clear();
        this.startMs = this.time.nowMs();
    }

    hitRate(): number {
        const { totalSearches, hits } = this.counters;
        return totalSearches > 0 ? (hits * 100) / totalSearches : 0;
    }

    totalOperations(): number {
        const c = this.counters;
        return c.totalSearches + c.insertions + c.evictions + c.strategyChanges;
    }

    /**
     * Most recent labels, oldest first. At most RECENT_LOG_LIMIT are kept.
     */
    recentOperations(count: number = RECENT_LOG_LIMIT): OperationLabel[] {
        if (count <= 0) return [];
        return this.recent.slice(-count);
    }

    report(): PerformanceReport {
        const c = this.counters;
        const uptimeMs = this.time.nowMs() - this.startMs;

        return {
            totalSearches: c.totalSearches,
            hits: c.hits,
            misses: c.misses,
            hitRate: this.hitRate(),
            avgAccessCost: c.hits > 0 ? c.totalAccessCost / c.hits : 0,
            avgSearchTimeMs: c.totalSearches > 0 ? c.totalSearchTimeNs / 1_000_000 / c.totalSearches : 0,
            operationsPerSecond: c.totalSearches > 0 && uptimeMs > 0 ? c.totalSearches / (uptimeMs / 1000) : 0,
            insertions: c.insertions,
            evictions: c.evictions,
            strategyChanges: c.strategyChanges,
            operationCounts: Object.fromEntries(this.operationCounts),
            uptimeMs,
        };
    }

    private recordOperation(label: OperationLabel): void {
        this.recent.push(label);
        if (this.recent.length > RECENT_LOG_LIMIT) {
            this.recent.shift();
        }
        this.operationCounts.set(label, (this.operationCounts.get(label) ?? 0) + 1);
    }
}
