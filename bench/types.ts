import type { PerformanceReport, StrategyKind } from "../src";

/**
 * Synthetic access patterns for search traces
 */
export type AccessPattern = "random" | "sequential" | "zipfian" | "temporal" | "gaussian";

export interface AccessPatternInfo {
    name: string;
    description: string;
}

/**
 * Benchmark configuration parameters
 */
export interface BenchmarkConfig {
    listSize: number;        // Distinct keys offered to loadAll (1..listSize)
    cacheSize: number;       // List capacity
    strategies: StrategyKind[];
    pattern: AccessPattern;
    operations: number;      // Measured searches
    warmupOperations: number;
    seed: number;
}

/**
 * Latency statistics (in nanoseconds)
 */
export interface LatencyStats {
    p50: number;
    p90: number;
    p99: number;
    max: number;
    mean: number;
    count: number;
}

/**
 * Result from a single strategy (or baseline) run
 */
export interface BenchmarkResult {
    implementation: string;  // Strategy name, or "lru-cache"
    pattern: AccessPattern;

    hitRate: number;         // percent over measured searches
    avgAccessCost: number;   // steps per measured search
    totalTimeMs: number;
    avgSearchTimeMs: number;
    hits: number;
    misses: number;

    latencies: LatencyStats;

    // Recorder report, absent for baselines
    details?: PerformanceReport;
}

/**
 * Full benchmark suite results
 */
export interface BenchmarkSuiteResult {
    config: BenchmarkConfig;
    timestamp: Date;
    results: BenchmarkResult[];
    recommendation?: string;  // Strategy with the best hit rate
}

/**
 * Common interface for baselines replaying the same trace
 */
export interface SearchBaseline {
    readonly name: string;
    load(keys: readonly number[]): void;
    search(key: number): boolean;
}

/**
 * Runner options
 */
export interface RunnerOptions {
    verbose?: boolean;
    log?: (...args: unknown[]) => void;
}
