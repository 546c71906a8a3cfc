import { SelfOrganizingList, STRATEGIES, type StrategyKind } from "../src";
import type {
    BenchmarkConfig,
    BenchmarkResult,
    RunnerOptions,
    SearchBaseline,
} from "./types";
import { LatencyHistogram } from "./latency";

/**
 * Run one strategy over a pre-generated trace
 *
 * @param config - Benchmark configuration
 * @param strategy - Strategy under test
 * @param data - Keys handed to loadAll
 * @param sequence - Search trace (warmup first, then measured)
 * @param options - Runner options
 * @returns Benchmark result
 */
export async function runStrategyBenchmark(
    config: BenchmarkConfig,
    strategy: StrategyKind,
    data: readonly number[],
    sequence: readonly number[],
    options: RunnerOptions = {}
): Promise<BenchmarkResult> {
    const { verbose = false, log = () => undefined } = options;
    const name = STRATEGIES[strategy].name;

    const list = new SelfOrganizingList<number>({ capacity: config.cacheSize, strategy });
    await list.loadAll(data);

    // Phase 1: Warmup (no measurement)
    const warmupOps = Math.min(config.warmupOperations, sequence.length);
    for (let i = 0; i < warmupOps; i++) {
        await list.search(sequence[i]);
    }

    // Phase 2: Measurement
    const histogram = new LatencyHistogram();
    let totalAccessCost = 0;
    let hits = 0;

    const start = process.hrtime.bigint();
    for (let i = warmupOps; i < sequence.length; i++) {
        const result = await list.search(sequence[i]);
        histogram.record(BigInt(result.searchTimeNs));
        totalAccessCost += result.accessCost;
        if (result.found) hits++;

        if (verbose && (i - warmupOps) % 1000 === 0) {
            log(`      Progress: ${i - warmupOps}/${sequence.length - warmupOps} operations`);
        }
    }
    const totalTimeMs = Number(process.hrtime.bigint() - start) / 1_000_000;

    const measured = sequence.length - warmupOps;
    const report = list.report();

    return {
        implementation: name,
        pattern: config.pattern,
        hitRate: measured > 0 ? (hits * 100) / measured : 0,
        avgAccessCost: measured > 0 ? totalAccessCost / measured : 0,
        totalTimeMs,
        avgSearchTimeMs: report.avgSearchTimeMs,
        hits,
        misses: measured - hits,
        latencies: histogram.stats(),
        details: report,
    };
}

/**
 * Replay the same trace against a baseline cache
 */
export function runBaseline(
    config: BenchmarkConfig,
    baseline: SearchBaseline,
    data: readonly number[],
    sequence: readonly number[]
): BenchmarkResult {
    baseline.load(data);

    const warmupOps = Math.min(config.warmupOperations, sequence.length);
    for (let i = 0; i < warmupOps; i++) {
        baseline.search(sequence[i]);
    }

    const histogram = new LatencyHistogram();
    let hits = 0;

    const start = process.hrtime.bigint();
    for (let i = warmupOps; i < sequence.length; i++) {
        const opStart = process.hrtime.bigint();
        const found = baseline.search(sequence[i]);
        histogram.record(process.hrtime.bigint() - opStart);
        if (found) hits++;
    }
    const totalTimeMs = Number(process.hrtime.bigint() - start) / 1_000_000;

    const measured = sequence.length - warmupOps;
    const latencies = histogram.stats();

    return {
        implementation: baseline.name,
        pattern: config.pattern,
        hitRate: measured > 0 ? (hits * 100) / measured : 0,
        avgAccessCost: 0,
        totalTimeMs,
        avgSearchTimeMs: latencies.mean / 1_000_000,
        hits,
        misses: measured - hits,
        latencies,
    };
}

/**
 * Strategy with the highest hit rate. Baselines (no recorder report)
 * are not candidates.
 */
export function recommendStrategy(results: BenchmarkResult[]): string | undefined {
    let best: BenchmarkResult | undefined;
    for (const result of results) {
        if (result.details === undefined) continue;
        if (best === undefined || result.hitRate > best.hitRate) {
            best = result;
        }
    }
    return best === undefined ? undefined : `${best.implementation} (Hit Rate: ${best.hitRate.toFixed(2)}%)`;
}

/**
 * Ranked comparison by hit rate plus the best result per metric
 */
export function generateAnalysis(results: BenchmarkResult[]): string {
    if (results.length === 0) {
        return "No results\n";
    }

    const ranked = [...results].sort((a, b) => b.hitRate - a.hitRate);
    const lines = ["=== COMPARATIVE ANALYSIS ===", ""];

    ranked.forEach((r, i) => {
        lines.push(`${i + 1}. ${r.implementation}`);
        lines.push(`   Hit Rate: ${r.hitRate.toFixed(2)}%`);
        lines.push(`   Avg Access Cost: ${r.avgAccessCost.toFixed(2)} steps`);
        lines.push(`   Avg Search Time: ${r.avgSearchTimeMs.toFixed(3)} ms`);
        lines.push(`   Total Time: ${r.totalTimeMs.toFixed(2)} ms`);
        lines.push("");
    });

    const minBy = (candidates: BenchmarkResult[], pick: (r: BenchmarkResult) => number) =>
        candidates.reduce((best, r) => (pick(r) < pick(best) ? r : best));

    // Baselines do not walk a chain, so they have no access cost to compare
    const walked = ranked.filter(r => r.details !== undefined);

    const bestHitRate = ranked[0];
    const bestAccessCost = minBy(walked.length > 0 ? walked : ranked, r => r.avgAccessCost);
    const bestSearchTime = minBy(ranked, r => r.avgSearchTimeMs);

    lines.push("=== RECOMMENDATIONS ===");
    lines.push(`For maximum hit rate: ${bestHitRate.implementation} (${bestHitRate.hitRate.toFixed(2)}%)`);
    lines.push(`For lowest access cost: ${bestAccessCost.implementation} (${bestAccessCost.avgAccessCost.toFixed(2)} steps)`);
    lines.push(`For fastest search: ${bestSearchTime.implementation} (${bestSearchTime.avgSearchTimeMs.toFixed(3)} ms)`);

    return lines.join("\n") + "\n";
}
