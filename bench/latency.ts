import type { LatencyStats } from "./types";
import { mean } from "./utils";

/**
 * Latency histogram for per-search latencies and percentiles.
 *
 * - Stores raw samples for accurate percentile calculation
 * - Computes percentiles on-demand
 */
export class LatencyHistogram {
    private samples: bigint[];
    private sorted: boolean;

    constructor() {
        this.samples = [];
        this.sorted = false;
    }

    /**
     * Record a latency sample
     * @param nanos - Latency in nanoseconds (from process.hrtime.bigint())
     */
    record(nanos: bigint): void {
        this.samples.push(nanos);
        this.sorted = false;
    }

    count(): number {
        return this.samples.length;
    }

    /**
     * Nearest-rank percentile
     * @param p - Percentile (0.50 for p50, 0.99 for p99, etc.)
     * @returns Latency in nanoseconds
     */
    percentile(p: number): number {
        if (this.samples.length === 0) return 0;

        this.ensureSorted();

        const index = Math.ceil(p * this.samples.length) - 1;
        const clampedIndex = Math.max(0, Math.min(index, this.samples.length - 1));

        return Number(this.samples[clampedIndex]);
    }

    max(): number {
        if (this.samples.length === 0) return 0;
        this.ensureSorted();
        return Number(this.samples[this.samples.length - 1]);
    }

    mean(): number {
        return mean(this.samples.map(s => Number(s)));
    }

    stats(): LatencyStats {
        return {
            p50: this.percentile(0.50),
            p90: this.percentile(0.90),
            p99: this.percentile(0.99),
            max: this.max(),
            mean: this.mean(),
            count: this.count(),
        };
    }

    private ensureSorted(): void {
        if (this.sorted) return;

        this.samples.sort((a, b) => {
            if (a < b) return -1;
            if (a > b) return 1;
            return 0;
        });

        this.sorted = true;
    }
}
