import { performance } from "node:perf_hooks";

export interface TimeSource {
    nowMs(): number;
}

export class PerfTimeSource implements TimeSource {
    nowMs(): number {
        return performance.now();
    }
}

/**
 * Smallest gap between two stamps when the time source has not moved.
 */
export const STAMP_STEP_MS = 0.001;

/**
 * Hands out strictly increasing access stamps from a TimeSource.
 * stamp = max(nowMs, previous stamp + STAMP_STEP_MS)
 */
export class MonotoneClock {
    private readonly time: TimeSource;
    private last: number;

    constructor(time?: TimeSource) {
        this.time = time ?? new PerfTimeSource();
        this.last = Number.NEGATIVE_INFINITY;
    }

    nowMs(): number {
        return this.time.nowMs();
    }

    stamp(): number {
        const now = this.time.nowMs();
        this.last = now > this.last ? now : this.last + STAMP_STEP_MS;
        return this.last;
    }
}
