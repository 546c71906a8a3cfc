/**
 * Seeded random number generator (Mulberry32)
 * Returns numbers in [0, 1)
 *
 * @param seed - Integer seed value
 * @returns Function that generates next random number
 */
export function seededRandom(seed: number): () => number {
    return function() {
        seed |= 0;
        seed = seed + 0x6D2B79F5 | 0;
        let t = Math.imul(seed ^ seed >>> 15, 1 | seed);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Integer in [0, n)
 */
export function nextInt(rng: () => number, n: number): number {
    return Math.floor(rng() * n);
}

/**
 * Standard normal sample (Box-Muller)
 */
export function nextGaussian(rng: () => number): number {
    let u = 0;
    while (u === 0) u = rng();
    const v = rng();
    return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * Fisher-Yates shuffle in place
 */
export function shuffle<T>(items: T[], rng: () => number): T[] {
    for (let i = items.length - 1; i > 0; i--) {
        const j = nextInt(rng, i + 1);
        const tmp = items[i];
        items[i] = items[j];
        items[j] = tmp;
    }
    return items;
}

/**
 * Format latency in appropriate unit (ns, μs, or ms)
 * @param nanos - Latency in nanoseconds
 * @returns Formatted string with unit
 */
export function formatLatency(nanos: number): string {
    if (nanos < 1000) {
        return `${nanos.toFixed(0)} ns`;
    } else if (nanos < 1_000_000) {
        return `${(nanos / 1000).toFixed(1)} μs`;
    } else {
        return `${(nanos / 1_000_000).toFixed(2)} ms`;
    }
}

/**
 * Calculate mean of an array of numbers
 */
export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    const sum = values.reduce((acc, val) => acc + val, 0);
    return sum / values.length;
}
