import type { AccessPattern, AccessPatternInfo, BenchmarkConfig } from "./types";
import { nextGaussian, nextInt, seededRandom, shuffle } from "./utils";

/**
 * Default seed for reproducibility
 */
export const DEFAULT_SEED = 42;

/**
 * Recent-window size and revisit probability for the temporal pattern
 */
const TEMPORAL_WINDOW = 10;
const TEMPORAL_REVISIT = 0.7;

/**
 * Share of keys in the zipfian hot zone, and share of accesses it gets
 */
const HOT_ZONE_FRACTION = 0.2;
const HOT_ZONE_ACCESS = 0.8;

export const ACCESS_PATTERNS: Readonly<Record<AccessPattern, AccessPatternInfo>> = {
    random: { name: "Random Uniform", description: "Equal probability for all elements" },
    sequential: { name: "Sequential", description: "Access elements in order" },
    zipfian: { name: "Zipfian (80-20)", description: "80% of accesses to 20% of elements" },
    temporal: { name: "Temporal Locality", description: "Recently accessed elements are more likely" },
    gaussian: { name: "Gaussian", description: "Accesses cluster around a mean value" },
};

export function isAccessPattern(value: string): value is AccessPattern {
    return Object.prototype.hasOwnProperty.call(ACCESS_PATTERNS, value);
}

export const DEFAULT_CONFIG: BenchmarkConfig = {
    listSize: 1000,
    cacheSize: 100,
    strategies: ["move-to-front", "transpose", "frequency-count", "lru"],
    pattern: "zipfian",
    operations: 10_000,
    warmupOperations: 1000,
    seed: DEFAULT_SEED,
};

/**
 * Keys 1..size in a seeded shuffled order
 */
export function generateData(size: number, seed: number): number[] {
    const data = Array.from({ length: size }, (_, i) => i + 1);
    return shuffle(data, seededRandom(seed));
}

/**
 * Pre-generate a search trace over `data` for an access pattern.
 * Same inputs always give the same trace.
 */
export function generateSearchSequence(
    data: readonly number[],
    count: number,
    pattern: AccessPattern,
    seed: number
): number[] {
    const rng = seededRandom(seed);
    const sequence: number[] = [];
    if (data.length === 0) return sequence;

    switch (pattern) {
        case "random":
            for (let i = 0; i < count; i++) {
                sequence.push(data[nextInt(rng, data.length)]);
            }
            break;

        case "sequential":
            for (let i = 0; i < count; i++) {
                sequence.push(data[i % data.length]);
            }
            break;

        case "zipfian": {
            const hotZoneSize = Math.max(1, Math.floor(data.length * HOT_ZONE_FRACTION));
            const coldZoneSize = data.length - hotZoneSize;
            for (let i = 0; i < count; i++) {
                if (coldZoneSize === 0 || rng() < HOT_ZONE_ACCESS) {
                    sequence.push(data[nextInt(rng, hotZoneSize)]);
                } else {
                    sequence.push(data[hotZoneSize + nextInt(rng, coldZoneSize)]);
                }
            }
            break;
        }

        case "temporal": {
            // Markov-style: mostly revisit one of the last few fresh picks
            const recent: number[] = [];
            for (let i = 0; i < count; i++) {
                if (recent.length > 0 && rng() < TEMPORAL_REVISIT) {
                    sequence.push(recent[nextInt(rng, recent.length)]);
                } else {
                    const key = data[nextInt(rng, data.length)];
                    sequence.push(key);
                    recent.push(key);
                    if (recent.length > TEMPORAL_WINDOW) {
                        recent.shift();
                    }
                }
            }
            break;
        }

        case "gaussian": {
            const center = Math.floor(data.length / 2);
            const stdDev = data.length / 6;
            for (let i = 0; i < count; i++) {
                let index: number;
                do {
                    index = Math.floor(nextGaussian(rng) * stdDev + center);
                } while (index < 0 || index >= data.length);
                sequence.push(data[index]);
            }
            break;
        }
    }

    return sequence;
}
