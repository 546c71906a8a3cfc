#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs";
import { STRATEGIES, STRATEGY_KINDS, formatReport, parseStrategy, type StrategyKind } from "../src";
import type { AccessPattern, BenchmarkConfig, BenchmarkResult, BenchmarkSuiteResult } from "./types";
import {
    ACCESS_PATTERNS,
    DEFAULT_CONFIG,
    generateData,
    generateSearchSequence,
    isAccessPattern,
} from "./workloads";
import { LruCacheBaseline } from "./baselines";
import { generateAnalysis, recommendStrategy, runBaseline, runStrategyBenchmark } from "./runner";
import { formatLatency } from "./utils";

interface CliOptions {
    pattern: AccessPattern;
    strategies: StrategyKind[];
    listSize: number;
    cacheSize: number;
    ops: number;
    warmup: number;
    seed: number;
    baseline: boolean;
    output?: string;
    quiet: boolean;
    verbose: boolean;
}

function parseCount(value: string): number {
    const n = Number(value);
    if (!Number.isInteger(n) || n < 0) {
        throw new InvalidArgumentError("expected a non-negative integer");
    }
    return n;
}

function parsePositive(value: string): number {
    const n = parseCount(value);
    if (n === 0) {
        throw new InvalidArgumentError("expected a positive integer");
    }
    return n;
}

function parsePattern(value: string): AccessPattern {
    if (!isAccessPattern(value)) {
        throw new InvalidArgumentError(`expected one of ${Object.keys(ACCESS_PATTERNS).join(", ")}`);
    }
    return value;
}

function parseStrategies(value: string): StrategyKind[] {
    try {
        return value.split(",").map(parseStrategy);
    } catch (error) {
        throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
    }
}

/**
 * Main CLI program
 */
const program = new Command();

program
    .name("bench")
    .description("Replays a synthetic search trace against each reorganization strategy - outputs JSON")
    .version("0.1.0")
    .option("-p, --pattern <name>", `Access pattern: ${Object.keys(ACCESS_PATTERNS).join(", ")}`, parsePattern, DEFAULT_CONFIG.pattern)
    .option("-s, --strategies <list>", `Comma-separated list: ${STRATEGY_KINDS.join(",")}`, parseStrategies, [...DEFAULT_CONFIG.strategies])
    .option("--list-size <number>", "Distinct keys loaded", parsePositive, DEFAULT_CONFIG.listSize)
    .option("--cache-size <number>", "List capacity", parsePositive, DEFAULT_CONFIG.cacheSize)
    .option("--ops <number>", "Measured searches", parseCount, DEFAULT_CONFIG.operations)
    .option("--warmup <number>", "Warmup searches", parseCount, DEFAULT_CONFIG.warmupOperations)
    .option("--seed <number>", "Random seed for reproducibility", parseCount, DEFAULT_CONFIG.seed)
    .option("--no-baseline", "Skip the lru-cache baseline")
    .option("-o, --output <file>", "Output file path (default: stdout)")
    .option("--quiet", "Suppress progress output", false)
    .option("--verbose", "Print per-strategy reports", false)
    .parse();

const options = program.opts<CliOptions>();

/**
 * Log to stderr (so stdout is clean JSON)
 */
function log(...args: unknown[]): void {
    if (!options.quiet) {
        console.error(...args);
    }
}

/**
 * Main execution
 */
async function main(): Promise<void> {
    const config: BenchmarkConfig = {
        listSize: options.listSize,
        cacheSize: options.cacheSize,
        strategies: options.strategies,
        pattern: options.pattern,
        operations: options.ops,
        warmupOperations: options.warmup,
        seed: options.seed,
    };

    const pattern = ACCESS_PATTERNS[config.pattern];
    log("=== Starting Benchmark ===");
    log(`List Size: ${config.listSize}`);
    log(`Cache Size: ${config.cacheSize}`);
    log(`Access Pattern: ${pattern.name} - ${pattern.description}`);
    log(`Operations: ${config.operations}`);
    log(`Strategies: ${config.strategies.map(kind => STRATEGIES[kind].name).join(", ")}`);
    log("");

    // Generate data and trace once (same for all strategies)
    const data = generateData(config.listSize, config.seed);
    const sequence = generateSearchSequence(
        data,
        config.operations + config.warmupOperations,
        config.pattern,
        config.seed + 1
    );

    const results: BenchmarkResult[] = [];

    for (const [index, kind] of config.strategies.entries()) {
        log(`[${index + 1}/${config.strategies.length}] Testing ${STRATEGIES[kind].name}...`);

        const result = await runStrategyBenchmark(config, kind, data, sequence, {
            verbose: options.verbose,
            log,
        });
        results.push(result);

        log(`   ${result.hitRate.toFixed(2)}% hit rate, ${result.avgAccessCost.toFixed(2)} avg cost, p99 ${formatLatency(result.latencies.p99)}`);
        if (options.verbose && result.details) {
            log(formatReport(result.details));
        }
    }

    if (options.baseline) {
        log("Testing lru-cache baseline...");
        const result = runBaseline(config, new LruCacheBaseline(config.cacheSize), data, sequence);
        results.push(result);
        log(`   ${result.hitRate.toFixed(2)}% hit rate, p99 ${formatLatency(result.latencies.p99)}`);
    }

    log("");
    log(generateAnalysis(results));

    const suiteResult: BenchmarkSuiteResult = {
        config,
        timestamp: new Date(),
        results,
        recommendation: recommendStrategy(results),
    };

    const output = JSON.stringify(suiteResult, null, 2);

    if (options.output) {
        fs.writeFileSync(options.output, output, "utf-8");
        log(`✓ Results written to ${options.output}`);
    } else {
        // Output JSON to stdout (progress was on stderr)
        console.log(output);
    }

    log("✓ Benchmark complete!");
}

// Run main and handle errors
main().catch((error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error("❌ Error:", err.message);
    console.error(err.stack);
    process.exit(1);
});
