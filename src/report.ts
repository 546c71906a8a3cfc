import type { PerformanceReport } from "./types";

/**
 * Multi-line text rendering of a report, operation counts sorted by
 * descending count (ties keep first-seen order).
 */
export function formatReport(report: PerformanceReport): string {
    const lines = [
        "=== PERFORMANCE REPORT ===",
        `Uptime: ${(report.uptimeMs / 1000).toFixed(1)} seconds`,
        `Total Operations: ${report.totalSearches + report.insertions + report.evictions}`,
        `Hit Rate: ${report.hitRate.toFixed(2)}% (${report.hits}/${report.totalSearches})`,
        `Avg Access Cost: ${report.avgAccessCost.toFixed(2)} steps`,
        `Avg Search Time: ${report.avgSearchTimeMs.toFixed(3)} ms`,
        `Operations/sec: ${report.operationsPerSecond.toFixed(1)}`,
        `Insertions: ${report.insertions}, Evictions: ${report.evictions}`,
        `Strategy Changes: ${report.strategyChanges}`,
    ];

    const counts = Object.entries(report.operationCounts);
    if (counts.length > 0) {
        lines.push("", "Operation Counts:");
        counts
            .sort((a, b) => b[1] - a[1])
            .forEach(([label, count]) => lines.push(`  ${label.padEnd(20)}: ${count}`));
    }

    return lines.join("\n") + "\n";
}
