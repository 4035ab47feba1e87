import type { ProcessingSummary } from "../core/types.js";

export interface RunStats {
  /** Rows in the range being processed this run. */
  total: number;
  /** Rows examined so far, including skipped and invalid ones. */
  examined: number;
  processed: number;
  successful: number;
  /** Cumulative cost, including earlier runs. */
  totalCost: number;
  startTime: number;
}

export function createStats(total: number, carriedCost: number): RunStats {
  return {
    total,
    examined: 0,
    processed: 0,
    successful: 0,
    totalCost: carriedCost,
    startTime: Date.now(),
  };
}

export function successRate(successful: number, processed: number): number {
  return processed > 0 ? (successful / processed) * 100 : 0;
}

export function formatProgress(stats: RunStats): string {
  const elapsed = (Date.now() - stats.startTime) / 1000;
  const rate = elapsed > 0 ? stats.examined / elapsed : 0;
  const remaining = stats.total - stats.examined;
  const eta = rate > 0 ? remaining / rate : 0;
  const pct = stats.total > 0 ? ((stats.examined / stats.total) * 100).toFixed(1) : "100.0";

  return (
    `[${stats.examined}/${stats.total}] ${pct}% | ` +
    `success: ${successRate(stats.successful, stats.processed).toFixed(1)}% | ` +
    `cost: $${stats.totalCost.toFixed(4)} | ETA: ${formatDuration(eta)}`
  );
}

export function printProgress(stats: RunStats): void {
  if (!process.stdout.isTTY) return;
  process.stdout.write(`\r${formatProgress(stats)}${"".padEnd(10)}`);
}

export function formatSummary(summary: ProcessingSummary): string {
  const lines = [
    "=== Processing Complete ===",
    `  State:               ${summary.state}`,
    `  Rows:                ${summary.startIndex} -> ${summary.lastProcessedIndex} of ${summary.totalRecordsInDataset}`,
    `  Records processed:   ${summary.recordsProcessed}`,
    `  Successful:          ${summary.successfulClassifications}`,
    `  Success rate:        ${summary.successRate.toFixed(1)}%`,
    `  Run cost:            $${summary.runCost.toFixed(4)}`,
    `  Total cost:          $${summary.totalCost.toFixed(4)}`,
    `  Avg cost / success:  $${summary.averageCostPerRecord.toFixed(4)}`,
    `  Batch size:          ${summary.batchSizeUsed}`,
    `  Started:             ${summary.startTime}`,
    `  Finished:            ${summary.endTime}`,
  ];
  if (summary.skippedBatches.length > 0) {
    lines.push(`  Skipped batches:     ${summary.skippedBatches.map((b) => b.startIndex).join(", ")}`);
  }
  return lines.join("\n");
}

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const m = Math.floor(seconds / 60);
  const s = Math.round(seconds % 60);
  if (m < 60) return `${m}m ${s}s`;
  const h = Math.floor(m / 60);
  const rm = m % 60;
  return `${h}h ${rm}m`;
}
