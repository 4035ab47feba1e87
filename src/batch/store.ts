// ---------------------------------------------------------------------------
// Durable run state: checkpoint, append-only result log, run summary.
// All files are JSON, rewritten whole on every save.
// ---------------------------------------------------------------------------

import { existsSync } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type pino from "pino";
import { z } from "zod";
import { PersistenceError, errorMessage } from "../core/errors.js";
import type { Checkpoint, ClassificationOutcome, ProcessingSummary } from "../core/types.js";
import { LabelSchema } from "../taxonomy/labels.js";

export const CHECKPOINT_FILE = "checkpoint.json";
export const RESULTS_FILE = "classification_results.json";
export const SUMMARY_FILE = "processing_summary.json";
export const FINAL_CSV_FILE = "final_results.csv";

// ── Schemas ────────────────────────────────────────────────────────────────

export const CheckpointSchema = z.object({
  lastProcessedIndex: z.number().int().nonnegative(),
  totalCost: z.number().nonnegative(),
  processedCount: z.number().int().nonnegative().default(0),
  successfulCount: z.number().int().nonnegative().default(0),
  startTime: z.string(),
  lastUpdate: z.string(),
});

export const OutcomeSchema = z.object({
  index: z.number().int().nonnegative(),
  success: z.boolean(),
  labels: z.array(z.object({ label: LabelSchema, confidence: z.number().min(0).max(1) })),
  modelUsed: z.string(),
  cost: z.number().nonnegative(),
  warnings: z.array(z.string()),
  qualityIssues: z.array(z.string()),
  error: z.string().optional(),
  inputTokens: z.number().int().nonnegative().default(0),
  outputTokens: z.number().int().nonnegative().default(0),
  usedFallback: z.boolean().default(false),
  validationMessage: z.string().optional(),
  rawResponse: z.string().optional(),
});

export const ResultLogSchema = z.array(OutcomeSchema);

// ── Helpers ────────────────────────────────────────────────────────────────

async function writeJson(path: string, value: unknown): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    await writeFile(tmp, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    await rename(tmp, path);
  } catch (err) {
    throw new PersistenceError(`Failed to write ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
}

async function readJson(path: string): Promise<unknown> {
  try {
    const parsed: unknown = JSON.parse(await readFile(path, "utf-8"));
    return parsed;
  } catch (err) {
    throw new PersistenceError(`Failed to read ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
}

export function freshCheckpoint(now: Date = new Date()): Checkpoint {
  const stamp = now.toISOString();
  return {
    lastProcessedIndex: 0,
    totalCost: 0,
    processedCount: 0,
    successfulCount: 0,
    startTime: stamp,
    lastUpdate: stamp,
  };
}

// ── Store ──────────────────────────────────────────────────────────────────

/**
 * File-backed store for one output directory. The batch processor is its
 * only writer.
 */
export class RunStore {
  readonly checkpointPath: string;
  readonly resultsPath: string;
  readonly summaryPath: string;
  private readonly logger: pino.Logger;

  constructor(readonly outputDir: string, logger: pino.Logger) {
    this.checkpointPath = join(outputDir, CHECKPOINT_FILE);
    this.resultsPath = join(outputDir, RESULTS_FILE);
    this.summaryPath = join(outputDir, SUMMARY_FILE);
    this.logger = logger.child({ component: "store" });
  }

  /** Load the checkpoint, or start a fresh one when absent or unreadable. */
  async loadCheckpoint(): Promise<Checkpoint> {
    if (!existsSync(this.checkpointPath)) return freshCheckpoint();

    try {
      const checkpoint = CheckpointSchema.parse(await readJson(this.checkpointPath));
      this.logger.info(
        { lastProcessedIndex: checkpoint.lastProcessedIndex, totalCost: checkpoint.totalCost },
        "loaded checkpoint",
      );
      return checkpoint;
    } catch (err) {
      this.logger.error(
        { path: this.checkpointPath, err: errorMessage(err) },
        "failed to load checkpoint, starting fresh",
      );
      return freshCheckpoint();
    }
  }

  /** Persist the checkpoint, stamping `lastUpdate`. Returns the saved copy. */
  async saveCheckpoint(checkpoint: Checkpoint): Promise<Checkpoint> {
    const stamped: Checkpoint = { ...checkpoint, lastUpdate: new Date().toISOString() };
    await writeJson(this.checkpointPath, stamped);
    return stamped;
  }

  /** Every outcome recorded so far, in write order. Empty when no log exists. */
  async readResults(): Promise<ClassificationOutcome[]> {
    if (!existsSync(this.resultsPath)) return [];
    const parsed = ResultLogSchema.safeParse(await readJson(this.resultsPath));
    if (!parsed.success) {
      throw new PersistenceError(
        `Result log is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
        this.resultsPath,
      );
    }
    return parsed.data;
  }

  /** Read the whole log, append, and rewrite it. */
  async appendResults(outcomes: readonly ClassificationOutcome[]): Promise<number> {
    const existing = await this.readResults();
    const all = [...existing, ...outcomes];
    await writeJson(this.resultsPath, all);
    this.logger.info({ appended: outcomes.length, total: all.length }, "saved results");
    return all.length;
  }

  async writeSummary(summary: ProcessingSummary): Promise<void> {
    await writeJson(this.summaryPath, summary);
  }

  hasResults(): boolean {
    return existsSync(this.resultsPath);
  }
}

/**
 * Index outcomes by row. The log is append-only, so the last entry for an
 * index is the authoritative one.
 */
export function latestByIndex(outcomes: readonly ClassificationOutcome[]): Map<number, ClassificationOutcome> {
  const byIndex = new Map<number, ClassificationOutcome>();
  for (const outcome of outcomes) {
    byIndex.set(outcome.index, outcome);
  }
  return byIndex;
}
