// ---------------------------------------------------------------------------
// Batch processor: drives a resumable classification run over a dataset.
//
// The checkpoint is the only source of truth for the resume position. It is
// saved after every batch, so every batch boundary is a safe place to stop.
// ---------------------------------------------------------------------------

import { join } from "node:path";
import type pino from "pino";
import { errorMessage } from "../core/errors.js";
import { RunState } from "../core/types.js";
import type {
  Checkpoint,
  ClassificationOutcome,
  DatasetCostEstimate,
  PreparedRecord,
  ProcessingSummary,
  SkippedBatch,
} from "../core/types.js";
import type { CostModel } from "../cost/cost-model.js";
import { getDatasetStats, loadDataset, writeCsv } from "../dataset/dataset.js";
import { prepareTextForApi } from "../dataset/record-preparer.js";
import type { RecordPreparer } from "../dataset/record-preparer.js";
import { createStats, successRate } from "./progress.js";
import type { RunStats } from "./progress.js";
import { FINAL_CSV_FILE, latestByIndex } from "./store.js";
import type { RunStore } from "./store.js";

/** Rows sampled from the head of the dataset for cost previews. */
export const ESTIMATE_SAMPLE_SIZE = 10;

export const PREDICTION_COLUMNS = [
  "predicted_labels",
  "prediction_confidence",
  "model_used",
  "classification_success",
] as const;

/** The part of the classification client the processor depends on. */
export interface BatchClassifier {
  classifyBatch(records: readonly PreparedRecord[]): Promise<ClassificationOutcome[]>;
}

export interface BatchProcessorOptions {
  classifier: BatchClassifier;
  costModel: CostModel;
  store: RunStore;
  preparer: RecordPreparer;
  logger: pino.Logger;
  defaultBatchSize: number;
  /** Model priced in cost previews. */
  model: string;
  rateLimits?: { maxRequestsPerMinute: number; maxTokensPerMinute: number };
  onProgress?: (stats: RunStats) => void;
}

export interface ProcessOptions {
  batchSize?: number;
  /** Overrides the checkpoint's resume position. */
  startFrom?: number;
  maxRecords?: number;
  /** Aborting stops the run at the next batch boundary. */
  signal?: AbortSignal;
}

export interface CostPreview extends DatasetCostEstimate {
  sampleSize: number;
  avgTextLength: number;
  /** Lower bound on wall-clock minutes under the configured RPM/TPM ceilings. */
  minimumMinutes: number | null;
}

export class BatchProcessor {
  private readonly classifier: BatchClassifier;
  private readonly costModel: CostModel;
  private readonly store: RunStore;
  private readonly preparer: RecordPreparer;
  private readonly logger: pino.Logger;
  private readonly defaultBatchSize: number;
  private readonly model: string;
  private readonly rateLimits?: { maxRequestsPerMinute: number; maxTokensPerMinute: number };
  private readonly onProgress?: (stats: RunStats) => void;

  private runState: RunState = RunState.IDLE;
  private stopRequested = false;

  constructor(options: BatchProcessorOptions) {
    this.classifier = options.classifier;
    this.costModel = options.costModel;
    this.store = options.store;
    this.preparer = options.preparer;
    this.logger = options.logger.child({ component: "batch-processor" });
    this.defaultBatchSize = options.defaultBatchSize;
    this.model = options.model;
    this.rateLimits = options.rateLimits;
    this.onProgress = options.onProgress;
  }

  get state(): RunState {
    return this.runState;
  }

  /** Ask the run to stop once the in-flight batch has been persisted. */
  requestStop(): void {
    if (!this.stopRequested) {
      this.stopRequested = true;
      this.logger.info("stop requested, finishing current batch");
    }
  }

  // ── Cost preview ────────────────────────────────────────────────────────

  async estimateCost(dataPath: string): Promise<CostPreview> {
    const dataset = await loadDataset(dataPath);
    const sample = dataset.rows.slice(0, ESTIMATE_SAMPLE_SIZE);
    const avgTextLength =
      sample.reduce(
        (sum, row) => sum + prepareTextForApi(row.title, row.description, row.content).length,
        0,
      ) / sample.length;

    const estimate = this.costModel.estimateDatasetCost(
      dataset.rows.length,
      Math.round(avgTextLength),
      this.model,
    );

    let minimumMinutes: number | null = null;
    if (this.rateLimits) {
      const tokensPerRecord = estimate.avgInputTokens + estimate.avgOutputTokens;
      minimumMinutes = Math.max(
        estimate.datasetSize / this.rateLimits.maxRequestsPerMinute,
        (estimate.datasetSize * tokensPerRecord) / this.rateLimits.maxTokensPerMinute,
      );
    }

    this.logger.info(
      { totalCost: estimate.totalCost, datasetSize: estimate.datasetSize, model: this.model },
      "cost estimate",
    );
    return { ...estimate, sampleSize: sample.length, avgTextLength, minimumMinutes };
  }

  // ── Processing ──────────────────────────────────────────────────────────

  /**
   * Classify `[start, end)` of the dataset in batches.
   *
   * @throws DatasetValidationError when the dataset itself is unusable.
   */
  async processDataset(dataPath: string, options: ProcessOptions = {}): Promise<ProcessingSummary> {
    const dataset = await loadDataset(dataPath);
    const rows = dataset.rows;
    this.logger.info({ path: dataPath, stats: getDatasetStats(rows) }, "dataset loaded");

    let checkpoint = await this.store.loadCheckpoint();
    const batchSize = Math.max(1, options.batchSize ?? this.defaultBatchSize);
    const startIndex = options.startFrom ?? checkpoint.lastProcessedIndex;
    const endIndex =
      options.maxRecords !== undefined
        ? Math.min(startIndex + options.maxRecords, rows.length)
        : rows.length;

    this.logger.info({ startIndex, endIndex, batchSize }, "processing records");

    const stats = createStats(Math.max(0, endIndex - startIndex), checkpoint.totalCost);
    const skippedBatches: SkippedBatch[] = [];
    let runCost = 0;

    this.runState = RunState.RUNNING;
    this.stopRequested = false;
    const onAbort = () => this.requestStop();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    if (options.signal?.aborted) this.requestStop();

    let current = startIndex;
    try {
      while (current < endIndex) {
        if (this.stopRequested) {
          this.runState = RunState.INTERRUPTED;
          this.logger.info({ current }, "processing interrupted");
          break;
        }

        const width = Math.min(batchSize, endIndex - current);

        try {
          const records = this.preparer.prepareSlice(rows, current, width);

          if (records.length === 0) {
            this.logger.warn({ start: current, width }, "no valid data in batch");
          } else {
            this.logger.info(
              { start: current, end: current + width, records: records.length },
              "processing batch",
            );
            const outcomes = await this.classifier.classifyBatch(records);
            await this.persistResults(outcomes);

            const batchCost = outcomes.reduce((sum, o) => sum + o.cost, 0);
            const batchSuccess = outcomes.filter((o) => o.success).length;
            runCost += batchCost;
            stats.processed += outcomes.length;
            stats.successful += batchSuccess;
            stats.totalCost += batchCost;

            checkpoint = {
              ...checkpoint,
              totalCost: checkpoint.totalCost + batchCost,
              processedCount: checkpoint.processedCount + outcomes.length,
              successfulCount: checkpoint.successfulCount + batchSuccess,
            };
          }
        } catch (err) {
          this.logger.error(
            { start: current, width, err: errorMessage(err) },
            "batch processing error, skipping batch",
          );
          skippedBatches.push({ startIndex: current, width, error: errorMessage(err) });
        }

        checkpoint = await this.persistCheckpoint(checkpoint, current + width);
        current += width;
        stats.examined += width;
        this.onProgress?.(stats);
      }
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
    }

    if (this.runState === RunState.RUNNING) {
      this.runState = RunState.COMPLETED;
    }

    const summary: ProcessingSummary = {
      totalRecordsInDataset: rows.length,
      recordsProcessed: stats.processed,
      successfulClassifications: stats.successful,
      successRate: successRate(stats.successful, stats.processed),
      totalCost: checkpoint.totalCost,
      runCost,
      averageCostPerRecord: stats.successful > 0 ? runCost / stats.successful : 0,
      startIndex,
      endIndex,
      lastProcessedIndex: checkpoint.lastProcessedIndex,
      startTime: checkpoint.startTime,
      endTime: new Date().toISOString(),
      batchSizeUsed: batchSize,
      state: this.runState,
      skippedBatches,
    };

    try {
      await this.store.writeSummary(summary);
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, "failed to save summary");
    }

    this.logger.info({ summary }, "processing completed");
    return summary;
  }

  private async persistResults(outcomes: readonly ClassificationOutcome[]): Promise<void> {
    try {
      await this.store.appendResults(outcomes);
    } catch (err) {
      this.logger.error({ err: errorMessage(err), count: outcomes.length }, "failed to save results");
    }
  }

  /** Advance the resume position (never backwards) and save. */
  private async persistCheckpoint(checkpoint: Checkpoint, reachedIndex: number): Promise<Checkpoint> {
    const next: Checkpoint = {
      ...checkpoint,
      lastProcessedIndex: Math.max(checkpoint.lastProcessedIndex, reachedIndex),
    };
    try {
      return await this.store.saveCheckpoint(next);
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, "failed to save checkpoint");
      return next;
    }
  }

  // ── Final CSV ───────────────────────────────────────────────────────────

  /**
   * Join the original dataset with the result log by row index and write
   * `final_results.csv` to the output directory.
   *
   * @returns the path of the written file.
   */
  async createFinalCsv(dataPath: string): Promise<string> {
    const dataset = await loadDataset(dataPath);
    if (!this.store.hasResults()) {
      throw new Error(`No results file found in ${this.store.outputDir}`);
    }

    const results = latestByIndex(await this.store.readResults());
    const predictionColumns = new Set<string>(PREDICTION_COLUMNS);
    const columns = [
      ...dataset.headers.filter((h) => !predictionColumns.has(h)),
      ...PREDICTION_COLUMNS,
    ];

    const rows = dataset.rows.map((row) => {
      const outcome = results.get(row.index);
      const joined: Record<string, string> = {
        ...row.columns,
        predicted_labels: "",
        prediction_confidence: "",
        model_used: "",
        classification_success: "false",
      };

      if (outcome?.success) {
        joined["predicted_labels"] = outcome.labels.map((l) => l.label).join("; ");
        joined["prediction_confidence"] = outcome.labels
          .map((l) => l.confidence.toFixed(2))
          .join("; ");
        joined["model_used"] = outcome.modelUsed;
        joined["classification_success"] = "true";
      }
      return joined;
    });

    const outputPath = join(this.store.outputDir, FINAL_CSV_FILE);
    await writeCsv(outputPath, columns, rows);
    this.logger.info({ path: outputPath, rows: rows.length }, "final results saved");
    return outputPath;
  }
}
