// ---------------------------------------------------------------------------
// Integration tests for the batch processor: real dataset files, real store
// in a temporary directory, and an in-process completion service.
// ---------------------------------------------------------------------------

import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { BatchProcessor } from "../../../src/batch/batch-processor.js";
import type { BatchClassifier } from "../../../src/batch/batch-processor.js";
import { RunStore, latestByIndex } from "../../../src/batch/store.js";
import { ClassificationClient } from "../../../src/classifier/classification-client.js";
import { DatasetValidationError } from "../../../src/core/errors.js";
import type { ClassificationOutcome, PreparedRecord } from "../../../src/core/types.js";
import { CostModel } from "../../../src/cost/cost-model.js";
import { parseDataset, toCsv } from "../../../src/dataset/dataset.js";
import { RecordPreparer, prepareTextForApi } from "../../../src/dataset/record-preparer.js";
import { isRateLimited } from "../../../src/orchestrator/retry.js";
import { FakeCompletionService, labelsReply } from "../../helpers/fake-completion.js";
import type { Responder } from "../../helpers/fake-completion.js";
import { createMockLogger } from "../../helpers/loggers.js";

const PRIMARY = "primary-model";
const FALLBACK = "fallback-model";
const PRICING = {
  [PRIMARY]: { input: 0.001, output: 0.002 },
  [FALLBACK]: { input: 0.003, output: 0.004 },
};
const PRIMARY_COST = 0.0012;
const FALLBACK_COST = 0.0034;

const VALID = labelsReply(["Môi trường", 0.9], ["Tài nguyên nước", 0.8]);
const COLUMNS = ["Tieu_de", "Description", "Noi_dung_tin_bai", "Nguon"];

let dir: string;
let dataPath: string;
let outputDir: string;

async function writeDataset(count: number, overrides: Record<number, Record<string, string>> = {}) {
  const rows = Array.from({ length: count }, (_, i) => ({
    Tieu_de: `Bài số ${i}`,
    Description: `Mô tả bài ${i}`,
    Noi_dung_tin_bai: `Nội dung bài ${i}`,
    Nguon: "test",
    ...overrides[i],
  }));
  await writeFile(dataPath, `${toCsv(COLUMNS, rows)}\n`, "utf-8");
}

/** Replies with garbage for the given row titles and valid labels otherwise. */
function failingRows(...indexes: number[]): Responder {
  return (request) => {
    const user = request.messages[1]?.content ?? "";
    return indexes.some((i) => user.includes(`TIÊU ĐỀ: Bài số ${i}\n`)) ? "không hợp lệ" : VALID;
  };
}

function build(options: { responder?: Responder; classifier?: BatchClassifier; batchSize?: number } = {}) {
  const logger = createMockLogger();
  const costModel = new CostModel({ pricing: PRICING });
  const service = new FakeCompletionService(options.responder ?? failingRows());
  const client = new ClassificationClient({
    service,
    costModel,
    policy: {
      maxAttempts: 3,
      baseDelayMs: 0,
      backoffFactor: 2,
      cooldownMs: 0,
      needsCooldown: isRateLimited,
      escalationModel: FALLBACK,
      pacingMs: 0,
    },
    primaryModel: PRIMARY,
    maxOutputTokens: 500,
    temperature: 0.1,
    confidenceThreshold: 0.7,
    jsonModeModels: [],
    logger,
  });
  const store = new RunStore(outputDir, logger);
  const processor = new BatchProcessor({
    classifier: options.classifier ?? client,
    costModel,
    store,
    preparer: new RecordPreparer(logger),
    logger,
    defaultBatchSize: options.batchSize ?? 2,
    model: PRIMARY,
    rateLimits: { maxRequestsPerMinute: 60, maxTokensPerMinute: 1_000 },
  });
  return { service, store, processor };
}

function okOutcome(index: number): ClassificationOutcome {
  return {
    index,
    success: true,
    labels: [{ label: "Đất đai", confidence: 0.8 }],
    modelUsed: PRIMARY,
    cost: 0.001,
    warnings: [],
    qualityIssues: [],
    inputTokens: 100,
    outputTokens: 10,
    usedFallback: false,
  };
}

/** Records the resume position of every checkpoint save. */
function trackCheckpoints(store: RunStore): number[] {
  const positions: number[] = [];
  const save = store.saveCheckpoint.bind(store);
  vi.spyOn(store, "saveCheckpoint").mockImplementation(async (checkpoint) => {
    positions.push(checkpoint.lastProcessedIndex);
    return save(checkpoint);
  });
  return positions;
}

describe("BatchProcessor", () => {
  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "batch-processor-"));
    dataPath = join(dir, "data.csv");
    outputDir = join(dir, "output");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  // ── End-to-end ────────────────────────────────────────────────────────

  it("classifies a dataset, persists every outcome and writes the joined CSV", async () => {
    await writeDataset(3);
    const { service, store, processor } = build({ responder: failingRows(1) });

    const summary = await processor.processDataset(dataPath);

    expect(summary).toMatchObject({
      totalRecordsInDataset: 3,
      recordsProcessed: 3,
      successfulClassifications: 2,
      startIndex: 0,
      endIndex: 3,
      lastProcessedIndex: 3,
      batchSizeUsed: 2,
      state: "completed",
      skippedBatches: [],
    });
    expect(summary.successRate).toBeCloseTo(66.67, 2);
    const expectedCost = PRIMARY_COST + (PRIMARY_COST + FALLBACK_COST) + PRIMARY_COST;
    expect(summary.totalCost).toBeCloseTo(expectedCost, 10);
    expect(summary.runCost).toBeCloseTo(expectedCost, 10);
    expect(summary.averageCostPerRecord).toBeCloseTo(expectedCost / 2, 10);
    expect(processor.state).toBe("completed");

    // Row 1 went to the primary model and then once to the fallback.
    expect(service.requests.map((r) => r.model)).toEqual([PRIMARY, PRIMARY, FALLBACK, PRIMARY]);

    const checkpoint = await store.loadCheckpoint();
    expect(checkpoint).toMatchObject({ lastProcessedIndex: 3, processedCount: 3, successfulCount: 2 });
    expect(checkpoint.totalCost).toBeCloseTo(expectedCost, 10);

    const results = await store.readResults();
    expect(results.map((o) => [o.index, o.success])).toEqual([
      [0, true],
      [1, false],
      [2, true],
    ]);
    expect(results[1]?.rawResponse).toBe("không hợp lệ");
    expect(existsSync(store.summaryPath)).toBe(true);

    const csvPath = await processor.createFinalCsv(dataPath);
    expect(csvPath).toBe(join(outputDir, "final_results.csv"));
    const joined = parseDataset(await readFile(csvPath, "utf-8"), csvPath);
    expect(joined.headers).toEqual([
      ...COLUMNS,
      "predicted_labels",
      "prediction_confidence",
      "model_used",
      "classification_success",
    ]);
    expect(joined.rows[0]?.columns).toMatchObject({
      Tieu_de: "Bài số 0",
      predicted_labels: "Môi trường; Tài nguyên nước",
      prediction_confidence: "0.90; 0.80",
      model_used: PRIMARY,
      classification_success: "true",
    });
    expect(joined.rows[1]?.columns).toMatchObject({
      predicted_labels: "",
      prediction_confidence: "",
      model_used: "",
      classification_success: "false",
    });
  });

  it("handles a bare array, a fenced object rescued by the fallback and an unparseable row", async () => {
    await writeDataset(3);
    const fencedObject =
      "```json\n" + JSON.stringify({ result: [{ label: "Đất đai", confidence: 0.85 }] }) + "\n```";
    const responder: Responder = (request) => {
      const user = request.messages[1]?.content ?? "";
      if (user.includes("TIÊU ĐỀ: Bài số 0\n")) return VALID;
      if (user.includes("TIÊU ĐỀ: Bài số 1\n")) {
        return request.model === FALLBACK ? fencedObject : "xin lỗi, tôi không chắc";
      }
      return "không phải JSON";
    };
    const { service, store, processor } = build({ responder, batchSize: 3 });

    const summary = await processor.processDataset(dataPath);

    expect(service.requests.map((r) => r.model)).toEqual([
      PRIMARY,
      PRIMARY,
      FALLBACK,
      PRIMARY,
      FALLBACK,
    ]);
    expect(summary).toMatchObject({
      recordsProcessed: 3,
      successfulClassifications: 2,
      lastProcessedIndex: 3,
      state: "completed",
    });
    const expectedCost = PRIMARY_COST + 2 * (PRIMARY_COST + FALLBACK_COST);
    expect(summary.totalCost).toBeCloseTo(expectedCost, 10);

    const results = await store.readResults();
    expect(results.map((o) => [o.index, o.success, o.modelUsed])).toEqual([
      [0, true, PRIMARY],
      [1, true, FALLBACK],
      [2, false, FALLBACK],
    ]);
    expect(results[1]?.labels).toEqual([{ label: "Đất đai", confidence: 0.85 }]);
    expect(results[2]?.error).toBe("Invalid response format: invalid_json");
    expect(results[2]?.rawResponse).toBe("không phải JSON");

    const csvPath = await processor.createFinalCsv(dataPath);
    const joined = parseDataset(await readFile(csvPath, "utf-8"), csvPath);
    expect(joined.rows[1]?.columns).toMatchObject({
      predicted_labels: "Đất đai",
      prediction_confidence: "0.85",
      model_used: FALLBACK,
      classification_success: "true",
    });
    expect(joined.rows[2]?.columns).toMatchObject({
      predicted_labels: "",
      classification_success: "false",
    });
  });

  // ── Resume ────────────────────────────────────────────────────────────

  it("does nothing when resumed after a completed run", async () => {
    await writeDataset(3);
    const { service, store, processor } = build();
    const first = await processor.processDataset(dataPath);
    const calls = service.requests.length;

    const second = await processor.processDataset(dataPath);

    expect(service.requests).toHaveLength(calls);
    expect(await store.readResults()).toHaveLength(3);
    expect(second).toMatchObject({ recordsProcessed: 0, startIndex: 3, lastProcessedIndex: 3, runCost: 0 });
    expect(second.totalCost).toBeCloseTo(first.totalCost, 10);
  });

  it("continues from the checkpoint after a partial run", async () => {
    await writeDataset(5);
    const { store, processor } = build();

    const partial = await processor.processDataset(dataPath, { maxRecords: 3 });
    expect(partial).toMatchObject({ endIndex: 3, lastProcessedIndex: 3, recordsProcessed: 3 });

    const rest = await processor.processDataset(dataPath);
    expect(rest).toMatchObject({ startIndex: 3, endIndex: 5, lastProcessedIndex: 5, recordsProcessed: 2 });

    const checkpoint = await store.loadCheckpoint();
    expect(checkpoint.processedCount).toBe(5);
    expect((await store.readResults()).map((o) => o.index)).toEqual([0, 1, 2, 3, 4]);
  });

  it("advances the checkpoint by each attempted batch width", async () => {
    await writeDataset(5);
    const { store, processor } = build();
    const positions = trackCheckpoints(store);

    await processor.processDataset(dataPath);

    expect(positions).toEqual([2, 4, 5]);
  });

  it("never moves the checkpoint backwards when re-running earlier rows", async () => {
    await writeDataset(5);
    const { store, processor } = build();
    await processor.processDataset(dataPath);

    const redo = await processor.processDataset(dataPath, { startFrom: 0, maxRecords: 2 });

    expect(redo).toMatchObject({ startIndex: 0, endIndex: 2, recordsProcessed: 2, lastProcessedIndex: 5 });
    const results = await store.readResults();
    expect(results.map((o) => o.index)).toEqual([0, 1, 2, 3, 4, 0, 1]);
    expect(latestByIndex(results).size).toBe(5);
  });

  // ── Invalid rows & failures ───────────────────────────────────────────

  it("skips invalid rows but still counts them toward the resume position", async () => {
    await writeDataset(3, { 1: { Tieu_de: "Tin" } });
    const { service, store, processor } = build({ batchSize: 1 });
    const positions = trackCheckpoints(store);

    const summary = await processor.processDataset(dataPath);

    expect(service.requests).toHaveLength(2);
    expect(positions).toEqual([1, 2, 3]);
    expect(summary.recordsProcessed).toBe(2);
    expect((await store.readResults()).map((o) => o.index)).toEqual([0, 2]);
  });

  it("skips a batch that throws and keeps going", async () => {
    await writeDataset(10);
    const classifyBatch = vi.fn(async (records: readonly PreparedRecord[]) => {
      if (records[0]?.index === 2) throw new Error("network meltdown");
      return records.map((r) => okOutcome(r.index));
    });
    const { store, processor } = build({ classifier: { classifyBatch } });
    const positions = trackCheckpoints(store);

    const summary = await processor.processDataset(dataPath);

    expect(classifyBatch).toHaveBeenCalledTimes(5);
    expect(positions).toEqual([2, 4, 6, 8, 10]);
    expect(summary).toMatchObject({
      recordsProcessed: 8,
      successfulClassifications: 8,
      lastProcessedIndex: 10,
      state: "completed",
      skippedBatches: [{ startIndex: 2, width: 2, error: "network meltdown" }],
    });
    expect((await store.readResults()).map((o) => o.index)).toEqual([0, 1, 4, 5, 6, 7, 8, 9]);
  });

  it("fails fast on an unusable dataset without touching the checkpoint", async () => {
    await writeFile(dataPath, "Tieu_de,Description\nBài số 0,Mô tả\n", "utf-8");
    const { store, processor } = build();

    await expect(processor.processDataset(dataPath)).rejects.toBeInstanceOf(DatasetValidationError);
    expect(existsSync(store.checkpointPath)).toBe(false);
  });

  // ── Interrupts ────────────────────────────────────────────────────────

  it("stops at the next batch boundary when the signal aborts", async () => {
    await writeDataset(6);
    const controller = new AbortController();
    const classifyBatch = vi.fn(async (records: readonly PreparedRecord[]) => {
      controller.abort();
      return records.map((r) => okOutcome(r.index));
    });
    const { store, processor } = build({ classifier: { classifyBatch } });

    const summary = await processor.processDataset(dataPath, { signal: controller.signal });

    expect(classifyBatch).toHaveBeenCalledTimes(1);
    expect(summary).toMatchObject({ state: "interrupted", lastProcessedIndex: 2, recordsProcessed: 2 });
    expect((await store.loadCheckpoint()).lastProcessedIndex).toBe(2);

    const resumed = await processor.processDataset(dataPath);
    expect(resumed).toMatchObject({ state: "completed", startIndex: 2, lastProcessedIndex: 6 });
  });

  it("honours requestStop between batches", async () => {
    await writeDataset(6);
    let processor: BatchProcessor | undefined;
    const classifyBatch = vi.fn(async (records: readonly PreparedRecord[]) => {
      if (records[0]?.index === 2) processor?.requestStop();
      return records.map((r) => okOutcome(r.index));
    });
    const built = build({ classifier: { classifyBatch } });
    processor = built.processor;

    const summary = await processor.processDataset(dataPath);

    expect(classifyBatch).toHaveBeenCalledTimes(2);
    expect(summary).toMatchObject({ state: "interrupted", lastProcessedIndex: 4 });
  });

  // ── Cost preview & final CSV ──────────────────────────────────────────

  it("estimates cost from at most the first ten rows", async () => {
    await writeDataset(12);
    const { service, processor } = build();

    const estimate = await processor.estimateCost(dataPath);

    const sampleLengths = Array.from(
      { length: 10 },
      (_, i) => prepareTextForApi(`Bài số ${i}`, `Mô tả bài ${i}`, `Nội dung bài ${i}`).length,
    );
    const avg = sampleLengths.reduce((a, b) => a + b, 0) / 10;
    expect(estimate.sampleSize).toBe(10);
    expect(estimate.datasetSize).toBe(12);
    expect(estimate.avgTextLength).toBeCloseTo(avg, 10);
    expect(estimate.avgOutputTokens).toBe(120);
    expect(estimate.minimumMinutes).toBeCloseTo(
      Math.max(12 / 60, (12 * (estimate.avgInputTokens + estimate.avgOutputTokens)) / 1_000),
      10,
    );
    expect(service.requests).toHaveLength(0);
  });

  it("refuses to build the final CSV before any results exist", async () => {
    await writeDataset(2);
    const { processor } = build();
    await expect(processor.createFinalCsv(dataPath)).rejects.toThrow(
      `No results file found in ${outputDir}`,
    );
  });
});
