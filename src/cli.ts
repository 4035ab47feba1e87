#!/usr/bin/env node
// ---------------------------------------------------------------------------
// Command-line entry point.
//
//   news-labeler test
//   news-labeler estimate [--data <csv>]
//   news-labeler process  [--data <csv>] [--batch-size N] [--start-from N]
//                         [--max-records N] [--output-dir <dir>]
// ---------------------------------------------------------------------------

import "dotenv/config";
import { parseArgs } from "node:util";
import type pino from "pino";
import { BatchProcessor } from "./batch/batch-processor.js";
import type { CostPreview } from "./batch/batch-processor.js";
import { formatSummary, printProgress } from "./batch/progress.js";
import { RunStore } from "./batch/store.js";
import { ClassificationClient } from "./classifier/classification-client.js";
import { AnthropicCompletionService } from "./completion/anthropic-service.js";
import { loadConfig } from "./config/config.js";
import { ConfigurationError, DatasetValidationError, errorMessage } from "./core/errors.js";
import type { AppConfig } from "./core/types.js";
import { CostModel } from "./cost/cost-model.js";
import { RecordPreparer } from "./dataset/record-preparer.js";
import { createLogger } from "./logging/logger.js";
import { createClassificationPolicy } from "./orchestrator/retry.js";

const COMMANDS = ["test", "estimate", "process"] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: news-labeler <${COMMANDS.join("|")}> [options]

Options:
  --data <path>          CSV dataset (default: DATA_PATH)
  --batch-size <n>       records per batch (default: BATCH_SIZE)
  --start-from <n>       row index to start at, overriding the checkpoint
  --max-records <n>      process at most n rows from the start index
  --output-dir <path>    checkpoint and results directory (default: OUTPUT_PATH)`;

const SAMPLE_RECORD = {
  index: 0,
  title: "Bộ TN&MT tổ chức hội nghị về quản lý tài nguyên nước",
  description: "Hội nghị bàn về các giải pháp bảo vệ nguồn nước và ứng phó với hạn hán",
  content:
    "Ngày 15/3, Bộ Tài nguyên và Môi trường tổ chức hội nghị toàn quốc về quản lý tài nguyên nước. " +
    "Các đại biểu thảo luận về tình trạng suy giảm nguồn nước và giải pháp bảo vệ môi trường nước.",
};

interface CliOptions {
  command: Command;
  dataPath: string;
  outputDir: string;
  batchSize?: number;
  startFrom?: number;
  maxRecords?: number;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseCount(name: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError([`--${name} must be an integer >= ${min}, got '${value}'`]);
  }
  return parsed;
}

function parseCliArgs(argv: string[], config: AppConfig): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      data: { type: "string" },
      "batch-size": { type: "string" },
      "start-from": { type: "string" },
      "max-records": { type: "string" },
      "output-dir": { type: "string" },
    },
    allowPositionals: true,
    strict: true,
  });

  const command = positionals[0];
  if (!isCommand(command)) {
    throw new ConfigurationError([`Unknown command '${command ?? ""}'\n\n${USAGE}`]);
  }

  return {
    command,
    dataPath: values.data ?? config.paths.dataPath,
    outputDir: values["output-dir"] ?? config.paths.outputPath,
    batchSize: parseCount("batch-size", values["batch-size"], 1),
    startFrom: parseCount("start-from", values["start-from"], 0),
    maxRecords: parseCount("max-records", values["max-records"], 1),
  };
}

function printEstimate(estimate: CostPreview): void {
  console.log("Cost estimate");
  console.log("=============");
  console.log(`  Model:            ${estimate.model}`);
  console.log(`  Records:          ${estimate.datasetSize}`);
  console.log(`  Sampled rows:     ${estimate.sampleSize}`);
  console.log(`  Avg text length:  ${Math.round(estimate.avgTextLength)} chars`);
  console.log(`  Avg input tokens: ${estimate.avgInputTokens}`);
  console.log(`  Avg output tokens:${estimate.avgOutputTokens}`);
  console.log(`  Cost per record:  $${estimate.costPerRecord.toFixed(6)}`);
  console.log(`  Total cost:       $${estimate.totalCost.toFixed(4)}`);
  if (estimate.minimumMinutes !== null) {
    console.log(`  Minimum duration: ${estimate.minimumMinutes.toFixed(1)} min at configured limits`);
  }
  console.log();
}

async function main(): Promise<void> {
  const config = loadConfig();
  const opts = parseCliArgs(process.argv.slice(2), config);
  const logger: pino.Logger = createLogger(config.logging);

  const service = new AnthropicCompletionService(config.api, logger);
  const costModel = new CostModel({ logger });
  const client = new ClassificationClient({
    service,
    costModel,
    policy: createClassificationPolicy(config),
    primaryModel: config.models.primary,
    maxOutputTokens: config.models.maxTokens,
    temperature: config.models.temperature,
    confidenceThreshold: config.processing.confidenceThreshold,
    jsonModeModels: config.models.jsonModeModels,
    logger,
  });
  const processor = new BatchProcessor({
    classifier: client,
    costModel,
    store: new RunStore(opts.outputDir, logger),
    preparer: new RecordPreparer(logger, config.processing.maxContentLength),
    logger,
    defaultBatchSize: config.processing.batchSize,
    model: config.models.primary,
    rateLimits: {
      maxRequestsPerMinute: config.rateLimit.maxRequestsPerMinute,
      maxTokensPerMinute: config.rateLimit.maxTokensPerMinute,
    },
    onProgress: printProgress,
  });

  switch (opts.command) {
    case "test": {
      if (!(await client.testConnection())) {
        console.error("API connection failed");
        process.exitCode = 1;
        return;
      }
      const outcome = await client.classify(SAMPLE_RECORD);
      console.log(`Success:  ${outcome.success}`);
      console.log(`Model:    ${outcome.modelUsed}`);
      console.log(`Cost:     $${outcome.cost.toFixed(6)}`);
      for (const { label, confidence } of outcome.labels) {
        console.log(`  - ${label} (${confidence.toFixed(2)})`);
      }
      if (outcome.error) console.log(`Error:    ${outcome.error}`);
      if (!outcome.success) process.exitCode = 1;
      return;
    }

    case "estimate": {
      printEstimate(await processor.estimateCost(opts.dataPath));
      return;
    }

    case "process": {
      if (!(await client.testConnection())) {
        console.error("API connection failed, aborting");
        process.exitCode = 1;
        return;
      }
      printEstimate(await processor.estimateCost(opts.dataPath));

      // Graceful shutdown: the current batch is finished and persisted first.
      const onSignal = () => {
        console.log("\nInterrupted. Finishing current batch...");
        processor.requestStop();
      };
      process.on("SIGINT", onSignal);
      process.on("SIGTERM", onSignal);

      try {
        const summary = await processor.processDataset(opts.dataPath, {
          batchSize: opts.batchSize,
          startFrom: opts.startFrom,
          maxRecords: opts.maxRecords,
        });
        console.log(`\n${formatSummary(summary)}`);
      } finally {
        process.removeListener("SIGINT", onSignal);
        process.removeListener("SIGTERM", onSignal);
      }

      const csvPath = await processor.createFinalCsv(opts.dataPath);
      console.log(`Final results: ${csvPath}`);
      return;
    }
  }
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError || err instanceof DatasetValidationError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", errorMessage(err));
  }
  process.exit(1);
});
