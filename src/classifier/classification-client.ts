// ---------------------------------------------------------------------------
// Classification client: one article in, one ClassificationOutcome out.
// Owns no persistent state.
// ---------------------------------------------------------------------------

import type pino from "pino";
import { errorMessage } from "../core/errors.js";
import type {
  ClassificationOutcome,
  CompletionResponse,
  CompletionService,
  PreparedRecord,
} from "../core/types.js";
import type { CostModel } from "../cost/cost-model.js";
import { sleep, withRetry } from "../orchestrator/retry.js";
import type { ClassificationPolicy } from "../orchestrator/retry.js";
import { checkResponseQuality, validateLabels } from "../parsing/label-validator.js";
import { parseResponse } from "../parsing/response-parser.js";
import { buildClassificationMessages } from "../prompts/templates.js";

/** The fields of a record the client needs. */
export type ClassificationInput = Pick<PreparedRecord, "index" | "title" | "description" | "content">;

export interface ClassificationClientOptions {
  service: CompletionService;
  costModel: CostModel;
  policy: ClassificationPolicy;
  primaryModel: string;
  maxOutputTokens: number;
  temperature: number;
  confidenceThreshold: number;
  /** Model id fragments that get JSON-constrained output. */
  jsonModeModels: readonly string[];
  logger: pino.Logger;
}

export class ClassificationClient {
  private readonly service: CompletionService;
  private readonly costModel: CostModel;
  private readonly policy: ClassificationPolicy;
  private readonly primaryModel: string;
  private readonly maxOutputTokens: number;
  private readonly temperature: number;
  private readonly confidenceThreshold: number;
  private readonly jsonModeModels: readonly string[];
  private readonly logger: pino.Logger;

  constructor(options: ClassificationClientOptions) {
    this.service = options.service;
    this.costModel = options.costModel;
    this.policy = options.policy;
    this.primaryModel = options.primaryModel;
    this.maxOutputTokens = options.maxOutputTokens;
    this.temperature = options.temperature;
    this.confidenceThreshold = options.confidenceThreshold;
    this.jsonModeModels = options.jsonModeModels;
    this.logger = options.logger.child({ component: "classifier" });
  }

  get fallbackModel(): string {
    return this.policy.escalationModel;
  }

  usesJsonMode(model: string): boolean {
    return this.jsonModeModels.some((fragment) => model.includes(fragment));
  }

  /**
   * Classify one record with the primary model, or with the escalation model
   * when `useFallback` is set. Never throws: every failure becomes an outcome
   * with `success: false`.
   */
  async classify(record: ClassificationInput, useFallback: boolean = false): Promise<ClassificationOutcome> {
    const model = useFallback ? this.policy.escalationModel : this.primaryModel;
    const log = this.logger.child({ index: record.index, model });
    const messages = buildClassificationMessages(record.title, record.description, record.content);

    let response: CompletionResponse;
    try {
      response = await withRetry(
        () =>
          this.service.complete({
            model,
            messages,
            temperature: this.temperature,
            maxOutputTokens: this.maxOutputTokens,
            jsonMode: this.usesJsonMode(model),
          }),
        {
          ...this.policy,
          onRetry: (err, attempt, delayMs) => {
            log.warn({ attempt, delayMs, err: errorMessage(err) }, "completion failed, retrying");
            this.policy.onRetry?.(err, attempt, delayMs);
          },
        },
      );
    } catch (err) {
      log.error({ err: errorMessage(err) }, "completion failed after retries");
      return failedOutcome(record.index, model, useFallback, errorMessage(err));
    }

    const { inputTokens, outputTokens } = response.usage;
    const cost = this.costModel.calculateCost(model, inputTokens, outputTokens);
    log.info({ inputTokens, outputTokens, cost }, "completion received");

    const parsed = parseResponse(response.text);
    if (!parsed.ok) {
      log.error({ reason: parsed.reason, detail: parsed.message }, "invalid response format");
      return {
        ...failedOutcome(record.index, model, useFallback, `Invalid response format: ${parsed.reason}`),
        cost,
        inputTokens,
        outputTokens,
        validationMessage: parsed.message,
        rawResponse: response.text,
      };
    }

    const { cleaned, warnings } = validateLabels(parsed.items);
    if (warnings.length > 0) {
      log.warn({ warnings }, "label validation warnings");
    }

    const quality = checkResponseQuality(cleaned, this.confidenceThreshold);
    if (!quality.acceptable) {
      log.warn({ issues: quality.issues }, "quality issues detected");
    }

    return {
      index: record.index,
      success: true,
      labels: cleaned,
      modelUsed: model,
      cost,
      warnings,
      qualityIssues: quality.issues,
      inputTokens,
      outputTokens,
      usedFallback: useFallback,
      rawResponse: response.text,
    };
  }

  /**
   * Classify records one after another. A failed primary attempt is retried
   * exactly once with the escalation model. Records are paced by
   * `policy.pacingMs`, with no pause after the last one.
   */
  async classifyBatch(records: readonly ClassificationInput[]): Promise<ClassificationOutcome[]> {
    const outcomes: ClassificationOutcome[] = [];
    let batchCost = 0;

    this.logger.info({ records: records.length }, "starting batch classification");

    for (const [i, record] of records.entries()) {
      let outcome: ClassificationOutcome;
      try {
        outcome = await this.classifyWithEscalation(record);
      } catch (err) {
        this.logger.error(
          { index: record.index, err: errorMessage(err) },
          "unexpected error while classifying record",
        );
        outcome = failedOutcome(record.index, this.primaryModel, false, errorMessage(err));
      }

      batchCost += outcome.cost;
      outcomes.push(outcome);

      if (i < records.length - 1 && this.policy.pacingMs > 0) {
        await sleep(this.policy.pacingMs);
      }
    }

    this.logger.info(
      { records: records.length, successful: outcomes.filter((o) => o.success).length, batchCost },
      "batch classification completed",
    );
    return outcomes;
  }

  private async classifyWithEscalation(record: ClassificationInput): Promise<ClassificationOutcome> {
    const primary = await this.classify(record);
    if (primary.success) return primary;

    this.logger.warn(
      { index: record.index, fallbackModel: this.policy.escalationModel, err: primary.error },
      "retrying record with fallback model",
    );
    const fallback = await this.classify(record, true);

    return {
      ...fallback,
      cost: primary.cost + fallback.cost,
      inputTokens: primary.inputTokens + fallback.inputTokens,
      outputTokens: primary.outputTokens + fallback.outputTokens,
      warnings: [
        `Primary model ${primary.modelUsed} failed: ${primary.error ?? "unknown error"}`,
        ...fallback.warnings,
      ],
      // Keep the primary's raw text when the fallback never got a response.
      rawResponse: fallback.rawResponse ?? primary.rawResponse,
      validationMessage: fallback.validationMessage ?? primary.validationMessage,
    };
  }

  /** Minimal request against the primary model. */
  async testConnection(): Promise<boolean> {
    try {
      await this.service.ping(this.primaryModel);
      this.logger.info({ model: this.primaryModel }, "API connection test successful");
      return true;
    } catch (err) {
      this.logger.error({ model: this.primaryModel, err: errorMessage(err) }, "API connection test failed");
      return false;
    }
  }
}

function failedOutcome(
  index: number,
  model: string,
  usedFallback: boolean,
  error: string,
): ClassificationOutcome {
  return {
    index,
    success: false,
    labels: [],
    modelUsed: model,
    cost: 0,
    warnings: [],
    qualityIssues: [],
    error,
    inputTokens: 0,
    outputTokens: 0,
    usedFallback,
  };
}
