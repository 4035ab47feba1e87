// ---------------------------------------------------------------------------
// Cost model: token counting, per-call pricing and dataset projections.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type {
  BatchCostEstimate,
  DatasetCostEstimate,
  ModelCostComparison,
  ModelPricing,
  PricingTable,
} from "../core/types.js";
import { approximateTokenizer } from "./tokenizer.js";
import type { Tokenizer } from "./tokenizer.js";

// ── Pricing defaults ───────────────────────────────────────────────────────

/** USD per 1000 tokens. */
export const DEFAULT_PRICING: PricingTable = {
  "claude-haiku-4-5-20251001": { input: 0.001, output: 0.005 },
  "claude-sonnet-4-5-20250929": { input: 0.003, output: 0.015 },
  "claude-3-5-haiku-20241022": { input: 0.0008, output: 0.004 },
};

/** Rate assumed for models missing from the table. */
export const DEFAULT_ESTIMATED_PRICING: ModelPricing = { input: 0.00015, output: 0.00015 };

/** Allowance for the system prompt in dataset projections. */
export const SYSTEM_PROMPT_TOKEN_ALLOWANCE = 500;
export const EXPECTED_LABELS_PER_RECORD = 2;

export interface ResolvedPricing {
  pricing: ModelPricing;
  /** True when the model was not in the table and the default rate applies. */
  estimated: boolean;
}

export interface CostModelOptions {
  pricing?: PricingTable;
  defaultPricing?: ModelPricing;
  tokenizer?: Tokenizer;
  logger?: pino.Logger;
}

// ── Cost model ─────────────────────────────────────────────────────────────

export class CostModel {
  private readonly pricing: PricingTable;
  private readonly defaultPricing: ModelPricing;
  private readonly tokenizer: Tokenizer;
  private readonly logger?: pino.Logger;
  private readonly reportedUnknown = new Set<string>();

  constructor(options: CostModelOptions = {}) {
    this.pricing = options.pricing ?? DEFAULT_PRICING;
    this.defaultPricing = options.defaultPricing ?? DEFAULT_ESTIMATED_PRICING;
    this.tokenizer = options.tokenizer ?? approximateTokenizer;
    this.logger = options.logger?.child({ component: "cost-model" });
  }

  /** Look up a model's rates, falling back to the default estimate. */
  resolvePricing(model: string): ResolvedPricing {
    const known = this.pricing[model];
    if (known) return { pricing: known, estimated: false };

    if (!this.reportedUnknown.has(model)) {
      this.reportedUnknown.add(model);
      this.logger?.warn(
        { model, pricing: this.defaultPricing },
        "using estimated pricing for unknown model",
      );
    }
    return { pricing: this.defaultPricing, estimated: true };
  }

  countTokens(text: string): number {
    return this.tokenizer.count(text);
  }

  calculateCost(model: string, inputTokens: number, outputTokens: number): number {
    const { pricing } = this.resolvePricing(model);
    return (inputTokens / 1000) * pricing.input + (outputTokens / 1000) * pricing.output;
  }

  /** Rough output size of a JSON label array: ~50 tokens per label plus framing. */
  estimateResponseTokens(numLabels: number = 3): number {
    return numLabels * 50 + 20;
  }

  estimatePromptTokens(systemPrompt: string, userPrompt: string): number {
    return this.countTokens(systemPrompt) + this.countTokens(userPrompt);
  }

  /** Linear projection for `datasetSize` records of `avgTextLength` characters. */
  estimateDatasetCost(
    datasetSize: number,
    avgTextLength: number,
    model: string,
  ): DatasetCostEstimate {
    const avgTextTokens = this.countTokens("a".repeat(Math.max(0, Math.round(avgTextLength))));
    const avgInputTokens = SYSTEM_PROMPT_TOKEN_ALLOWANCE + avgTextTokens;
    const avgOutputTokens = this.estimateResponseTokens(EXPECTED_LABELS_PER_RECORD);

    const totalCost = this.calculateCost(
      model,
      avgInputTokens * datasetSize,
      avgOutputTokens * datasetSize,
    );

    return {
      datasetSize,
      avgInputTokens,
      avgOutputTokens,
      totalCost,
      costPerRecord: datasetSize > 0 ? totalCost / datasetSize : 0,
      model,
      estimated: true,
    };
  }

  estimateBatchCost(
    texts: readonly string[],
    systemPrompt: string,
    model: string,
    avgLabels: number = EXPECTED_LABELS_PER_RECORD,
  ): BatchCostEstimate {
    const systemTokens = this.countTokens(systemPrompt);
    let totalInputTokens = 0;
    let totalOutputTokens = 0;

    for (const text of texts) {
      totalInputTokens += systemTokens + this.countTokens(text);
      totalOutputTokens += this.estimateResponseTokens(avgLabels);
    }

    const totalCost = this.calculateCost(model, totalInputTokens, totalOutputTokens);
    return {
      totalRecords: texts.length,
      totalInputTokens,
      totalOutputTokens,
      totalCost,
      costPerRecord: texts.length > 0 ? totalCost / texts.length : 0,
      model,
    };
  }

  /** Cost of the same usage under every priced model. */
  compareModels(inputTokens: number, outputTokens: number): Record<string, ModelCostComparison> {
    const comparison: Record<string, ModelCostComparison> = {};
    for (const [model, pricing] of Object.entries(this.pricing)) {
      const inputCost = (inputTokens / 1000) * pricing.input;
      const outputCost = (outputTokens / 1000) * pricing.output;
      comparison[model] = { inputCost, outputCost, totalCost: inputCost + outputCost };
    }
    return comparison;
  }
}
