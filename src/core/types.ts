// ---------------------------------------------------------------------------
// Core types for the news labeler.
// All other modules import from this file.
// ---------------------------------------------------------------------------

import type { TaxonomyLabel } from "../taxonomy/labels.js";

// ── Predictions & outcomes ──────────────────────────────────────────────────

/** One validated label with its confidence in [0, 1]. */
export interface LabelPrediction {
  readonly label: TaxonomyLabel;
  readonly confidence: number;
}

/**
 * Result of attempting to classify one dataset row.
 * Exactly one is produced per attempted row per batch run.
 */
export interface ClassificationOutcome {
  index: number;
  success: boolean;
  labels: LabelPrediction[];
  modelUsed: string;
  cost: number;
  warnings: string[];
  qualityIssues: string[];
  error?: string;
  inputTokens: number;
  outputTokens: number;
  usedFallback: boolean;
  /** Parser diagnostic when the response could not be read. */
  validationMessage?: string;
  /** Raw completion text; always kept when parsing failed. */
  rawResponse?: string;
}

// ── Dataset ─────────────────────────────────────────────────────────────────

/** CSV column names the dataset must provide. */
export const DatasetColumn = {
  TITLE: "Tieu_de",
  DESCRIPTION: "Description",
  CONTENT: "Noi_dung_tin_bai",
} as const;
export type DatasetColumn = (typeof DatasetColumn)[keyof typeof DatasetColumn];

export const REQUIRED_COLUMNS: readonly DatasetColumn[] = [
  DatasetColumn.TITLE,
  DatasetColumn.DESCRIPTION,
  DatasetColumn.CONTENT,
];

export interface DatasetRow {
  /** Zero-based position of the row in the CSV (header excluded). */
  index: number;
  title: string;
  description: string;
  content: string;
  /** Every column of the original row, untouched. */
  columns: Record<string, string>;
}

export interface Dataset {
  path: string;
  headers: string[];
  rows: DatasetRow[];
}

/** A row that passed record validation, ready for the completion service. */
export interface PreparedRecord {
  index: number;
  title: string;
  description: string;
  /** Content truncated to the configured maximum length. */
  content: string;
  combinedText: string;
}

export interface DatasetStats {
  totalRecords: number;
  avgTitleLength: number;
  avgDescriptionLength: number;
  avgContentLength: number;
  blankTitles: number;
  blankDescriptions: number;
  blankContents: number;
}

// ── Checkpoint & run summary ────────────────────────────────────────────────

export interface Checkpoint {
  lastProcessedIndex: number;
  totalCost: number;
  processedCount: number;
  successfulCount: number;
  startTime: string;
  lastUpdate: string;
}

export const RunState = {
  IDLE: "idle",
  RUNNING: "running",
  COMPLETED: "completed",
  INTERRUPTED: "interrupted",
} as const;
export type RunState = (typeof RunState)[keyof typeof RunState];

export interface SkippedBatch {
  startIndex: number;
  width: number;
  error: string;
}

export interface ProcessingSummary {
  totalRecordsInDataset: number;
  recordsProcessed: number;
  successfulClassifications: number;
  /** Percentage, 0-100. */
  successRate: number;
  /** Cumulative cost including earlier runs recorded in the checkpoint. */
  totalCost: number;
  runCost: number;
  averageCostPerRecord: number;
  startIndex: number;
  endIndex: number;
  lastProcessedIndex: number;
  startTime: string;
  endTime: string;
  batchSizeUsed: number;
  state: RunState;
  skippedBatches: SkippedBatch[];
}

// ── Cost ────────────────────────────────────────────────────────────────────

/** Rates in currency units per 1000 tokens. */
export interface ModelPricing {
  input: number;
  output: number;
}

export type PricingTable = Readonly<Record<string, ModelPricing>>;

export interface DatasetCostEstimate {
  datasetSize: number;
  avgInputTokens: number;
  avgOutputTokens: number;
  totalCost: number;
  costPerRecord: number;
  model: string;
  estimated: true;
}

export interface BatchCostEstimate {
  totalRecords: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalCost: number;
  costPerRecord: number;
  model: string;
}

export interface ModelCostComparison {
  inputCost: number;
  outputCost: number;
  totalCost: number;
}

// ── Completion service contract ─────────────────────────────────────────────

export type ChatRole = "system" | "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatTurn[];
  temperature: number;
  maxOutputTokens: number;
  /** Ask the service to constrain its output to JSON. */
  jsonMode: boolean;
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  text: string;
  usage: CompletionUsage;
  model: string;
}

/**
 * Every completion backend implements this interface.
 * Failures are thrown as `CompletionError` subclasses.
 */
export interface CompletionService {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
  /** Minimal round trip used as a connectivity check. */
  ping(model: string): Promise<void>;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  api: ApiConfig;
  models: ModelConfig;
  rateLimit: RateLimitConfig;
  processing: ProcessingConfig;
  retry: RetryConfig;
  paths: PathConfig;
  logging: LoggingConfig;
}

export interface ApiConfig {
  apiKey: string;
  baseUrl: string | undefined;
  requestTimeoutMs: number;
}

export interface ModelConfig {
  primary: string;
  fallback: string;
  maxTokens: number;
  temperature: number;
  /** Model id fragments that get JSON-constrained output. */
  jsonModeModels: string[];
}

export interface RateLimitConfig {
  maxRequestsPerMinute: number;
  maxTokensPerMinute: number;
  pacingMs: number;
  cooldownMs: number;
}

export interface ProcessingConfig {
  batchSize: number;
  confidenceThreshold: number;
  maxContentLength: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface PathConfig {
  dataPath: string;
  outputPath: string;
}

export interface LoggingConfig {
  level: string;
  file: string | undefined;
  prettyPrint: boolean;
  redactSecrets: boolean;
}
