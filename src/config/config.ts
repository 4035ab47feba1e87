// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables, applies defaults, and validates with Zod
// so that a bad setting stops the process before any work starts.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { ConfigurationError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const fragmentList = z
  .string()
  .default("claude-sonnet")
  .transform((v) =>
    v
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z
    .string({ required_error: "ANTHROPIC_API_KEY is required" })
    .trim()
    .min(1, "ANTHROPIC_API_KEY is required"),
  ANTHROPIC_BASE_URL: z.string().trim().url().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  DEFAULT_MODEL: z.string().trim().min(1).default("claude-haiku-4-5-20251001"),
  FALLBACK_MODEL: z.string().trim().min(1).default("claude-sonnet-4-5-20250929"),
  MAX_TOKENS: z.coerce.number().int().positive("MAX_TOKENS must be positive").default(500),
  TEMPERATURE: z.coerce
    .number()
    .min(0, "TEMPERATURE must be between 0 and 2")
    .max(2, "TEMPERATURE must be between 0 and 2")
    .default(0.1),
  JSON_MODE_MODELS: fragmentList,

  MAX_RPM: z.coerce.number().int().positive().default(500),
  MAX_TPM: z.coerce.number().int().positive().default(30_000),
  REQUEST_PACING_MS: z.coerce.number().int().nonnegative().default(1_000),
  RATE_LIMIT_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(60_000),

  BATCH_SIZE: z.coerce.number().int().positive().default(10),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  MAX_CONTENT_LENGTH: z.coerce.number().int().positive().default(2_000),

  MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),

  DATA_PATH: z.string().trim().min(1).default("./data/tnmt_subtopic_data.csv"),
  OUTPUT_PATH: z.string().trim().min(1).default("./output"),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: z.string().trim().optional(),
  LOG_PRETTY: booleanFlag,
});

/** Treat empty variables as unset so defaults apply. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return cleaned;
}

/**
 * Load the application configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid or missing setting.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join(".");
      return issue.message.includes(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigurationError(issues);
  }

  const e = parsed.data;
  return {
    api: {
      apiKey: e.ANTHROPIC_API_KEY,
      baseUrl: e.ANTHROPIC_BASE_URL,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    models: {
      primary: e.DEFAULT_MODEL,
      fallback: e.FALLBACK_MODEL,
      maxTokens: e.MAX_TOKENS,
      temperature: e.TEMPERATURE,
      jsonModeModels: e.JSON_MODE_MODELS,
    },
    rateLimit: {
      maxRequestsPerMinute: e.MAX_RPM,
      maxTokensPerMinute: e.MAX_TPM,
      pacingMs: e.REQUEST_PACING_MS,
      cooldownMs: e.RATE_LIMIT_COOLDOWN_MS,
    },
    processing: {
      batchSize: e.BATCH_SIZE,
      confidenceThreshold: e.CONFIDENCE_THRESHOLD,
      maxContentLength: e.MAX_CONTENT_LENGTH,
    },
    retry: {
      maxAttempts: e.MAX_RETRIES,
      baseDelayMs: e.RETRY_DELAY_MS,
    },
    paths: {
      dataPath: e.DATA_PATH,
      outputPath: e.OUTPUT_PATH,
    },
    logging: {
      level: e.LOG_LEVEL,
      file: e.LOG_FILE,
      prettyPrint: e.LOG_PRETTY,
      redactSecrets: true,
    },
  };
}
