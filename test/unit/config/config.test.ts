import { describe, it, expect } from "vitest";

import { loadConfig } from "../../../src/config/config.js";
import { ConfigurationError } from "../../../src/core/errors.js";

function configError(env: NodeJS.ProcessEnv): ConfigurationError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected loadConfig to fail");
}

describe("loadConfig", () => {
  it("applies defaults when only the API key is set", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "test-key" });

    expect(config.api).toEqual({ apiKey: "test-key", baseUrl: undefined, requestTimeoutMs: 60_000 });
    expect(config.models).toEqual({
      primary: "claude-haiku-4-5-20251001",
      fallback: "claude-sonnet-4-5-20250929",
      maxTokens: 500,
      temperature: 0.1,
      jsonModeModels: ["claude-sonnet"],
    });
    expect(config.rateLimit).toEqual({
      maxRequestsPerMinute: 500,
      maxTokensPerMinute: 30_000,
      pacingMs: 1_000,
      cooldownMs: 60_000,
    });
    expect(config.processing).toEqual({ batchSize: 10, confidenceThreshold: 0.7, maxContentLength: 2_000 });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1_000 });
    expect(config.paths).toEqual({ dataPath: "./data/tnmt_subtopic_data.csv", outputPath: "./output" });
    expect(config.logging).toEqual({
      level: "info",
      file: undefined,
      prettyPrint: false,
      redactSecrets: true,
    });
  });

  it("coerces numeric and list settings", () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: "test-key",
      BATCH_SIZE: "25",
      TEMPERATURE: "0",
      JSON_MODE_MODELS: "claude-sonnet, claude-opus ,",
      LOG_PRETTY: "1",
    });
    expect(config.processing.batchSize).toBe(25);
    expect(config.models.temperature).toBe(0);
    expect(config.models.jsonModeModels).toEqual(["claude-sonnet", "claude-opus"]);
    expect(config.logging.prettyPrint).toBe(true);
  });

  it("treats blank variables as unset", () => {
    const config = loadConfig({ ANTHROPIC_API_KEY: "test-key", BATCH_SIZE: "  ", LOG_FILE: "" });
    expect(config.processing.batchSize).toBe(10);
    expect(config.logging.file).toBeUndefined();
  });

  it("requires the API key", () => {
    expect(configError({}).issues).toEqual(["ANTHROPIC_API_KEY is required"]);
  });

  it("lists every invalid setting", () => {
    const err = configError({
      ANTHROPIC_API_KEY: "test-key",
      MAX_TOKENS: "0",
      TEMPERATURE: "3",
    });
    expect(err.issues).toEqual([
      "MAX_TOKENS must be positive",
      "TEMPERATURE must be between 0 and 2",
    ]);
    expect(err.message).toBe(
      "Invalid configuration: MAX_TOKENS must be positive; TEMPERATURE must be between 0 and 2",
    );
  });

  it("prefixes generic messages with the variable name", () => {
    const err = configError({ ANTHROPIC_API_KEY: "test-key", BATCH_SIZE: "abc" });
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.startsWith("BATCH_SIZE: ")).toBe(true);
  });
});
