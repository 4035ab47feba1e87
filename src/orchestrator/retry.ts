// ---------------------------------------------------------------------------
// Retry logic with exponential backoff, rate-limit cooldown and a one-time
// escalation target, expressed as a single policy object.
// ---------------------------------------------------------------------------

import { CompletionRateLimitError } from "../core/errors.js";
import type { AppConfig } from "../core/types.js";

// ── Types ──────────────────────────────────────────────────────────────────

export interface RetryPolicy {
  /** Total attempts including the first call (1 means no retries). */
  maxAttempts: number;
  /** Delay after the first failed attempt. */
  baseDelayMs: number;
  /** Multiplier applied to the delay after each further failure. */
  backoffFactor: number;
  /** Fixed extra wait added when `needsCooldown` matches the error. */
  cooldownMs: number;
  needsCooldown: (error: unknown) => boolean;
  /**
   * Predicate that decides whether a given error is retryable.
   *
   * When omitted every error is retried: auth and malformed-request
   * failures spend the same budget as transient ones.
   */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait with the attempt number that just failed (1-based). */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface ClassificationPolicy extends RetryPolicy {
  /** Model used for the single escalation after a primary failure. */
  escalationModel: string;
  /** Pause between consecutive records in a batch. */
  pacingMs: number;
}

// ── Defaults ───────────────────────────────────────────────────────────────

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_BACKOFF_FACTOR = 2;
export const RATE_LIMIT_COOLDOWN_MS = 60_000;
export const REQUEST_PACING_MS = 1_000;

export function isRateLimited(error: unknown): boolean {
  return error instanceof CompletionRateLimitError;
}

/** 3 attempts, 1s/2s backoff, 60s rate-limit cooldown, 1s pacing. */
export function defaultClassificationPolicy(escalationModel: string): ClassificationPolicy {
  return {
    maxAttempts: DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: DEFAULT_BASE_DELAY_MS,
    backoffFactor: DEFAULT_BACKOFF_FACTOR,
    cooldownMs: RATE_LIMIT_COOLDOWN_MS,
    needsCooldown: isRateLimited,
    escalationModel,
    pacingMs: REQUEST_PACING_MS,
  };
}

/** Build the classification policy from application config. */
export function createClassificationPolicy(config: AppConfig): ClassificationPolicy {
  return {
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    backoffFactor: DEFAULT_BACKOFF_FACTOR,
    cooldownMs: config.rateLimit.cooldownMs,
    needsCooldown: isRateLimited,
    escalationModel: config.models.fallback,
    // Never pace faster than the requests-per-minute ceiling allows.
    pacingMs: Math.max(
      config.rateLimit.pacingMs,
      Math.ceil(60_000 / config.rateLimit.maxRequestsPerMinute),
    ),
  };
}

// ── Delay helpers ──────────────────────────────────────────────────────────

/**
 * Wait before the next attempt, where `failedAttempt` is 1-based:
 * base, base*factor, base*factor^2, ... plus the cooldown when it applies.
 */
export function computeDelay(policy: RetryPolicy, failedAttempt: number, error: unknown): number {
  const backoff = policy.baseDelayMs * policy.backoffFactor ** (failedAttempt - 1);
  const cooldown = policy.needsCooldown(error) ? policy.cooldownMs : 0;
  return backoff + cooldown;
}

/** Returns a promise that resolves after `ms` milliseconds. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Execute `fn` with retry semantics.
 *
 * On failure `shouldRetry` is consulted. If `true`, the function sleeps
 * according to {@link computeDelay} before trying again, up to
 * `maxAttempts` calls in total.
 *
 * If all attempts are exhausted, the last error is thrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<T> {
  const attempts = Math.max(1, policy.maxAttempts);
  const shouldRetry = policy.shouldRetry ?? (() => true);

  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= attempts) {
        throw error;
      }

      const delay = computeDelay(policy, attempt, error);
      policy.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  // Should be unreachable, but satisfy the compiler.
  throw lastError;
}
