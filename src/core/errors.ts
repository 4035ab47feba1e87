// ---------------------------------------------------------------------------
// Error hierarchy for the news labeler.
// ---------------------------------------------------------------------------

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all labeler domain errors.
 */
export class LabelerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LabelerError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Completion service errors ───────────────────────────────────────────────

/**
 * Base class for errors raised while talking to the completion service.
 */
export class CompletionError extends LabelerError {
  public readonly model: string;

  constructor(message: string, model: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CompletionError";
    this.model = model;
  }
}

/** The service could not be reached. */
export class CompletionConnectionError extends CompletionError {
  constructor(message: string, model: string, options?: ErrorOptions) {
    super(message, model, options);
    this.name = "CompletionConnectionError";
  }
}

/** The request exceeded the per-call timeout. */
export class CompletionTimeoutError extends CompletionError {
  constructor(message: string, model: string, options?: ErrorOptions) {
    super(message, model, options);
    this.name = "CompletionTimeoutError";
  }
}

/** Credentials were rejected. */
export class CompletionAuthError extends CompletionError {
  constructor(message: string, model: string, options?: ErrorOptions) {
    super(message, model, options);
    this.name = "CompletionAuthError";
  }
}

/** The provider told us we are rate-limited. */
export class CompletionRateLimitError extends CompletionError {
  constructor(message: string, model: string, options?: ErrorOptions) {
    super(message, model, options);
    this.name = "CompletionRateLimitError";
  }
}

/** The provider failed on its side (5xx). */
export class CompletionServerError extends CompletionError {
  public readonly status: number | undefined;

  constructor(
    message: string,
    model: string,
    status?: number,
    options?: ErrorOptions,
  ) {
    super(message, model, options);
    this.name = "CompletionServerError";
    this.status = status;
  }
}

/** The provider rejected the request as malformed (4xx other than auth/429). */
export class CompletionRequestError extends CompletionError {
  public readonly status: number | undefined;

  constructor(
    message: string,
    model: string,
    status?: number,
    options?: ErrorOptions,
  ) {
    super(message, model, options);
    this.name = "CompletionRequestError";
    this.status = status;
  }
}

// ── Data errors ─────────────────────────────────────────────────────────────

/** The dataset as a whole is unusable. Fatal for the run. */
export class DatasetValidationError extends LabelerError {
  public readonly problems: string[];

  constructor(path: string, problems: string[], options?: ErrorOptions) {
    super(`Data validation failed for ${path}: ${problems.join("; ")}`, options);
    this.name = "DatasetValidationError";
    this.problems = problems;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends LabelerError {
  public readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Invalid configuration: ${issues.join("; ")}`, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Reading or writing a checkpoint, result log or report failed. */
export class PersistenceError extends LabelerError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PersistenceError";
    this.path = path;
  }
}

/** Render any thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
