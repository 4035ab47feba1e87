// ---------------------------------------------------------------------------
// Completion response parser.
//
// Models do not reliably return a bare JSON array. The parser strips markdown
// fences, decodes the JSON, and then runs an ordered chain of extraction
// strategies; the first one that finds a label array wins. Every failure
// carries a distinct reason code.
// ---------------------------------------------------------------------------

import { z } from "zod";

// ── Types ──────────────────────────────────────────────────────────────────

/** A label object as the model returned it, before taxonomy validation. */
export interface CandidateLabel {
  label: unknown;
  confidence: unknown;
  [key: string]: unknown;
}

export type ExtractionStrategyName =
  | "direct-array"
  | "known-key"
  | "nested-search"
  | "flat-pairs";

export type ParseFailureReason =
  | "invalid_json"
  | "unsupported_type"
  | "no_label_array"
  | "item_not_object"
  | "missing_label"
  | "missing_confidence"
  | "confidence_not_numeric"
  | "confidence_out_of_range";

export type ParseResult =
  | { ok: true; items: CandidateLabel[]; strategy: ExtractionStrategyName }
  | { ok: false; reason: ParseFailureReason; message: string };

/** One way of locating the label array inside a decoded payload. */
export interface ExtractionStrategy {
  readonly name: ExtractionStrategyName;
  extract(payload: unknown): unknown[] | null;
}

// ── Helpers ────────────────────────────────────────────────────────────────

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonTypeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

/** Remove a surrounding ```json ... ``` (or bare ```) fence. */
export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  text = text.replace(/^```[A-Za-z]*[ \t]*\r?\n?/, "");
  text = text.replace(/\r?\n?```$/, "");
  return text.trim();
}

/**
 * Coerce a confidence value to a finite number.
 * Accepts numbers, numeric strings and booleans.
 */
export function toConfidence(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed === "") return null;
    const n = Number(trimmed);
    return Number.isFinite(n) ? n : null;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return null;
}

// ── Strategies ─────────────────────────────────────────────────────────────

export const LABEL_ARRAY_KEYS = [
  "output",
  "result",
  "labels",
  "data",
  "classifications",
  "predictions",
  "items",
] as const;

export const MAX_SEARCH_DEPTH = 5;

const directArray: ExtractionStrategy = {
  name: "direct-array",
  extract: (payload) => (Array.isArray(payload) ? payload : null),
};

const knownKey: ExtractionStrategy = {
  name: "known-key",
  extract(payload) {
    if (!isJsonObject(payload)) return null;
    for (const key of LABEL_ARRAY_KEYS) {
      const value = payload[key];
      if (Array.isArray(value)) return value;
    }
    return null;
  },
};

function findLabelArray(value: unknown, depth: number): unknown[] | null {
  if (depth <= 0) return null;

  if (Array.isArray(value)) {
    const first: unknown = value[0];
    if (isJsonObject(first) && ("label" in first || "name" in first)) {
      return value;
    }
    return null;
  }

  if (isJsonObject(value)) {
    for (const child of Object.values(value)) {
      const found = findLabelArray(child, depth - 1);
      if (found !== null) return found;
    }
  }
  return null;
}

const nestedSearch: ExtractionStrategy = {
  name: "nested-search",
  extract(payload) {
    if (!isJsonObject(payload)) return null;
    return findLabelArray(payload, MAX_SEARCH_DEPTH);
  },
};

function numberedPairs(payload: JsonObject): CandidateLabel[] {
  const pairs: CandidateLabel[] = [];
  for (let i = 1; `label${i}` in payload && `confidence${i}` in payload; i++) {
    pairs.push({
      label: payload[`label${i}`],
      confidence: payload[`confidence${i}`],
    });
  }
  return pairs;
}

function keyedPairs(payload: JsonObject): CandidateLabel[] {
  const keys = Object.keys(payload);
  const labelKeys = keys.filter((k) => k.toLowerCase().includes("label")).sort();
  const confKeys = keys.filter((k) => k.toLowerCase().includes("conf")).sort();

  if (labelKeys.length === 0 || labelKeys.length !== confKeys.length) return [];

  return labelKeys.map((labelKey, i) => ({
    label: payload[labelKey],
    confidence: payload[confKeys[i] ?? ""],
  }));
}

const flatPairs: ExtractionStrategy = {
  name: "flat-pairs",
  extract(payload) {
    if (!isJsonObject(payload)) return null;
    const numbered = numberedPairs(payload);
    if (numbered.length > 0) return numbered;
    const keyed = keyedPairs(payload);
    return keyed.length > 0 ? keyed : null;
  },
};

/** Tried in order; the first strategy returning an array wins. */
export const EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  directArray,
  knownKey,
  nestedSearch,
  flatPairs,
];

// ── Item validation ────────────────────────────────────────────────────────

/** Missing stays `undefined`; anything not coercible becomes NaN. */
const ConfidenceSchema = z.preprocess(
  (value) => (value === undefined ? undefined : (toConfidence(value) ?? Number.NaN)),
  z.number().min(0).max(1),
);

/** Shape every extracted label object must have. Extra keys pass through. */
export const CandidateLabelSchema = z
  .object({
    label: z.custom<unknown>((value) => value !== undefined),
    confidence: ConfidenceSchema,
  })
  .passthrough();

type ItemFailure = Extract<ParseResult, { ok: false }>;

function describeIssue(issue: z.ZodIssue, index: number, item: unknown): ItemFailure {
  const field = issue.path[0];

  if (field === undefined) {
    return { ok: false, reason: "item_not_object", message: `Item ${index} is not an object` };
  }
  if (field === "label") {
    return { ok: false, reason: "missing_label", message: `Item ${index} missing 'label' field` };
  }
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
    return {
      ok: false,
      reason: "missing_confidence",
      message: `Item ${index} missing 'confidence' field`,
    };
  }
  if (issue.code === z.ZodIssueCode.too_small || issue.code === z.ZodIssueCode.too_big) {
    const got = isJsonObject(item) ? toConfidence(item["confidence"]) : null;
    return {
      ok: false,
      reason: "confidence_out_of_range",
      message: `Item ${index} confidence must be between 0.0 and 1.0, got ${got}`,
    };
  }
  return {
    ok: false,
    reason: "confidence_not_numeric",
    message: `Item ${index} confidence must be a number`,
  };
}

function validateItems(items: unknown[]): ItemFailure | CandidateLabel[] {
  const candidates: CandidateLabel[] = [];

  for (const [i, item] of items.entries()) {
    const parsed = CandidateLabelSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      if (issue === undefined) {
        return { ok: false, reason: "item_not_object", message: `Item ${i} is not an object` };
      }
      return describeIssue(issue, i, item);
    }
    candidates.push({
      ...parsed.data,
      label: parsed.data.label,
      confidence: parsed.data.confidence,
    });
  }

  return candidates;
}

// ── Public API ─────────────────────────────────────────────────────────────

/**
 * Parse raw completion text into candidate label objects.
 *
 * The returned items still need {@link validateLabels} to be checked against
 * the taxonomy.
 */
export function parseResponse(raw: string): ParseResult {
  const cleaned = stripCodeFence(raw);

  let payload: unknown;
  try {
    payload = JSON.parse(cleaned);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: "invalid_json", message: `Invalid JSON: ${detail}` };
  }

  if (!Array.isArray(payload) && !isJsonObject(payload)) {
    return {
      ok: false,
      reason: "unsupported_type",
      message: `Response must be a JSON array or object, got ${jsonTypeName(payload)}`,
    };
  }

  for (const strategy of EXTRACTION_STRATEGIES) {
    const items = strategy.extract(payload);
    if (items === null) continue;

    const validated = validateItems(items);
    if (!Array.isArray(validated)) return validated;
    return { ok: true, items: validated, strategy: strategy.name };
  }

  const keys = isJsonObject(payload) ? Object.keys(payload) : [];
  return {
    ok: false,
    reason: "no_label_array",
    message: `No valid label array found in response. Available keys: [${keys.join(", ")}]`,
  };
}
