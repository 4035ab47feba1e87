// ---------------------------------------------------------------------------
// Taxonomy validation and quality heuristics for parsed labels.
// ---------------------------------------------------------------------------

import { isValidLabel } from "../taxonomy/labels.js";
import type { LabelPrediction } from "../core/types.js";
import { toConfidence } from "./response-parser.js";
import type { CandidateLabel } from "./response-parser.js";

export const DEFAULT_CONFIDENCE = 0.5;
export const MAX_EXPECTED_LABELS = 4;

export interface LabelValidationResult {
  cleaned: LabelPrediction[];
  warnings: string[];
}

export interface QualityReport {
  acceptable: boolean;
  issues: string[];
}

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/**
 * Keep only taxonomy labels and normalise their confidence.
 *
 * Every dropped label and every substituted confidence produces a warning.
 */
export function validateLabels(candidates: readonly CandidateLabel[]): LabelValidationResult {
  const cleaned: LabelPrediction[] = [];
  const warnings: string[] = [];

  for (const candidate of candidates) {
    const label = typeof candidate.label === "string" ? candidate.label.trim() : "";

    if (!isValidLabel(label)) {
      const shown = typeof candidate.label === "string" ? label : JSON.stringify(candidate.label);
      warnings.push(`Invalid label: '${shown}' - skipping`);
      continue;
    }

    let confidence = toConfidence(candidate.confidence);
    if (confidence === null) {
      confidence = DEFAULT_CONFIDENCE;
      warnings.push(`Invalid confidence for '${label}' - using default ${DEFAULT_CONFIDENCE}`);
    }

    cleaned.push({ label, confidence: clamp(confidence) });
  }

  return { cleaned, warnings };
}

/**
 * Flag results an operator may want to review. Never used to reject a
 * classification.
 */
export function checkResponseQuality(
  labels: readonly LabelPrediction[],
  minConfidence: number = 0.5,
): QualityReport {
  const issues: string[] = [];

  if (labels.length === 0) {
    issues.push("No labels predicted");
    return { acceptable: false, issues };
  }

  const lowConfidence = labels
    .filter((item) => item.confidence < minConfidence)
    .map((item) => item.label);
  if (lowConfidence.length > 0) {
    issues.push(`Low confidence labels: ${lowConfidence.join(", ")}`);
  }

  if (labels.length > MAX_EXPECTED_LABELS) {
    issues.push(`Too many labels predicted: ${labels.length}`);
  }

  return { acceptable: issues.length === 0, issues };
}
