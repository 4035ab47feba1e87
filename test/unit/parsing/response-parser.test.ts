// ---------------------------------------------------------------------------
// Tests for the completion response parser.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { parseResponse, stripCodeFence, toConfidence } from "../../../src/parsing/response-parser.js";
import type { ParseResult } from "../../../src/parsing/response-parser.js";

function expectItems(result: ParseResult) {
  if (!result.ok) throw new Error(`expected success, got ${result.reason}: ${result.message}`);
  return result;
}

function expectFailure(result: ParseResult) {
  if (result.ok) throw new Error(`expected failure, got ${result.items.length} items`);
  return result;
}

const EXPECTED = [
  { label: "Môi trường", confidence: 0.9 },
  { label: "Tài nguyên nước", confidence: 0.8 },
];

describe("parseResponse", () => {
  // ── Accepted shapes ───────────────────────────────────────────────────

  it("reads a bare array", () => {
    const result = expectItems(parseResponse(JSON.stringify(EXPECTED)));
    expect(result.strategy).toBe("direct-array");
    expect(result.items).toEqual(EXPECTED);
  });

  it("reads an array under a known key", () => {
    const result = expectItems(parseResponse(JSON.stringify({ result: EXPECTED })));
    expect(result.strategy).toBe("known-key");
    expect(result.items).toEqual(EXPECTED);
  });

  it("prefers the earlier known key", () => {
    const raw = JSON.stringify({
      labels: [{ label: "Khác", confidence: 0.3 }],
      output: EXPECTED,
    });
    expect(expectItems(parseResponse(raw)).items).toEqual(EXPECTED);
  });

  it("finds a nested array of label objects", () => {
    const raw = JSON.stringify({ response: { classification: EXPECTED } });
    const result = expectItems(parseResponse(raw));
    expect(result.strategy).toBe("nested-search");
    expect(result.items).toEqual(EXPECTED);
  });

  it("pairs numbered flat keys", () => {
    const raw = JSON.stringify({
      label1: "Môi trường",
      confidence1: 0.9,
      label2: "Tài nguyên nước",
      confidence2: 0.8,
    });
    const result = expectItems(parseResponse(raw));
    expect(result.strategy).toBe("flat-pairs");
    expect(result.items).toEqual(EXPECTED);
  });

  it("pairs label/conf keys by sorted key order", () => {
    const raw = JSON.stringify({
      main_label: "Môi trường",
      main_conf: 0.9,
      second_label: "Tài nguyên nước",
      second_conf: 0.8,
    });
    expect(expectItems(parseResponse(raw)).items).toEqual(EXPECTED);
  });

  it("strips a json code fence", () => {
    const raw = "```json\n" + JSON.stringify(EXPECTED) + "\n```";
    expect(expectItems(parseResponse(raw)).items).toEqual(EXPECTED);
  });

  it("accepts an empty array", () => {
    expect(expectItems(parseResponse("[]")).items).toEqual([]);
  });

  it("coerces numeric-string and boolean confidences", () => {
    const result = expectItems(
      parseResponse('[{"label": "Khác", "confidence": "0.4"}, {"label": "Đất đai", "confidence": true}]'),
    );
    expect(result.items).toEqual([
      { label: "Khác", confidence: 0.4 },
      { label: "Đất đai", confidence: 1 },
    ]);
  });

  it("keeps extra keys on label objects", () => {
    const result = expectItems(
      parseResponse('[{"label": "Khác", "confidence": 0.3, "reason": "chung chung"}]'),
    );
    expect(result.items).toEqual([{ label: "Khác", confidence: 0.3, reason: "chung chung" }]);
  });

  // ── Failures ──────────────────────────────────────────────────────────

  it("reports invalid JSON", () => {
    const failure = expectFailure(parseResponse("not json"));
    expect(failure.reason).toBe("invalid_json");
    expect(failure.message.startsWith("Invalid JSON: ")).toBe(true);
  });

  it("rejects scalar payloads", () => {
    const failure = expectFailure(parseResponse("42"));
    expect(failure.reason).toBe("unsupported_type");
    expect(failure.message).toBe("Response must be a JSON array or object, got number");
  });

  it("lists the available keys when no label array is found", () => {
    const failure = expectFailure(parseResponse('{"answer": "Môi trường", "score": 1}'));
    expect(failure.reason).toBe("no_label_array");
    expect(failure.message).toBe(
      "No valid label array found in response. Available keys: [answer, score]",
    );
  });

  it("rejects non-object items", () => {
    const failure = expectFailure(parseResponse('["Môi trường"]'));
    expect(failure).toEqual({
      ok: false,
      reason: "item_not_object",
      message: "Item 0 is not an object",
    });
  });

  it("rejects items without a label", () => {
    const failure = expectFailure(
      parseResponse('[{"label": "Khác", "confidence": 0.5}, {"confidence": 0.5}]'),
    );
    expect(failure.reason).toBe("missing_label");
    expect(failure.message).toBe("Item 1 missing 'label' field");
  });

  it("reports the label first when both fields are missing", () => {
    const failure = expectFailure(parseResponse('[{"name": "Khác"}]'));
    expect(failure.reason).toBe("missing_label");
    expect(failure.message).toBe("Item 0 missing 'label' field");
  });

  it("rejects items without a confidence", () => {
    const failure = expectFailure(parseResponse('[{"label": "Khác"}]'));
    expect(failure.reason).toBe("missing_confidence");
    expect(failure.message).toBe("Item 0 missing 'confidence' field");
  });

  it("rejects non-numeric confidences", () => {
    const failure = expectFailure(parseResponse('[{"label": "Khác", "confidence": "high"}]'));
    expect(failure.reason).toBe("confidence_not_numeric");
    expect(failure.message).toBe("Item 0 confidence must be a number");
  });

  it("treats a null confidence as non-numeric", () => {
    const failure = expectFailure(parseResponse('[{"label": "Khác", "confidence": null}]'));
    expect(failure.reason).toBe("confidence_not_numeric");
  });

  it("rejects confidences outside [0, 1]", () => {
    const failure = expectFailure(parseResponse('[{"label": "Khác", "confidence": 1.5}]'));
    expect(failure.reason).toBe("confidence_out_of_range");
    expect(failure.message).toBe("Item 0 confidence must be between 0.0 and 1.0, got 1.5");

    const below = expectFailure(
      parseResponse('[{"label": "Khác", "confidence": 0.2}, {"label": "Khác", "confidence": "-0.1"}]'),
    );
    expect(below.message).toBe("Item 1 confidence must be between 0.0 and 1.0, got -0.1");
  });
});

describe("stripCodeFence", () => {
  it("removes bare and tagged fences", () => {
    expect(stripCodeFence("```\n[1]\n```")).toBe("[1]");
    expect(stripCodeFence("  ```json\n[1]\n```  ")).toBe("[1]");
    expect(stripCodeFence("[1]")).toBe("[1]");
  });
});

describe("toConfidence", () => {
  it("coerces numbers, numeric strings and booleans", () => {
    expect(toConfidence(0.7)).toBe(0.7);
    expect(toConfidence(" 0.25 ")).toBe(0.25);
    expect(toConfidence(true)).toBe(1);
    expect(toConfidence(false)).toBe(0);
    expect(toConfidence("")).toBeNull();
    expect(toConfidence("abc")).toBeNull();
    expect(toConfidence(null)).toBeNull();
    expect(toConfidence(Number.NaN)).toBeNull();
  });
});
