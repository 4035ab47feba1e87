// ---------------------------------------------------------------------------
// Record-level validation and preparation.
// Crawled articles are sent as-is apart from content truncation.
// ---------------------------------------------------------------------------

import type pino from "pino";
import type { DatasetRow, PreparedRecord } from "../core/types.js";
import { truncateContent } from "../prompts/templates.js";

export const DEFAULT_MAX_CONTENT_LENGTH = 2000;
export const MIN_TITLE_LENGTH = 5;

/** Reasons a record cannot be classified; empty when it is usable. */
export function validateTextRecord(title: string, description: string, content: string): string[] {
  const errors: string[] = [];

  if (title.trim() === "") errors.push("Title is empty");
  if (description.trim() === "") errors.push("Description is empty");
  if (content.trim() === "") errors.push("Content is empty");
  if (title.trim().length < MIN_TITLE_LENGTH) {
    errors.push(`Title too short (< ${MIN_TITLE_LENGTH} characters)`);
  }

  return errors;
}

/** The combined block used for token and cost estimation. */
export function prepareTextForApi(
  title: string,
  description: string,
  content: string,
  maxContentLength: number = DEFAULT_MAX_CONTENT_LENGTH,
): string {
  return `TIÊU ĐỀ: ${title}

MÔ TẢ: ${description}

NỘI DUNG: ${truncateContent(content, maxContentLength)}`;
}

export class RecordPreparer {
  private readonly maxContentLength: number;
  private readonly logger: pino.Logger;

  constructor(logger: pino.Logger, maxContentLength: number = DEFAULT_MAX_CONTENT_LENGTH) {
    this.maxContentLength = maxContentLength;
    this.logger = logger.child({ component: "record-preparer" });
  }

  /** Returns `null` for rows that fail validation; the drop is logged. */
  prepare(row: DatasetRow): PreparedRecord | null {
    const errors = validateTextRecord(row.title, row.description, row.content);
    if (errors.length > 0) {
      this.logger.warn({ index: row.index, errors }, "record validation failed, skipping");
      return null;
    }

    return {
      index: row.index,
      title: row.title,
      description: row.description,
      content: truncateContent(row.content, this.maxContentLength),
      combinedText: prepareTextForApi(row.title, row.description, row.content, this.maxContentLength),
    };
  }

  /**
   * Prepare the valid rows in `[start, start + width)`, clipped to the
   * dataset. The caller owns the width it advances by.
   */
  prepareSlice(rows: readonly DatasetRow[], start: number, width: number): PreparedRecord[] {
    const end = Math.min(start + width, rows.length);
    const records: PreparedRecord[] = [];

    for (const row of rows.slice(start, end)) {
      const record = this.prepare(row);
      if (record) records.push(record);
    }

    this.logger.debug(
      { start, end, valid: records.length },
      "prepared batch slice",
    );
    return records;
  }
}
