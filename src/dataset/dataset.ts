// ---------------------------------------------------------------------------
// CSV dataset loading, dataset-level validation and CSV output.
// ---------------------------------------------------------------------------

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import Papa from "papaparse";
import { DatasetValidationError, PersistenceError, errorMessage } from "../core/errors.js";
import { DatasetColumn, REQUIRED_COLUMNS } from "../core/types.js";
import type { Dataset, DatasetRow, DatasetStats } from "../core/types.js";

function isMissing(value: string | undefined): boolean {
  return value === undefined || value === "";
}

/** Collect every dataset-level problem; an empty list means the data is usable. */
export function validateDataset(headers: readonly string[], records: readonly Record<string, string>[]): string[] {
  const problems: string[] = [];

  const missingColumns = REQUIRED_COLUMNS.filter((col) => !headers.includes(col));
  if (missingColumns.length > 0) {
    problems.push(`Missing columns: ${missingColumns.join(", ")}`);
  }

  if (records.length === 0) {
    problems.push("Dataset is empty");
  }

  for (const col of REQUIRED_COLUMNS) {
    if (!headers.includes(col)) continue;
    const nullCount = records.filter((r) => isMissing(r[col])).length;
    if (nullCount > 0) {
      problems.push(`Column '${col}' has ${nullCount} null values`);
    }
  }

  return problems;
}

/** Parse CSV text into a dataset without touching the filesystem. */
export function parseDataset(text: string, path: string): Dataset {
  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    skipEmptyLines: true,
  });

  const malformed = parsed.errors.filter((e) => e.type === "Quotes" || e.type === "Delimiter");
  if (malformed.length > 0) {
    throw new DatasetValidationError(
      path,
      malformed.map((e) => `Row ${e.row ?? "?"}: ${e.message}`),
    );
  }

  const headers = parsed.meta.fields ?? [];
  const problems = validateDataset(headers, parsed.data);
  if (problems.length > 0) {
    throw new DatasetValidationError(path, problems);
  }

  const rows: DatasetRow[] = parsed.data.map((record, index) => {
    const columns: Record<string, string> = {};
    for (const header of headers) {
      columns[header] = record[header] ?? "";
    }
    return {
      index,
      title: columns[DatasetColumn.TITLE] ?? "",
      description: columns[DatasetColumn.DESCRIPTION] ?? "",
      content: columns[DatasetColumn.CONTENT] ?? "",
      columns,
    };
  });

  return { path, headers, rows };
}

/**
 * Load a UTF-8 CSV dataset.
 *
 * @throws DatasetValidationError when required columns are missing, the
 *   dataset is empty, or a required column has empty cells.
 * @throws PersistenceError when the file cannot be read.
 */
export async function loadDataset(path: string): Promise<Dataset> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new PersistenceError(`Failed to read dataset: ${errorMessage(err)}`, path, { cause: err });
  }
  return parseDataset(text, path);
}

function average(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;
}

export function getDatasetStats(rows: readonly DatasetRow[]): DatasetStats {
  return {
    totalRecords: rows.length,
    avgTitleLength: average(rows.map((r) => r.title.length)),
    avgDescriptionLength: average(rows.map((r) => r.description.length)),
    avgContentLength: average(rows.map((r) => r.content.length)),
    blankTitles: rows.filter((r) => r.title.trim() === "").length,
    blankDescriptions: rows.filter((r) => r.description.trim() === "").length,
    blankContents: rows.filter((r) => r.content.trim() === "").length,
  };
}

export function toCsv(columns: readonly string[], rows: readonly Record<string, string>[]): string {
  return Papa.unparse({
    fields: [...columns],
    data: rows.map((row) => columns.map((col) => row[col] ?? "")),
  });
}

export async function writeCsv(
  path: string,
  columns: readonly string[],
  rows: readonly Record<string, string>[],
): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${toCsv(columns, rows)}\n`, "utf-8");
  } catch (err) {
    throw new PersistenceError(`Failed to write CSV: ${errorMessage(err)}`, path, { cause: err });
  }
}
