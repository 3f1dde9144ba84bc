import type { ResultRecord, TabularResult } from "../types.js";

export const NO_RESULTS = "No results found.";

export interface NormalizedResult {
  /** Serialized payload for the tool-result message */
  content: string;
  /** Cacheable records; set only for non-export collection results */
  records?: ResultRecord[];
}

export interface NormalizeOptions {
  /** Export calls never refresh the result cache */
  isExport?: boolean;
}

/**
 * Turn whatever a tool returned into conversation text and, for row sets,
 * the record list the result cache keeps.
 *
 *   empty / null       → "No results found."
 *   tabular rows       → records keyed by column name (positional without columns)
 *   array              → records as given
 *   plain object       → JSON, never cached
 *   anything else      → String(value)
 */
export function normalizeResult(
  result: unknown,
  options: NormalizeOptions = {},
): NormalizedResult {
  if (isEmptyResult(result)) {
    return { content: NO_RESULTS };
  }

  let records: ResultRecord[] | undefined;
  if (isTabularResult(result)) {
    records = tabularToRecords(result);
  } else if (Array.isArray(result)) {
    records = result.map(toRecord);
  }

  if (records) {
    return {
      content: serialize(records),
      records: options.isExport ? undefined : records,
    };
  }

  if (typeof result === "object" && result !== null) {
    return { content: serialize(result) };
  }

  return { content: String(result) };
}

export function isTabularResult(value: unknown): value is TabularResult {
  if (typeof value !== "object" || value === null) return false;
  if (!("columns" in value) || !("rows" in value)) return false;
  return (
    Array.isArray(value.columns) &&
    value.columns.every((c) => typeof c === "string") &&
    Array.isArray(value.rows) &&
    value.rows.every((r) => Array.isArray(r))
  );
}

export function tabularToRecords(result: TabularResult): ResultRecord[] {
  if (result.columns.length === 0) {
    return result.rows.map((row) => [...row]);
  }
  return result.rows.map((row) => {
    const record: Record<string, unknown> = {};
    result.columns.forEach((column, i) => {
      record[column] = row[i];
    });
    return record;
  });
}

function isEmptyResult(result: unknown): boolean {
  if (result === null || result === undefined || result === "") return true;
  if (Array.isArray(result)) return result.length === 0;
  if (isTabularResult(result)) return result.rows.length === 0;
  return false;
}

function toRecord(row: unknown): ResultRecord {
  if (Array.isArray(row)) return [...row];
  if (typeof row === "object" && row !== null) return { ...row };
  // Scalars get a single column so the cache stays uniform
  return { value: row };
}

/** JSON with 2-space indent; bigint values become strings */
export function serialize(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v),
    2,
  );
}
