import { describe, it, expect } from "vitest";
import { NO_RESULTS, normalizeResult, isTabularResult } from "./normalizer.js";

describe("normalizeResult", () => {
  it.each([{ value: null }, { value: undefined }, { value: "" }, { value: [] }])(
    "returns the sentinel for empty result $value",
    ({ value }) => {
      expect(normalizeResult(value)).toEqual({ content: NO_RESULTS });
    },
  );

  it("returns the sentinel for a tabular result without rows", () => {
    expect(normalizeResult({ columns: ["a"], rows: [] })).toEqual({ content: NO_RESULTS });
  });

  it("keys tabular rows by column name and caches them", () => {
    const result = normalizeResult({
      columns: ["CustomerID", "Name"],
      rows: [
        [1, "Avery"],
        [2, "Blake"],
      ],
    });

    const records = [
      { CustomerID: 1, Name: "Avery" },
      { CustomerID: 2, Name: "Blake" },
    ];
    expect(result.records).toEqual(records);
    expect(result.content).toBe(JSON.stringify(records, null, 2));
  });

  it("keeps rows positional when there are no column names", () => {
    const result = normalizeResult({ columns: [], rows: [[1, "x"]] });
    expect(result.records).toEqual([[1, "x"]]);
  });

  it("does not hand back records for export calls", () => {
    const result = normalizeResult({ columns: ["a"], rows: [[1]] }, { isExport: true });
    expect(result.records).toBeUndefined();
    expect(result.content).toBe(JSON.stringify([{ a: 1 }], null, 2));
  });

  it("keeps arrays of objects as records and wraps scalars", () => {
    const result = normalizeResult([{ a: 1 }, "loose"]);
    expect(result.records).toEqual([{ a: 1 }, { value: "loose" }]);
  });

  it("serializes a plain object without caching it", () => {
    const status = { success: true, rows_exported: 3 };
    const result = normalizeResult(status);
    expect(result).toEqual({ content: JSON.stringify(status, null, 2) });
  });

  it("stringifies scalars", () => {
    expect(normalizeResult(42)).toEqual({ content: "42" });
    expect(normalizeResult(false)).toEqual({ content: "false" });
    expect(normalizeResult("done")).toEqual({ content: "done" });
  });

  it("writes bigint values as strings", () => {
    const result = normalizeResult({ columns: ["id"], rows: [[12345678901234567890n]] });
    expect(result.content).toBe('[\n  {\n    "id": "12345678901234567890"\n  }\n]');
  });
});

describe("isTabularResult", () => {
  it("recognizes column and row arrays", () => {
    expect(isTabularResult({ columns: ["a"], rows: [[1]] })).toBe(true);
  });

  it("rejects lookalikes", () => {
    expect(isTabularResult({ columns: "a", rows: [] })).toBe(false);
    expect(isTabularResult({ columns: ["a"], rows: [1] })).toBe(false);
    expect(isTabularResult([1, 2])).toBe(false);
  });
});
