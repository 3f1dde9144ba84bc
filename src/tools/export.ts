import { mkdir, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { defineTool } from "./registry.js";
import type { Tool } from "../types.js";

export const EXPORT_TOOL_NAME = "export_data";
/** Argument carrying the rows; the agent loop fills it from the result cache */
export const EXPORT_DATA_PARAMETER = "data";

export interface ExportToolOptions {
  /** Defaults to EXPORT_TOOL_NAME */
  name?: string;
  /** Directory the export documents are written to (created on demand) */
  outputDir: string;
  /** Base URL of the download surface, e.g. http://localhost:8000 */
  baseUrl: string;
  now?: () => Date;
}

export type ExportResult =
  | {
      success: true;
      message: string;
      download_url: string;
      filename: string;
      rows_exported: number;
      columns: string[];
    }
  | { success: false; message: string };

/**
 * Export tool. Writes rows the model already retrieved to a document the
 * download surface can serve. The agent loop swaps in the cached rows when
 * the model passes fewer than it was shown.
 */
export function createExportTool(options: ExportToolOptions): Tool {
  const now = options.now ?? (() => new Date());

  return defineTool(
    {
      name: options.name ?? EXPORT_TOOL_NAME,
      description:
        "Export data you already have to a downloadable file. Use this to save results " +
        `from a previous tool call. Pass the array of data objects in the ${EXPORT_DATA_PARAMETER} parameter. ` +
        "Do NOT use this to execute new queries, only to export existing data.",
      parameters: [
        {
          name: EXPORT_DATA_PARAMETER,
          type: "array",
          description:
            "Array of data objects/records to export. Each object should have consistent keys/columns.",
          items: { type: "object" },
          required: true,
        },
        {
          name: "filename",
          type: "string",
          description: "Name for the exported file (without extension)",
        },
        {
          name: "sheet_name",
          type: "string",
          description: "Name for the sheet inside the exported file",
        },
      ],
    },
    async (args): Promise<ExportResult> => {
      const supplied = args[EXPORT_DATA_PARAMETER];
      const data = Array.isArray(supplied) ? supplied : [];
      if (data.length === 0) {
        return { success: false, message: "No data provided to export" };
      }

      const filename = safeFilename(args.filename) ?? `export_${formatTimestamp(now())}`;
      const sheet = typeof args.sheet_name === "string" && args.sheet_name ? args.sheet_name : "Sheet1";
      const columns = collectColumns(data);
      const rows = data.map((record) => columns.map((c) => cellValue(record, c)));

      await mkdir(options.outputDir, { recursive: true });
      const file = `${filename}.json`;
      await writeFile(
        join(options.outputDir, file),
        JSON.stringify({ sheet, columns, rows }, null, 2),
        "utf-8",
      );

      return {
        success: true,
        message: "Data exported successfully. Download your file using the link below.",
        download_url: `${options.baseUrl.replace(/\/+$/, "")}/download/${file}`,
        filename: file,
        rows_exported: rows.length,
        columns,
      };
    },
  );
}

/** Column names in first-seen order across all records */
export function collectColumns(data: unknown[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of data) {
    const keys = Array.isArray(record)
      ? record.map((_, i) => String(i))
      : typeof record === "object" && record !== null
        ? Object.keys(record)
        : ["value"];
    for (const key of keys) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

function cellValue(record: unknown, column: string): unknown {
  if (Array.isArray(record)) {
    return record[Number(column)] ?? null;
  }
  if (typeof record === "object" && record !== null) {
    const value: unknown = Reflect.get(record, column);
    return value ?? null;
  }
  return column === "value" ? record : null;
}

function safeFilename(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const cleaned = basename(value)
    .replace(/\.json$/i, "")
    .replace(/[^A-Za-z0-9_.-]/g, "_")
    .replace(/^\.+/, "");
  return cleaned || undefined;
}

/** yyyyMMdd_HHmmss in local time */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
