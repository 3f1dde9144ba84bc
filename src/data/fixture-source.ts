import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigError, describeError } from "../errors.js";
import type { DataSource, ProcedureParams, TabularResult } from "../types.js";

/**
 * DataSource backed by canned row sets, one per procedure name.
 *
 * Used by the demo and the tests in place of a database connection.
 * Parameters that match a column filter the rows: strings by
 * case-insensitive substring, everything else by equality. Parameters
 * with no matching column are ignored.
 */

const FixtureSchema = z.object({
  procedures: z.record(
    z.object({
      columns: z.array(z.string()),
      rows: z.array(z.array(z.unknown())),
    }),
  ),
});

export type FixtureData = z.infer<typeof FixtureSchema>;

export class FixtureDataSource implements DataSource {
  private data: FixtureData;
  private closed = false;
  /** Every call made, for assertions */
  public calls: Array<{ procedure: string; params: ProcedureParams }> = [];

  constructor(data: FixtureData) {
    this.data = data;
  }

  static async fromFile(path: string): Promise<FixtureDataSource> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Cannot load fixture data ${path}: ${describeError(err)}`);
    }
    const parsed = FixtureSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid fixture data ${path}: ${parsed.error.message}`);
    }
    return new FixtureDataSource(parsed.data);
  }

  async callProcedure(procedure: string, params: ProcedureParams): Promise<TabularResult> {
    if (this.closed) {
      throw new Error("Data source is closed");
    }
    this.calls.push({ procedure, params: [...params] });

    const fixture = this.data.procedures[procedure];
    if (!fixture) {
      throw new Error(`Unknown procedure: ${procedure}`);
    }

    const filters = params
      .map((p) => ({ index: fixture.columns.indexOf(p.name), value: p.value }))
      .filter((f) => f.index >= 0);

    const rows = fixture.rows.filter((row) =>
      filters.every((f) => matches(row[f.index], f.value)),
    );
    return { columns: [...fixture.columns], rows: rows.map((r) => [...r]) };
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

function matches(cell: unknown, value: unknown): boolean {
  if (typeof value === "string" && typeof cell === "string") {
    return cell.toLowerCase().includes(value.toLowerCase());
  }
  return cell === value;
}
