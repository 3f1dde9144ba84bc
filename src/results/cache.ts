import type { ResultRecord } from "../types.js";

/**
 * Last non-empty record set produced by a non-export tool in this session.
 *
 * The export fallback reads from here when the model re-emits fewer rows
 * than it was shown. Lives as long as the session: a conversation reset
 * leaves it in place, session teardown clears it.
 */
export class ResultCache {
  private records: ResultRecord[] = [];
  private source?: string;

  /** Replace the cached set; empty sets are ignored */
  update(records: ResultRecord[], source?: string): boolean {
    if (records.length === 0) return false;
    this.records = [...records];
    this.source = source;
    return true;
  }

  get(): ResultRecord[] {
    return [...this.records];
  }

  /** Tool that produced the cached records */
  get sourceTool(): string | undefined {
    return this.source;
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
    this.source = undefined;
  }
}
