// Result aggregation.
// Purpose: turn verdicts into immutable records and expose them in check-ID order.

import type { CheckDefinition, Severity } from "../checks/types.js";
import { compareCheckIds, severityOf, type AuditConfig } from "../core/config.js";

// =============================================================================
// TYPES
// =============================================================================

export type ResultRecord = Readonly<{
  id: string;
  message: string;
  success: boolean;
  severity: Severity;
  category: string;
}>;

// =============================================================================
// RECORDS
// =============================================================================

export function makeResult(
  config: AuditConfig,
  definition: CheckDefinition,
  passed: boolean,
): ResultRecord {
  return Object.freeze({
    id: definition.id,
    message: passed ? definition.successMessage : definition.failureMessage,
    success: passed,
    // Unconfigured checks are skipped during resolution.
    severity: severityOf(config, definition.id) ?? "ignore",
    category: definition.category,
  });
}

// =============================================================================
// RESULT SET
// =============================================================================

/** Check ID to record. Reads and JSON are always sorted by check ID, whatever the insertion order. */
export class ResultSet {
  private readonly records = new Map<string, ResultRecord>();

  static from(records: Iterable<ResultRecord>): ResultSet {
    const set = new ResultSet();
    for (const record of records) {
      set.add(record);
    }
    return set;
  }

  add(record: ResultRecord): void {
    this.records.set(record.id, record);
  }

  get(checkId: string): ResultRecord | undefined {
    return this.records.get(checkId);
  }

  has(checkId: string): boolean {
    return this.records.has(checkId);
  }

  get size(): number {
    return this.records.size;
  }

  ids(): string[] {
    return [...this.records.keys()].sort(compareCheckIds);
  }

  values(): ResultRecord[] {
    return this.ids().flatMap((checkId) => {
      const record = this.records.get(checkId);
      return record ? [record] : [];
    });
  }

  entries(): Array<[string, ResultRecord]> {
    return this.values().map((record) => [record.id, record]);
  }

  [Symbol.iterator](): IterableIterator<ResultRecord> {
    return this.values()[Symbol.iterator]();
  }

  failures(): ResultRecord[] {
    return this.values().filter((record) => !record.success);
  }

  // An array, since objects would hoist integer-like IDs ahead of the rest.
  toJSON(): ResultRecord[] {
    return this.values();
  }
}
