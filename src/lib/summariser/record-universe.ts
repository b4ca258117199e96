/**
 * Record Universe
 *
 * The fixed set of records in scope for one reconciliation pass: all records
 * of one organisation, or all records of one question. Constructed by the
 * caller and passed into every reconciler; nothing here is process-wide.
 *
 * @module summariser/record-universe
 */

import type { ResponseRecord } from "./types";

export class RecordUniverse {
  private readonly byId: ReadonlyMap<string, ResponseRecord>;

  constructor(readonly records: readonly ResponseRecord[]) {
    const map = new Map<string, ResponseRecord>();
    for (const record of records) {
      map.set(record.recordId, record);
    }
    this.byId = map;
  }

  has(recordId: string): boolean {
    return this.byId.has(recordId);
  }

  get(recordId: string): ResponseRecord | undefined {
    return this.byId.get(recordId);
  }

  /**
   * Resolve ids to records, skipping unknown ids.
   */
  resolve(recordIds: readonly string[]): ResponseRecord[] {
    const out: ResponseRecord[] = [];
    for (const id of recordIds) {
      const record = this.byId.get(id);
      if (record) out.push(record);
    }
    return out;
  }
}

/**
 * Sorted unique response ids and organisation names behind a set of records.
 */
export function summariseSupport(records: readonly ResponseRecord[]): {
  responseIds: string[];
  organisations: string[];
} {
  const responseIds = [...new Set(records.map((r) => r.responseId))].sort();
  const organisations = [...new Set(records.map((r) => r.organisationName))].sort();
  return { responseIds, organisations };
}
