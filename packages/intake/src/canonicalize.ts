import type { ParsedCaseRecord } from "./validate.js";

/**
 * Canonicalize parsed case records for deterministic downstream computation.
 * - Drops arrivals without a date (an empty location column)
 * - Trims string dates
 *
 * NOTE: We do NOT "fix" missing data here. Record order and arrival order are kept;
 * the timeline builder owns chronological ordering.
 */
export function canonicalizeCaseRecords(records: ParsedCaseRecord[]): ParsedCaseRecord[] {
  return records.map(canonicalizeCaseRecord);
}

export function canonicalizeCaseRecord(r: ParsedCaseRecord): ParsedCaseRecord {
  const arrivals = r.arrivals
    .map((a) => (typeof a.date === "string" ? { ...a, date: a.date.trim() } : a))
    .filter((a) => a.date != null && a.date !== "");

  return { ...r, arrivals };
}
