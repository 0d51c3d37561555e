import type { CalendarDate } from "../../intake/src/schema.js";
import type { LocationCatalog, WarehouseClassification } from "../../locations/src/catalog.js";
import { daysBetween } from "../../timeline/src/dates.js";
import { currentLocation } from "../../timeline/src/position.js";
import type { CaseTimeline } from "../../timeline/src/types.js";
import { ageStats } from "./stats.js";
import type { AgeStats } from "./stats.js";

export const DEFAULT_THRESHOLDS_DAYS = [90, 180, 365] as const;

export type DeadStockOptions = {
  reference_date: CalendarDate;
  thresholds_days?: readonly number[];
};

export type DeadStockRecord = {
  case_id: string;
  warehouse_id: string;
  classification: WarehouseClassification;
  last_event_date: CalendarDate;
  age_days: number;
  // highest threshold with age_days >= threshold; null when below every threshold
  threshold_days: number | null;
};

export type DeadStockReport = {
  reference_date: CalendarDate;
  thresholds_days: number[];
  // every case resting in a warehouse at the reference date, oldest first
  records: DeadStockRecord[];
  notes: string[];
};

export type WarehouseDeadStock = AgeStats & {
  warehouse_id: string;
};

export type BucketDeadStock = AgeStats & {
  threshold_days: number;
};

/**
 * Long-stay detection at an explicit reference date.
 *
 * Only cases whose current location (as of the reference date) is a warehouse are
 * reported; delivered and not-yet-received cases never are. Threshold boundaries are
 * inclusive: an age equal to a threshold crosses it.
 */
export function detectDeadStock(
  timelines: readonly CaseTimeline[],
  catalog: LocationCatalog,
  opts: DeadStockOptions
): DeadStockReport {
  const thresholds = normalizeThresholds(opts.thresholds_days ?? DEFAULT_THRESHOLDS_DAYS);
  const records: DeadStockRecord[] = [];
  let notReceived = 0;

  for (const t of timelines) {
    const cur = currentLocation(t, opts.reference_date);
    if (!cur) {
      notReceived++;
      continue;
    }
    if (cur.kind !== "WAREHOUSE") continue;

    const age_days = daysBetween(cur.date, opts.reference_date);
    records.push({
      case_id: t.case_id,
      warehouse_id: cur.location_id,
      classification: catalog.classification(cur.location_id),
      last_event_date: cur.date,
      age_days,
      threshold_days: bucketFor(age_days, thresholds),
    });
  }

  records.sort(bySeverity);

  const notes: string[] = [];
  notes.push("Thresholds are inclusive lower bounds: age_days >= threshold crosses it.");
  if (notReceived > 0) {
    notes.push(`${notReceived} case(s) had no event on or before ${opts.reference_date} and were not assessed.`);
  }

  return { reference_date: opts.reference_date, thresholds_days: thresholds, records, notes };
}

/** Records at or above `min_threshold_days` (default: the lowest configured threshold). */
export function flaggedDeadStock(r: DeadStockReport, min_threshold_days?: number): DeadStockRecord[] {
  const min = min_threshold_days ?? r.thresholds_days[0];
  if (min == null) return [];
  return r.records.filter((x) => x.age_days >= min);
}

/** Urgent-action list: age_days >= urgent_days, most severe first. */
export function urgentCases(r: DeadStockReport, urgent_days: number): DeadStockRecord[] {
  return r.records.filter((x) => x.age_days >= urgent_days);
}

export function deadStockByWarehouse(r: DeadStockReport, min_threshold_days?: number): WarehouseDeadStock[] {
  const m = new Map<string, number[]>();
  for (const x of flaggedDeadStock(r, min_threshold_days)) {
    const list = m.get(x.warehouse_id) ?? [];
    list.push(x.age_days);
    m.set(x.warehouse_id, list);
  }

  return [...m.entries()]
    .map(([warehouse_id, ages]) => ({ warehouse_id, ...ageStats(ages) }))
    .sort((a, b) => b.count - a.count || a.warehouse_id.localeCompare(b.warehouse_id));
}

export function deadStockByBucket(r: DeadStockReport): BucketDeadStock[] {
  const m = new Map<number, number[]>();
  for (const x of r.records) {
    if (x.threshold_days == null) continue;
    const list = m.get(x.threshold_days) ?? [];
    list.push(x.age_days);
    m.set(x.threshold_days, list);
  }

  return [...m.entries()]
    .map(([threshold_days, ages]) => ({ threshold_days, ...ageStats(ages) }))
    .sort((a, b) => b.threshold_days - a.threshold_days);
}

/* ------------------------- helpers (deterministic) ------------------------- */

function normalizeThresholds(xs: readonly number[]): number[] {
  return [...new Set(xs)].sort((a, b) => a - b);
}

function bucketFor(age_days: number, ascending: readonly number[]): number | null {
  let hit: number | null = null;
  for (const t of ascending) {
    if (age_days >= t) hit = t;
  }
  return hit;
}

export function bySeverity(
  a: { age_days: number; case_id: string },
  b: { age_days: number; case_id: string }
): number {
  return b.age_days - a.age_days || a.case_id.localeCompare(b.case_id);
}
