import type { CalendarDate } from "../../intake/src/schema.js";
import { daysBetween } from "../../timeline/src/dates.js";
import { firstEventOfKind } from "../../timeline/src/position.js";
import type { CaseTimeline } from "../../timeline/src/types.js";
import { ageStats } from "./stats.js";
import type { AgeStats } from "./stats.js";

export type LeadTimeRecord = {
  case_id: string;
  initial_warehouse_id: string;
  warehouse_arrival: CalendarDate;
  site_id: string;
  site_arrival: CalendarDate;
  lead_time_days: number;
};

export type LeadTimeReport = {
  threshold_days: number;
  records: LeadTimeRecord[];
  by_initial_warehouse: Array<AgeStats & { warehouse_id: string }>;
  // lead_time_days >= threshold_days, longest first
  long_lead_times: LeadTimeRecord[];
  notes: string[];
};

/**
 * Days from the first warehouse arrival to delivery (terminal site arrival), for
 * delivered cases that were staged through at least one warehouse.
 */
export function analyzeLeadTimes(
  timelines: readonly CaseTimeline[],
  opts: { threshold_days: number }
): LeadTimeReport {
  const records: LeadTimeRecord[] = [];
  let direct = 0;

  for (const t of timelines) {
    const last = t.events[t.events.length - 1];
    if (!last || last.kind !== "SITE") continue;

    const first = firstEventOfKind(t, "WAREHOUSE");
    if (!first) {
      direct++;
      continue;
    }

    records.push({
      case_id: t.case_id,
      initial_warehouse_id: first.location_id,
      warehouse_arrival: first.date,
      site_id: last.location_id,
      site_arrival: last.date,
      lead_time_days: daysBetween(first.date, last.date),
    });
  }

  records.sort((a, b) => a.case_id.localeCompare(b.case_id));

  const byWh = new Map<string, number[]>();
  for (const r of records) {
    const list = byWh.get(r.initial_warehouse_id) ?? [];
    list.push(r.lead_time_days);
    byWh.set(r.initial_warehouse_id, list);
  }

  const notes: string[] = [];
  if (direct > 0) notes.push(`${direct} delivered case(s) never passed through a warehouse and have no lead time.`);

  return {
    threshold_days: opts.threshold_days,
    records,
    by_initial_warehouse: [...byWh.entries()]
      .map(([warehouse_id, days]) => ({ warehouse_id, ...ageStats(days) }))
      .sort((a, b) => a.warehouse_id.localeCompare(b.warehouse_id)),
    long_lead_times: records
      .filter((r) => r.lead_time_days >= opts.threshold_days)
      .sort((a, b) => b.lead_time_days - a.lead_time_days || a.case_id.localeCompare(b.case_id)),
    notes,
  };
}
