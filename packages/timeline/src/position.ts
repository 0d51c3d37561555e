import type { CalendarDate } from "../../intake/src/schema.js";
import type { CaseStage, CaseTimeline, LocationEvent } from "./types.js";

/**
 * Where the case is as of `reference_date`: the last event dated on or before it.
 * Without a reference date this is the terminal event. Null means not yet received.
 */
export function currentLocation(t: CaseTimeline, reference_date?: CalendarDate): LocationEvent | null {
  if (reference_date == null) return t.events[t.events.length - 1] ?? null;

  let cur: LocationEvent | null = null;
  for (const e of t.events) {
    if (e.date > reference_date) break;
    cur = e;
  }
  return cur;
}

export function caseStage(t: CaseTimeline, reference_date?: CalendarDate): CaseStage {
  const cur = currentLocation(t, reference_date);
  if (!cur) return "NOT_RECEIVED";
  return cur.kind === "SITE" ? "DELIVERED" : "IN_STORAGE";
}

/** Every location the case has visited, in order of first arrival. */
export function visitedLocations(t: CaseTimeline): string[] {
  return [...new Set(t.events.map((e) => e.location_id))];
}

export function firstEventOfKind(t: CaseTimeline, kind: LocationEvent["kind"]): LocationEvent | null {
  return t.events.find((e) => e.kind === kind) ?? null;
}
