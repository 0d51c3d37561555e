import type { ParsedCaseRecord } from "../../intake/src/validate.js";
import type { LocationCatalog } from "../../locations/src/catalog.js";
import { toCalendarDate } from "./dates.js";
import { EmptyTimelineWarning, MalformedEventError } from "./errors.js";
import type { CaseTimeline, Exclusion, LocationEvent, TimelineBuildResult } from "./types.js";

/**
 * Normalize one wide record (one column per location) into an ordered event list.
 *
 * - every dated arrival becomes exactly one event; nothing is merged
 * - order: date ascending, then declared column rank
 * - unknown location ids throw UnknownLocationError (from the catalog)
 */
export function buildCaseTimeline(r: ParsedCaseRecord, catalog: LocationCatalog): CaseTimeline {
  const events: LocationEvent[] = [];
  const seen = new Set<string>();

  for (const a of r.arrivals) {
    if (a.date == null || a.date === "") continue;

    const kind = catalog.kindOf(a.location_id);
    const rank = catalog.rankOf(a.location_id);

    const date = toCalendarDate(a.date);
    if (date == null) {
      throw new MalformedEventError(
        r.case_id,
        `unreadable date ${JSON.stringify(String(a.date))} for location '${a.location_id}'`
      );
    }

    // Same location twice: a same-day pair would have no rank to break the tie.
    if (seen.has(a.location_id)) {
      throw new MalformedEventError(r.case_id, `location '${a.location_id}' listed more than once`);
    }
    seen.add(a.location_id);

    events.push(Object.freeze({ location_id: a.location_id, kind, date, rank }));
  }

  if (events.length === 0) throw new EmptyTimelineWarning(r.case_id);

  events.sort(compareEvents);

  return Object.freeze({
    case_id: r.case_id,
    supplier: r.supplier,
    category: r.category,
    storage_type: r.storage_type,
    status: r.status,
    events: Object.freeze(events),
  });
}

/**
 * Build every timeline of a batch. Per-case problems become exclusions;
 * reference-data problems (UnknownLocationError) propagate and abort the batch.
 */
export function buildTimelines(
  records: readonly ParsedCaseRecord[],
  catalog: LocationCatalog
): TimelineBuildResult {
  const timelines: CaseTimeline[] = [];
  const exclusions: Exclusion[] = [];
  const ids = new Set<string>();

  for (const r of records) {
    if (ids.has(r.case_id)) {
      exclusions.push({
        case_id: r.case_id,
        reason: "DUPLICATE_CASE",
        level: "ERROR",
        message: `DUPLICATE_CASE: case '${r.case_id}' appears more than once; later record ignored`,
      });
      continue;
    }
    ids.add(r.case_id);

    try {
      timelines.push(buildCaseTimeline(r, catalog));
    } catch (e) {
      if (e instanceof EmptyTimelineWarning) {
        exclusions.push({ case_id: r.case_id, reason: e.code, level: "WARN", message: e.message });
      } else if (e instanceof MalformedEventError) {
        exclusions.push({ case_id: r.case_id, reason: e.code, level: "ERROR", message: e.message });
      } else {
        throw e;
      }
    }
  }

  return { timelines, exclusions };
}

export function compareEvents(a: LocationEvent, b: LocationEvent): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.rank - b.rank;
}
