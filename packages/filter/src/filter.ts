import { z } from "zod";
import type { LocationCatalog } from "../../locations/src/catalog.js";
import { isCalendarDate } from "../../timeline/src/dates.js";
import { caseStage } from "../../timeline/src/position.js";
import type { CaseTimeline } from "../../timeline/src/types.js";

const OptionalValue = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v && v.length ? v : undefined));

export const CaseFilterSchema = z
  .object({
    // membership at any point in the case history
    warehouse: OptionalValue,
    site: OptionalValue,

    storage_type: OptionalValue,
    category: OptionalValue,
    supplier: OptionalValue,
    status: OptionalValue,

    stage: z.enum(["NOT_RECEIVED", "IN_STORAGE", "DELIVERED"]).optional(),
    // evaluation date for `stage`; the terminal event when omitted
    as_of: z.string().refine(isCalendarDate, "Expected a YYYY-MM-DD date").optional(),
  })
  .strict();

export type CaseFilter = z.input<typeof CaseFilterSchema>;
export type ParsedCaseFilter = z.output<typeof CaseFilterSchema>;

export type CasePredicate = (t: CaseTimeline) => boolean;

export function parseCaseFilter(input: unknown): ParsedCaseFilter {
  return CaseFilterSchema.parse(input);
}

/**
 * Compile a filter into a predicate. Every criterion present must hold.
 * Warehouse and site ids are checked against the catalog up front.
 */
export function compileCaseFilter(filter: CaseFilter, catalog: LocationCatalog): CasePredicate {
  const f = parseCaseFilter(filter);

  // throws UnknownLocationError
  if (f.warehouse != null) catalog.classification(f.warehouse);
  if (f.site != null) catalog.siteGroup(f.site);

  return (t) => {
    if (f.warehouse != null && !t.events.some((e) => e.location_id === f.warehouse)) return false;
    if (f.site != null && !t.events.some((e) => e.location_id === f.site)) return false;
    if (f.storage_type != null && t.storage_type !== f.storage_type) return false;
    if (f.category != null && t.category !== f.category) return false;
    if (f.supplier != null && t.supplier !== f.supplier) return false;
    if (f.status != null && t.status !== f.status) return false;
    if (f.stage != null && caseStage(t, f.as_of) !== f.stage) return false;
    return true;
  };
}

/** The matching subset, in input order. */
export function filterCases(
  timelines: readonly CaseTimeline[],
  filter: CaseFilter | CasePredicate,
  catalog: LocationCatalog
): CaseTimeline[] {
  const pred = typeof filter === "function" ? filter : compileCaseFilter(filter, catalog);
  return timelines.filter(pred);
}

export function describeFilter(filter: CaseFilter | CasePredicate): string {
  if (typeof filter === "function") return "custom predicate";

  const parts = Object.entries(parseCaseFilter(filter))
    .filter(([, v]) => v != null)
    .map(([k, v]) => `${k}=${String(v)}`);

  return parts.length ? parts.join(", ") : "all cases";
}
