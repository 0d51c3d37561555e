import type { MonthKey } from "../../intake/src/schema.js";
import type { LocationCatalog, WarehouseClassification } from "../../locations/src/catalog.js";
import type { CaseTimeline } from "../../timeline/src/types.js";
import { collectPostings } from "./postings.js";
import { countKey, monthWindow } from "./window.js";
import type { AggregateOptions } from "./window.js";

export type WarehouseMonthlyRow = {
  warehouse_id: string;
  classification: WarehouseClassification;
  month: MonthKey;
  inbound: number;
  outbound: number;
  ending_stock: number;
};

export type SiteMonthlyRow = {
  site_id: string;
  site_group: string;
  month: MonthKey;
  inbound: number;
  cumulative_inbound: number;
  // departures from the site to a later location
  outbound: number;
};

/**
 * Inbound, outbound and ending stock per warehouse and month.
 *
 * ending_stock(m) = ending_stock(m-1) + inbound(m) - outbound(m), starting at 0 in the
 * month before the first month with data. Rows cover every month of the window for
 * each warehouse with at least one posting, ordered by month then column rank.
 */
export function aggregateWarehouseMonthly(
  timelines: readonly CaseTimeline[],
  catalog: LocationCatalog,
  opts: AggregateOptions = {}
): WarehouseMonthlyRow[] {
  const { walk, emit, postings } = monthWindow(collectPostings(timelines), opts);

  const inbound = new Map<string, number>();
  const outbound = new Map<string, number>();
  const warehouses = new Set<string>();

  for (const p of postings) {
    if (p.type !== "IN" && p.type !== "OUT") continue;
    warehouses.add(p.location_id);
    const bucket = p.type === "IN" ? inbound : outbound;
    const k = countKey(p.location_id, p.month);
    bucket.set(k, (bucket.get(k) ?? 0) + 1);
  }

  const rows: WarehouseMonthlyRow[] = [];

  for (const warehouse_id of byRank(warehouses, catalog)) {
    const classification = catalog.classification(warehouse_id);
    let stock = 0;

    for (const month of walk) {
      const k = countKey(warehouse_id, month);
      const i = inbound.get(k) ?? 0;
      const o = outbound.get(k) ?? 0;
      stock += i - o;

      if (!emit.has(month)) continue;
      rows.push({ warehouse_id, classification, month, inbound: i, outbound: o, ending_stock: stock });
    }
  }

  return rows.sort((a, b) => compareRows(a.month, b.month, a.warehouse_id, b.warehouse_id, catalog));
}

/**
 * Inbound and inclusive running cumulative inbound per site and month.
 */
export function aggregateSiteMonthly(
  timelines: readonly CaseTimeline[],
  catalog: LocationCatalog,
  opts: AggregateOptions = {}
): SiteMonthlyRow[] {
  const { walk, emit, postings } = monthWindow(collectPostings(timelines), opts);

  const inbound = new Map<string, number>();
  const outbound = new Map<string, number>();
  const sites = new Set<string>();

  for (const p of postings) {
    if (p.type !== "SITE_IN" && p.type !== "SITE_OUT") continue;
    sites.add(p.location_id);
    const bucket = p.type === "SITE_IN" ? inbound : outbound;
    const k = countKey(p.location_id, p.month);
    bucket.set(k, (bucket.get(k) ?? 0) + 1);
  }

  const rows: SiteMonthlyRow[] = [];

  for (const site_id of byRank(sites, catalog)) {
    const site_group = catalog.siteGroup(site_id);
    let cumulative = 0;

    for (const month of walk) {
      const k = countKey(site_id, month);
      const i = inbound.get(k) ?? 0;
      cumulative += i;

      if (!emit.has(month)) continue;
      rows.push({
        site_id,
        site_group,
        month,
        inbound: i,
        cumulative_inbound: cumulative,
        outbound: outbound.get(k) ?? 0,
      });
    }
  }

  return rows.sort((a, b) => compareRows(a.month, b.month, a.site_id, b.site_id, catalog));
}

/* ------------------------- helpers (deterministic) ------------------------- */

function byRank(ids: Set<string>, catalog: LocationCatalog): string[] {
  return [...ids].sort((a, b) => catalog.rankOf(a) - catalog.rankOf(b));
}

function compareRows(
  ma: MonthKey,
  mb: MonthKey,
  la: string,
  lb: string,
  catalog: LocationCatalog
): number {
  if (ma !== mb) return ma < mb ? -1 : 1;
  return catalog.rankOf(la) - catalog.rankOf(lb);
}
