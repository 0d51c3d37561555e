import type { MonthKey } from "../../intake/src/schema.js";
import type { LocationCatalog, WarehouseClassification } from "../../locations/src/catalog.js";
import type { CaseTimeline } from "../../timeline/src/types.js";
import { aggregateSiteMonthly, aggregateWarehouseMonthly } from "./monthly.js";
import type { SiteMonthlyRow, WarehouseMonthlyRow } from "./monthly.js";
import type { AggregateOptions } from "./window.js";

export type ClassificationMonthlyRow = {
  classification: WarehouseClassification;
  month: MonthKey;
  inbound: number;
  outbound: number;
  ending_stock: number;
};

export type SiteGroupMonthlyRow = {
  site_group: string;
  month: MonthKey;
  inbound: number;
  cumulative_inbound: number;
};

export type WarehouseSummaryRow = {
  warehouse_id: string;
  classification: WarehouseClassification;
  total_inbound: number;
  total_outbound: number;
  current_stock: number;
};

export type SupplierSummaryRow = {
  supplier: string;
  cases: number;
  total_warehouse_inbound: number;
  total_warehouse_outbound: number;
  final_warehouse_stock: number;
  final_site_cumulative_inbound: number;
};

export const UNSPECIFIED_SUPPLIER = "UNSPECIFIED";

const CLASSIFICATION_ORDER: WarehouseClassification[] = ["INDOOR", "OUTDOOR", "DANGEROUS"];

export function rollupByClassification(rows: readonly WarehouseMonthlyRow[]): ClassificationMonthlyRow[] {
  const m = new Map<string, ClassificationMonthlyRow>();

  for (const r of rows) {
    const k = `${r.classification}|${r.month}`;
    const acc = m.get(k) ?? {
      classification: r.classification,
      month: r.month,
      inbound: 0,
      outbound: 0,
      ending_stock: 0,
    };
    acc.inbound += r.inbound;
    acc.outbound += r.outbound;
    acc.ending_stock += r.ending_stock;
    m.set(k, acc);
  }

  return [...m.values()].sort(
    (a, b) =>
      a.month.localeCompare(b.month) ||
      CLASSIFICATION_ORDER.indexOf(a.classification) - CLASSIFICATION_ORDER.indexOf(b.classification)
  );
}

export function rollupBySiteGroup(rows: readonly SiteMonthlyRow[]): SiteGroupMonthlyRow[] {
  const m = new Map<string, SiteGroupMonthlyRow>();

  for (const r of rows) {
    const k = `${r.site_group}|${r.month}`;
    const acc = m.get(k) ?? { site_group: r.site_group, month: r.month, inbound: 0, cumulative_inbound: 0 };
    acc.inbound += r.inbound;
    acc.cumulative_inbound += r.cumulative_inbound;
    m.set(k, acc);
  }

  return [...m.values()].sort(
    (a, b) => a.month.localeCompare(b.month) || a.site_group.localeCompare(b.site_group)
  );
}

/** Totals over the window; current stock is the last emitted month's ending stock. */
export function summarizeWarehouses(rows: readonly WarehouseMonthlyRow[]): WarehouseSummaryRow[] {
  const out = new Map<string, WarehouseSummaryRow>();

  // rows arrive month-ascending, so the last write of ending_stock wins
  for (const r of rows) {
    const acc = out.get(r.warehouse_id) ?? {
      warehouse_id: r.warehouse_id,
      classification: r.classification,
      total_inbound: 0,
      total_outbound: 0,
      current_stock: 0,
    };
    acc.total_inbound += r.inbound;
    acc.total_outbound += r.outbound;
    acc.current_stock = r.ending_stock;
    out.set(r.warehouse_id, acc);
  }

  return [...out.values()];
}

/**
 * Per-supplier totals. Each supplier's cases are aggregated on their own, with the
 * same options, so a supplier's final stock is its own last month.
 */
export function summarizeSuppliers(
  timelines: readonly CaseTimeline[],
  catalog: LocationCatalog,
  opts: AggregateOptions = {}
): SupplierSummaryRow[] {
  const bySupplier = new Map<string, CaseTimeline[]>();
  for (const t of timelines) {
    const k = t.supplier ?? UNSPECIFIED_SUPPLIER;
    const list = bySupplier.get(k) ?? [];
    list.push(t);
    bySupplier.set(k, list);
  }

  const rows: SupplierSummaryRow[] = [];

  for (const [supplier, cases] of [...bySupplier.entries()].sort((a, b) => a[0].localeCompare(b[0]))) {
    const wh = summarizeWarehouses(aggregateWarehouseMonthly(cases, catalog, opts));
    const sites = aggregateSiteMonthly(cases, catalog, opts);

    const lastCumulative = new Map<string, number>();
    for (const r of sites) lastCumulative.set(r.site_id, r.cumulative_inbound);

    rows.push({
      supplier,
      cases: cases.length,
      total_warehouse_inbound: sum(wh.map((w) => w.total_inbound)),
      total_warehouse_outbound: sum(wh.map((w) => w.total_outbound)),
      final_warehouse_stock: sum(wh.map((w) => w.current_stock)),
      final_site_cumulative_inbound: sum([...lastCumulative.values()]),
    });
  }

  return rows;
}

function sum(xs: number[]): number {
  return xs.reduce((a, b) => a + b, 0);
}
