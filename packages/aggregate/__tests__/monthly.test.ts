import { describe, it, expect } from "vitest";
import { casePostings } from "../src/postings.js";
import { aggregateSiteMonthly, aggregateWarehouseMonthly } from "../src/monthly.js";
import type { WarehouseMonthlyRow } from "../src/monthly.js";
import { catalog, caseX, caseY, caseZ, timeline } from "../../timeline/__tests__/_helpers/cases.js";

const wh = (
  warehouse_id: "WarehouseA" | "WarehouseB" | "WarehouseC",
  month: string,
  inbound: number,
  outbound: number,
  ending_stock: number
): WarehouseMonthlyRow => ({
  warehouse_id,
  classification: warehouse_id === "WarehouseA" ? "INDOOR" : warehouse_id === "WarehouseB" ? "OUTDOOR" : "DANGEROUS",
  month,
  inbound,
  outbound,
  ending_stock,
});

describe("aggregate: postings", () => {
  it("books the outbound in the month of the next move", () => {
    expect(casePostings(caseX()).map((p) => `${p.type} ${p.location_id} ${p.month}`)).toEqual([
      "IN WarehouseA 2025-01",
      "OUT WarehouseA 2025-03",
      "IN WarehouseB 2025-03",
    ]);
  });

  it("records site departures separately from warehouse outbound", () => {
    const t = timeline("R", { SiteDAS: "2025-01-10", WarehouseA: "2025-02-01" });
    expect(casePostings(t).map((p) => `${p.type} ${p.location_id} ${p.month}`)).toEqual([
      "SITE_IN SiteDAS 2025-01",
      "SITE_OUT SiteDAS 2025-02",
      "IN WarehouseA 2025-02",
    ]);
  });
});

describe("aggregate: warehouse monthly", () => {
  it("scenario A: transfer between warehouses", () => {
    expect(aggregateWarehouseMonthly([caseX()], catalog)).toEqual([
      wh("WarehouseA", "2025-01", 1, 0, 1),
      wh("WarehouseB", "2025-01", 0, 0, 0),
      wh("WarehouseA", "2025-02", 0, 0, 1),
      wh("WarehouseB", "2025-02", 0, 0, 0),
      wh("WarehouseA", "2025-03", 0, 1, 0),
      wh("WarehouseB", "2025-03", 1, 0, 1),
    ]);
  });

  it("scenario B: a site-only case never reaches a warehouse table", () => {
    expect(aggregateWarehouseMonthly([caseY()], catalog)).toEqual([]);
    expect(aggregateWarehouseMonthly([caseX(), caseY()], catalog)).toEqual(
      aggregateWarehouseMonthly([caseX()], catalog)
    );
  });

  it("books a same-month transfer as In and Out in that month", () => {
    const t = timeline("S", { WarehouseA: "2025-03-03", WarehouseB: "2025-03-20" });
    expect(aggregateWarehouseMonthly([t], catalog)).toEqual([
      wh("WarehouseA", "2025-03", 1, 1, 0),
      wh("WarehouseB", "2025-03", 1, 0, 1),
    ]);
  });

  it("emits k-1 outbound events for a k-hop path", () => {
    const t = timeline("K", {
      WarehouseA: "2025-01-05",
      WarehouseB: "2025-02-10",
      WarehouseC: "2025-04-01",
      SiteMIR: "2025-05-01",
    });

    const rows = aggregateWarehouseMonthly([t], catalog);
    expect(rows.reduce((s, r) => s + r.outbound, 0)).toBe(t.events.length - 1);
    expect(rows.reduce((s, r) => s + r.inbound, 0)).toBe(3);
    expect(rows.filter((r) => r.month === "2025-05").map((r) => r.ending_stock)).toEqual([0, 0, 0]);
  });

  it("keeps ending stock as a running balance from zero", () => {
    const cases = [
      caseX(),
      caseY(),
      caseZ(),
      timeline("K", { WarehouseA: "2025-01-05", WarehouseB: "2025-02-10", WarehouseC: "2025-04-01", SiteMIR: "2025-05-01" }),
      timeline("S", { WarehouseA: "2025-03-03", WarehouseB: "2025-03-20" }),
      timeline("D", { WarehouseC: "2025-02-28", SiteSHU: "2025-06-30" }),
    ];

    const rows = aggregateWarehouseMonthly(cases, catalog);
    const prev = new Map<string, number>();
    for (const r of rows) {
      expect(r.ending_stock).toBe((prev.get(r.warehouse_id) ?? 0) + r.inbound - r.outbound);
      prev.set(r.warehouse_id, r.ending_stock);
    }

    expect(rows.filter((r) => r.month === "2025-06")).toEqual([
      wh("WarehouseA", "2025-06", 0, 0, 1),
      wh("WarehouseB", "2025-06", 0, 0, 2),
      wh("WarehouseC", "2025-06", 0, 1, 0),
    ]);
  });

  it("is idempotent", () => {
    const cases = [caseX(), caseY(), caseZ()];
    expect(aggregateWarehouseMonthly(cases, catalog)).toEqual(aggregateWarehouseMonthly(cases, catalog));
    expect(aggregateSiteMonthly(cases, catalog)).toEqual(aggregateSiteMonthly(cases, catalog));
  });

  it("clips to through_month and ignores later postings", () => {
    expect(aggregateWarehouseMonthly([caseX()], catalog, { through_month: "2025-02" })).toEqual([
      wh("WarehouseA", "2025-01", 1, 0, 1),
      wh("WarehouseA", "2025-02", 0, 0, 1),
    ]);
  });

  it("carries the opening balance into from_month", () => {
    expect(aggregateWarehouseMonthly([caseX()], catalog, { from_month: "2025-02" })).toEqual([
      wh("WarehouseA", "2025-02", 0, 0, 1),
      wh("WarehouseB", "2025-02", 0, 0, 0),
      wh("WarehouseA", "2025-03", 0, 1, 0),
      wh("WarehouseB", "2025-03", 1, 0, 1),
    ]);
  });

  it("carries stock forward to a from_month after the last posting", () => {
    expect(aggregateWarehouseMonthly([caseX()], catalog, { from_month: "2025-05" })).toEqual([
      wh("WarehouseA", "2025-05", 0, 0, 0),
      wh("WarehouseB", "2025-05", 0, 0, 1),
    ]);
    expect(aggregateSiteMonthly([caseY()], catalog, { from_month: "2025-04" })).toEqual([
      { site_id: "SiteDAS", site_group: "OFFSHORE", month: "2025-04", inbound: 0, cumulative_inbound: 1, outbound: 0 },
    ]);
  });
});

describe("aggregate: site monthly", () => {
  it("scenario B: cumulative inbound is the running sum", () => {
    expect(aggregateSiteMonthly([caseX(), caseY()], catalog)).toEqual([
      { site_id: "SiteDAS", site_group: "OFFSHORE", month: "2025-01", inbound: 0, cumulative_inbound: 0, outbound: 0 },
      { site_id: "SiteDAS", site_group: "OFFSHORE", month: "2025-02", inbound: 1, cumulative_inbound: 1, outbound: 0 },
      { site_id: "SiteDAS", site_group: "OFFSHORE", month: "2025-03", inbound: 0, cumulative_inbound: 1, outbound: 0 },
    ]);
  });

  it("never decreases and counts re-dispatch as site outbound", () => {
    const cases = [
      timeline("R", { SiteDAS: "2025-01-10", WarehouseA: "2025-02-01" }),
      timeline("M1", { WarehouseA: "2025-01-02", SiteMIR: "2025-01-20" }),
      timeline("M2", { SiteMIR: "2025-03-11" }),
    ];

    const rows = aggregateSiteMonthly(cases, catalog);
    expect(rows.map((r) => `${r.month} ${r.site_id} ${r.inbound}/${r.cumulative_inbound}/${r.outbound}`)).toEqual([
      "2025-01 SiteDAS 1/1/0",
      "2025-01 SiteMIR 1/1/0",
      "2025-02 SiteDAS 0/1/1",
      "2025-02 SiteMIR 0/1/0",
      "2025-03 SiteDAS 0/1/0",
      "2025-03 SiteMIR 1/2/0",
    ]);
  });
});
