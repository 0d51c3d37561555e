import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { UnknownLocationError } from "../../locations/src/errors.js";
import { LedgerConfigError, loadLedgerConfig, parseLedgerConfig } from "../src/config.js";
import { rerunWithFilter, runLedgerAnalysis } from "../src/engine.js";
import { reference } from "../../timeline/__tests__/_helpers/cases.js";

const config = parseLedgerConfig({ locations: reference });

const records = [
  {
    case_id: "X",
    supplier: "Acme",
    arrivals: [
      { location_id: "WarehouseA", date: "2025-01-10" },
      { location_id: "WarehouseB", date: "2025-03-02" },
      { location_id: "SiteDAS", date: null },
    ],
  },
  { case_id: 42, arrivals: [{ location_id: "SiteDAS", date: "2025-02-15" }] },
  { case_id: "Z", arrivals: [{ location_id: "WarehouseA", date: "2025-01-01" }] },
  { case_id: "E", arrivals: [{ location_id: "WarehouseA", date: "" }] },
];

const reference_date = "2025-06-01";

describe("ledger: analysis run", () => {
  const a = runLedgerAnalysis(records, config, { reference_date });

  it("reports the population and every exclusion", () => {
    expect(a.population).toEqual({ records: 4, timelines: 3, analyzed: 3, excluded: 1, filter: "all cases" });
    expect(a.exclusions).toEqual([
      {
        case_id: "E",
        reason: "EMPTY_TIMELINE",
        level: "WARN",
        message: "EMPTY_TIMELINE: case 'E' has no dated location events",
      },
    ]);
    expect(a.timelines.map((t) => t.case_id)).toEqual(["X", "42", "Z"]);
    expect(a.notes[0]).toBe("1 case(s) excluded from every table (EMPTY_TIMELINE=1).");
  });

  it("builds the warehouse and site tables", () => {
    expect(a.warehouse_monthly.filter((r) => r.month === "2025-03")).toEqual([
      { warehouse_id: "WarehouseA", classification: "INDOOR", month: "2025-03", inbound: 0, outbound: 1, ending_stock: 1 },
      { warehouse_id: "WarehouseB", classification: "OUTDOOR", month: "2025-03", inbound: 1, outbound: 0, ending_stock: 1 },
    ]);
    expect(a.site_monthly.map((r) => [r.month, r.inbound, r.cumulative_inbound])).toEqual([
      ["2025-01", 0, 0],
      ["2025-02", 1, 1],
      ["2025-03", 0, 1],
    ]);
    expect(a.warehouse_summary).toEqual([
      { warehouse_id: "WarehouseA", classification: "INDOOR", total_inbound: 2, total_outbound: 1, current_stock: 1 },
      { warehouse_id: "WarehouseB", classification: "OUTDOOR", total_inbound: 1, total_outbound: 0, current_stock: 1 },
    ]);
    expect(a.supplier_summary.map((s) => [s.supplier, s.cases, s.final_warehouse_stock, s.final_site_cumulative_inbound])).toEqual([
      ["Acme", 1, 1, 0],
      ["UNSPECIFIED", 2, 1, 1],
    ]);
    expect(a.balance_check.ok).toBe(true);
  });

  it("flags dead stock at the reference date", () => {
    expect(a.dead_stock.records.map((r) => [r.case_id, r.warehouse_id, r.age_days, r.threshold_days])).toEqual([
      ["Z", "WarehouseA", 151, 90],
      ["X", "WarehouseB", 91, 90],
    ]);
    expect(a.dead_stock_flagged.map((r) => r.case_id)).toEqual(["Z", "X"]);
    expect(a.urgent_cases).toEqual([]);
    expect(a.lead_times.records).toEqual([]);
  });

  it("re-runs the same rules over a filtered subset", () => {
    const f = rerunWithFilter(a, { supplier: "Acme" });

    expect(f.population).toEqual({ records: 4, timelines: 3, analyzed: 1, excluded: 1, filter: "supplier=Acme" });
    expect(f.exclusions).toEqual(a.exclusions);
    expect(f.warehouse_monthly.filter((r) => r.month === "2025-03").map((r) => [r.warehouse_id, r.inbound, r.outbound, r.ending_stock])).toEqual([
      ["WarehouseA", 0, 1, 0],
      ["WarehouseB", 1, 0, 1],
    ]);
    expect(f.site_monthly).toEqual([]);
    expect(f.dead_stock.records.map((r) => r.case_id)).toEqual(["X"]);
    expect(f.notes).toContain("Filtered population: 1 of 3 case(s).");
  });

  it("honours the configured month window", () => {
    const clipped = runLedgerAnalysis(records, { ...config, through_month: "2025-02" }, { reference_date });

    expect(clipped.warehouse_monthly.map((r) => [r.warehouse_id, r.month, r.ending_stock])).toEqual([
      ["WarehouseA", "2025-01", 2],
      ["WarehouseA", "2025-02", 2],
    ]);
  });
});

describe("ledger: run failures", () => {
  it("aborts on an unknown location", () => {
    const bad = [...records, { case_id: "Q", arrivals: [{ location_id: "Elsewhere", date: "2025-01-01" }] }];
    expect(() => runLedgerAnalysis(bad, config, { reference_date })).toThrow(UnknownLocationError);
  });

  it("excludes a malformed record and analyzes the rest", () => {
    const run = runLedgerAnalysis(
      [
        records[0],
        { case_id: "S", arrivals: [{ location_id: "WarehouseA", date: 45667 }] },
        { case_id: "T", arrivals: { WarehouseA: "2025-01-10" } },
        { case_id: "U", arrivals: [{ location_id: "WarehouseB", date: true }] },
      ],
      config,
      { reference_date }
    );

    expect(run.exclusions.map((e) => [e.case_id, e.reason, e.level])).toEqual([
      ["T", "MALFORMED_EVENT", "ERROR"],
      ["S", "MALFORMED_EVENT", "ERROR"],
      ["U", "MALFORMED_EVENT", "ERROR"],
    ]);
    expect(run.exclusions[0].message).toMatch(/^MALFORMED_EVENT: case 'T': arrivals: /);
    expect(run.exclusions[1].message).toBe(
      "MALFORMED_EVENT: case 'S': unreadable date \"45667\" for location 'WarehouseA'"
    );
    expect(run.population).toEqual({ records: 4, timelines: 1, analyzed: 1, excluded: 3, filter: "all cases" });
    expect(run.timelines.map((t) => t.case_id)).toEqual(["X"]);
  });

  it("aborts when the batch is not a list", () => {
    expect(() => runLedgerAnalysis({ case_id: "X", arrivals: [] }, config, { reference_date })).toThrow(ZodError);
  });

  it("requires a calendar reference date", () => {
    expect(() => runLedgerAnalysis(records, config, { reference_date: "June 1st" })).toThrow(LedgerConfigError);
  });
});

describe("ledger: example data", () => {
  const dir = (p: string) => fileURLToPath(new URL(`../../../examples/${p}`, import.meta.url));

  it("excludes the empty and malformed example cases", () => {
    const raw: unknown = JSON.parse(readFileSync(dir("data/cases.json"), "utf8"));
    const run = runLedgerAnalysis(raw, loadLedgerConfig(dir("config/ledger.config.json")), { reference_date: "2025-03-31" });

    expect(run.exclusions.map((e) => [e.case_id, e.reason])).toEqual([
      ["CS-1007", "EMPTY_TIMELINE"],
      ["CS-1008", "MALFORMED_EVENT"],
    ]);
    expect(run.population.timelines).toBe(6);
    expect(run.balance_check.ok).toBe(true);
    expect(run.urgent_cases.map((r) => [r.case_id, r.warehouse_id, r.age_days])).toEqual([["CS-1006", "Hazmat Store", 415]]);
  });
});
