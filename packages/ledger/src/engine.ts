import { canonicalizeCaseRecords, parseCaseRecordBatch } from "../../intake/src/index.js";
import type { CalendarDate } from "../../intake/src/index.js";
import { createLocationCatalog } from "../../locations/src/index.js";
import type { LocationCatalog } from "../../locations/src/index.js";
import { MalformedEventError, buildTimelines, isCalendarDate } from "../../timeline/src/index.js";
import type { CaseTimeline, Exclusion } from "../../timeline/src/index.js";
import {
  aggregateSiteMonthly,
  aggregateWarehouseMonthly,
  rollupByClassification,
  rollupBySiteGroup,
  summarizeSuppliers,
  summarizeWarehouses,
  verifyStockBalance,
} from "../../aggregate/src/index.js";
import type {
  AggregateOptions,
  BalanceCheck,
  ClassificationMonthlyRow,
  SiteGroupMonthlyRow,
  SiteMonthlyRow,
  SupplierSummaryRow,
  WarehouseMonthlyRow,
  WarehouseSummaryRow,
} from "../../aggregate/src/index.js";
import {
  analyzeLeadTimes,
  deadStockByBucket,
  deadStockByWarehouse,
  detectDeadStock,
  flaggedDeadStock,
  urgentCases,
} from "../../anomaly/src/index.js";
import type {
  BucketDeadStock,
  DeadStockRecord,
  DeadStockReport,
  LeadTimeReport,
  WarehouseDeadStock,
} from "../../anomaly/src/index.js";
import { describeFilter, filterCases } from "../../filter/src/index.js";
import type { CaseFilter, CasePredicate } from "../../filter/src/index.js";
import { LedgerConfigError, locationReference } from "./config.js";
import type { LedgerConfig } from "./config.js";

export type LedgerRunOptions = {
  // required: dead-stock ages are relative to this day, never to the wall clock
  reference_date: CalendarDate;
  filter?: CaseFilter | CasePredicate;
};

export type LedgerAnalysis = {
  reference_date: CalendarDate;
  config: LedgerConfig;

  population: {
    records: number;
    timelines: number;
    analyzed: number;
    excluded: number;
    filter: string;
  };

  exclusions: Exclusion[];
  // every buildable case, before filtering; filtered re-runs start from here
  timelines: CaseTimeline[];

  warehouse_monthly: WarehouseMonthlyRow[];
  site_monthly: SiteMonthlyRow[];
  classification_monthly: ClassificationMonthlyRow[];
  site_group_monthly: SiteGroupMonthlyRow[];
  warehouse_summary: WarehouseSummaryRow[];
  supplier_summary: SupplierSummaryRow[];

  dead_stock: DeadStockReport;
  dead_stock_flagged: DeadStockRecord[];
  dead_stock_by_warehouse: WarehouseDeadStock[];
  dead_stock_by_bucket: BucketDeadStock[];
  urgent_cases: DeadStockRecord[];

  lead_times: LeadTimeReport;
  balance_check: BalanceCheck;

  notes: string[];
};

/**
 * End-to-end run over one batch of raw case records.
 *
 * A batch that is not a list (ZodError) and unknown locations (UnknownLocationError)
 * abort the run. Per-case problems, including a record that fails validation, are
 * listed in `exclusions` and the run continues.
 */
export function runLedgerAnalysis(
  records: unknown,
  config: LedgerConfig,
  opts: LedgerRunOptions
): LedgerAnalysis {
  assertReferenceDate(opts.reference_date);

  const batch = parseCaseRecordBatch(records);
  const catalog = createLocationCatalog(locationReference(config));
  const built = buildTimelines(canonicalizeCaseRecords(batch.records), catalog);

  const rejected = batch.rejected.map((r): Exclusion => {
    const e = new MalformedEventError(r.case_id, r.message);
    return { case_id: r.case_id, reason: e.code, level: "ERROR", message: e.message };
  });

  return analyze({
    config,
    catalog,
    reference_date: opts.reference_date,
    records: batch.records.length + batch.rejected.length,
    timelines: built.timelines,
    exclusions: [...rejected, ...built.exclusions],
    filter: opts.filter,
  });
}

/**
 * Same aggregation and detection over a subset of an earlier run's cases. Only the
 * input population changes.
 */
export function rerunWithFilter(
  prev: LedgerAnalysis,
  filter: CaseFilter | CasePredicate,
  opts: { reference_date?: CalendarDate } = {}
): LedgerAnalysis {
  const reference_date = opts.reference_date ?? prev.reference_date;
  assertReferenceDate(reference_date);

  return analyze({
    config: prev.config,
    catalog: createLocationCatalog(locationReference(prev.config)),
    reference_date,
    records: prev.population.records,
    timelines: prev.timelines,
    exclusions: prev.exclusions,
    filter,
  });
}

/* ----------------------------- internals ----------------------------- */

type AnalyzeInput = {
  config: LedgerConfig;
  catalog: LocationCatalog;
  reference_date: CalendarDate;
  records: number;
  timelines: CaseTimeline[];
  exclusions: Exclusion[];
  filter?: CaseFilter | CasePredicate;
};

function analyze(x: AnalyzeInput): LedgerAnalysis {
  const { config, catalog, reference_date } = x;

  const population = x.filter ? filterCases(x.timelines, x.filter, catalog) : x.timelines;

  const window: AggregateOptions = {
    from_month: config.from_month,
    through_month: config.through_month,
  };

  const warehouse_monthly = aggregateWarehouseMonthly(population, catalog, window);
  const site_monthly = aggregateSiteMonthly(population, catalog, window);

  const dead_stock = detectDeadStock(population, catalog, {
    reference_date,
    thresholds_days: config.dead_stock.thresholds_days,
  });

  const notes: string[] = [];
  if (x.exclusions.length) {
    const counts = new Map<string, number>();
    for (const e of x.exclusions) counts.set(e.reason, (counts.get(e.reason) ?? 0) + 1);
    const parts = [...counts.entries()].map(([reason, n]) => `${reason}=${n}`).join(", ");
    notes.push(`${x.exclusions.length} case(s) excluded from every table (${parts}).`);
  }
  if (x.filter) notes.push(`Filtered population: ${population.length} of ${x.timelines.length} case(s).`);
  notes.push(...dead_stock.notes);

  const lead_times = analyzeLeadTimes(population, { threshold_days: config.lead_time.threshold_days });
  notes.push(...lead_times.notes);

  return {
    reference_date,
    config,

    population: {
      records: x.records,
      timelines: x.timelines.length,
      analyzed: population.length,
      excluded: x.exclusions.length,
      filter: x.filter ? describeFilter(x.filter) : "all cases",
    },

    exclusions: x.exclusions,
    timelines: x.timelines,

    warehouse_monthly,
    site_monthly,
    classification_monthly: rollupByClassification(warehouse_monthly),
    site_group_monthly: rollupBySiteGroup(site_monthly),
    warehouse_summary: summarizeWarehouses(warehouse_monthly),
    supplier_summary: summarizeSuppliers(population, catalog, window),

    dead_stock,
    dead_stock_flagged: flaggedDeadStock(dead_stock),
    dead_stock_by_warehouse: deadStockByWarehouse(dead_stock),
    dead_stock_by_bucket: deadStockByBucket(dead_stock),
    urgent_cases: urgentCases(dead_stock, config.dead_stock.urgent_days),

    lead_times,
    balance_check: verifyStockBalance(warehouse_monthly, population),

    notes,
  };
}

function assertReferenceDate(d: string): void {
  if (!isCalendarDate(d)) {
    throw new LedgerConfigError(`reference_date must be a YYYY-MM-DD calendar date, got ${JSON.stringify(d)}`);
  }
}
