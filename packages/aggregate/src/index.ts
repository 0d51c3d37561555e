// ---------- Postings (stable public API) ----------
export { casePostings, collectPostings } from "./postings.js";
export type { Posting, PostingType } from "./postings.js";

// ---------- Monthly tables ----------
export { aggregateSiteMonthly, aggregateWarehouseMonthly } from "./monthly.js";
export type { SiteMonthlyRow, WarehouseMonthlyRow } from "./monthly.js";
export { monthWindow } from "./window.js";
export type { AggregateOptions, MonthWindow } from "./window.js";

// ---------- Consistency ----------
export { snapshotEndingStock, verifyStockBalance } from "./balance.js";
export type { BalanceCheck, BalanceMismatch, BalanceMismatchKind } from "./balance.js";

// ---------- Rollups ----------
export {
  UNSPECIFIED_SUPPLIER,
  rollupByClassification,
  rollupBySiteGroup,
  summarizeSuppliers,
  summarizeWarehouses,
} from "./rollups.js";
export type {
  ClassificationMonthlyRow,
  SiteGroupMonthlyRow,
  SupplierSummaryRow,
  WarehouseSummaryRow,
} from "./rollups.js";
