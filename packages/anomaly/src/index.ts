export {
  DEFAULT_THRESHOLDS_DAYS,
  bySeverity,
  deadStockByBucket,
  deadStockByWarehouse,
  detectDeadStock,
  flaggedDeadStock,
  urgentCases,
} from "./dead-stock.js";
export type {
  BucketDeadStock,
  DeadStockOptions,
  DeadStockRecord,
  DeadStockReport,
  WarehouseDeadStock,
} from "./dead-stock.js";

export { analyzeLeadTimes } from "./lead-time.js";
export type { LeadTimeRecord, LeadTimeReport } from "./lead-time.js";

export { ageStats } from "./stats.js";
export type { AgeStats } from "./stats.js";
