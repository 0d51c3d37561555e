export {
  LedgerConfigError,
  LedgerConfigSchema,
  loadLedgerConfig,
  locationReference,
  parseLedgerConfig,
} from "./config.js";
export type { LedgerConfig, LedgerConfigInput } from "./config.js";

export { rerunWithFilter, runLedgerAnalysis } from "./engine.js";
export type { LedgerAnalysis, LedgerRunOptions } from "./engine.js";
