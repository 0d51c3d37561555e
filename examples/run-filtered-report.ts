import { readFileSync } from "node:fs";
import { parseCaseFilter } from "../packages/filter/src/index.js";
import { loadLedgerConfig, rerunWithFilter, runLedgerAnalysis } from "../packages/ledger/src/index.js";

// usage: tsx examples/run-filtered-report.ts '{"warehouse":"North Yard"}' [YYYY-MM-DD]
const filter = parseCaseFilter(JSON.parse(process.argv[2] ?? "{}"));
const reference_date = process.argv[3] ?? new Date().toISOString().slice(0, 10);

const config = loadLedgerConfig("examples/config/ledger.config.json");
const raw: unknown = JSON.parse(readFileSync("examples/data/cases.json", "utf-8"));

const full = runLedgerAnalysis(raw, config, { reference_date });
const sliced = rerunWithFilter(full, filter);

console.log(
  JSON.stringify(
    {
      filter: sliced.population.filter,
      analyzed: sliced.population.analyzed,
      of: full.population.analyzed,
      warehouse_summary: sliced.warehouse_summary,
      warehouse_monthly: sliced.warehouse_monthly,
      site_monthly: sliced.site_monthly,
      dead_stock_flagged: sliced.dead_stock_flagged,
    },
    null,
    2
  )
);
