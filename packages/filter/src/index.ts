export {
  CaseFilterSchema,
  compileCaseFilter,
  describeFilter,
  filterCases,
  parseCaseFilter,
} from "./filter.js";
export type { CaseFilter, CasePredicate, ParsedCaseFilter } from "./filter.js";
