export { filterToSources } from "./summary-filter.js";
export type { FilterResult } from "./summary-filter.js";
