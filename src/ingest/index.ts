export { runIngestion, toRunReport } from "./driver";
export type { IngestDependencies, IngestSummary, RunReport } from "./driver";
export { stableId, toCandidate } from "./identity";
export { DEFAULT_SELECTOR_TEST_LIMIT, testSourceSelectors } from "./selectorTest";
export type { SelectorTestItem, SelectorTestOptions, SelectorTestReport } from "./selectorTest";
