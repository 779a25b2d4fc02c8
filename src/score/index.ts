export { budgetBucket, daysUntil, deadlineBucket, parseIsoDate } from "./buckets";
export { extractBudget } from "./budget";
export { normalizeDeadline } from "./deadline";
export { buildTags, decide, formatTags, oneLiner, RulesScorer } from "./engine";
export type { OpportunityScorer } from "./engine";
