export { crawlSource } from "./crawler";
export type { CrawlDependencies, CrawlOptions, CrawlResult } from "./crawler";
export { isValidSelector } from "./selectors";
