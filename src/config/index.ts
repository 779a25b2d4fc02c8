export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
export {
  DEFAULT_LISTING_SELECTORS,
  DEFAULT_MAX_LISTINGS,
  DEFAULT_PDF_SELECTORS,
  loadSources,
  normalizeSourceEntry,
  parseSourcesDocument,
} from "./sources";
export type { LoadedSources } from "./sources";
export type { AppConfig, ConfigOverrides } from "./types";
