import { AppConfig } from "../config";
import { Logger } from "../observability";
import { JsonlHistoryStore } from "./jsonlHistoryStore";
import { HistoryStore } from "./types";

export function createHistoryStore(config: AppConfig, logger?: Logger): HistoryStore {
  return new JsonlHistoryStore(config.historyPath, logger);
}

export { InMemoryHistoryStore } from "./memoryStore";
export { JsonlHistoryStore } from "./jsonlHistoryStore";
export { summarizeEntries } from "./types";
export type { HistoryEntry, HistoryStats, HistoryStore } from "./types";
