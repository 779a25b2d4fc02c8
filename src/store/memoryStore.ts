import { ScoredRecord } from "../types";
import { HistoryStats, HistoryStore, summarizeEntries } from "./types";

export class InMemoryHistoryStore implements HistoryStore {
  private readonly records: ScoredRecord[];
  appendCalls = 0;

  constructor(initial: ScoredRecord[] = []) {
    this.records = [...initial];
  }

  async loadSeenIds(): Promise<Set<string>> {
    return new Set(this.records.map((record) => record.id));
  }

  async append(records: ScoredRecord[]): Promise<void> {
    this.appendCalls += 1;
    this.records.push(...records);
  }

  async getStats(): Promise<HistoryStats> {
    return summarizeEntries(this.records, 0);
  }

  all(): ScoredRecord[] {
    return [...this.records];
  }
}
