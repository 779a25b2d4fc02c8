import { Decision, ScoredRecord } from "../types";

export interface HistoryStats {
  total: number;
  skippedLines: number;
  byDecision: Record<Decision, number>;
  bySource: Record<string, number>;
}

/** Append-only record of every scored opportunity ever emitted. */
export interface HistoryStore {
  /** Ids of every record already in the history; rebuilt by replaying the whole log. */
  loadSeenIds(): Promise<Set<string>>;
  append(records: ScoredRecord[]): Promise<void>;
  getStats(): Promise<HistoryStats>;
}

export interface HistoryEntry {
  id: string;
  sourceId?: string;
  decision?: Decision;
}

export function summarizeEntries(entries: HistoryEntry[], skippedLines: number): HistoryStats {
  const byDecision: Record<Decision, number> = { GO: 0, MAYBE: 0, NO_GO: 0 };
  const bySource: Record<string, number> = {};

  for (const entry of entries) {
    if (entry.decision) {
      byDecision[entry.decision] += 1;
    }
    const sourceId = entry.sourceId ?? "unknown";
    bySource[sourceId] = (bySource[sourceId] ?? 0) + 1;
  }

  return { total: entries.length, skippedLines, byDecision, bySource };
}
