import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { Logger } from "../observability";
import { ScoredRecord } from "../types";
import { HistoryEntry, HistoryStats, HistoryStore, summarizeEntries } from "./types";

// Only `id` decides whether a line counts; the stats fields fall back to undefined.
const HistoryLineSchema = z.object({
  id: z.string().min(1),
  sourceId: z.string().optional().catch(undefined),
  decision: z.enum(["GO", "MAYBE", "NO_GO"]).optional().catch(undefined),
});

interface ReplayResult {
  entries: HistoryEntry[];
  skipped: number;
}

function parseLine(line: string): HistoryEntry | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  const parsed = HistoryLineSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

/** Newline-delimited JSON history. A missing file is an empty history; malformed lines are skipped. */
export class JsonlHistoryStore implements HistoryStore {
  private readonly filePath: string;
  private readonly logger?: Logger;

  constructor(filePath: string, logger?: Logger) {
    this.filePath = path.resolve(filePath);
    this.logger = logger;
  }

  async loadSeenIds(): Promise<Set<string>> {
    const { entries, skipped } = await this.replay();
    const ids = new Set(entries.map((entry) => entry.id));
    this.logger?.info("history_loaded", { path: this.filePath, records: entries.length, skippedLines: skipped });
    return ids;
  }

  async append(records: ScoredRecord[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(this.filePath, content, "utf-8");
    this.logger?.info("history_appended", { path: this.filePath, records: records.length });
  }

  async getStats(): Promise<HistoryStats> {
    const { entries, skipped } = await this.replay();
    return summarizeEntries(entries, skipped);
  }

  private async replay(): Promise<ReplayResult> {
    if (!fs.existsSync(this.filePath)) {
      return { entries: [], skipped: 0 };
    }

    const content = await fs.promises.readFile(this.filePath, "utf-8");
    const entries: HistoryEntry[] = [];
    let skipped = 0;

    for (const line of content.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      const entry = parseLine(line);
      if (entry) {
        entries.push(entry);
      } else {
        skipped += 1;
      }
    }

    if (skipped > 0) {
      this.logger?.warn("history_lines_skipped", { path: this.filePath, skippedLines: skipped });
    }
    return { entries, skipped };
  }
}
