import fs from "node:fs";
import path from "node:path";
import { AppConfig, loadSources } from "../config";
import { crawlSource } from "../crawl";
import { IngestSummary, runIngestion, testSourceSelectors, toRunReport } from "../ingest";
import { Logger, MetricsRegistry } from "../observability";
import { RulesScorer } from "../score";
import { HistoryStore } from "../store";
import { PageSource } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  history: HistoryStore;
  fetcher: PageSource;
  /** Destination for command output (reports), kept apart from log lines. */
  write: (text: string) => void;
}

export interface TestSourceOptions {
  sourceId: string;
  limit?: number;
  fetchPdf: boolean;
  outPath?: string;
}

export async function runIngest(ctx: CommandContext): Promise<IngestSummary> {
  const loaded = loadSources(ctx.config.sourcesPath);
  const seenIds = await ctx.history.loadSeenIds();
  const crawlDeps = { fetcher: ctx.fetcher, logger: ctx.logger.child("crawl"), metrics: ctx.metrics };

  const summary = await runIngestion(
    {
      sources: loaded.sources,
      rejected: loaded.rejected,
      crawl: (source) => crawlSource(crawlDeps, source),
      scorer: new RulesScorer(),
      history: ctx.history,
      logger: ctx.logger,
      metrics: ctx.metrics,
      concurrency: ctx.config.sourceConcurrency,
    },
    seenIds,
  );

  if (summary.failures.length > 0) {
    ctx.logger.warn("ingest_source_failures", { failures: summary.failures });
  }
  ctx.write(JSON.stringify(toRunReport(ctx.runId, summary), null, 2));
  return summary;
}

export async function runTestSource(ctx: CommandContext, options: TestSourceOptions): Promise<void> {
  const loaded = loadSources(ctx.config.sourcesPath);
  const source = loaded.sources.find((candidate) => candidate.id === options.sourceId);
  if (!source) {
    const rejected = loaded.rejected.find((error) => error.sourceId === options.sourceId);
    if (rejected) {
      throw rejected;
    }
    throw new Error(`Source '${options.sourceId}' not found in ${ctx.config.sourcesPath}`);
  }

  const report = await testSourceSelectors(
    { fetcher: ctx.fetcher, logger: ctx.logger.child("crawl"), metrics: ctx.metrics },
    source,
    { limit: options.limit, fetchPdf: options.fetchPdf },
  );
  const output = JSON.stringify(report, null, 2);

  if (options.outPath) {
    const absolutePath = path.resolve(options.outPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    fs.writeFileSync(absolutePath, output + "\n", "utf-8");
    ctx.write(`Results written to ${absolutePath}`);
    return;
  }
  ctx.write(output);
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  const stats = await ctx.history.getStats();
  ctx.write(
    JSON.stringify(
      {
        history_path: path.resolve(ctx.config.historyPath),
        total: stats.total,
        skipped_lines: stats.skippedLines,
        by_decision: stats.byDecision,
        by_source: stats.bySource,
      },
      null,
      2,
    ),
  );
}
