import { mapWithConcurrency } from "../core/concurrency";
import { errorMessage, SourceConfigError } from "../core/errors";
import { CrawlResult } from "../crawl";
import { Logger, MetricsRegistry } from "../observability";
import { OpportunityScorer } from "../score";
import { HistoryStore } from "../store";
import { ScoredRecord, SourceConfig, SourceFailure } from "../types";
import { toCandidate } from "./identity";

export interface IngestDependencies {
  sources: SourceConfig[];
  /** Sources that failed validation at load time; reported as failures without being crawled. */
  rejected?: SourceConfigError[];
  crawl: (source: SourceConfig) => Promise<CrawlResult>;
  scorer: OpportunityScorer;
  history: HistoryStore;
  logger: Logger;
  metrics: MetricsRegistry;
  now?: () => Date;
  concurrency?: number;
}

export interface IngestSummary {
  appended: number;
  sourcesCrawled: number;
  records: ScoredRecord[];
  failures: SourceFailure[];
}

export interface RunReport {
  run_id: string;
  appended: number;
  sources_crawled: number;
  failures: Array<{ source_id: string; error: string }>;
}

type SourceOutcome = { ok: true; records: ScoredRecord[] } | { ok: false; failure: SourceFailure };

/**
 * One ingestion pass. `seenIds` is the history as of the start of the run and
 * is never updated here: two identical candidates found in the same run are
 * both kept, and only ids recorded by earlier runs are skipped.
 *
 * Records are appended in one batch, grouped by source in configured order
 * whatever the crawl concurrency.
 */
export async function runIngestion(deps: IngestDependencies, seenIds: ReadonlySet<string>): Promise<IngestSummary> {
  const { logger, metrics, scorer } = deps;
  const now = deps.now ?? (() => new Date());
  const runStartedAt = now();
  const fetchedAt = runStartedAt.toISOString();

  const failures: SourceFailure[] = (deps.rejected ?? []).map((error) => ({
    sourceId: error.sourceId,
    error: error.message,
  }));
  for (const failure of failures) {
    logger.warn("ingest_source_rejected", { sourceId: failure.sourceId, error: failure.error });
  }

  logger.info("ingest_start", {
    sources: deps.sources.length,
    rejected: failures.length,
    seenIds: seenIds.size,
    concurrency: deps.concurrency ?? 1,
  });

  const outcomes = await mapWithConcurrency(deps.sources, deps.concurrency ?? 1, async (source): Promise<SourceOutcome> => {
    const stopTimer = metrics.startTimer("source_crawl_ms");
    try {
      const result = await deps.crawl(source);
      const records: ScoredRecord[] = [];
      let skipped = 0;

      for (const listing of result.listings) {
        const candidate = toCandidate(listing, fetchedAt);
        if (seenIds.has(candidate.id)) {
          skipped += 1;
          continue;
        }
        records.push(scorer.score(candidate, runStartedAt));
      }

      metrics.incrementCounter("sources_crawled", 1);
      metrics.incrementCounter("records_new", records.length);
      metrics.incrementCounter("records_seen", skipped);
      logger.info("ingest_source_complete", {
        sourceId: source.id,
        listings: result.listings.length,
        newRecords: records.length,
        alreadySeen: skipped,
        detailErrors: result.errors.length,
      });
      return { ok: true, records };
    } catch (error) {
      metrics.incrementCounter("sources_failed", 1);
      const failure = { sourceId: source.id, error: errorMessage(error) };
      logger.error("ingest_source_failed", { sourceId: source.id, error: failure.error });
      return { ok: false, failure };
    } finally {
      stopTimer();
    }
  });

  const records: ScoredRecord[] = [];
  let sourcesCrawled = 0;
  for (const outcome of outcomes) {
    if (outcome.ok) {
      sourcesCrawled += 1;
      records.push(...outcome.records);
    } else {
      failures.push(outcome.failure);
    }
  }

  if (records.length > 0) {
    await deps.history.append(records);
  }

  logger.info("ingest_complete", { appended: records.length, sourcesCrawled, failures: failures.length });
  return { appended: records.length, sourcesCrawled, records, failures };
}

export function toRunReport(runId: string, summary: IngestSummary): RunReport {
  return {
    run_id: runId,
    appended: summary.appended,
    sources_crawled: summary.sourcesCrawled,
    failures: summary.failures.map((failure) => ({ source_id: failure.sourceId, error: failure.error })),
  };
}
