import { errorMessage, SourceFetchError } from "../core/errors";
import { CrawlDependencies, crawlSource } from "../crawl";
import { SourceConfig } from "../types";

export const DEFAULT_SELECTOR_TEST_LIMIT = 10;

export interface SelectorTestItem {
  title: string;
  canonical_url: string;
  pdf_url: string | null;
}

export type SelectorTestError = { url: string; error: string } | { stage: string; error: string };

export interface SelectorTestReport {
  source_id: string;
  base_url: string;
  count: number;
  items: SelectorTestItem[];
  errors: SelectorTestError[];
}

export interface SelectorTestOptions {
  limit?: number;
  /** Visit detail pages to look for document links. */
  fetchPdf?: boolean;
}

/** Crawl-only check of one source's selectors. Nothing is scored or written to history. */
export async function testSourceSelectors(
  deps: CrawlDependencies,
  source: SourceConfig,
  options: SelectorTestOptions = {},
): Promise<SelectorTestReport> {
  const report: SelectorTestReport = {
    source_id: source.id,
    base_url: source.indexUrl,
    count: 0,
    items: [],
    errors: [],
  };

  try {
    const result = await crawlSource(deps, source, {
      limit: options.limit ?? DEFAULT_SELECTOR_TEST_LIMIT,
      fetchDetails: options.fetchPdf ?? true,
    });
    report.items = result.listings.map((listing) => ({
      title: listing.title,
      canonical_url: listing.canonicalUrl,
      pdf_url: listing.pdfUrl ?? null,
    }));
    report.errors.push(...result.errors);
  } catch (error) {
    report.errors.push({
      stage: error instanceof SourceFetchError ? "index_fetch" : "crawl",
      error: errorMessage(error),
    });
  }

  report.count = report.items.length;
  return report;
}
