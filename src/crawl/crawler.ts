import { errorMessage, SourceFetchError } from "../core/errors";
import { PageSource } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { CrawledListing, CrawlError, SourceConfig } from "../types";
import { DetailFields, extractDetailFields, extractListingLinks, isDocumentUrl, ListingLink } from "./htmlParser";
import { createMatchers, SelectorMatcher } from "./selectors";

export interface CrawlDependencies {
  fetcher: PageSource;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface CrawlOptions {
  /** Further caps the listings below the source's own `maxListings`. */
  limit?: number;
  /** When false, listings are emitted without visiting their detail pages. */
  fetchDetails?: boolean;
}

export interface CrawlResult {
  sourceId: string;
  listings: CrawledListing[];
  errors: CrawlError[];
}

const EMPTY_DETAIL: DetailFields = { description: "" };

async function fetchDetail(
  deps: CrawlDependencies,
  source: SourceConfig,
  link: ListingLink,
  pdfMatchers: SelectorMatcher[],
  errors: CrawlError[],
): Promise<DetailFields> {
  const stopTimer = deps.metrics.startTimer("detail_fetch_ms");
  try {
    const html = await deps.fetcher.fetchHtml(link.url);
    return extractDetailFields(html, link.url, pdfMatchers);
  } catch (error) {
    const message = errorMessage(error);
    deps.metrics.incrementCounter("detail_fetch_failed", 1);
    deps.logger.warn("crawl_detail_fetch_failed", { sourceId: source.id, url: link.url, error: message });
    errors.push({ url: link.url, error: `Failed to fetch detail: ${message}` });
    return EMPTY_DETAIL;
  } finally {
    stopTimer();
  }
}

export async function crawlSource(
  deps: CrawlDependencies,
  source: SourceConfig,
  options: CrawlOptions = {},
): Promise<CrawlResult> {
  const { fetcher, logger, metrics } = deps;
  const fetchDetails = options.fetchDetails ?? true;
  const cap = options.limit !== undefined ? Math.min(options.limit, source.maxListings) : source.maxListings;

  logger.info("crawl_source_start", { sourceId: source.id, url: source.indexUrl, maxListings: cap });
  const stopIndexTimer = metrics.startTimer("index_fetch_ms");
  let indexHtml: string;
  try {
    indexHtml = await fetcher.fetchHtml(source.indexUrl);
  } catch (error) {
    throw new SourceFetchError(source.id, error);
  } finally {
    stopIndexTimer();
  }

  const links = extractListingLinks(indexHtml, source.indexUrl, createMatchers(source.listingSelectors), cap);
  metrics.incrementCounter("listings_discovered", links.length);
  logger.info("crawl_listings_found", { sourceId: source.id, url: source.indexUrl, listings: links.length });

  const pdfMatchers = createMatchers(source.pdfSelectors);
  const listings: CrawledListing[] = [];
  const errors: CrawlError[] = [];

  for (const link of links) {
    let detail: DetailFields = EMPTY_DETAIL;
    if (source.directDocumentLinks && isDocumentUrl(link.url)) {
      detail = { pdfUrl: link.url, description: "" };
    } else if (fetchDetails) {
      detail = await fetchDetail(deps, source, link, pdfMatchers, errors);
    }

    listings.push({
      sourceId: source.id,
      title: link.title,
      canonicalUrl: link.url,
      buyerOrg: source.buyerOrg,
      buyerType: source.buyerType,
      region: source.region,
      pdfUrl: detail.pdfUrl,
      rawDeadlineText: detail.rawDeadlineText,
      description: detail.description,
    });
  }

  logger.info("crawl_source_complete", {
    sourceId: source.id,
    listings: listings.length,
    detailFailures: errors.length,
  });
  return { sourceId: source.id, listings, errors };
}
