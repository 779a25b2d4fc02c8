import { TransportError } from "../src/core/errors";
import { PageSource } from "../src/core/fetch";
import { Logger, MetricsRegistry } from "../src/observability";
import { CrawledListing, SourceConfig } from "../src/types";

/** In-process stand-in for the network: URL → HTML body, or an error to throw. */
export class FakePageSource implements PageSource {
  readonly requested: string[] = [];
  private readonly pages: Record<string, string | Error>;

  constructor(pages: Record<string, string | Error>) {
    this.pages = pages;
  }

  async fetchHtml(url: string): Promise<string> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) {
      throw new TransportError(`HTTP 404 while fetching ${url}`, { url, status: 404, retriable: false, attempts: 1 });
    }
    if (page instanceof Error) {
      throw page;
    }
    return page;
  }
}

export function makeSource(overrides: Partial<SourceConfig> = {}): SourceConfig {
  return {
    id: "county-bids",
    type: "html_index",
    indexUrl: "https://bids.example.gov/open/",
    listingSelectors: ["a"],
    pdfSelectors: ["a[href$='.pdf']"],
    maxListings: 10,
    directDocumentLinks: false,
    buyerOrg: "Example County",
    buyerType: "county",
    region: "us-east",
    ...overrides,
  };
}

export function makeListing(overrides: Partial<CrawledListing> = {}): CrawledListing {
  return {
    sourceId: "county-bids",
    title: "Road resurfacing",
    canonicalUrl: "https://bids.example.gov/open/road",
    buyerOrg: "Example County",
    buyerType: "county",
    region: "us-east",
    description: "",
    ...overrides,
  };
}

export function testDeps(fetcher: PageSource): { fetcher: PageSource; logger: Logger; metrics: MetricsRegistry } {
  return {
    fetcher,
    logger: new Logger({ component: "test", runId: "run_test", minLevel: "error" }),
    metrics: new MetricsRegistry(),
  };
}
