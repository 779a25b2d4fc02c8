export type SourceType = "html_index";

export interface SourceConfig {
  id: string;
  type: SourceType;
  indexUrl: string;
  listingSelectors: string[];
  pdfSelectors: string[];
  maxListings: number;
  directDocumentLinks: boolean;
  buyerOrg: string;
  buyerType: string;
  region: string;
}

/** One listing as the crawler saw it, before an id or run timestamp is attached. */
export interface CrawledListing {
  sourceId: string;
  title: string;
  canonicalUrl: string;
  buyerOrg: string;
  buyerType: string;
  region: string;
  pdfUrl?: string;
  rawDeadlineText?: string;
  description: string;
}

export interface CandidateRecord extends CrawledListing {
  id: string;
  fetchedAt: string;
}

export type DeadlineBucket = "immediate" | "near_term" | "planning" | "unknown";

export type BudgetBucket = "micro" | "small" | "mid" | "enterprise" | "unknown";

export type Decision = "GO" | "MAYBE" | "NO_GO";

export interface ScoredRecord extends CandidateRecord {
  deadline: string | null;
  deadlineBucket: DeadlineBucket;
  budgetValue: number | null;
  budgetBucket: BudgetBucket;
  decision: Decision;
  oneLiner: string;
  tags: string[];
}

export interface CrawlError {
  url: string;
  error: string;
}

export interface SourceFailure {
  sourceId: string;
  error: string;
}
