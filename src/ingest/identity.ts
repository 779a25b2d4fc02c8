import crypto from "node:crypto";
import { CandidateRecord, CrawledListing } from "../types";

type IdentityFields = Pick<CrawledListing, "sourceId" | "canonicalUrl" | "title" | "rawDeadlineText">;

/**
 * SHA-256 over the raw crawl output. The deadline part is the text as found on
 * the page, never the normalized date, so a reworded deadline yields a new id.
 */
export function stableId(listing: IdentityFields): string {
  const key = [listing.sourceId, listing.canonicalUrl, listing.title, listing.rawDeadlineText ?? ""].join("|");
  return crypto.createHash("sha256").update(key, "utf-8").digest("hex");
}

export function toCandidate(listing: CrawledListing, fetchedAt: string): CandidateRecord {
  return {
    ...listing,
    id: stableId(listing),
    fetchedAt,
  };
}
