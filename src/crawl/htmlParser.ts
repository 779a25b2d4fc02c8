import { CheerioAPI, load } from "cheerio";
import { AnyNode, hasChildren, isTag, isText } from "domhandler";
import { matchFirst, matchUnion, SelectorMatcher } from "./selectors";

export const MAX_DESCRIPTION_LENGTH = 500;

const DOCUMENT_EXTENSIONS = [".pdf", ".doc", ".docx"] as const;

const SKIPPED_TEXT_TAGS = new Set(["script", "style", "noscript", "template"]);

// Order matters: the first pattern that matches anywhere on the page wins.
const DEADLINE_PATTERNS: RegExp[] = [
  /deadline[:\s]+([a-z]{3,}\s+\d{1,2},\s+\d{4})/i,
  /due\s+date[:\s]+(\d{4}-\d{2}-\d{2})/i,
  /due[:\s]+(\d{1,2}\/\d{1,2}\/\d{4})/i,
];

export interface ListingLink {
  href: string;
  url: string;
  title: string;
}

export interface DetailFields {
  pdfUrl?: string;
  rawDeadlineText?: string;
  description: string;
}

export function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return undefined;
  }
}

export function isDocumentUrl(url: string): boolean {
  let pathname: string;
  try {
    pathname = new URL(url).pathname.toLowerCase();
  } catch {
    return false;
  }
  return DOCUMENT_EXTENSIONS.some((extension) => pathname.endsWith(extension));
}

/** Cuts at `maxLength` code points, so a surrogate pair is never split. */
export function truncate(value: string, maxLength: number): string {
  const codePoints = Array.from(value);
  return codePoints.length > maxLength ? codePoints.slice(0, maxLength).join("") : value;
}

/**
 * Listing links from an index page: all matchers contribute, anchors without
 * an href are dropped, duplicates by raw href keep the first occurrence, and
 * the result is capped at `maxListings`.
 */
export function extractListingLinks(
  html: string,
  pageUrl: string,
  matchers: SelectorMatcher[],
  maxListings: number,
): ListingLink[] {
  const $ = load(html);
  const seenHrefs = new Set<string>();
  const unique: Array<{ href: string; title: string }> = [];

  for (const element of matchUnion($, matchers)) {
    const href = $(element).attr("href");
    if (!href || seenHrefs.has(href)) {
      continue;
    }
    seenHrefs.add(href);
    unique.push({ href, title: sanitizeText($(element).text()) || "Untitled" });
  }

  const links: ListingLink[] = [];
  for (const candidate of unique.slice(0, Math.max(0, maxListings))) {
    const url = normalizeUrl(pageUrl, candidate.href);
    if (!url) {
      continue;
    }
    links.push({ href: candidate.href, url, title: candidate.title });
  }
  return links;
}

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    parts.push(node.data);
    return;
  }
  if (isTag(node) && SKIPPED_TEXT_TAGS.has(node.name)) {
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/** Visible text with a space between adjacent text nodes, so table cells do not run together. */
export function extractPageText($: CheerioAPI): string {
  const parts: string[] = [];
  for (const node of $.root().toArray()) {
    collectText(node, parts);
  }
  return sanitizeText(parts.join(" "));
}

export function extractDeadlineText(text: string): string | undefined {
  for (const pattern of DEADLINE_PATTERNS) {
    const match = text.match(pattern);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}

function extractDescription($: CheerioAPI): string {
  const meta = $("meta[name='description']").attr("content");
  if (meta && meta.trim()) {
    return truncate(sanitizeText(meta), MAX_DESCRIPTION_LENGTH);
  }

  const paragraph = $("p").first();
  if (paragraph.length > 0) {
    return truncate(sanitizeText(paragraph.text()), MAX_DESCRIPTION_LENGTH);
  }
  return "";
}

export function extractDetailFields(html: string, pageUrl: string, pdfMatchers: SelectorMatcher[]): DetailFields {
  const $ = load(html);

  let pdfUrl: string | undefined;
  const [firstDocumentLink] = matchFirst($, pdfMatchers);
  if (firstDocumentLink) {
    const href = $(firstDocumentLink).attr("href");
    pdfUrl = href ? normalizeUrl(pageUrl, href) : undefined;
  }

  return {
    pdfUrl,
    rawDeadlineText: extractDeadlineText(extractPageText($)),
    description: extractDescription($),
  };
}
