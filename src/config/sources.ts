import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SourceConfigError } from "../core/errors";
import { isValidSelector } from "../crawl/selectors";
import { SourceConfig } from "../types";

export const DEFAULT_LISTING_SELECTORS = ["a"];
export const DEFAULT_PDF_SELECTORS = ["a[href$='.pdf']"];
export const DEFAULT_MAX_LISTINGS = 10;

const HttpUrlSchema = z
  .string()
  .url()
  .regex(/^https?:\/\//i, "Must be an http(s) URL");

const SelectorListSchema = z
  .union([z.string().min(1), z.array(z.string().min(1)).min(1)])
  .transform((value) => (typeof value === "string" ? [value] : value));

const CrawlBlockSchema = z.object({
  listing_link_selectors: SelectorListSchema.optional(),
  pdf_link_selectors: SelectorListSchema.optional(),
  max_listings: z.number().int().positive().optional(),
  direct_document_links: z.boolean().optional(),
});

const NormalizeBlockSchema = z.object({
  buyer_org: z.string().optional(),
  buyer_type: z.string().optional(),
  region: z.string().optional(),
});

// Accepts both the nested `crawl`/`normalize` layout and the older flat one.
const RawSourceSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().optional(),
    base_url: HttpUrlSchema.optional(),
    url: HttpUrlSchema.optional(),
    crawl: CrawlBlockSchema.optional(),
    normalize: NormalizeBlockSchema.optional(),
    listing_link_selectors: SelectorListSchema.optional(),
    pdf_link_selectors: SelectorListSchema.optional(),
    max_listings: z.number().int().positive().optional(),
    buyer_org: z.string().optional(),
    buyer_type: z.string().optional(),
    region: z.string().optional(),
  })
  .refine((source) => Boolean(source.base_url ?? source.url), {
    message: "base_url or url is required",
    path: ["base_url"],
  });

type RawSource = z.infer<typeof RawSourceSchema>;

const SourcesDocumentSchema = z.object({
  sources: z.array(z.unknown()),
});

export interface LoadedSources {
  sources: SourceConfig[];
  rejected: SourceConfigError[];
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

function entryLabel(raw: unknown, index: number): string {
  if (raw !== null && typeof raw === "object" && "id" in raw && typeof raw.id === "string" && raw.id) {
    return raw.id;
  }
  return `sources[${index}]`;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function toSourceConfig(raw: RawSource): SourceConfig {
  const listingSelectors = raw.crawl?.listing_link_selectors ?? raw.listing_link_selectors ?? DEFAULT_LISTING_SELECTORS;
  const pdfSelectors = raw.crawl?.pdf_link_selectors ?? raw.pdf_link_selectors ?? DEFAULT_PDF_SELECTORS;

  const invalid = [...listingSelectors, ...pdfSelectors].filter((selector) => !isValidSelector(selector));
  if (invalid.length > 0) {
    throw new SourceConfigError(raw.id, `invalid CSS selector(s): ${invalid.join(", ")}`);
  }

  return {
    id: raw.id,
    type: "html_index",
    indexUrl: raw.base_url ?? raw.url ?? "",
    listingSelectors: [...listingSelectors],
    pdfSelectors: [...pdfSelectors],
    maxListings: raw.crawl?.max_listings ?? raw.max_listings ?? DEFAULT_MAX_LISTINGS,
    directDocumentLinks: raw.crawl?.direct_document_links ?? false,
    buyerOrg: nonEmpty(raw.normalize?.buyer_org) ?? nonEmpty(raw.buyer_org) ?? "Unknown",
    buyerType: nonEmpty(raw.normalize?.buyer_type) ?? nonEmpty(raw.buyer_type) ?? "unknown",
    region: nonEmpty(raw.normalize?.region) ?? nonEmpty(raw.region) ?? "unknown",
  };
}

/** Resolves either config layout into one canonical `SourceConfig`. */
export function normalizeSourceEntry(raw: unknown, index = 0): SourceConfig {
  const label = entryLabel(raw, index);
  const parsed = RawSourceSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SourceConfigError(label, describeIssues(parsed.error));
  }
  if (parsed.data.type !== undefined && parsed.data.type !== "html_index") {
    throw new SourceConfigError(label, `unsupported source type: ${parsed.data.type}`);
  }
  return toSourceConfig(parsed.data);
}

export function parseSourcesDocument(content: string): LoadedSources {
  const raw: unknown = parseYaml(content);
  const document = SourcesDocumentSchema.safeParse(raw);
  if (!document.success) {
    throw new Error(`Invalid sources document: ${describeIssues(document.error)}`);
  }

  const sources: SourceConfig[] = [];
  const rejected: SourceConfigError[] = [];
  const seenIds = new Set<string>();

  document.data.sources.forEach((entry, index) => {
    try {
      const source = normalizeSourceEntry(entry, index);
      if (seenIds.has(source.id)) {
        throw new SourceConfigError(source.id, "duplicate source id");
      }
      seenIds.add(source.id);
      sources.push(source);
    } catch (error) {
      if (!(error instanceof SourceConfigError)) {
        throw error;
      }
      rejected.push(error);
    }
  });

  return { sources, rejected };
}

export function loadSources(filePath: string): LoadedSources {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Sources file not found: ${absolutePath}`);
  }
  return parseSourcesDocument(fs.readFileSync(absolutePath, "utf-8"));
}
