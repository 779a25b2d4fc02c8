import { BudgetBucket, DeadlineBucket } from "../types";

const DAY_MS = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})/;

/** Midnight UTC of the calendar date an ISO string starts with, or null for impossible dates. */
export function parseIsoDate(iso: string): Date | null {
  const match = iso.match(ISO_DATE);
  if (!match) {
    return null;
  }
  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function daysUntil(iso: string, now: Date): number | null {
  const date = parseIsoDate(iso);
  if (!date) {
    return null;
  }
  return Math.floor((date.getTime() - now.getTime()) / DAY_MS);
}

/** Passed deadlines land in `immediate`; there is no separate expired bucket. */
export function deadlineBucket(iso: string | null, now: Date): DeadlineBucket {
  if (!iso) {
    return "unknown";
  }
  const days = daysUntil(iso, now);
  if (days === null) {
    return "unknown";
  }
  if (days < 7) {
    return "immediate";
  }
  if (days < 30) {
    return "near_term";
  }
  return "planning";
}

export function budgetBucket(value: number | null): BudgetBucket {
  if (value === null) {
    return "unknown";
  }
  if (value < 50_000) {
    return "micro";
  }
  if (value < 250_000) {
    return "small";
  }
  if (value < 1_000_000) {
    return "mid";
  }
  return "enterprise";
}
