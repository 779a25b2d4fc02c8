const MONTHS = new Map<string, number>([
  ["january", 1],
  ["february", 2],
  ["march", 3],
  ["april", 4],
  ["may", 5],
  ["june", 6],
  ["july", 7],
  ["august", 8],
  ["september", 9],
  ["october", 10],
  ["november", 11],
  ["december", 12],
]);

const ISO_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const US_SLASH = /^(\d{1,2})\/(\d{1,2})\/(\d{4})/;
const LONG_MONTH = /^([a-z]+)\s+(\d{1,2}),\s+(\d{4})/i;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function formatDate(year: string, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

/**
 * Best-effort deadline normalization. Input is trimmed first; ISO-prefixed text
 * is then returned as is, `M/D/YYYY` and `Month D, YYYY` become `YYYY-MM-DD`;
 * anything else is null.
 */
export function normalizeDeadline(text?: string | null): string | null {
  if (!text) {
    return null;
  }
  const value = text.trim();

  if (ISO_PREFIX.test(value)) {
    return value;
  }

  const slash = value.match(US_SLASH);
  if (slash) {
    return formatDate(slash[3], Number.parseInt(slash[1], 10), Number.parseInt(slash[2], 10));
  }

  const long = value.match(LONG_MONTH);
  if (long) {
    const month = MONTHS.get(long[1].toLowerCase());
    if (month === undefined) {
      return null;
    }
    return formatDate(long[3], month, Number.parseInt(long[2], 10));
  }

  return null;
}
