interface BudgetPattern {
  pattern: RegExp;
  multiplier: number;
}

const AMOUNT = String.raw`([\d,]+(?:\.\d+)?)`;

// Priority order; the first pattern with a parseable amount wins.
const BUDGET_PATTERNS: BudgetPattern[] = [
  { pattern: new RegExp(String.raw`\$\s*${AMOUNT}\s*m(?:illion)?`, "i"), multiplier: 1_000_000 },
  { pattern: new RegExp(String.raw`\$\s*${AMOUNT}\s*k`, "i"), multiplier: 1_000 },
  { pattern: new RegExp(String.raw`\$\s*${AMOUNT}`, "i"), multiplier: 1 },
  { pattern: new RegExp(String.raw`USD\s*${AMOUNT}\s*m(?:illion)?`, "i"), multiplier: 1_000_000 },
  { pattern: new RegExp(String.raw`USD\s*${AMOUNT}\s*k`, "i"), multiplier: 1_000 },
  { pattern: new RegExp(String.raw`USD\s*${AMOUNT}`, "i"), multiplier: 1 },
];

export function extractBudget(text?: string | null): number | null {
  if (!text) {
    return null;
  }

  for (const { pattern, multiplier } of BUDGET_PATTERNS) {
    const match = text.match(pattern);
    if (!match) {
      continue;
    }
    const amount = Number.parseFloat(match[1].replace(/,/g, ""));
    if (Number.isFinite(amount)) {
      return amount * multiplier;
    }
  }
  return null;
}
