/**
 * Normalization — Scale & Unit Detection
 *
 * Filings announce their reporting scale in free text ("in thousands",
 * "$MM", "(€ bn)"). Detection is heuristic and ordered largest first.
 */

// Bare letters only count right after a currency symbol or alone in parentheses.
const SCALE_PATTERNS: ReadonlyArray<readonly [RegExp, number]> = [
  [/\b(billions?|bn)\b|[$€£¥]\s?b\b|\(b\)/i, 1_000_000_000],
  [/\b(millions?|mm|mn)\b|[$€£¥]\s?m\b|\(m\)/i, 1_000_000],
  [/\b(thousands?|000s)\b|[$€£¥]\s?k\b|\(k\)/i, 1_000],
];

export function detectScale(marker: string | undefined): number {
  if (!marker) return 1;
  for (const [pattern, factor] of SCALE_PATTERNS) {
    if (pattern.test(marker)) return factor;
  }
  return 1;
}

/** Units that are never rescaled. */
export const UNSCALED_UNITS: ReadonlySet<string> = new Set(["ratio", "pct", "per_share", "days", "count"]);

/** Default unit for well-known non-monetary line names. */
export const LINE_UNITS: Readonly<Record<string, string>> = {
  dilutedShares: "shares",
  basicShares: "shares",
  netRevenueRetention: "ratio",
  grossRevenueRetention: "ratio",
  employees: "count",
};

const CURRENCY_CODE = /^[A-Z]{3}$/;

export function isCurrencyUnit(unit: string): boolean {
  return CURRENCY_CODE.test(unit);
}
