/**
 * Valuation Engine — Fundamentals
 *
 * The three company figures the reverse DCF starts from, read off the
 * calculator results so both the analyst and the Verifier feed the
 * engine the same way.
 */

import type { MetricResult } from "@/lib/calculators/types";
import { METRIC } from "@/lib/calculators/registry";
import type { ValuationFundamentals } from "./types";

export function fundamentalsFromResults(results: Readonly<Record<string, MetricResult | undefined>>): ValuationFundamentals {
  return {
    startFcf: results[METRIC.ttmFcf]?.value,
    netDebt: results[METRIC.netDebt]?.value,
    dilutedShares: results[METRIC.dilutedShares]?.value,
  };
}
