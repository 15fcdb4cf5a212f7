/**
 * Verifier — Public API
 *
 * Second, independent pass over an analyst output. Reads only; the
 * verdict is PASS iff no blocking reason was found.
 *
 * Pure function — deterministic, no side effects.
 */

import type { QAResult } from "@/lib/dossier/types";
import { runConsistencyRules } from "./consistency";
import { recomputeSample } from "./recompute";
import { sampleMetricNames } from "./sampling";
import type { VerifierInput } from "./types";

export type { VerifierInput, VerifierOptions } from "./types";
export { CONSISTENCY_RULES, isAllowlistedUrl, runConsistencyRules } from "./consistency";
export type { ConsistencyContext, ConsistencyRule } from "./consistency";
export { compareMetric, createRederive, recomputeSample, DEFAULT_TOLERANCE } from "./recompute";
export { mulberry32, sampleMetricNames } from "./sampling";

export function verifyDossier(input: VerifierInput): QAResult {
  const sample = sampleMetricNames(
    input.analyst.metrics.map((m) => m.name),
    input.options.sampleSize,
    input.options.seed,
  );
  const reasons = [...new Set([...recomputeSample(input, sample), ...runConsistencyRules(input)])];
  return { status: reasons.length === 0 ? "PASS" : "BLOCKER", reasons };
}
