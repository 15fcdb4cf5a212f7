/**
 * Calculators — Explainability Helpers
 *
 * Shared utilities for building consistent MetricResult diagnostics.
 * Never coerce undefined→0 and never divide by zero.
 */

import type { MetricResult } from "./types";

export function buildDiagnostics(inputs: Record<string, number | undefined>): MetricResult["diagnostics"] {
  const missingInputs = Object.entries(inputs)
    .filter(([, val]) => val === undefined)
    .map(([key]) => key);
  return missingInputs.length === 0 ? undefined : { missingInputs };
}

export function safeDivide(
  numeratorKey: string,
  numerator: number | undefined,
  denominatorKey: string,
  denominator: number | undefined,
  inputs: Record<string, number | undefined>,
  formula: string,
): MetricResult {
  if (numerator === undefined || denominator === undefined) {
    const missingInputs: string[] = [];
    if (numerator === undefined) missingInputs.push(numeratorKey);
    if (denominator === undefined) missingInputs.push(denominatorKey);
    return { value: undefined, inputs, formula, diagnostics: { missingInputs } };
  }
  if (denominator === 0) {
    return { value: undefined, inputs, formula, diagnostics: { divideByZero: true } };
  }
  return { value: numerator / denominator, inputs, formula };
}

/**
 * Returns undefined if ANY component is undefined, with the missing names.
 */
export function safeSum(components: Record<string, number | undefined>): {
  value: number | undefined;
  missing: string[];
} {
  const missing: string[] = [];
  let sum = 0;
  for (const [key, val] of Object.entries(components)) {
    if (val === undefined) missing.push(key);
    else sum += val;
  }
  return missing.length > 0 ? { value: undefined, missing } : { value: sum, missing: [] };
}

/** Wrap a directly reported value. */
export function reported(key: string, value: number | undefined, formula: string): MetricResult {
  const inputs = { [key]: value };
  return { value, inputs, formula, diagnostics: buildDiagnostics(inputs) };
}

/** Apply a transform to a computed result, keeping its audit trail. */
export function mapResult(result: MetricResult, formula: string, fn: (v: number) => number): MetricResult {
  if (result.value === undefined) return { ...result, formula };
  return { ...result, value: fn(result.value), formula };
}
