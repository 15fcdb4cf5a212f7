/**
 * Verifier — Independent Recomputation
 *
 * Re-runs the registered calculators (and, for valuation-input metrics,
 * the valuation engine) on a fresh context built from the same quarters,
 * then compares against what the analyst reported.
 */

import { NA, isNA } from "@/lib/dossier/types";
import type { CompanyQuarter, Metric, MetricValue } from "@/lib/dossier/types";
import { unitFor } from "@/lib/calculators/buildMetrics";
import { METRIC, findCalculator } from "@/lib/calculators/registry";
import type { CalculatorContext, MetricResult } from "@/lib/calculators/types";
import { buildValuationBlock } from "@/lib/valuation";
import { fundamentalsFromResults } from "@/lib/valuation/fundamentals";
import { formatValue, relativeDifference } from "./format";
import type { VerifierInput } from "./types";

export const DEFAULT_TOLERANCE = 0.01;

export interface Recomputed {
  value: MetricValue;
  unit: string;
}

export type Rederive = (name: string) => Recomputed | undefined;

function freshContext(history: readonly CompanyQuarter[], input: VerifierInput): CalculatorContext | undefined {
  const current = history[history.length - 1];
  if (current === undefined) return undefined;
  const businessModel = input.businessModel ?? current.businessModel;
  return { history, current, ...(businessModel ? { businessModel } : {}) };
}

/** Builds the lookup used to re-derive any metric by name. */
export function createRederive(input: VerifierInput): Rederive {
  const ctx = freshContext(input.history, input);
  const cache = new Map<string, MetricResult | undefined>();
  let valuationMetrics: Metric[] | undefined;

  const calc = (name: string): MetricResult | undefined => {
    if (!ctx) return undefined;
    if (!cache.has(name)) cache.set(name, findCalculator(name, ctx)?.compute(ctx));
    return cache.get(name);
  };

  const valuation = (): Metric[] => {
    if (valuationMetrics) return valuationMetrics;
    if (!input.valuationInputs || !ctx) return (valuationMetrics = []);
    const results = {
      [METRIC.ttmFcf]: calc(METRIC.ttmFcf),
      [METRIC.netDebt]: calc(METRIC.netDebt),
      [METRIC.dilutedShares]: calc(METRIC.dilutedShares),
    };
    const output = buildValuationBlock(input.valuationInputs, fundamentalsFromResults(results), {
      solver: input.options.solver,
      asOf: input.asOf,
    });
    return (valuationMetrics = output.metrics);
  };

  return (name) => {
    if (ctx) {
      const def = findCalculator(name, ctx);
      if (def) {
        const result = calc(name);
        return { value: result?.value ?? NA, unit: unitFor(def, ctx.current) };
      }
    }
    const fromValuation = valuation().find((m) => m.name === name);
    return fromValuation ? { value: fromValuation.value, unit: fromValuation.unit } : undefined;
  };
}

function valuesMatch(reported: MetricValue, recomputed: MetricValue, tolerance: number): boolean {
  if (isNA(reported) || isNA(recomputed)) return reported === recomputed;
  if (typeof reported === "string" || typeof recomputed === "string") return reported === recomputed;
  return relativeDifference(reported, recomputed) <= tolerance;
}

export function compareMetric(metric: Metric, recomputed: Recomputed | undefined, tolerance = DEFAULT_TOLERANCE): string[] {
  if (!recomputed) return [`Metric ${metric.name} has no independent derivation`];
  const reasons: string[] = [];
  if (metric.unit !== recomputed.unit) {
    reasons.push(`Metric ${metric.name} unit mismatch: reported ${metric.unit} vs recomputed ${recomputed.unit}`);
  }
  if (!valuesMatch(metric.value, recomputed.value, tolerance)) {
    reasons.push(
      `Metric ${metric.name} recomputation mismatch: reported ${formatValue(metric.value)} vs recomputed ${formatValue(recomputed.value)}`,
    );
  }
  return reasons;
}

export function recomputeSample(input: VerifierInput, sample: readonly string[]): string[] {
  const rederive = createRederive(input);
  const byName = new Map(input.analyst.metrics.map((m) => [m.name, m]));
  const tolerance = input.options.tolerance ?? DEFAULT_TOLERANCE;
  return sample.flatMap((name) => {
    const metric = byName.get(name);
    return metric ? compareMetric(metric, rederive(name), tolerance) : [];
  });
}
