/**
 * Calculators — Metric Builder
 *
 * Runs the registry over a calculator context and attaches provenance.
 * A number with nothing to cite is withheld and reported as a provenance
 * issue; an NA with nothing to cite is simply not emitted.
 */

import { NA } from "@/lib/dossier/types";
import type { CompanyQuarter, Metric, ProvenanceIssue, Provenance } from "@/lib/dossier/types";
import { calculatorsFor } from "./registry";
import type { CalculatorContext, CalculatorDefinition, MetricResult } from "./types";

/** Citations keyed by metric name or by line reference ("income.revenue"). */
export type CitationIndex = Record<string, Provenance>;

export interface BuiltMetrics {
  metrics: Metric[];
  results: Record<string, MetricResult>;
  issues: ProvenanceIssue[];
}

export function unitFor(def: CalculatorDefinition, current: CompanyQuarter): string {
  return def.unit === "currency" ? current.currency : def.unit;
}

export function periodFor(def: CalculatorDefinition, current: CompanyQuarter): string {
  return def.scope === "ttm" ? current.ttm.key : current.period;
}

export function resolveCitation(def: CalculatorDefinition, citations: CitationIndex): Provenance | undefined {
  const own = citations[def.name];
  if (own) return own;
  for (const key of def.citeFrom) {
    const cited = citations[key];
    if (cited) return cited;
  }
  return undefined;
}

export function toMetric(
  def: CalculatorDefinition,
  result: MetricResult,
  current: CompanyQuarter,
  provenance: Provenance,
): Metric {
  return {
    name: def.name,
    value: result.value ?? NA,
    unit: unitFor(def, current),
    period: periodFor(def, current),
    provenance: { ...provenance },
    category: def.category,
    ...(def.basis ? { basis: def.basis } : {}),
    inputs: Object.keys(result.inputs),
  };
}

export function contextFromHistory(history: readonly CompanyQuarter[]): CalculatorContext | undefined {
  const current = history[history.length - 1];
  if (current === undefined) return undefined;
  return { history, current, ...(current.businessModel ? { businessModel: current.businessModel } : {}) };
}

export function buildMetrics(ctx: CalculatorContext, citations: CitationIndex): BuiltMetrics {
  const metrics: Metric[] = [];
  const results: Record<string, MetricResult> = {};
  const issues: ProvenanceIssue[] = [];

  for (const def of calculatorsFor(ctx)) {
    const result = def.compute(ctx);
    results[def.name] = result;
    const provenance = resolveCitation(def, citations);
    if (!provenance) {
      if (result.value !== undefined) issues.push({ metric: def.name, reason: "missing citation" });
      continue;
    }
    metrics.push(toMetric(def, result, ctx.current, provenance));
  }

  return { metrics, results, issues };
}
