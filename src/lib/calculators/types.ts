/**
 * Calculators — Shared Types
 *
 * Every calculator is a named pure function over the normalized history,
 * returning a MetricResult with its inputs, formula and diagnostics.
 */

import type { BusinessModel, CompanyQuarter, MetricCategory } from "@/lib/dossier/types";

export interface MetricResult {
  value: number | undefined;
  inputs: Record<string, number | undefined>;
  formula: string;
  diagnostics?: {
    missingInputs?: string[];
    divideByZero?: boolean;
  };
}

export interface CalculatorContext {
  /** Normalized quarters, oldest first. */
  history: readonly CompanyQuarter[];
  /** The most recent quarter of `history`. */
  current: CompanyQuarter;
  businessModel?: BusinessModel;
}

/**
 * quarter: flows of the current quarter and point-in-time balances.
 * ttm: anything built on trailing-twelve-month flows.
 */
export type CalculatorScope = "quarter" | "ttm";

export type CalculatorUnit = "currency" | "ratio" | "days" | "shares" | "count";

export interface CalculatorDefinition {
  name: string;
  unit: CalculatorUnit;
  scope: CalculatorScope;
  category: MetricCategory;
  /** Skipped unless the business-model tag is "subscription". */
  subscriptionOnly?: boolean;
  basis?: "reported" | "adjusted";
  /** Citation keys, in preference order, when the metric has no citation of its own. */
  citeFrom: string[];
  compute(ctx: CalculatorContext): MetricResult;
}
