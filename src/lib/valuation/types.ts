/**
 * Valuation Engine — Types
 */

import type { SolverConfig } from "@/lib/env/server";
import type { Metric, ProvenancedScalar, ScenarioName, ValuationBlock } from "@/lib/dossier/types";

export interface HurdleAdjustment {
  /** e.g. "mature", "marketplace" */
  name: string;
  bps: number;
}

/** Market, macro and policy inputs supplied with the analysis bundle. */
export interface ValuationInputs {
  price: ProvenancedScalar;
  riskFreeRate: ProvenancedScalar;
  equityRiskPremium: ProvenancedScalar;
  beta: ProvenancedScalar;
  preTaxCostOfDebt: ProvenancedScalar;
  taxRate: ProvenancedScalar;
  equityMarketValue: ProvenancedScalar;
  debtMarketValue: ProvenancedScalar;
  /** Company-specific premium on the cost of equity, bounded to ±150 bps. */
  riskAdjustmentBps?: number;
  inflation: ProvenancedScalar;
  realGrowth: ProvenancedScalar;
  baseHurdle: ProvenancedScalar;
  hurdleAdjustments: HurdleAdjustment[];
  /** Five annual growth rates per scenario, Bear ≤ Base ≤ Bull element-wise. */
  growthSchedules: Record<ScenarioName, number[]>;
  /** Overrides the latest filing's diluted share count. */
  dilutedShares?: ProvenancedScalar;
}

/** Company fundamentals read from the metric set. */
export interface ValuationFundamentals {
  startFcf: number | undefined;
  netDebt: number | undefined;
  dilutedShares: number | undefined;
}

export interface SolverOptions extends SolverConfig {
  /** Bracket for the discount rate. Defaults to [-0.99, 10]. */
  lower?: number;
  upper?: number;
  /** Clock in ms; injectable for tests. */
  now?: () => number;
}

export type SolverResult =
  | { status: "converged"; rate: number; iterations: number }
  | { status: "non_convergence"; reason: "no_sign_change" | "max_iterations" | "time_budget"; iterations: number };

export interface ReverseDcfCase {
  price: number;
  dilutedShares: number | undefined;
  netDebt: number | undefined;
  fcfPath: number[];
  wacc: number;
  terminalGrowth: number;
}

export interface ValuationOptions {
  solver: SolverOptions;
  /** YYYY-MM-DD; the period stamped on valuation-input metrics */
  asOf: string;
}

export interface ValuationOutput {
  block: ValuationBlock;
  metrics: Metric[];
}
