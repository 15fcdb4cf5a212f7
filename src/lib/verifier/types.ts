/**
 * Verifier — Types
 */

import type { AnalystOutput, BusinessModel, CompanyQuarter, QAResult } from "@/lib/dossier/types";
import type { DroppedPeriod } from "@/lib/normalization/types";
import type { SolverOptions, ValuationInputs } from "@/lib/valuation/types";

export interface VerifierOptions {
  sampleSize: number;
  seed: number;
  /** Hostnames whose URLs (or subdomains) are accepted as sources. */
  sourceAllowlist: readonly string[];
  solver: SolverOptions;
  /** Relative tolerance for recomputation. Defaults to 1%. */
  tolerance?: number;
}

export interface VerifierInput {
  /** Normalized quarters the analyst worked from, oldest first. */
  history: readonly CompanyQuarter[];
  /** Historical quarters excluded during normalization. */
  droppedPeriods?: readonly DroppedPeriod[];
  businessModel?: BusinessModel;
  analyst: Pick<AnalystOutput, "metrics" | "gates" | "valuation" | "provenanceIssues">;
  valuationInputs?: ValuationInputs;
  asOf: string;
  options: VerifierOptions;
}

export type { QAResult };
