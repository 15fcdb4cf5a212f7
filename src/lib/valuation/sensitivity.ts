/**
 * Valuation Engine — Sensitivity Grid
 *
 * Re-solves the Base case at WACC ±100 bps and g ±50 bps, everything else
 * held fixed, then checks the monotonic directions.
 */

import { ValuationContractError } from "@/lib/errors";
import { isNA } from "@/lib/dossier/types";
import type { Maybe, SensitivityKey } from "@/lib/dossier/types";
import { SENSITIVITY_GROWTH_STEP, SENSITIVITY_WACC_STEP } from "./policies";
import { solveReverseDcf } from "./reverseDcf";
import type { ReverseDcfCase, SolverOptions } from "./types";

export type SensitivityGrid = Record<SensitivityKey, Maybe<number>>;

export function buildSensitivity(base: ReverseDcfCase, solver: SolverOptions): SensitivityGrid {
  const at = (wacc: number, terminalGrowth: number) => solveReverseDcf({ ...base, wacc, terminalGrowth }, solver).irr;
  return {
    "wacc+100bps": at(base.wacc + SENSITIVITY_WACC_STEP, base.terminalGrowth),
    "wacc-100bps": at(base.wacc - SENSITIVITY_WACC_STEP, base.terminalGrowth),
    "g+50bps": at(base.wacc, base.terminalGrowth + SENSITIVITY_GROWTH_STEP),
    "g-50bps": at(base.wacc, base.terminalGrowth - SENSITIVITY_GROWTH_STEP),
  };
}

/**
 * Higher WACC ⇒ lower IRR; higher g ⇒ higher IRR. NA cells are exempt.
 * A violation is a defect and throws.
 */
export function assertSensitivityMonotonic(baseIrr: Maybe<number>, grid: SensitivityGrid, tolerance = 1e-6): void {
  const ordered: Array<[SensitivityKey | "base", Maybe<number>, SensitivityKey | "base", Maybe<number>]> = [
    ["wacc+100bps", grid["wacc+100bps"], "base", baseIrr],
    ["base", baseIrr, "wacc-100bps", grid["wacc-100bps"]],
    ["g-50bps", grid["g-50bps"], "base", baseIrr],
    ["base", baseIrr, "g+50bps", grid["g+50bps"]],
  ];
  for (const [lowKey, low, highKey, high] of ordered) {
    if (isNA(low) || isNA(high)) continue;
    if (low > high + tolerance) {
      throw new ValuationContractError(
        "SENSITIVITY_NOT_MONOTONIC",
        `Sensitivity not monotonic: IRR(${lowKey}) ${low} > IRR(${highKey}) ${high}`,
        { grid, baseIrr },
      );
    }
  }
}
