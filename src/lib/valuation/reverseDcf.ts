/**
 * Valuation Engine — Reverse DCF
 *
 * Solves for the IRR implied by paying today's price for a share of the
 * projected free cash flows, a Gordon terminal value at WACC, less net debt.
 *
 * Per-share equity flows: [-price, fcf1/n, …, fcf4/n, (fcf5 + TV - netDebt)/n].
 *
 * Every flow after year 0 must be positive; otherwise the case is NA. With
 * strictly positive flows the IRR is unique and rises with every later
 * flow, which is what makes the sensitivity directions a guarantee.
 */

import { NA } from "@/lib/dossier/types";
import type { Maybe } from "@/lib/dossier/types";
import { solveIrr } from "./solver";
import type { ReverseDcfCase, SolverOptions } from "./types";

export function projectFcfPath(startFcf: number, schedule: readonly number[]): number[] {
  const path: number[] = [];
  let fcf = startFcf;
  for (const growth of schedule) {
    fcf *= 1 + growth;
    path.push(fcf);
  }
  return path;
}

/** Gordon growth at the discount rate; undefined when wacc ≤ g. */
export function terminalValue(finalFcf: number, wacc: number, growth: number): number | undefined {
  if (wacc <= growth) return undefined;
  return (finalFcf * (1 + growth)) / (wacc - growth);
}

export function equityCashFlows(c: ReverseDcfCase): number[] | undefined {
  const { price, dilutedShares, netDebt, fcfPath } = c;
  if (dilutedShares === undefined || dilutedShares <= 0 || netDebt === undefined) return undefined;
  if (!(price > 0) || fcfPath.length === 0 || fcfPath.some((fcf) => !(fcf > 0))) return undefined;

  const finalFcf = fcfPath[fcfPath.length - 1];
  const tv = terminalValue(finalFcf, c.wacc, c.terminalGrowth);
  if (tv === undefined) return undefined;

  const terminalEquity = finalFcf + tv - netDebt;
  if (!(terminalEquity > 0)) return undefined;

  return [
    -price,
    ...fcfPath.slice(0, -1).map((fcf) => fcf / dilutedShares),
    terminalEquity / dilutedShares,
  ];
}

export interface ReverseDcfResult {
  terminalValue: Maybe<number>;
  irr: Maybe<number>;
}

export function solveReverseDcf(c: ReverseDcfCase, solver: SolverOptions): ReverseDcfResult {
  const finalFcf = c.fcfPath[c.fcfPath.length - 1];
  const tv = finalFcf === undefined ? undefined : terminalValue(finalFcf, c.wacc, c.terminalGrowth);
  const flows = equityCashFlows(c);
  if (!flows) return { terminalValue: tv ?? NA, irr: NA };

  const solved = solveIrr(flows, solver);
  return {
    terminalValue: tv ?? NA,
    irr: solved.status === "converged" ? solved.rate : NA,
  };
}
