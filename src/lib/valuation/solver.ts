/**
 * Valuation Engine — IRR Root Finder
 *
 * Bracketed bisection on the discount rate. Bounded by iteration count,
 * convergence epsilon and a wall-clock budget. Never throws for numeric
 * reasons; callers map non-convergence to NA.
 */

import { DEFAULT_RATE_BRACKET } from "./policies";
import type { SolverOptions, SolverResult } from "./types";

/** Net present value of cash flows indexed by year, year 0 undiscounted. */
export function npv(rate: number, cashFlows: readonly number[]): number {
  let total = 0;
  for (let t = 0; t < cashFlows.length; t++) {
    total += cashFlows[t] / Math.pow(1 + rate, t);
  }
  return total;
}

export function solveIrr(cashFlows: readonly number[], options: SolverOptions): SolverResult {
  const now = options.now ?? Date.now;
  let lo = options.lower ?? DEFAULT_RATE_BRACKET.lower;
  let hi = options.upper ?? DEFAULT_RATE_BRACKET.upper;
  let fLo = npv(lo, cashFlows);
  const fHi = npv(hi, cashFlows);

  if (!Number.isFinite(fLo) || !Number.isFinite(fHi) || Math.sign(fLo) === Math.sign(fHi)) {
    if (fLo === 0) return { status: "converged", rate: lo, iterations: 0 };
    if (fHi === 0) return { status: "converged", rate: hi, iterations: 0 };
    return { status: "non_convergence", reason: "no_sign_change", iterations: 0 };
  }

  const started = now();
  for (let i = 1; i <= options.maxIterations; i++) {
    const mid = (lo + hi) / 2;
    const fMid = npv(mid, cashFlows);
    if (Math.abs(fMid) < options.epsilon || (hi - lo) / 2 < options.epsilon) {
      return { status: "converged", rate: mid, iterations: i };
    }
    if (Math.sign(fMid) === Math.sign(fLo)) {
      lo = mid;
      fLo = fMid;
    } else {
      hi = mid;
    }
    if (now() - started > options.timeBudgetMs) {
      return { status: "non_convergence", reason: "time_budget", iterations: i };
    }
  }
  return { status: "non_convergence", reason: "max_iterations", iterations: options.maxIterations };
}
