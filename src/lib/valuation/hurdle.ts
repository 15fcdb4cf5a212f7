/**
 * Valuation Engine — Hurdle IRR
 */

import type { ValuationBlock } from "@/lib/dossier/types";
import type { HurdleAdjustment } from "./types";

/** Applies basis-point adjustments in order, recording the running hurdle. Floored at zero. */
export function deriveHurdle(base: number, adjustments: readonly HurdleAdjustment[]): ValuationBlock["hurdle"] {
  let running = base;
  const steps = adjustments.map((adj) => {
    running += adj.bps / 10_000;
    return { name: adj.name, bps: adj.bps, running };
  });
  return { base, value: Math.max(running, 0), adjustments: steps };
}
