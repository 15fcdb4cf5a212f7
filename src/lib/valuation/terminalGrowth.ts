/**
 * Valuation Engine — Terminal Growth
 *
 * Long-run inflation plus real growth, held at least TERMINAL_GROWTH_SPREAD
 * below WACC so the Gordon denominator stays positive.
 */

import type { ProvenancedScalar, ValuationBlock } from "@/lib/dossier/types";
import { TERMINAL_GROWTH_SPREAD } from "./policies";
import { named } from "./wacc";

export function deriveTerminalGrowth(
  inflation: ProvenancedScalar,
  realGrowth: ProvenancedScalar,
  waccPoint: number,
): ValuationBlock["terminalGrowth"] {
  const raw = inflation.value + realGrowth.value;
  const cap = waccPoint - TERMINAL_GROWTH_SPREAD;
  return {
    value: Math.min(raw, cap),
    capped: raw > cap,
    inputs: [named("inflation", inflation), named("realGrowth", realGrowth)],
  };
}
