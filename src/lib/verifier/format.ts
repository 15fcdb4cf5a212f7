import { isNA } from "@/lib/dossier/types";
import type { MetricValue } from "@/lib/dossier/types";

/** Six significant digits, no trailing zeros. */
export function formatValue(value: MetricValue | undefined): string {
  if (value === undefined || isNA(value)) return "NA";
  if (typeof value === "string") return value;
  return String(Number(value.toPrecision(6)));
}

export function relativeDifference(reported: number, recomputed: number): number {
  return reported === 0 ? Math.abs(recomputed) : Math.abs(reported - recomputed) / Math.abs(reported);
}
