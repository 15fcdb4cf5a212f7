/**
 * Gate Engine — Metric Lookup
 */

import type { Metric } from "@/lib/dossier/types";
import type { MetricSet } from "./types";

export function toMetricSet(metrics: readonly Metric[]): MetricSet {
  return new Map(metrics.map((m) => [m.name, m]));
}

/** Numeric value of a metric; NA, categorical and absent all read as undefined. */
export function metricValue(metrics: MetricSet, name: string): number | undefined {
  const v = metrics.get(name)?.value;
  return typeof v === "number" && Number.isFinite(v) ? v : undefined;
}
