/**
 * Delta Engine
 *
 * Quarter-over-quarter and year-over-year change for every tracked metric
 * of the latest snapshot. Comparison periods are found by quarter key,
 * not by position, so a gap in the history yields NA rather than a
 * comparison against the wrong quarter.
 *
 * Pure function — deterministic, no side effects. Output keys are
 * sorted; identical history serializes byte-for-byte identically.
 */

import { NA, isNA } from "@/lib/dossier/types";
import type { ChangeValue, DeltaEntry, Maybe, MetricSnapshot } from "@/lib/dossier/types";
import { compareQuarterKeys, previousQuarterKey, yearAgoQuarterKey } from "@/lib/normalization/periods";

const NO_CHANGE: ChangeValue = { absolute: NA, percent: NA };

export function change(current: Maybe<number>, base: Maybe<number> | undefined): ChangeValue {
  if (isNA(current) || base === undefined || isNA(base)) return { ...NO_CHANGE };
  const absolute = current - base;
  return { absolute, percent: base === 0 ? NA : absolute / Math.abs(base) };
}

export function latestSnapshot(history: readonly MetricSnapshot[]): MetricSnapshot | undefined {
  const sorted = [...history].sort((a, b) => compareQuarterKeys(a.period, b.period));
  return sorted[sorted.length - 1];
}

export function computeDeltas(history: readonly MetricSnapshot[]): Record<string, DeltaEntry> {
  const current = latestSnapshot(history);
  if (!current) return {};

  const byPeriod = new Map(history.map((s) => [s.period, s]));
  const priorKey = previousQuarterKey(current.period);
  const yearAgoKey = yearAgoQuarterKey(current.period);
  const prior = priorKey === undefined ? undefined : byPeriod.get(priorKey);
  const yearAgo = yearAgoKey === undefined ? undefined : byPeriod.get(yearAgoKey);

  const out: Record<string, DeltaEntry> = {};
  for (const metric of Object.keys(current.values).sort()) {
    const value = current.values[metric] ?? NA;
    out[metric] = {
      metric,
      current: value,
      qoq: change(value, prior?.values[metric]),
      yoy: change(value, yearAgo?.values[metric]),
    };
  }
  return out;
}

/** Replaces the entry for the snapshot's period, keeping history sorted by quarter. */
export function mergeSnapshot(history: readonly MetricSnapshot[], snapshot: MetricSnapshot): MetricSnapshot[] {
  return [...history.filter((s) => s.period !== snapshot.period), snapshot].sort((a, b) =>
    compareQuarterKeys(a.period, b.period),
  );
}
