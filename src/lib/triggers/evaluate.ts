/**
 * Trigger Monitor — Evaluation
 *
 * The comparison is the condition the metric must keep. Before the
 * deadline a violation is a BREACH and a missing value is PENDING; once
 * the deadline has passed, an unmet or unknown condition is EXPIRED and a
 * met one resolves silently.
 *
 * Pure function — deterministic, no side effects.
 */

import { isNA } from "@/lib/dossier/types";
import type { Comparison, Maybe, Trigger, TriggerAlert } from "@/lib/dossier/types";
import { daysBetween } from "@/lib/utils/dates";

export const EQ_TOLERANCE = 1e-9;

const SYMBOL: Record<Comparison, string> = { gte: "≥", lte: "≤", gt: ">", lt: "<", eq: "=" };

export function conditionHolds(value: number, comparison: Comparison, threshold: number): boolean {
  switch (comparison) {
    case "gte":
      return value >= threshold;
    case "lte":
      return value <= threshold;
    case "gt":
      return value > threshold;
    case "lt":
      return value < threshold;
    case "eq":
      return Math.abs(value - threshold) <= EQ_TOLERANCE;
  }
}

export function describeCondition(trigger: Pick<Trigger, "metric" | "comparison" | "threshold">): string {
  return `${trigger.metric} ${SYMBOL[trigger.comparison]} ${trigger.threshold}`;
}

export function evaluateTrigger(trigger: Trigger, value: Maybe<number> | undefined, asOf: string): TriggerAlert | undefined {
  const daysRemaining = daysBetween(asOf, trigger.deadline);
  const numeric = value === undefined || isNA(value) ? undefined : value;
  const holds = numeric !== undefined && conditionHolds(numeric, trigger.comparison, trigger.threshold);
  const condition = describeCondition(trigger);
  const base = { triggerId: trigger.id, metric: trigger.metric, daysRemaining };

  if (daysRemaining < 0) {
    if (holds) return undefined;
    return {
      ...base,
      status: "EXPIRED",
      message:
        numeric !== undefined
          ? `${condition} not met by ${trigger.deadline} (value ${numeric})`
          : `${condition} unresolved at ${trigger.deadline}: no value reported`,
    };
  }
  if (numeric === undefined) {
    return { ...base, status: "PENDING", message: `${condition} awaiting a reported value (${daysRemaining} days left)` };
  }
  if (!holds) {
    return { ...base, status: "BREACH", message: `${condition} breached: value ${numeric}` };
  }
  return undefined;
}

export function evaluateTriggers(
  triggers: readonly Trigger[],
  values: Readonly<Record<string, Maybe<number>>>,
  asOf: string,
): TriggerAlert[] {
  return triggers
    .map((t) => evaluateTrigger(t, values[t.metric], asOf))
    .filter((a): a is TriggerAlert => a !== undefined)
    .sort((a, b) => (a.metric < b.metric ? -1 : a.metric > b.metric ? 1 : a.triggerId < b.triggerId ? -1 : 1));
}
