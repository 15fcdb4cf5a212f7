/**
 * Gate Engine — Evaluator
 *
 * Runs every gate in table order and returns the complete audit, Hard and
 * Soft rows alike, even when a Hard gate has already failed. Any Hard Fail
 * overrides the selected path to Fail.
 *
 * Pure function — deterministic, no I/O.
 */

import type { EvidenceSpan, GateRow, Metric } from "@/lib/dossier/types";
import { GATE_TABLE } from "./catalog";
import { toMetricSet } from "./metricSet";
import { selectPath } from "./path";
import type { GatePolicy } from "./policies";
import { rowFromVerdict } from "./rows";
import type { GateDefinition, GateEvaluation } from "./types";

export interface EvaluateGatesInput {
  metrics: readonly Metric[];
  evidence?: readonly EvidenceSpan[];
  asOf: string;
  policy: GatePolicy;
  /** Defaults to the full catalog. */
  table?: readonly GateDefinition[];
}

export function evaluateGates(input: EvaluateGatesInput): GateEvaluation {
  const ctx = {
    metrics: toMetricSet(input.metrics),
    evidence: input.evidence ?? [],
    asOf: input.asOf,
    policy: input.policy,
  };

  const rows: GateRow[] = (input.table ?? GATE_TABLE).map((def) => rowFromVerdict(def, def.evaluate(ctx)));
  const hard = rows.filter((r) => r.hardness === "Hard");
  const soft = rows.filter((r) => r.hardness === "Soft");

  const selection = selectPath(ctx.metrics, input.policy);
  const hardFails = hard.filter((r) => r.result === "Fail");

  if (hardFails.length > 0) {
    return {
      hard,
      soft,
      path: "Fail",
      pathReasons: [...hardFails.map((r) => `Hard gate failed: ${r.label}`), ...selection.reasons],
      checks: selection.checks,
    };
  }

  return { hard, soft, path: selection.path, pathReasons: selection.reasons, checks: selection.checks };
}
