/**
 * Gate Engine — Types
 */

import type { EvidenceSnippet, EvidenceSpan, FlipTrigger, GateRow, Hardness, Metric } from "@/lib/dossier/types";
import type { GatePolicy } from "./policies";

export type MetricSet = ReadonlyMap<string, Metric>;

export interface GateContext {
  metrics: MetricSet;
  evidence: readonly EvidenceSpan[];
  /** YYYY-MM-DD; flip-trigger deadlines count from here */
  asOf: string;
  policy: GatePolicy;
}

/**
 * What a gate decides. A Soft-Pass cannot be expressed without its
 * flip-trigger; rows are still re-checked at run time by createGateRow.
 */
export type GateVerdict =
  | { result: "Pass" | "Fail" | "NA"; evidence?: EvidenceSnippet[] }
  | { result: "Soft-Pass"; flipTrigger: FlipTrigger; evidence?: EvidenceSnippet[] };

export interface GateDefinition {
  id: string;
  label: string;
  hardness: Hardness;
  rule: string;
  metricRefs: string[];
  evaluate(ctx: GateContext): GateVerdict;
}

export interface PathCheck {
  name: string;
  passed: boolean;
  detail: string;
}

export interface PathSelection {
  path: "Mature" | "Emergent";
  checks: PathCheck[];
  reasons: string[];
}

export interface GateEvaluation {
  hard: GateRow[];
  soft: GateRow[];
  path: "Mature" | "Emergent" | "Fail";
  pathReasons: string[];
  checks: PathCheck[];
}
