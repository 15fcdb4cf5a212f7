/**
 * Gate Engine — Deterministic Version Hash
 *
 * Content hash of the gate table and thresholds, recorded with each report
 * for the audit trail. Auto-tracks changes — no manual bumping required.
 */

import { hashCanonical } from "@/lib/utils/canonicalHash";
import { GATE_TABLE } from "./catalog";
import { GATE_POLICY } from "./policies";
import type { GatePolicy } from "./policies";
import type { GateDefinition } from "./types";

export function gateVersionFor(policy: GatePolicy, table: readonly GateDefinition[] = GATE_TABLE): string {
  const rows = table.map(({ id, hardness, rule, metricRefs }) => ({ id, hardness, rule, metricRefs }));
  return hashCanonical({ table: rows, policy }).slice(0, 16);
}

export const GATE_DEFINITIONS_VERSION: string = gateVersionFor(GATE_POLICY);
