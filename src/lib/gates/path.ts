/**
 * Gate Engine — Path Selection
 *
 * Mature iff all four checks hold; otherwise Emergent with the failing
 * checks as reasons. An unavailable metric fails its check.
 */

import { METRIC } from "@/lib/calculators/registry";
import { metricValue } from "./metricSet";
import type { GatePolicy } from "./policies";
import type { MetricSet, PathCheck, PathSelection } from "./types";

function describe(value: number | undefined): string {
  return value === undefined ? "unavailable" : String(value);
}

export function pathChecks(metrics: MetricSet, policy: GatePolicy): PathCheck[] {
  const fcf = metricValue(metrics, METRIC.ttmFcf);
  const ebit = metricValue(metrics, METRIC.ttmEbit);
  const netDebt = metricValue(metrics, METRIC.netDebt);
  const leverage = metricValue(metrics, METRIC.netLeverage);
  const segmentQuarters = metricValue(metrics, METRIC.segmentQuarters);

  return [
    {
      name: "TTM free cash flow > 0",
      passed: fcf !== undefined && fcf > 0,
      detail: `TTM FCF ${describe(fcf)}`,
    },
    {
      name: "GAAP operating income ≥ 0",
      passed: ebit !== undefined && ebit >= 0,
      detail: `TTM EBIT ${describe(ebit)}`,
    },
    {
      name: `Net leverage ≤ ${policy.matureMaxNetLeverage}× EBITDA or net cash`,
      passed: (netDebt !== undefined && netDebt <= 0) || (leverage !== undefined && leverage <= policy.matureMaxNetLeverage),
      detail: `net debt ${describe(netDebt)}, net debt / EBITDA ${describe(leverage)}`,
    },
    {
      name: `≥${policy.matureMinSegmentQuarters} consecutive quarters of segment disclosure`,
      passed: segmentQuarters !== undefined && segmentQuarters >= policy.matureMinSegmentQuarters,
      detail: `${describe(segmentQuarters)} quarters`,
    },
  ];
}

export function selectPath(metrics: MetricSet, policy: GatePolicy): PathSelection {
  const checks = pathChecks(metrics, policy);
  const failing = checks.filter((c) => !c.passed);
  return {
    path: failing.length === 0 ? "Mature" : "Emergent",
    checks,
    reasons: failing.map((c) => `${c.name} not met (${c.detail})`),
  };
}
