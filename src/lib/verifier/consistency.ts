/**
 * Verifier — Cross-field Consistency Rules
 *
 * Explicit ordered table; every rule runs on every report regardless of
 * the sample. Each returns zero or more blocking reasons.
 */

import { isNA } from "@/lib/dossier/types";
import type { CompanyQuarter, Metric } from "@/lib/dossier/types";
import { METRIC, SEGMENT_MARGIN_PREFIX, SUBSCRIPTION_METRICS } from "@/lib/calculators/registry";
import { HARD_GATES } from "@/lib/gates/catalog";
import { scenarioIrrs, scenariosOrdered } from "@/lib/valuation";
import { formatValue, relativeDifference } from "./format";
import type { VerifierInput } from "./types";

export interface ConsistencyContext {
  input: VerifierInput;
  metrics: ReadonlyMap<string, Metric>;
  current: CompanyQuarter | undefined;
}

export interface ConsistencyRule {
  id: string;
  check(ctx: ConsistencyContext): string[];
}

const RECONCILIATION_TOLERANCE = 0.01;
const SHARE_COUNT_TOLERANCE = 1e-9;

/** True when `url` is on an allowlisted host or one of its subdomains. */
export function isAllowlistedUrl(url: string, allowlist: readonly string[]): boolean {
  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return allowlist.some((domain) => {
    const d = domain.toLowerCase();
    return host === d || host.endsWith(`.${d}`);
  });
}

function numeric(metric: Metric | undefined): number | undefined {
  return typeof metric?.value === "number" ? metric.value : undefined;
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

const interestPeriods: ConsistencyRule = {
  id: "interest_coverage_periods",
  check: ({ metrics }) => {
    const ebit = metrics.get(METRIC.ebitInterest);
    const fcf = metrics.get(METRIC.fcfInterest);
    if (!ebit || !fcf || ebit.period === fcf.period) return [];
    return [
      `Interest coverage ratios reference different periods: ${METRIC.ebitInterest} ${ebit.period} vs ${METRIC.fcfInterest} ${fcf.period}`,
    ];
  },
};

const dilutedShares: ConsistencyRule = {
  id: "reverse_dcf_diluted_shares",
  check: ({ input, current }) => {
    const valuation = input.analyst.valuation;
    if (isNA(valuation) || isNA(valuation.inputs.dilutedShares) || !current) return [];
    const used = valuation.inputs.dilutedShares;
    const filed = current.income.dilutedShares?.value;
    if (filed !== undefined && relativeDifference(filed, used) <= SHARE_COUNT_TOLERANCE) return [];
    return [
      `Reverse-DCF diluted shares ${formatValue(used)} do not match latest filing ${formatValue(filed)} (${current.period})`,
    ];
  },
};

const debtDueFootnotes: ConsistencyRule = {
  id: "debt_due_24m_footnotes",
  check: ({ metrics, current }) => {
    const reported = numeric(metrics.get(METRIC.debtDue24m));
    const within12 = current?.footnotes?.debtDueWithin12m?.value;
    const within24 = current?.footnotes?.debtDue12to24m?.value;
    if (reported === undefined || within12 === undefined || within24 === undefined) return [];
    const footnoted = within12 + within24;
    if (relativeDifference(footnoted, reported) <= RECONCILIATION_TOLERANCE) return [];
    return [
      `Debt due within 24 months ${formatValue(reported)} does not reconcile with footnotes ${formatValue(footnoted)}`,
    ];
  },
};

const segmentBasis: ConsistencyRule = {
  id: "segment_margin_basis",
  check: ({ input }) =>
    input.analyst.metrics
      .filter((m) => m.name.startsWith(SEGMENT_MARGIN_PREFIX) && m.basis !== "reported")
      .map((m) => `Segment margin ${m.name.slice(SEGMENT_MARGIN_PREFIX.length)} computed on adjusted revenue`),
};

const subscriptionMetrics: ConsistencyRule = {
  id: "subscription_metrics_tag",
  check: ({ input, current }) => {
    const tag = input.businessModel ?? current?.businessModel;
    if (tag === "subscription") return [];
    return input.analyst.metrics
      .filter((m) => SUBSCRIPTION_METRICS.includes(m.name))
      .map((m) => `Subscription metric ${m.name} reported for non-subscription business model (${tag ?? "untagged"})`);
  },
};

const scenarioOrder: ConsistencyRule = {
  id: "scenario_irr_order",
  check: ({ input }) => {
    const valuation = input.analyst.valuation;
    if (isNA(valuation) || scenariosOrdered(valuation)) return [];
    const [bear, base, bull] = scenarioIrrs(valuation).map((v) => formatValue(v));
    return [`Scenario IRRs not ordered: Bear ${bear}, Base ${base}, Bull ${bull}`];
  },
};

const hardGateVerdicts: ConsistencyRule = {
  id: "hard_gate_verdicts",
  check: ({ input }) => {
    const rows = new Map(input.analyst.gates.hard.map((row) => [row.gateId, row]));
    return HARD_GATES.filter((gate) => (rows.get(gate.id)?.result ?? "NA") === "NA").map(
      (gate) => `Missing ${gate.label} verdict`,
    );
  },
};

const droppedPeriods: ConsistencyRule = {
  id: "dropped_periods",
  check: ({ input }) => (input.droppedPeriods ?? []).map((p) => `Period excluded from analysis: ${p.message}`),
};

const sourceAllowlist: ConsistencyRule = {
  id: "source_url_allowlist",
  check: ({ input }) =>
    input.analyst.metrics
      .filter((m) => !isAllowlistedUrl(m.provenance.url, input.options.sourceAllowlist))
      .map((m) => `Metric ${m.name} source URL not allowlisted: ${m.provenance.url}`),
};

const provenanceIssues: ConsistencyRule = {
  id: "provenance_issues",
  check: ({ input }) =>
    input.analyst.provenanceIssues.map((issue) => `Provenance issue for ${issue.metric}: ${issue.reason}`),
};

export const CONSISTENCY_RULES: readonly ConsistencyRule[] = [
  interestPeriods,
  dilutedShares,
  debtDueFootnotes,
  segmentBasis,
  subscriptionMetrics,
  scenarioOrder,
  hardGateVerdicts,
  sourceAllowlist,
  provenanceIssues,
  droppedPeriods,
];

export function runConsistencyRules(input: VerifierInput, rules: readonly ConsistencyRule[] = CONSISTENCY_RULES): string[] {
  const ctx: ConsistencyContext = {
    input,
    metrics: new Map(input.analyst.metrics.map((m) => [m.name, m])),
    current: input.history[input.history.length - 1],
  };
  return rules.flatMap((rule) => rule.check(ctx));
}
