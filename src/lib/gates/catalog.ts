/**
 * Gate Engine — Gate Catalog
 *
 * Ordered table of named gates: five Hard, then six Soft. Each gate reads
 * only the metric set (and, for qualitative gates, the ranked evidence).
 */

import { METRIC } from "@/lib/calculators/registry";
import type { Comparison, EvidenceSpan, FlipTrigger } from "@/lib/dossier/types";
import { addDays } from "@/lib/utils/dates";
import { metricValue } from "./metricSet";
import type { GateContext, GateDefinition, GateVerdict } from "./types";

// ---------------------------------------------------------------------------
// Verdict helpers
// ---------------------------------------------------------------------------

function pct(rate: number): string {
  return `${Number((rate * 100).toFixed(2))}%`;
}

const PASS: GateVerdict = { result: "Pass" };
const FAIL: GateVerdict = { result: "Fail" };
const NA_VERDICT: GateVerdict = { result: "NA" };

function flipTrigger(
  ctx: GateContext,
  description: string,
  condition?: { metric: string; comparison: Comparison; threshold: number },
): FlipTrigger {
  return {
    description,
    deadline: addDays(ctx.asOf, ctx.policy.flipTriggerHorizonDays),
    ...(condition ? { condition } : {}),
  };
}

function softPass(
  ctx: GateContext,
  description: string,
  condition?: { metric: string; comparison: Comparison; threshold: number },
): GateVerdict {
  return { result: "Soft-Pass", flipTrigger: flipTrigger(ctx, description, condition) };
}

// ---------------------------------------------------------------------------
// Hard gates
// ---------------------------------------------------------------------------

const circleOfCompetence: GateDefinition = {
  id: "circle_of_competence",
  label: "Circle of Competence",
  hardness: "Hard",
  rule: "TTM revenue > 0 and at least one quarter of segment disclosure",
  metricRefs: [METRIC.ttmRevenue, METRIC.segmentQuarters],
  evaluate(ctx) {
    const revenue = metricValue(ctx.metrics, METRIC.ttmRevenue);
    const segmentQuarters = metricValue(ctx.metrics, METRIC.segmentQuarters);
    if (revenue === undefined || segmentQuarters === undefined) return NA_VERDICT;
    return revenue > 0 && segmentQuarters >= 1 ? PASS : FAIL;
  },
};

const fraudControls: GateDefinition = {
  id: "fraud_controls",
  label: "Fraud/Controls",
  hardness: "Hard",
  rule: "|Accruals ratio| ≤ 10%",
  metricRefs: [METRIC.accrualsRatio],
  evaluate(ctx) {
    const accruals = metricValue(ctx.metrics, METRIC.accrualsRatio);
    if (accruals === undefined) return NA_VERDICT;
    return Math.abs(accruals) <= ctx.policy.fraudMaxAbsAccruals ? PASS : FAIL;
  },
};

const imminentSolvency: GateDefinition = {
  id: "imminent_solvency",
  label: "Imminent Solvency",
  hardness: "Hard",
  rule: "Net debt / EBITDA ≤ 4× or TTM FCF > 0",
  metricRefs: [METRIC.netLeverage, METRIC.ttmFcf],
  evaluate(ctx) {
    const leverage = metricValue(ctx.metrics, METRIC.netLeverage);
    const fcf = metricValue(ctx.metrics, METRIC.ttmFcf);
    if ((leverage !== undefined && leverage <= ctx.policy.solvencyMaxNetLeverage) || (fcf !== undefined && fcf > 0)) {
      return PASS;
    }
    return leverage !== undefined && fcf !== undefined ? FAIL : NA_VERDICT;
  },
};

const valuationQuality: GateDefinition = {
  id: "valuation",
  label: "Valuation",
  hardness: "Hard",
  rule: "ROIC ≥ WACC",
  metricRefs: [METRIC.roic, METRIC.wacc],
  evaluate(ctx) {
    const roic = metricValue(ctx.metrics, METRIC.roic);
    const wacc = metricValue(ctx.metrics, METRIC.wacc);
    if (roic === undefined || wacc === undefined) return NA_VERDICT;
    return roic >= wacc ? PASS : FAIL;
  },
};

const finalDecision: GateDefinition = {
  id: "final_decision",
  label: "Final Decision",
  hardness: "Hard",
  rule: "Base-case IRR ≥ hurdle IRR",
  metricRefs: [METRIC.baseIrr, METRIC.hurdleIrr],
  evaluate(ctx) {
    const irr = metricValue(ctx.metrics, METRIC.baseIrr);
    const hurdle = metricValue(ctx.metrics, METRIC.hurdleIrr);
    if (irr === undefined || hurdle === undefined) return NA_VERDICT;
    return irr >= hurdle ? PASS : FAIL;
  },
};

// ---------------------------------------------------------------------------
// Soft gates
// ---------------------------------------------------------------------------

const accountingSanity: GateDefinition = {
  id: "accounting_sanity",
  label: "Accounting Sanity",
  hardness: "Soft",
  rule: "|Accruals ratio| ≤ 5% passes; ≤ 15% soft-passes under monitoring",
  metricRefs: [METRIC.accrualsRatio],
  evaluate(ctx) {
    const accruals = metricValue(ctx.metrics, METRIC.accrualsRatio);
    if (accruals === undefined) return NA_VERDICT;
    const { sanityPassMaxAbsAccruals: passMax, sanitySoftMaxAbsAccruals: softMax } = ctx.policy;
    if (Math.abs(accruals) <= passMax) return PASS;
    if (Math.abs(accruals) > softMax) return FAIL;
    return softPass(
      ctx,
      `Accruals ratio must stay within ±${pct(softMax)}`,
      accruals > 0
        ? { metric: METRIC.accrualsRatio, comparison: "lte", threshold: softMax }
        : { metric: METRIC.accrualsRatio, comparison: "gte", threshold: -softMax },
    );
  },
};

const balanceSheetSurvival: GateDefinition = {
  id: "balance_sheet_survival",
  label: "Balance-sheet Survival",
  hardness: "Soft",
  rule: "Cash > 0 and TTM FCF > 0; cash alone soft-passes",
  metricRefs: [METRIC.cash, METRIC.ttmFcf],
  evaluate(ctx) {
    const cash = metricValue(ctx.metrics, METRIC.cash);
    const fcf = metricValue(ctx.metrics, METRIC.ttmFcf);
    if (cash === undefined) return NA_VERDICT;
    if (cash <= 0) return FAIL;
    if (fcf !== undefined && fcf > 0) return PASS;
    return softPass(ctx, "Cash must remain positive while free cash flow is not", {
      metric: METRIC.cash,
      comparison: "gt",
      threshold: 0,
    });
  },
};

const unitEconomics: GateDefinition = {
  id: "unit_economics",
  label: "Unit Economics",
  hardness: "Soft",
  rule: "Take rate > 10% or NRR ≥ 100%; take rate > 5% or NRR ≥ 90% soft-passes",
  metricRefs: [METRIC.takeRate, METRIC.nrr],
  evaluate(ctx) {
    const { minTakeRate, floorTakeRate, minNrr, floorNrr } = ctx.policy;
    const takeRate = metricValue(ctx.metrics, METRIC.takeRate);
    const nrr = metricValue(ctx.metrics, METRIC.nrr);
    if (takeRate === undefined && nrr === undefined) return NA_VERDICT;
    if ((takeRate !== undefined && takeRate > minTakeRate) || (nrr !== undefined && nrr >= minNrr)) return PASS;
    if (takeRate !== undefined && takeRate > floorTakeRate) {
      return softPass(ctx, `Take rate must stay above ${pct(floorTakeRate)}`, {
        metric: METRIC.takeRate,
        comparison: "gt",
        threshold: floorTakeRate,
      });
    }
    if (nrr !== undefined && nrr >= floorNrr) {
      return softPass(ctx, `Net revenue retention must stay at or above ${pct(floorNrr)}`, {
        metric: METRIC.nrr,
        comparison: "gte",
        threshold: floorNrr,
      });
    }
    return FAIL;
  },
};

function qualitativeGate(id: string, label: string, topic: EvidenceSpan["topic"]): GateDefinition {
  return {
    id,
    label,
    hardness: "Soft",
    rule: `Ranked ${topic} evidence from primary filings; soft-passes pending re-verification`,
    metricRefs: [],
    evaluate(ctx) {
      const evidence = ctx.evidence
        .filter((span) => span.topic === topic)
        .slice(0, ctx.policy.maxEvidenceSnippets)
        .map(({ documentId, quote, url }) => ({ documentId, quote, url }));
      if (evidence.length === 0) return NA_VERDICT;
      return {
        result: "Soft-Pass",
        flipTrigger: flipTrigger(ctx, `Re-verify ${label} evidence against the next filing`),
        evidence,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Table
// ---------------------------------------------------------------------------

export const GATE_TABLE: readonly GateDefinition[] = [
  circleOfCompetence,
  fraudControls,
  imminentSolvency,
  valuationQuality,
  finalDecision,
  accountingSanity,
  balanceSheetSurvival,
  unitEconomics,
  qualitativeGate("industry", "Industry", "industry"),
  qualitativeGate("moat", "Moat", "moat"),
  qualitativeGate("management", "Management", "management"),
];

export const HARD_GATES: readonly GateDefinition[] = GATE_TABLE.filter((g) => g.hardness === "Hard");
