/**
 * Calculators — Derived Ratios
 *
 * Deterministic ratios over the current quarter and its TTM roll-up.
 * Every function returns a MetricResult with inputs, formula, and diagnostics.
 */

import { parseQuarterKey, shiftQuarterKey } from "@/lib/normalization/periods";
import { buildDiagnostics, mapResult, safeDivide, safeSum } from "./explain";
import { line, netDebt, totalDebt, ttm, ttmEbitda, ttmFcf } from "./lines";
import type { CalculatorContext, MetricResult } from "./types";

/** Statutory rate used for NOPAT in ROIC. */
export const NOPAT_TAX_RATE = 0.21;
const DAYS_PER_YEAR = 365;

function absOrUndefined(v: number | undefined): number | undefined {
  return v === undefined ? undefined : Math.abs(v);
}

// ---------------------------------------------------------------------------
// Leverage & coverage
// ---------------------------------------------------------------------------

export function computeNetDebt({ current }: CalculatorContext): MetricResult {
  const debt = totalDebt(current);
  const cash = line(current, "balance", "cash");
  const inputs = { totalDebt: debt, cash };
  const value = netDebt(current);
  return value === undefined
    ? { value, inputs, formula: "TotalDebt - Cash", diagnostics: buildDiagnostics(inputs) }
    : { value, inputs, formula: "TotalDebt - Cash" };
}

export function computeNetLeverage({ current }: CalculatorContext): MetricResult {
  const nd = netDebt(current);
  const ebitda = ttmEbitda(current);
  return safeDivide("netDebt", nd, "ttmEbitda", ebitda, { netDebt: nd, ttmEbitda: ebitda }, "NetDebt / TTM EBITDA");
}

export function computeEbitInterest({ current }: CalculatorContext): MetricResult {
  const ebit = ttm(current, "operatingIncome");
  const interest = absOrUndefined(ttm(current, "interestExpense"));
  return safeDivide("ttmEbit", ebit, "ttmInterest", interest, { ttmEbit: ebit, ttmInterest: interest }, "TTM EBIT / |TTM Interest|");
}

export function computeFcfInterest({ current }: CalculatorContext): MetricResult {
  const fcf = ttmFcf(current);
  const interest = absOrUndefined(ttm(current, "interestExpense"));
  return safeDivide("ttmFcf", fcf, "ttmInterest", interest, { ttmFcf: fcf, ttmInterest: interest }, "TTM FCF / |TTM Interest|");
}

// ---------------------------------------------------------------------------
// Quality & returns
// ---------------------------------------------------------------------------

export function computeAccrualsRatio({ current }: CalculatorContext): MetricResult {
  const netIncome = ttm(current, "netIncome");
  const cfo = ttm(current, "operatingCashFlow");
  const totalAssets = line(current, "balance", "totalAssets");
  const inputs = { ttmNetIncome: netIncome, ttmCfo: cfo, totalAssets };
  const formula = "(TTM NetIncome - TTM CFO) / TotalAssets";
  const accruals = netIncome === undefined || cfo === undefined ? undefined : netIncome - cfo;
  return safeDivide("accruals", accruals, "totalAssets", totalAssets, inputs, formula);
}

export function computeRoic({ current }: CalculatorContext): MetricResult {
  const ebit = ttm(current, "operatingIncome");
  const equity = line(current, "balance", "totalEquity");
  const debt = totalDebt(current);
  const cash = line(current, "balance", "cash");
  const inputs = { ttmEbit: ebit, totalEquity: equity, totalDebt: debt, cash };
  const formula = `TTM EBIT × (1 - ${NOPAT_TAX_RATE}) / (Equity + Debt - Cash)`;

  const { value: capital, missing } = safeSum({ totalEquity: equity, totalDebt: debt, negCash: cash === undefined ? undefined : -cash });
  if (capital === undefined) {
    return { value: undefined, inputs, formula, diagnostics: { missingInputs: missing } };
  }
  const nopat = ebit === undefined ? undefined : ebit * (1 - NOPAT_TAX_RATE);
  return safeDivide("nopat", nopat, "investedCapital", capital, { ...inputs, investedCapital: capital }, formula);
}

export function computeOperatingMargin({ current }: CalculatorContext): MetricResult {
  const ebit = line(current, "income", "operatingIncome");
  const revenue = line(current, "income", "revenue");
  return safeDivide("ebit", ebit, "revenue", revenue, { ebit, revenue }, "EBIT / Revenue");
}

export function computeGrossProfit({ current }: CalculatorContext): MetricResult {
  const reportedGp = line(current, "income", "grossProfit");
  if (reportedGp !== undefined) {
    return { value: reportedGp, inputs: { grossProfit: reportedGp }, formula: "income.grossProfit" };
  }
  const revenue = line(current, "income", "revenue");
  const cogs = line(current, "income", "costOfRevenue");
  const inputs = { revenue, costOfRevenue: cogs };
  const { value, missing } = safeSum({ revenue, negCostOfRevenue: cogs === undefined ? undefined : -cogs });
  return value === undefined
    ? { value, inputs, formula: "Revenue - CostOfRevenue", diagnostics: { missingInputs: missing } }
    : { value, inputs, formula: "Revenue - CostOfRevenue" };
}

// ---------------------------------------------------------------------------
// Working capital
// ---------------------------------------------------------------------------

export function computeDso({ current }: CalculatorContext): MetricResult {
  const ar = line(current, "balance", "accountsReceivable");
  const revenue = ttm(current, "revenue");
  const ratio = safeDivide("accountsReceivable", ar, "ttmRevenue", revenue, { accountsReceivable: ar, ttmRevenue: revenue }, "");
  return mapResult(ratio, "AR / TTM Revenue × 365", (v) => v * DAYS_PER_YEAR);
}

export function computeDih({ current }: CalculatorContext): MetricResult {
  const inventory = line(current, "balance", "inventory");
  const cogs = ttm(current, "costOfRevenue");
  const ratio = safeDivide("inventory", inventory, "ttmCostOfRevenue", cogs, { inventory, ttmCostOfRevenue: cogs }, "");
  return mapResult(ratio, "Inventory / TTM COGS × 365", (v) => v * DAYS_PER_YEAR);
}

export function computeDpo({ current }: CalculatorContext): MetricResult {
  const ap = line(current, "balance", "accountsPayable");
  const cogs = ttm(current, "costOfRevenue");
  const ratio = safeDivide("accountsPayable", ap, "ttmCostOfRevenue", cogs, { accountsPayable: ap, ttmCostOfRevenue: cogs }, "");
  return mapResult(ratio, "AP / TTM COGS × 365", (v) => v * DAYS_PER_YEAR);
}

export function computeCcc(ctx: CalculatorContext): MetricResult {
  const dso = computeDso(ctx).value;
  const dih = computeDih(ctx).value;
  const dpo = computeDpo(ctx).value;
  const inputs = { dso, dih, dpo };
  const { value, missing } = safeSum({ dso, dih, negDpo: dpo === undefined ? undefined : -dpo });
  return value === undefined
    ? { value, inputs, formula: "DSO + DIH - DPO", diagnostics: { missingInputs: missing } }
    : { value, inputs, formula: "DSO + DIH - DPO" };
}

// ---------------------------------------------------------------------------
// Business-model metrics
// ---------------------------------------------------------------------------

export function computeTakeRate({ current }: CalculatorContext): MetricResult {
  const revenue = line(current, "income", "revenue");
  const gmv = line(current, "kpis", "grossMerchandiseVolume");
  return safeDivide("revenue", revenue, "grossMerchandiseVolume", gmv, { revenue, grossMerchandiseVolume: gmv }, "Revenue / GMV");
}

// ---------------------------------------------------------------------------
// Disclosure history
// ---------------------------------------------------------------------------

/** Consecutive quarters, ending at the current one, that disclose a segment table. */
export function computeSegmentDisclosureQuarters({ history, current }: CalculatorContext): MetricResult {
  const byPeriod = new Map(history.map((q) => [q.period, q]));
  let count = 0;
  let key: string | undefined = current.period;
  while (key !== undefined && parseQuarterKey(key)) {
    const q = byPeriod.get(key);
    if (!q || Object.keys(q.segments).length === 0) break;
    count++;
    key = shiftQuarterKey(key, -1);
  }
  return { value: count, inputs: { quartersAvailable: history.length }, formula: "consecutive quarters with segment table" };
}

export function computeSegmentMargin(segment: string, { current }: CalculatorContext): MetricResult {
  const lines = current.segments[segment];
  const income = lines?.operatingIncome?.value;
  const revenue = lines?.revenue?.value;
  return safeDivide(
    "segmentOperatingIncome",
    income,
    "segmentRevenue",
    revenue,
    { segmentOperatingIncome: income, segmentRevenue: revenue },
    "Segment OperatingIncome / Segment Reported Revenue",
  );
}
