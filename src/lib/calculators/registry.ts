/**
 * Calculators — Registry
 *
 * Explicit ordered table of every calculator. Order is the emission order
 * of metrics in the report; the Verifier looks calculators up by name here.
 */

import { reported } from "./explain";
import { line, quarterFcf, ttm, ttmEbitda, ttmFcf } from "./lines";
import {
  computeAccrualsRatio,
  computeCcc,
  computeDih,
  computeDpo,
  computeDso,
  computeEbitInterest,
  computeFcfInterest,
  computeGrossProfit,
  computeNetDebt,
  computeNetLeverage,
  computeOperatingMargin,
  computeRoic,
  computeSegmentDisclosureQuarters,
  computeSegmentMargin,
  computeTakeRate,
} from "./ratios";
import type { CalculatorContext, CalculatorDefinition } from "./types";

export const METRIC = {
  revenue: "Revenue",
  grossProfit: "Gross Profit",
  ebit: "EBIT",
  fcf: "FCF",
  ttmRevenue: "TTM Revenue",
  ttmEbit: "TTM EBIT",
  ttmFcf: "TTM FCF",
  ebitda: "EBITDA",
  interestExpense: "Interest Expense",
  cash: "Cash",
  netDebt: "Net Debt",
  netLeverage: "Net Debt / EBITDA",
  ebitInterest: "EBIT / Interest",
  fcfInterest: "FCF / Interest",
  accrualsRatio: "Accruals Ratio",
  roic: "ROIC",
  operatingMargin: "Operating Margin",
  dso: "DSO",
  dih: "DIH",
  dpo: "DPO",
  ccc: "CCC",
  takeRate: "Take Rate",
  nrr: "NRR",
  grr: "GRR",
  dilutedShares: "Diluted Shares",
  debtDue24m: "Debt Due 24M",
  segmentQuarters: "Segment Disclosure Quarters",
  wacc: "WACC",
  terminalGrowth: "Terminal Growth",
  hurdleIrr: "Hurdle IRR",
  baseIrr: "Base IRR",
} as const;

export const SEGMENT_MARGIN_PREFIX = "Segment Margin: ";

export const SUBSCRIPTION_METRICS: readonly string[] = [METRIC.nrr, METRIC.grr];

export const CALCULATOR_REGISTRY: readonly CalculatorDefinition[] = [
  {
    name: METRIC.revenue,
    unit: "currency",
    scope: "quarter",
    category: "reported",
    citeFrom: ["income.revenue"],
    compute: ({ current }) => reported("revenue", line(current, "income", "revenue"), "income.revenue"),
  },
  {
    name: METRIC.grossProfit,
    unit: "currency",
    scope: "quarter",
    category: "derived",
    citeFrom: ["income.grossProfit", "income.revenue"],
    compute: computeGrossProfit,
  },
  {
    name: METRIC.ebit,
    unit: "currency",
    scope: "quarter",
    category: "reported",
    citeFrom: ["income.operatingIncome"],
    compute: ({ current }) => reported("operatingIncome", line(current, "income", "operatingIncome"), "income.operatingIncome"),
  },
  {
    name: METRIC.fcf,
    unit: "currency",
    scope: "quarter",
    category: "derived",
    citeFrom: ["cashflow.freeCashFlow", "cashflow.operatingCashFlow"],
    compute: ({ current }) => reported("fcf", quarterFcf(current), "FreeCashFlow | CFO + CapEx"),
  },
  {
    name: METRIC.ttmRevenue,
    unit: "currency",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.revenue"],
    compute: ({ current }) => reported("ttmRevenue", ttm(current, "revenue"), "Σ4Q Revenue"),
  },
  {
    name: METRIC.ttmEbit,
    unit: "currency",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.operatingIncome"],
    compute: ({ current }) => reported("ttmEbit", ttm(current, "operatingIncome"), "Σ4Q EBIT"),
  },
  {
    name: METRIC.ttmFcf,
    unit: "currency",
    scope: "ttm",
    category: "derived",
    citeFrom: ["cashflow.freeCashFlow", "cashflow.operatingCashFlow"],
    compute: ({ current }) => reported("ttmFcf", ttmFcf(current), "Σ4Q FreeCashFlow | Σ4Q (CFO + CapEx)"),
  },
  {
    name: METRIC.ebitda,
    unit: "currency",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.operatingIncome"],
    compute: ({ current }) => reported("ttmEbitda", ttmEbitda(current), "Σ4Q (EBIT + D&A)"),
  },
  {
    name: METRIC.interestExpense,
    unit: "currency",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.interestExpense"],
    compute: ({ current }) => reported("ttmInterest", ttm(current, "interestExpense"), "Σ4Q InterestExpense"),
  },
  {
    name: METRIC.cash,
    unit: "currency",
    scope: "quarter",
    category: "reported",
    citeFrom: ["balance.cash"],
    compute: ({ current }) => reported("cash", line(current, "balance", "cash"), "balance.cash"),
  },
  {
    name: METRIC.netDebt,
    unit: "currency",
    scope: "quarter",
    category: "derived",
    citeFrom: ["balance.totalDebt", "balance.longTermDebt", "balance.cash"],
    compute: computeNetDebt,
  },
  {
    name: METRIC.netLeverage,
    unit: "ratio",
    scope: "ttm",
    category: "derived",
    citeFrom: ["balance.totalDebt", "balance.longTermDebt", "income.operatingIncome"],
    compute: computeNetLeverage,
  },
  {
    name: METRIC.ebitInterest,
    unit: "ratio",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.interestExpense", "income.operatingIncome"],
    compute: computeEbitInterest,
  },
  {
    name: METRIC.fcfInterest,
    unit: "ratio",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.interestExpense", "cashflow.operatingCashFlow"],
    compute: computeFcfInterest,
  },
  {
    name: METRIC.accrualsRatio,
    unit: "ratio",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.netIncome", "cashflow.operatingCashFlow"],
    compute: computeAccrualsRatio,
  },
  {
    name: METRIC.roic,
    unit: "ratio",
    scope: "ttm",
    category: "derived",
    citeFrom: ["income.operatingIncome", "balance.totalEquity"],
    compute: computeRoic,
  },
  {
    name: METRIC.operatingMargin,
    unit: "ratio",
    scope: "quarter",
    category: "derived",
    citeFrom: ["income.operatingIncome", "income.revenue"],
    compute: computeOperatingMargin,
  },
  { name: METRIC.dso, unit: "days", scope: "ttm", category: "derived", citeFrom: ["balance.accountsReceivable"], compute: computeDso },
  { name: METRIC.dih, unit: "days", scope: "ttm", category: "derived", citeFrom: ["balance.inventory"], compute: computeDih },
  { name: METRIC.dpo, unit: "days", scope: "ttm", category: "derived", citeFrom: ["balance.accountsPayable"], compute: computeDpo },
  {
    name: METRIC.ccc,
    unit: "days",
    scope: "ttm",
    category: "derived",
    citeFrom: ["balance.accountsReceivable", "balance.inventory"],
    compute: computeCcc,
  },
  {
    name: METRIC.takeRate,
    unit: "ratio",
    scope: "quarter",
    category: "derived",
    citeFrom: ["kpis.grossMerchandiseVolume"],
    compute: computeTakeRate,
  },
  {
    name: METRIC.nrr,
    unit: "ratio",
    scope: "quarter",
    category: "reported",
    subscriptionOnly: true,
    citeFrom: ["kpis.netRevenueRetention"],
    compute: ({ current }) => reported("netRevenueRetention", line(current, "kpis", "netRevenueRetention"), "kpis.netRevenueRetention"),
  },
  {
    name: METRIC.grr,
    unit: "ratio",
    scope: "quarter",
    category: "reported",
    subscriptionOnly: true,
    citeFrom: ["kpis.grossRevenueRetention"],
    compute: ({ current }) =>
      reported("grossRevenueRetention", line(current, "kpis", "grossRevenueRetention"), "kpis.grossRevenueRetention"),
  },
  {
    name: METRIC.dilutedShares,
    unit: "shares",
    scope: "quarter",
    category: "reported",
    citeFrom: ["income.dilutedShares"],
    compute: ({ current }) => reported("dilutedShares", line(current, "income", "dilutedShares"), "income.dilutedShares"),
  },
  {
    name: METRIC.debtDue24m,
    unit: "currency",
    scope: "quarter",
    category: "reported",
    citeFrom: ["balance.debtDueWithin24m"],
    compute: ({ current }) => reported("debtDueWithin24m", line(current, "balance", "debtDueWithin24m"), "balance.debtDueWithin24m"),
  },
  {
    name: METRIC.segmentQuarters,
    unit: "count",
    scope: "quarter",
    category: "derived",
    citeFrom: ["segments"],
    compute: computeSegmentDisclosureQuarters,
  },
];

/** Per-segment margin calculators for the segments of the current quarter, sorted by name. */
export function segmentMarginDefinitions(ctx: CalculatorContext): CalculatorDefinition[] {
  return Object.keys(ctx.current.segments)
    .sort()
    .map((segment) => ({
      name: `${SEGMENT_MARGIN_PREFIX}${segment}`,
      unit: "ratio" as const,
      scope: "quarter" as const,
      category: "derived" as const,
      basis: "reported" as const,
      citeFrom: [`segments.${segment}.revenue`, `segments.${segment}.operatingIncome`],
      compute: (c: CalculatorContext) => computeSegmentMargin(segment, c),
    }));
}

export function calculatorsFor(ctx: CalculatorContext): CalculatorDefinition[] {
  return [...CALCULATOR_REGISTRY, ...segmentMarginDefinitions(ctx)].filter(
    (def) => !def.subscriptionOnly || ctx.businessModel === "subscription",
  );
}

export function findCalculator(name: string, ctx: CalculatorContext): CalculatorDefinition | undefined {
  return [...CALCULATOR_REGISTRY, ...segmentMarginDefinitions(ctx)].find((def) => def.name === name);
}
