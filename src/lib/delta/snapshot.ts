import { NA } from "@/lib/dossier/types";
import type { CompanyQuarter, Maybe, MetricSnapshot } from "@/lib/dossier/types";
import { line, netDebt, quarterFcf } from "@/lib/calculators/lines";
import { computeAccrualsRatio, computeGrossProfit } from "@/lib/calculators/ratios";

type Extractor = (q: CompanyQuarter) => number | undefined;

/** Owner earnings: CFO plus (negative) capex; CFO alone when capex is not reported. */
function ownerEarnings(q: CompanyQuarter): number | undefined {
  const cfo = line(q, "cashflow", "operatingCashFlow");
  if (cfo === undefined) return undefined;
  return cfo + (line(q, "cashflow", "capitalExpenditure") ?? 0);
}

/** Tracked metrics, in report order. */
export const TRACKED_METRICS: ReadonlyArray<readonly [string, Extractor]> = [
  ["Revenue", (q) => line(q, "income", "revenue")],
  ["Gross Profit", (q) => computeGrossProfit({ history: [q], current: q }).value],
  ["EBIT", (q) => line(q, "income", "operatingIncome")],
  ["CFO", (q) => line(q, "cashflow", "operatingCashFlow")],
  ["FCF", quarterFcf],
  ["Owner Earnings", ownerEarnings],
  ["Net Debt", netDebt],
  ["Accruals Ratio", (q) => computeAccrualsRatio({ history: [q], current: q }).value],
  ["Accounts Receivable", (q) => line(q, "balance", "accountsReceivable")],
  ["Inventory", (q) => line(q, "balance", "inventory")],
  ["Diluted Shares", (q) => line(q, "income", "dilutedShares")],
];

export function snapshotFromQuarter(quarter: CompanyQuarter): MetricSnapshot {
  const values: Record<string, Maybe<number>> = {};
  for (const [name, extract] of TRACKED_METRICS) {
    values[name] = extract(quarter) ?? NA;
  }
  return { period: quarter.period, values };
}
