/**
 * Calculators — Line Accessors
 *
 * Typed reads from a normalized quarter. NA and absent lines both read
 * as undefined so they flow into safeDivide/safeSum diagnostics.
 */

import { isNA } from "@/lib/dossier/types";
import type { CompanyQuarter } from "@/lib/dossier/types";

type Statement = "income" | "balance" | "cashflow" | "kpis";

export function line(q: CompanyQuarter, statement: Statement, name: string): number | undefined {
  return q[statement][name]?.value;
}

export function ttm(q: CompanyQuarter, name: string): number | undefined {
  const v = q.ttm.values[name];
  return v === undefined || isNA(v) ? undefined : v;
}

/** Reported free cash flow, else operating cash flow plus (negative) capex. */
export function quarterFcf(q: CompanyQuarter): number | undefined {
  const reportedFcf = line(q, "cashflow", "freeCashFlow");
  if (reportedFcf !== undefined) return reportedFcf;
  const cfo = line(q, "cashflow", "operatingCashFlow");
  const capex = line(q, "cashflow", "capitalExpenditure");
  return cfo === undefined || capex === undefined ? undefined : cfo + capex;
}

export function ttmFcf(q: CompanyQuarter): number | undefined {
  const reportedFcf = ttm(q, "freeCashFlow");
  if (reportedFcf !== undefined) return reportedFcf;
  const cfo = ttm(q, "operatingCashFlow");
  const capex = ttm(q, "capitalExpenditure");
  return cfo === undefined || capex === undefined ? undefined : cfo + capex;
}

/** Reported total debt, else short-term plus long-term debt. */
export function totalDebt(q: CompanyQuarter): number | undefined {
  const total = line(q, "balance", "totalDebt");
  if (total !== undefined) return total;
  const st = line(q, "balance", "shortTermDebt");
  const lt = line(q, "balance", "longTermDebt");
  return st === undefined || lt === undefined ? undefined : st + lt;
}

export function netDebt(q: CompanyQuarter): number | undefined {
  const debt = totalDebt(q);
  const cash = line(q, "balance", "cash");
  return debt === undefined || cash === undefined ? undefined : debt - cash;
}

export function ttmEbitda(q: CompanyQuarter): number | undefined {
  const ebit = ttm(q, "operatingIncome");
  const da = ttm(q, "depreciationAmortization");
  return ebit === undefined || da === undefined ? undefined : ebit + da;
}
