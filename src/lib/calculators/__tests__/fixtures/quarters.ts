/**
 * Steady four-quarter company used across calculator and verifier tests.
 *
 * Every quarter (in millions): revenue 1,000, COGS 600, EBIT 200,
 * interest 25, net income 150, D&A 50, CFO 250, capex -50.
 * Latest balance sheet: cash 800, debt 200 + 1,800, equity 5,000,
 * total assets 10,000, AR 400, inventory 300, AP 240.
 */

import type { Provenance } from "@/lib/dossier/types";
import { normalizeHistory } from "@/lib/normalization/normalizer";
import type { RawQuarter } from "@/lib/normalization/types";

const QUARTER_ENDS: Record<number, string> = { 1: "03-31", 2: "06-30", 3: "09-30", 4: "12-31" };

export function steadyRawQuarter(year: number, quarter: number): RawQuarter {
  const end = `${year}-${QUARTER_ENDS[quarter]}`;
  return {
    ticker: "ACME",
    fiscalYear: year,
    fiscalQuarter: quarter,
    statements: {
      income: {
        periodEnd: end,
        scaleMarker: "(in millions, except per share data)",
        lines: {
          revenue: 1_000,
          costOfRevenue: 600,
          operatingIncome: 200,
          interestExpense: 25,
          netIncome: 150,
          depreciationAmortization: 50,
          dilutedShares: 500,
        },
      },
      balance: {
        periodEnd: end,
        scaleMarker: "(in millions)",
        lines: {
          cash: 800,
          accountsReceivable: 400,
          inventory: 300,
          accountsPayable: 240,
          totalAssets: 10_000,
          shortTermDebt: 200,
          longTermDebt: 1_800,
          totalEquity: 5_000,
          debtDueWithin24m: 500,
        },
      },
      cashflow: {
        periodEnd: end,
        scaleMarker: "(in millions)",
        lines: { operatingCashFlow: 250, capitalExpenditure: -50 },
      },
    },
    segments: {
      Cloud: { revenue: 600, operatingIncome: 150 },
      Devices: { revenue: 400, operatingIncome: 50 },
    },
    footnotes: { scaleMarker: "(in millions)", debtDueWithin12m: 200, debtDue12to24m: 300 },
  };
}

export const STEADY_RAW: RawQuarter[] = [
  steadyRawQuarter(2024, 1),
  steadyRawQuarter(2024, 2),
  steadyRawQuarter(2024, 3),
  steadyRawQuarter(2024, 4),
];

export const STEADY_HISTORY = normalizeHistory(STEADY_RAW, { baseCurrency: "USD", toleranceDays: 7 });

export const TEN_K_CITATION: Provenance = {
  documentId: "doc-10k-2024",
  pageOrSection: "Item 8",
  quote: "Total revenue was $1,000 million",
  url: "https://www.sec.gov/Archives/acme-10k-2024.htm",
};

/** Cites every line the registry can fall back to. */
export const FULL_CITATIONS: Record<string, Provenance> = Object.fromEntries(
  [
    "income.revenue",
    "income.operatingIncome",
    "income.interestExpense",
    "income.netIncome",
    "income.dilutedShares",
    "cashflow.operatingCashFlow",
    "balance.cash",
    "balance.longTermDebt",
    "balance.totalEquity",
    "balance.accountsReceivable",
    "balance.inventory",
    "balance.accountsPayable",
    "balance.debtDueWithin24m",
    "kpis.grossMerchandiseVolume",
    "segments",
    "segments.Cloud.revenue",
    "segments.Devices.revenue",
  ].map((key) => [key, TEN_K_CITATION]),
);
