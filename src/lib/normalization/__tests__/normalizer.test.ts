import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { NormalizationError } from "@/lib/errors";
import { detectScale } from "../scale";
import { normalizeHistory, normalizeQuarter, normalizeQuarters } from "../normalizer";
import { isContiguous, previousQuarterKey, ttmKey, yearAgoQuarterKey } from "../periods";
import type { NormalizeOptions, RawQuarter } from "../types";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const OPTIONS: NormalizeOptions = { baseCurrency: "USD", toleranceDays: 7 };

const QUARTER_ENDS: Record<number, string> = { 1: "03-31", 2: "06-30", 3: "09-30", 4: "12-31" };

function rawQuarter(year: number, quarter: number, revenue: number, overrides: Partial<RawQuarter> = {}): RawQuarter {
  const end = `${year}-${QUARTER_ENDS[quarter]}`;
  return {
    ticker: "TEST",
    fiscalYear: year,
    fiscalQuarter: quarter,
    statements: {
      income: { periodEnd: end, scaleMarker: "(in millions, except per share data)", lines: { revenue, dilutedShares: 2_000 } },
      balance: { periodEnd: end, scaleMarker: "in millions", lines: { cash: 500 } },
      cashflow: { periodEnd: end, scaleMarker: "in millions", lines: { operatingCashFlow: 300, capitalExpenditure: -50 } },
    },
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Scale detection
// ---------------------------------------------------------------------------

describe("detectScale", () => {
  it("recognizes thousands, millions and billions markers", () => {
    assert.equal(detectScale("(in thousands)"), 1_000);
    assert.equal(detectScale("$ in 000s"), 1_000);
    assert.equal(detectScale("(in millions, except per share data)"), 1_000_000);
    assert.equal(detectScale("USD MM"), 1_000_000);
    assert.equal(detectScale("€ bn"), 1_000_000_000);
  });

  it("defaults to units when no marker is present", () => {
    assert.equal(detectScale(undefined), 1);
    assert.equal(detectScale("Consolidated Statements of Operations"), 1);
  });

  it("reads single-letter scales only next to a currency symbol", () => {
    assert.equal(detectScale("$B"), 1_000_000_000);
    assert.equal(detectScale("(€ m)"), 1_000_000);
    assert.equal(detectScale("(k)"), 1_000);
    assert.equal(detectScale("(in thousands, see Note B)"), 1_000);
    assert.equal(detectScale("Schedule M"), 1);
  });
});

// ---------------------------------------------------------------------------
// Single quarter
// ---------------------------------------------------------------------------

describe("normalizeQuarter", () => {
  it("rescales monetary lines and share counts to base units", () => {
    const q = normalizeQuarter(rawQuarter(2024, 2, 1_250), OPTIONS);
    assert.equal(q.period, "2024-Q2");
    assert.deepEqual(q.income.revenue, { value: 1_250_000_000, unit: "USD" });
    assert.deepEqual(q.income.dilutedShares, { value: 2_000_000_000, unit: "shares" });
    assert.deepEqual(q.cashflow.capitalExpenditure, { value: -50_000_000, unit: "USD" });
  });

  it("never rescales ratio lines and honors a line-level scale marker", () => {
    const raw = rawQuarter(2024, 2, 1_250, {
      kpis: { netRevenueRetention: 1.12, grossMerchandiseVolume: { value: 9.5, scaleMarker: "bn" } },
    });
    const q = normalizeQuarter(raw, OPTIONS);
    assert.deepEqual(q.kpis.netRevenueRetention, { value: 1.12, unit: "ratio" });
    assert.deepEqual(q.kpis.grossMerchandiseVolume, { value: 9_500_000_000, unit: "USD" });
  });

  it("converts foreign-currency statements with the supplied rate", () => {
    const raw = rawQuarter(2024, 2, 100, { currency: "EUR" });
    const q = normalizeQuarter(raw, { ...OPTIONS, fxRates: { EUR: 1.5 } });
    assert.deepEqual(q.income.revenue, { value: 150_000_000, unit: "USD" });
    assert.equal(q.currency, "USD");
  });

  it("rejects a currency with no rate", () => {
    const raw = rawQuarter(2024, 2, 100, { currency: "JPY" });
    assert.throws(
      () => normalizeQuarter(raw, OPTIONS),
      (err: unknown) => err instanceof NormalizationError && err.code === "UNKNOWN_CURRENCY",
    );
  });

  it("accepts statement period ends within tolerance", () => {
    const raw = rawQuarter(2024, 2, 100);
    raw.statements.cashflow = { ...raw.statements.cashflow, periodEnd: "2024-07-05" };
    assert.equal(normalizeQuarter(raw, OPTIONS).period, "2024-Q2");
  });

  it("raises NormalizationError when period ends diverge beyond tolerance", () => {
    const raw = rawQuarter(2024, 2, 100);
    raw.statements.balance = { ...raw.statements.balance, periodEnd: "2024-07-31" };
    assert.throws(
      () => normalizeQuarter(raw, OPTIONS),
      (err: unknown) =>
        err instanceof NormalizationError &&
        err.code === "PERIOD_MISALIGNED" &&
        err.message.includes("misaligned by 31 days"),
    );
  });

  it("does not mutate the raw extraction", () => {
    const raw = rawQuarter(2024, 2, 1_250);
    const before = JSON.stringify(raw);
    normalizeQuarter(raw, OPTIONS);
    assert.equal(JSON.stringify(raw), before);
  });
});

// ---------------------------------------------------------------------------
// TTM roll-up
// ---------------------------------------------------------------------------

describe("normalizeHistory", () => {
  it("sums the trailing four contiguous quarters", () => {
    const history = normalizeHistory(
      [rawQuarter(2024, 3, 130), rawQuarter(2024, 1, 110), rawQuarter(2024, 2, 120), rawQuarter(2023, 4, 100)],
      OPTIONS,
    );
    assert.deepEqual(
      history.map((q) => q.period),
      ["2023-Q4", "2024-Q1", "2024-Q2", "2024-Q3"],
    );
    const latest = history[3];
    assert.equal(latest.ttm.key, "TTM-2024Q3");
    assert.equal(latest.ttm.values.revenue, 460_000_000);
    assert.equal(latest.ttm.values.capitalExpenditure, -200_000_000);
  });

  it("marks TTM as NA when a quarter is missing rather than extrapolating", () => {
    const history = normalizeHistory(
      [rawQuarter(2023, 4, 100), rawQuarter(2024, 1, 110), rawQuarter(2024, 3, 130)],
      OPTIONS,
    );
    assert.equal(history[2].ttm.values.revenue, "NA");
  });

  it("marks a single line NA when one quarter in the window lacks it", () => {
    const gap = rawQuarter(2024, 1, 110);
    gap.statements.cashflow = { ...gap.statements.cashflow, lines: { operatingCashFlow: 300 } };
    const history = normalizeHistory(
      [rawQuarter(2023, 4, 100), gap, rawQuarter(2024, 2, 120), rawQuarter(2024, 3, 130)],
      OPTIONS,
    );
    assert.equal(history[3].ttm.values.revenue, 460_000_000);
    assert.equal(history[3].ttm.values.capitalExpenditure, "NA");
  });

  it("drops a misaligned historical quarter and reports it", () => {
    const skewed = rawQuarter(2024, 1, 110);
    skewed.statements.balance = { ...skewed.statements.balance, periodEnd: "2023-12-01" };
    const { quarters, dropped } = normalizeQuarters(
      [rawQuarter(2023, 4, 100), skewed, rawQuarter(2024, 2, 120), rawQuarter(2024, 3, 130)],
      OPTIONS,
    );

    assert.deepEqual(
      quarters.map((q) => q.period),
      ["2023-Q4", "2024-Q2", "2024-Q3"],
    );
    assert.deepEqual(dropped, [
      {
        period: "2024-Q1",
        code: "PERIOD_MISALIGNED",
        message:
          "2024-Q1: statement period ends misaligned by 121 days " +
          "(income 2024-03-31, balance 2023-12-01, cash flow 2024-03-31; tolerance 7)",
      },
    ]);
    assert.equal(quarters[2].ttm.values.revenue, "NA");
  });

  it("still fails when the latest quarter is misaligned", () => {
    const skewed = rawQuarter(2024, 3, 130);
    skewed.statements.cashflow = { ...skewed.statements.cashflow, periodEnd: "2024-08-01" };
    assert.throws(
      () => normalizeQuarters([rawQuarter(2024, 2, 120), skewed], OPTIONS),
      (err: unknown) => err instanceof NormalizationError && err.code === "PERIOD_MISALIGNED",
    );
  });

  it("rejects duplicate periods", () => {
    assert.throws(
      () => normalizeHistory([rawQuarter(2024, 1, 110), rawQuarter(2024, 1, 111)], OPTIONS),
      (err: unknown) => err instanceof NormalizationError && err.code === "INVALID_PERIOD",
    );
  });
});

// ---------------------------------------------------------------------------
// Period keys
// ---------------------------------------------------------------------------

describe("period keys", () => {
  it("walks quarters across year boundaries", () => {
    assert.equal(previousQuarterKey("2024-Q1"), "2023-Q4");
    assert.equal(yearAgoQuarterKey("2024-Q3"), "2023-Q3");
    assert.equal(ttmKey(2024, 1), "TTM-2024Q1");
  });

  it("detects gaps", () => {
    assert.equal(isContiguous(["2024-Q1", "2023-Q4", "2024-Q2"]), true);
    assert.equal(isContiguous(["2024-Q1", "2024-Q3"]), false);
  });
});
