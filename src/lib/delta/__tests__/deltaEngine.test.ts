import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { MetricSnapshot } from "@/lib/dossier/types";
import { STEADY_HISTORY } from "@/lib/calculators/__tests__/fixtures/quarters";
import { computeDeltas, mergeSnapshot, snapshotFromQuarter } from "../index";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const Q1_2024: MetricSnapshot = { period: "2024-Q1", values: { Revenue: 100, Margin: 0 } };
const Q4_2024: MetricSnapshot = { period: "2024-Q4", values: { Revenue: 120, Margin: 0 } };
const Q1_2025: MetricSnapshot = { period: "2025-Q1", values: { Revenue: 150, Margin: 5, New: "NA" } };

// ---------------------------------------------------------------------------
// Snapshots
// ---------------------------------------------------------------------------

describe("snapshotFromQuarter", () => {
  it("extracts the tracked metrics from a normalized quarter", () => {
    assert.deepEqual(snapshotFromQuarter(STEADY_HISTORY[3]), {
      period: "2024-Q4",
      values: {
        Revenue: 1_000_000_000,
        "Gross Profit": 400_000_000,
        EBIT: 200_000_000,
        CFO: 250_000_000,
        FCF: 200_000_000,
        "Owner Earnings": 200_000_000,
        "Net Debt": 1_200_000_000,
        "Accruals Ratio": -0.04,
        "Accounts Receivable": 400_000_000,
        Inventory: 300_000_000,
        "Diluted Shares": 500_000_000,
      },
    });
  });

  it("records NA where the trailing year is incomplete", () => {
    assert.equal(snapshotFromQuarter(STEADY_HISTORY[0]).values["Accruals Ratio"], "NA");
  });
});

// ---------------------------------------------------------------------------
// Deltas
// ---------------------------------------------------------------------------

describe("computeDeltas", () => {
  it("compares against the prior quarter and the same quarter a year earlier", () => {
    const deltas = computeDeltas([Q1_2024, Q4_2024, Q1_2025]);
    assert.deepEqual(deltas.Revenue, {
      metric: "Revenue",
      current: 150,
      qoq: { absolute: 30, percent: 0.25 },
      yoy: { absolute: 50, percent: 0.5 },
    });
  });

  it("returns NA percent on a zero base", () => {
    const deltas = computeDeltas([Q1_2024, Q4_2024, Q1_2025]);
    assert.deepEqual(deltas.Margin.qoq, { absolute: 5, percent: "NA" });
    assert.deepEqual(deltas.Margin.yoy, { absolute: 5, percent: "NA" });
  });

  it("returns NA when the current value or a comparison period is missing", () => {
    assert.deepEqual(computeDeltas([Q1_2024, Q4_2024, Q1_2025]).New, {
      metric: "New",
      current: "NA",
      qoq: { absolute: "NA", percent: "NA" },
      yoy: { absolute: "NA", percent: "NA" },
    });

    const gap = computeDeltas([{ period: "2024-Q2", values: { Revenue: 90 } }, Q4_2024]);
    assert.deepEqual(gap.Revenue.qoq, { absolute: "NA", percent: "NA" });
    assert.deepEqual(gap.Revenue.yoy, { absolute: "NA", percent: "NA" });
  });

  it("measures percent change against the magnitude of a negative base", () => {
    const deltas = computeDeltas([
      { period: "2024-Q3", values: { FCF: -100 } },
      { period: "2024-Q4", values: { FCF: -50 } },
    ]);
    assert.deepEqual(deltas.FCF.qoq, { absolute: 50, percent: 0.5 });
  });

  it("is idempotent and independent of input order", () => {
    const a = JSON.stringify(computeDeltas([Q1_2024, Q4_2024, Q1_2025]));
    const b = JSON.stringify(computeDeltas([Q1_2025, Q1_2024, Q4_2024]));
    assert.equal(a, b);
    assert.deepEqual(Object.keys(JSON.parse(a)), ["Margin", "New", "Revenue"]);
  });

  it("returns an empty map for an empty history", () => {
    assert.deepEqual(computeDeltas([]), {});
  });
});

describe("mergeSnapshot", () => {
  it("replaces a repeated period and keeps quarter order", () => {
    const restated: MetricSnapshot = { period: "2024-Q4", values: { Revenue: 125 } };
    assert.deepEqual(mergeSnapshot([Q4_2024, Q1_2024], restated), [Q1_2024, restated]);
  });
});
