/**
 * Calculators — registry, ratios and provenance attachment
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { Metric } from "@/lib/dossier/types";
import { normalizeHistory } from "@/lib/normalization/normalizer";
import { buildMetrics, contextFromHistory } from "../buildMetrics";
import { safeDivide, safeSum } from "../explain";
import { CALCULATOR_REGISTRY, calculatorsFor, findCalculator, METRIC } from "../registry";
import type { CalculatorContext } from "../types";
import { FULL_CITATIONS, STEADY_HISTORY, STEADY_RAW, TEN_K_CITATION } from "./fixtures/quarters";

function approx(actual: number | undefined, expected: number, tol = 1e-9): void {
  assert.ok(actual !== undefined, "expected a value");
  assert.ok(Math.abs(actual - expected) < tol, `expected ${expected}, got ${actual}`);
}

function ctx(): CalculatorContext {
  const c = contextFromHistory(STEADY_HISTORY);
  assert.ok(c);
  return c;
}

function compute(name: string, c: CalculatorContext = ctx()) {
  const def = findCalculator(name, c);
  assert.ok(def, `calculator ${name} registered`);
  return def.compute(c);
}

function metricByName(metrics: Metric[], name: string): Metric | undefined {
  return metrics.find((m) => m.name === name);
}

// ---------------------------------------------------------------------------
// Explainability helpers
// ---------------------------------------------------------------------------

describe("safeDivide / safeSum", () => {
  it("reports missing inputs instead of coercing to zero", () => {
    const r = safeDivide("a", undefined, "b", 2, { a: undefined, b: 2 }, "A / B");
    assert.equal(r.value, undefined);
    assert.deepEqual(r.diagnostics, { missingInputs: ["a"] });
  });

  it("flags division by zero", () => {
    const r = safeDivide("a", 1, "b", 0, { a: 1, b: 0 }, "A / B");
    assert.equal(r.value, undefined);
    assert.deepEqual(r.diagnostics, { divideByZero: true });
  });

  it("sums only when every component is present", () => {
    assert.deepEqual(safeSum({ a: 1, b: 2 }), { value: 3, missing: [] });
    assert.deepEqual(safeSum({ a: 1, b: undefined }), { value: undefined, missing: ["b"] });
  });
});

// ---------------------------------------------------------------------------
// Ratios
// ---------------------------------------------------------------------------

describe("registered calculators", () => {
  it("has unique names", () => {
    const names = CALCULATOR_REGISTRY.map((d) => d.name);
    assert.equal(new Set(names).size, names.length);
  });

  it("reads reported lines and TTM roll-ups", () => {
    assert.equal(compute(METRIC.revenue).value, 1_000_000_000);
    assert.equal(compute(METRIC.grossProfit).value, 400_000_000);
    assert.equal(compute(METRIC.ttmRevenue).value, 4_000_000_000);
    assert.equal(compute(METRIC.ttmFcf).value, 800_000_000);
    assert.equal(compute(METRIC.ebitda).value, 1_000_000_000);
  });

  it("computes leverage and coverage on TTM flows", () => {
    assert.equal(compute(METRIC.netDebt).value, 1_200_000_000);
    approx(compute(METRIC.netLeverage).value, 1.2);
    approx(compute(METRIC.ebitInterest).value, 8);
    approx(compute(METRIC.fcfInterest).value, 8);
  });

  it("computes quality and return ratios", () => {
    approx(compute(METRIC.accrualsRatio).value, -0.04);
    approx(compute(METRIC.roic).value, 632 / 6_200);
    approx(compute(METRIC.operatingMargin).value, 0.2);
  });

  it("computes working-capital days", () => {
    approx(compute(METRIC.dso).value, 36.5);
    approx(compute(METRIC.dih).value, 45.625);
    approx(compute(METRIC.dpo).value, 36.5);
    approx(compute(METRIC.ccc).value, 45.625);
  });

  it("counts consecutive quarters of segment disclosure", () => {
    assert.equal(compute(METRIC.segmentQuarters).value, 4);

    const raws = STEADY_RAW.map((r) => ({ ...r }));
    raws[1] = { ...raws[1], segments: {} };
    const broken = contextFromHistory(normalizeHistory(raws, { baseCurrency: "USD", toleranceDays: 7 }));
    assert.ok(broken);
    assert.equal(compute(METRIC.segmentQuarters, broken).value, 2);
  });

  it("returns NA-able results with diagnostics when inputs are absent", () => {
    const r = compute(METRIC.takeRate);
    assert.equal(r.value, undefined);
    assert.deepEqual(r.diagnostics, { missingInputs: ["grossMerchandiseVolume"] });
  });

  it("generates one reported-basis margin per segment", () => {
    approx(compute("Segment Margin: Cloud").value, 0.25);
    approx(compute("Segment Margin: Devices").value, 0.125);
  });

  it("only offers subscription metrics to subscription businesses", () => {
    const names = calculatorsFor(ctx()).map((d) => d.name);
    assert.equal(names.includes(METRIC.nrr), false);

    const sub = calculatorsFor({ ...ctx(), businessModel: "subscription" }).map((d) => d.name);
    assert.equal(sub.includes(METRIC.nrr), true);
  });
});

// ---------------------------------------------------------------------------
// Metric builder
// ---------------------------------------------------------------------------

describe("buildMetrics", () => {
  it("attaches provenance, unit and period to every metric", () => {
    const { metrics, issues } = buildMetrics(ctx(), FULL_CITATIONS);
    assert.deepEqual(issues, []);

    const revenue = metricByName(metrics, METRIC.revenue);
    assert.ok(revenue);
    assert.equal(revenue.value, 1_000_000_000);
    assert.equal(revenue.unit, "USD");
    assert.equal(revenue.period, "2024-Q4");
    assert.deepEqual(revenue.provenance, TEN_K_CITATION);

    const leverage = metricByName(metrics, METRIC.netLeverage);
    assert.equal(leverage?.period, "TTM-2024Q4");
    assert.equal(leverage?.unit, "ratio");

    const margin = metricByName(metrics, "Segment Margin: Cloud");
    assert.equal(margin?.basis, "reported");
  });

  it("emits NA when inputs are missing but a citation exists", () => {
    const { metrics } = buildMetrics(ctx(), FULL_CITATIONS);
    assert.equal(metricByName(metrics, METRIC.takeRate)?.value, "NA");
  });

  it("withholds uncited numbers and reports them as provenance issues", () => {
    const { metrics, issues } = buildMetrics(ctx(), { "income.revenue": TEN_K_CITATION });
    assert.ok(metricByName(metrics, METRIC.revenue));
    assert.ok(metricByName(metrics, METRIC.grossProfit));
    assert.equal(metricByName(metrics, METRIC.dso), undefined);
    assert.ok(issues.some((i) => i.metric === METRIC.dso && i.reason === "missing citation"));
    assert.equal(issues.some((i) => i.metric === METRIC.takeRate), false);
  });
});
