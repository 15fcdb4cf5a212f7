import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { loadDossierConfig, parseAllowlist } from "../server";

describe("loadDossierConfig", () => {
  it("applies defaults to an empty environment", () => {
    assert.deepEqual(loadDossierConfig({}), {
      dataDir: "data/runtime",
      baseCurrency: "USD",
      periodToleranceDays: 7,
      verifier: {
        sampleSize: 5,
        seed: 20240601,
        sourceAllowlist: ["sec.gov", "fred.stlouisfed.org", "treasury.gov"],
      },
      solver: { maxIterations: 200, epsilon: 1e-6, timeBudgetMs: 50 },
      flipTriggerHorizonDays: 90,
      analysisConcurrency: 4,
    });
  });

  it("coerces numeric overrides", () => {
    const config = loadDossierConfig({
      DOSSIER_VERIFIER_SAMPLE_SIZE: "12",
      DOSSIER_SOLVER_EPSILON: "0.0001",
      DOSSIER_PERIOD_TOLERANCE_DAYS: "0",
    });
    assert.equal(config.verifier.sampleSize, 12);
    assert.equal(config.solver.epsilon, 0.0001);
    assert.equal(config.periodToleranceDays, 0);
  });

  it("throws on an invalid value", (t) => {
    t.mock.method(console, "error", () => undefined);
    assert.throws(() => loadDossierConfig({ DOSSIER_BASE_CURRENCY: "usd" }), {
      message: "Invalid dossier environment variables (see logs).",
    });
  });
});

describe("parseAllowlist", () => {
  it("trims, lower-cases and drops empty hosts", () => {
    assert.deepEqual(parseAllowlist(" SEC.gov , ,example.com"), ["sec.gov", "example.com"]);
  });
});
