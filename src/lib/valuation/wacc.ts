/**
 * Valuation Engine — Cost of Capital
 *
 * CAPM cost of equity, after-tax cost of debt, market-value weights.
 */

import type { ProvenancedInput, ProvenancedScalar, ValuationBlock } from "@/lib/dossier/types";
import { MAX_RISK_ADJUSTMENT_BPS, WACC_BAND } from "./policies";
import type { ValuationInputs } from "./types";

export function named(name: string, scalar: ProvenancedScalar): ProvenancedInput {
  return { name, value: scalar.value, provenance: { ...scalar.provenance } };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function deriveWacc(inputs: ValuationInputs): ValuationBlock["wacc"] {
  const riskAdjustmentBps = clamp(inputs.riskAdjustmentBps ?? 0, -MAX_RISK_ADJUSTMENT_BPS, MAX_RISK_ADJUSTMENT_BPS);
  const costOfEquity =
    inputs.riskFreeRate.value + inputs.beta.value * inputs.equityRiskPremium.value + riskAdjustmentBps / 10_000;
  const afterTaxCostOfDebt = inputs.preTaxCostOfDebt.value * (1 - inputs.taxRate.value);

  const equityValue = Math.max(inputs.equityMarketValue.value, 0);
  const debtValue = Math.max(inputs.debtMarketValue.value, 0);
  const total = equityValue + debtValue;
  const weights = total > 0 ? { equity: equityValue / total, debt: debtValue / total } : { equity: 1, debt: 0 };

  const point = weights.equity * costOfEquity + weights.debt * afterTaxCostOfDebt;

  return {
    point,
    band: { lower: Math.max(point - WACC_BAND, 0), upper: point + WACC_BAND },
    costOfEquity,
    afterTaxCostOfDebt,
    weights,
    riskAdjustmentBps,
    inputs: [
      named("riskFreeRate", inputs.riskFreeRate),
      named("equityRiskPremium", inputs.equityRiskPremium),
      named("beta", inputs.beta),
      named("preTaxCostOfDebt", inputs.preTaxCostOfDebt),
      named("taxRate", inputs.taxRate),
      named("equityMarketValue", inputs.equityMarketValue),
      named("debtMarketValue", inputs.debtMarketValue),
    ],
  };
}
