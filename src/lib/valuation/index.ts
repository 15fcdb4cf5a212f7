/**
 * Valuation Engine — Public API
 *
 * Cost of capital, terminal growth and hurdle, then Bear/Base/Bull
 * reverse-DCF scenarios and the Base-case sensitivity grid.
 *
 * Pure function — deterministic, no side effects.
 */

import { ValuationContractError } from "@/lib/errors";
import { NA, SCENARIO_NAMES, isNA } from "@/lib/dossier/types";
import type { Maybe, Metric, Provenance, ScenarioName, ScenarioResult, ValuationBlock } from "@/lib/dossier/types";
import { METRIC } from "@/lib/calculators/registry";
import { deriveHurdle } from "./hurdle";
import { PROJECTION_YEARS } from "./policies";
import { projectFcfPath, solveReverseDcf } from "./reverseDcf";
import { assertSensitivityMonotonic, buildSensitivity } from "./sensitivity";
import { deriveTerminalGrowth } from "./terminalGrowth";
import type { ReverseDcfCase, ValuationFundamentals, ValuationInputs, ValuationOptions, ValuationOutput } from "./types";
import { deriveWacc } from "./wacc";

export type {
  HurdleAdjustment,
  ReverseDcfCase,
  SolverOptions,
  SolverResult,
  ValuationFundamentals,
  ValuationInputs,
  ValuationOptions,
  ValuationOutput,
} from "./types";
export { fundamentalsFromResults } from "./fundamentals";
export { deriveWacc } from "./wacc";
export { deriveTerminalGrowth } from "./terminalGrowth";
export { deriveHurdle } from "./hurdle";
export { npv, solveIrr } from "./solver";
export { equityCashFlows, projectFcfPath, solveReverseDcf, terminalValue } from "./reverseDcf";
export { assertSensitivityMonotonic, buildSensitivity } from "./sensitivity";

/** Growth schedules must have five entries and satisfy Bear ≤ Base ≤ Bull year by year. */
export function assertSchedulesOrdered(schedules: Record<ScenarioName, number[]>): void {
  for (const name of SCENARIO_NAMES) {
    const s = schedules[name];
    if (s.length !== PROJECTION_YEARS || s.some((g) => !Number.isFinite(g) || g <= -1)) {
      throw new ValuationContractError(
        "INVALID_INPUT",
        `${name} growth schedule must hold ${PROJECTION_YEARS} finite rates above -100%`,
        { scenario: name, schedule: s },
      );
    }
  }
  for (let year = 0; year < PROJECTION_YEARS; year++) {
    const { Bear, Base, Bull } = schedules;
    if (Bear[year] > Base[year] || Base[year] > Bull[year]) {
      throw new ValuationContractError(
        "SCENARIOS_NOT_ORDERED",
        `Growth schedules not ordered in year ${year + 1}: Bear ${Bear[year]}, Base ${Base[year]}, Bull ${Bull[year]}`,
        { year: year + 1 },
      );
    }
  }
}

function valuationMetric(name: string, value: Maybe<number>, asOf: string, provenance: Provenance, inputs: string[]): Metric {
  return { name, value, unit: "ratio", period: asOf, provenance: { ...provenance }, category: "valuation-input", inputs };
}

export function buildValuationBlock(
  inputs: ValuationInputs,
  fundamentals: ValuationFundamentals,
  options: ValuationOptions,
): ValuationOutput {
  assertSchedulesOrdered(inputs.growthSchedules);

  const wacc = deriveWacc(inputs);
  const terminalGrowth = deriveTerminalGrowth(inputs.inflation, inputs.realGrowth, wacc.point);
  const hurdle = deriveHurdle(inputs.baseHurdle.value, inputs.hurdleAdjustments);
  const dilutedShares = inputs.dilutedShares?.value ?? fundamentals.dilutedShares;

  const caseFor = (fcfPath: number[]): ReverseDcfCase => ({
    price: inputs.price.value,
    dilutedShares,
    netDebt: fundamentals.netDebt,
    fcfPath,
    wacc: wacc.point,
    terminalGrowth: terminalGrowth.value,
  });

  const runScenario = (name: ScenarioName): { dcfCase: ReverseDcfCase; result: ScenarioResult } => {
    const schedule = [...inputs.growthSchedules[name]];
    const fcfPath = fundamentals.startFcf === undefined ? [] : projectFcfPath(fundamentals.startFcf, schedule);
    const dcfCase = caseFor(fcfPath);
    const solved = solveReverseDcf(dcfCase, options.solver);
    return {
      dcfCase,
      result: { name, growthSchedule: schedule, fcfPath, terminalValue: solved.terminalValue, irr: solved.irr },
    };
  };

  const bear = runScenario("Bear");
  const base = runScenario("Base");
  const bull = runScenario("Bull");
  const scenarios: Record<ScenarioName, ScenarioResult> = { Bear: bear.result, Base: base.result, Bull: bull.result };

  const sensitivity = buildSensitivity(base.dcfCase, options.solver);
  assertSensitivityMonotonic(scenarios.Base.irr, sensitivity, options.solver.epsilon * 10);

  const block: ValuationBlock = {
    wacc,
    terminalGrowth,
    hurdle,
    scenarios,
    sensitivity,
    inputs: {
      price: inputs.price.value,
      dilutedShares: dilutedShares ?? NA,
      netDebt: fundamentals.netDebt ?? NA,
      startFcf: fundamentals.startFcf ?? NA,
    },
  };

  const metrics: Metric[] = [
    valuationMetric(METRIC.wacc, wacc.point, options.asOf, inputs.riskFreeRate.provenance, wacc.inputs.map((i) => i.name)),
    valuationMetric(METRIC.terminalGrowth, terminalGrowth.value, options.asOf, inputs.inflation.provenance, ["inflation", "realGrowth"]),
    valuationMetric(METRIC.hurdleIrr, hurdle.value, options.asOf, inputs.baseHurdle.provenance, ["baseHurdle", ...inputs.hurdleAdjustments.map((a) => a.name)]),
    valuationMetric(METRIC.baseIrr, scenarios.Base.irr, options.asOf, inputs.price.provenance, ["price", "dilutedShares", "netDebt", "startFcf"]),
  ];

  return { block, metrics };
}

/** Scenario IRRs in Bear, Base, Bull order, NA kept. */
export function scenarioIrrs(block: ValuationBlock): Maybe<number>[] {
  return SCENARIO_NAMES.map((name) => block.scenarios[name].irr);
}

/** True when every pair of non-NA scenario IRRs respects Bear ≤ Base ≤ Bull. */
export function scenariosOrdered(block: ValuationBlock, tolerance = 1e-6): boolean {
  const known = scenarioIrrs(block).filter((v): v is number => !isNA(v));
  return known.every((v, i) => i === 0 || known[i - 1] <= v + tolerance);
}
