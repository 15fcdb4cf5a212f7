/**
 * Calculators — Public API
 */

export type { CalculatorContext, CalculatorDefinition, MetricResult } from "./types";
export { safeDivide, safeSum, buildDiagnostics } from "./explain";
export { netDebt, totalDebt, ttmFcf, ttmEbitda } from "./lines";
export {
  CALCULATOR_REGISTRY,
  METRIC,
  SEGMENT_MARGIN_PREFIX,
  SUBSCRIPTION_METRICS,
  calculatorsFor,
  findCalculator,
  segmentMarginDefinitions,
} from "./registry";
export { buildMetrics, contextFromHistory, periodFor, resolveCitation, toMetric, unitFor } from "./buildMetrics";
export type { BuiltMetrics, CitationIndex } from "./buildMetrics";
