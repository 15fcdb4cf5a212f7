/**
 * Gate Engine — Public API
 */

export type { GateContext, GateDefinition, GateEvaluation, GateVerdict, MetricSet, PathCheck, PathSelection } from "./types";
export { GATE_POLICY, gatePolicy } from "./policies";
export type { GatePolicy } from "./policies";
export { GATE_TABLE } from "./catalog";
export { assertGateRow, createGateRow, rowFromVerdict } from "./rows";
export { metricValue, toMetricSet } from "./metricSet";
export { pathChecks, selectPath } from "./path";
export { evaluateGates } from "./evaluator";
export type { EvaluateGatesInput } from "./evaluator";
export { GATE_DEFINITIONS_VERSION, gateVersionFor } from "./version";
