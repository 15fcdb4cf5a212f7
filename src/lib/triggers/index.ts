export { EQ_TOLERANCE, conditionHolds, describeCondition, evaluateTrigger, evaluateTriggers } from "./evaluate";
export { TriggerMonitor, metricValues, sortTriggers, upsertTrigger } from "./monitor";
export type { TriggerRepository } from "./monitor";
export { gateTriggerId, parseTriggerInput, triggerId } from "./schema";
