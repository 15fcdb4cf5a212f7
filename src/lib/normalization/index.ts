export type { DroppedPeriod, NormalizedHistory, NormalizeOptions, RawLine, RawQuarter, RawStatement } from "./types";
export { detectScale } from "./scale";
export { normalizeHistory, normalizeQuarter, normalizeQuarters, rollUpTtm } from "./normalizer";
export {
  compareQuarterKeys,
  isContiguous,
  parseQuarterKey,
  previousQuarterKey,
  quarterKey,
  shiftQuarterKey,
  trailingQuarterKeys,
  ttmKey,
  yearAgoQuarterKey,
} from "./periods";
