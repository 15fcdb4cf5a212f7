export { change, computeDeltas, latestSnapshot, mergeSnapshot } from "./deltaEngine";
export { TRACKED_METRICS, snapshotFromQuarter } from "./snapshot";
