/**
 * Gate Engine — Thresholds
 *
 * No hard-coded numbers in gate logic — all thresholds here.
 */

export interface GatePolicy {
  /** Hard: |accruals ratio| above this fails Fraud/Controls */
  fraudMaxAbsAccruals: number;
  /** Soft: Accounting Sanity passes at or below, soft-passes up to the soft max */
  sanityPassMaxAbsAccruals: number;
  sanitySoftMaxAbsAccruals: number;
  /** Hard: Imminent Solvency passes at or below this net leverage, or on positive TTM FCF */
  solvencyMaxNetLeverage: number;
  /** Soft: Unit Economics */
  minTakeRate: number;
  floorTakeRate: number;
  minNrr: number;
  floorNrr: number;
  /** Path selection */
  matureMaxNetLeverage: number;
  matureMinSegmentQuarters: number;
  flipTriggerHorizonDays: number;
  maxEvidenceSnippets: number;
}

export const GATE_POLICY: Readonly<GatePolicy> = Object.freeze({
  fraudMaxAbsAccruals: 0.1,
  sanityPassMaxAbsAccruals: 0.05,
  sanitySoftMaxAbsAccruals: 0.15,
  solvencyMaxNetLeverage: 4,
  minTakeRate: 0.1,
  floorTakeRate: 0.05,
  minNrr: 1.0,
  floorNrr: 0.9,
  matureMaxNetLeverage: 1,
  matureMinSegmentQuarters: 8,
  flipTriggerHorizonDays: 90,
  maxEvidenceSnippets: 3,
});

export function gatePolicy(overrides: Partial<GatePolicy> = {}): GatePolicy {
  return { ...GATE_POLICY, ...overrides };
}
