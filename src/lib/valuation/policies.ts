/**
 * Valuation Engine — Constants
 *
 * All valuation knobs in one place.
 */

/** Symmetric WACC band half-width (±100 bps). */
export const WACC_BAND = 0.01;

/** Bound on the company-specific cost-of-equity adjustment. */
export const MAX_RISK_ADJUSTMENT_BPS = 150;

/** Terminal growth may not come closer to WACC than this. */
export const TERMINAL_GROWTH_SPREAD = 0.005;

export const SENSITIVITY_WACC_STEP = 0.01;
export const SENSITIVITY_GROWTH_STEP = 0.005;

export const PROJECTION_YEARS = 5;

export const DEFAULT_RATE_BRACKET = { lower: -0.99, upper: 10 } as const;
