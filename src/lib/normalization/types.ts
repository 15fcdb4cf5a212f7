/**
 * Normalization — Types
 *
 * Raw extraction records as received from the statement-extraction
 * collaborator, before scale detection, currency conversion and TTM roll-up.
 */

import type { BusinessModel, CompanyQuarter } from "@/lib/dossier/types";
import type { NormalizationErrorCode } from "@/lib/errors";

export type RawLine = number | { value: number; unit?: string; scaleMarker?: string };

export interface RawStatement {
  periodEnd: string;
  /** Free-text heading marker, e.g. "(in millions, except per share data)" */
  scaleMarker?: string;
  currency?: string;
  lines: Record<string, RawLine>;
}

export interface RawQuarter {
  ticker: string;
  fiscalYear: number;
  fiscalQuarter: number;
  currency?: string;
  businessModel?: BusinessModel;
  statements: {
    income: RawStatement;
    balance: RawStatement;
    cashflow: RawStatement;
  };
  segments?: Record<string, Record<string, RawLine>>;
  segmentScaleMarker?: string;
  kpis?: Record<string, RawLine>;
  footnotes?: {
    scaleMarker?: string;
    debtDueWithin12m?: RawLine;
    debtDue12to24m?: RawLine;
  };
}

export interface NormalizeOptions {
  baseCurrency: string;
  /** Units of base currency per unit of the keyed currency. */
  fxRates?: Record<string, number>;
  toleranceDays: number;
}

/** A historical quarter excluded from the analysis. */
export interface DroppedPeriod {
  period: string;
  code: NormalizationErrorCode;
  message: string;
}

export interface NormalizedHistory {
  quarters: CompanyQuarter[];
  dropped: DroppedPeriod[];
}
