/**
 * Pipeline — Types
 */

import type { DossierConfig } from "@/lib/env/server";
import type { BusinessModel, Document, EvidenceSpan, MetricSnapshot, Provenance, Trigger } from "@/lib/dossier/types";
import type { GatePolicy } from "@/lib/gates/policies";
import type { RawQuarter } from "@/lib/normalization/types";
import type { ValuationInputs } from "@/lib/valuation/types";

/** Everything the collaborators supply for one ticker's analysis. */
export interface AnalysisBundle {
  ticker: string;
  /** YYYY-MM-DD */
  asOf: string;
  businessModel?: BusinessModel;
  documents: Document[];
  quarters: RawQuarter[];
  /** Keyed by metric name or by line reference ("income.revenue"). */
  citations: Record<string, Provenance>;
  valuation?: ValuationInputs;
  evidence?: EvidenceSpan[];
  /** Units of base currency per unit of the keyed currency. */
  fxRates?: Record<string, number>;
}

export type AnalysisConfig = Pick<
  DossierConfig,
  "baseCurrency" | "periodToleranceDays" | "verifier" | "solver" | "flipTriggerHorizonDays"
>;

export interface AnalyzeOptions {
  config: AnalysisConfig;
  /** Stored metric history for the ticker, any order. */
  history?: readonly MetricSnapshot[];
  /** Registered triggers for the ticker. */
  triggers?: readonly Trigger[];
  /** Defaults to the catalog policy with the configured flip-trigger horizon. */
  policy?: GatePolicy;
  traceId?: string;
  /** Clock for `generatedAt`; injectable for tests. */
  now?: () => Date;
}
