/**
 * Dossier — Shared Record Types
 *
 * Plain serializable records exchanged between the engines and persisted
 * in the per-ticker report. Absent evidence is the literal "NA", never
 * null or zero.
 */

export const NA = "NA" as const;
export type NA = typeof NA;
export type Maybe<T> = T | NA;

export function isNA(value: unknown): value is NA {
  return value === NA;
}

// ---------------------------------------------------------------------------
// Documents & provenance
// ---------------------------------------------------------------------------

export const SOURCE_TYPES = ["10-K", "10-Q", "6-K", "8-K", "Proxy", "IR", "Macro", "Market"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export const PRIMARY_SOURCE_TYPES: readonly SourceType[] = ["10-K", "10-Q", "6-K", "8-K", "Proxy", "IR"];
export const VALUATION_SOURCE_TYPES: readonly SourceType[] = ["Macro", "Market"];

/** Point-in-time document snapshot. Frozen on ingestion. */
export interface Document {
  readonly id: string;
  readonly ticker: string;
  readonly sourceType: SourceType;
  readonly retrievedAt: string;
  /** sha256 hex of rawText at retrieval time */
  readonly contentHash: string;
  readonly rawText: string;
  readonly url: string;
}

export interface Provenance {
  documentId: string;
  pageOrSection: string;
  quote: string;
  url: string;
}

export interface DocumentLookup {
  get(documentId: string): Document | undefined;
}

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export type MetricCategory = "reported" | "derived" | "valuation-input";
export type MetricValue = number | string | NA;

export interface Metric {
  name: string;
  value: MetricValue;
  unit: string;
  period: string;
  provenance: Provenance;
  category: MetricCategory;
  basis?: "reported" | "adjusted";
  inputs?: string[];
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export const BUSINESS_MODELS = ["subscription", "marketplace", "transactional", "hardware", "other"] as const;
export type BusinessModel = (typeof BUSINESS_MODELS)[number];

export interface StatementValue {
  value: number;
  unit: string;
}

export type StatementLines = Record<string, StatementValue>;

export interface DebtFootnotes {
  debtDueWithin12m?: StatementValue;
  debtDue12to24m?: StatementValue;
}

export interface CompanyQuarter {
  ticker: string;
  /** "YYYY-Q#" */
  period: string;
  fiscalYear: number;
  fiscalQuarter: number;
  periodEnd: string;
  currency: string;
  businessModel?: BusinessModel;
  income: StatementLines;
  balance: StatementLines;
  cashflow: StatementLines;
  kpis: StatementLines;
  segments: Record<string, StatementLines>;
  footnotes?: DebtFootnotes;
  ttm: {
    /** "TTM-YYYYQ#" */
    key: string;
    values: Record<string, Maybe<number>>;
  };
}

/** Ranked candidate span from the retrieval collaborator. */
export interface EvidenceSpan {
  topic: "industry" | "moat" | "management";
  documentId: string;
  quote: string;
  url: string;
  score: number;
}

// ---------------------------------------------------------------------------
// Gates
// ---------------------------------------------------------------------------

export type Hardness = "Hard" | "Soft";
export type GateResult = "Pass" | "Soft-Pass" | "Fail" | "NA";

export const COMPARISONS = ["gte", "lte", "gt", "lt", "eq"] as const;
export type Comparison = (typeof COMPARISONS)[number];

export interface FlipTrigger {
  description: string;
  /** YYYY-MM-DD */
  deadline: string;
  condition?: { metric: string; comparison: Comparison; threshold: number };
}

export interface EvidenceSnippet {
  documentId: string;
  quote: string;
  url: string;
}

export interface GateRow {
  gateId: string;
  label: string;
  hardness: Hardness;
  result: GateResult;
  rule: string;
  metricIds: string[];
  flipTrigger?: FlipTrigger;
  evidence: EvidenceSnippet[];
}

export type AnalysisPath = "Mature" | "Emergent" | "Fail";

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

export interface ProvenancedScalar {
  value: number;
  provenance: Provenance;
}

export interface ProvenancedInput extends ProvenancedScalar {
  name: string;
}

export const SCENARIO_NAMES = ["Bear", "Base", "Bull"] as const;
export type ScenarioName = (typeof SCENARIO_NAMES)[number];

export const SENSITIVITY_KEYS = ["wacc+100bps", "wacc-100bps", "g+50bps", "g-50bps"] as const;
export type SensitivityKey = (typeof SENSITIVITY_KEYS)[number];

export interface ScenarioResult {
  name: ScenarioName;
  growthSchedule: number[];
  fcfPath: number[];
  terminalValue: Maybe<number>;
  irr: Maybe<number>;
}

export interface HurdleStep {
  name: string;
  bps: number;
  running: number;
}

export interface ValuationBlock {
  wacc: {
    point: number;
    band: { lower: number; upper: number };
    costOfEquity: number;
    afterTaxCostOfDebt: number;
    weights: { equity: number; debt: number };
    riskAdjustmentBps: number;
    inputs: ProvenancedInput[];
  };
  terminalGrowth: {
    value: number;
    capped: boolean;
    inputs: ProvenancedInput[];
  };
  hurdle: {
    base: number;
    value: number;
    adjustments: HurdleStep[];
  };
  scenarios: Record<ScenarioName, ScenarioResult>;
  sensitivity: Record<SensitivityKey, Maybe<number>>;
  inputs: {
    price: number;
    dilutedShares: Maybe<number>;
    netDebt: Maybe<number>;
    startFcf: Maybe<number>;
  };
}

// ---------------------------------------------------------------------------
// QA, deltas, triggers
// ---------------------------------------------------------------------------

export type QAStatus = "PASS" | "BLOCKER";

export interface QAResult {
  status: QAStatus;
  reasons: string[];
}

export interface ChangeValue {
  absolute: Maybe<number>;
  percent: Maybe<number>;
}

export interface DeltaEntry {
  metric: string;
  current: Maybe<number>;
  qoq: ChangeValue;
  yoy: ChangeValue;
}

export interface MetricSnapshot {
  /** "YYYY-Q#" */
  period: string;
  values: Record<string, Maybe<number>>;
}

export interface Trigger {
  /** `${ticker}:${metric}` */
  id: string;
  ticker: string;
  metric: string;
  threshold: number;
  comparison: Comparison;
  /** YYYY-MM-DD */
  deadline: string;
  source?: string;
}

export type TriggerAlertStatus = "BREACH" | "PENDING" | "EXPIRED";

export interface TriggerAlert {
  triggerId: string;
  metric: string;
  status: TriggerAlertStatus;
  message: string;
  daysRemaining: number;
}

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface ProvenanceIssue {
  metric: string;
  reason: string;
}

export interface AnalystOutput {
  path: AnalysisPath;
  /** Content hash of the gate table and thresholds in force */
  gateVersion: string;
  pathReasons: string[];
  metrics: Metric[];
  gates: { hard: GateRow[]; soft: GateRow[] };
  valuation: ValuationBlock | NA;
  provenanceIssues: ProvenanceIssue[];
}

export interface DossierReport {
  ticker: string;
  asOf: string;
  generatedAt: string;
  traceId: string;
  analyst: AnalystOutput;
  verifier: QAResult;
  delta: Record<string, DeltaEntry>;
  triggers: TriggerAlert[];
  contentHash: string;
}
