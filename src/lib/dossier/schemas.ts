/**
 * Dossier — Boundary Schemas
 *
 * zod schemas for every record received from a collaborator or read back
 * from the durable store. Parsed data is typed by the interfaces in
 * ./types; the annotations keep the two in lockstep.
 */

import { z } from "zod";

import { isIsoDate } from "@/lib/utils/dates";
import type { RawQuarter } from "@/lib/normalization/types";
import type { AnalysisBundle } from "@/lib/pipeline/types";
import type { ValuationInputs } from "@/lib/valuation/types";
import { BUSINESS_MODELS, COMPARISONS, SCENARIO_NAMES, SOURCE_TYPES } from "./types";
import type {
  Document,
  DossierReport,
  EvidenceSpan,
  GateRow,
  Metric,
  MetricSnapshot,
  Provenance,
  ProvenancedScalar,
  Trigger,
  ValuationBlock,
} from "./types";

const isoDate = z.string().refine(isIsoDate, { message: "Expected a YYYY-MM-DD calendar date" });
const maybeNumber = z.union([z.number(), z.literal("NA")]);

// ---------------------------------------------------------------------------
// Collaborator inputs
// ---------------------------------------------------------------------------

export const ProvenanceSchema: z.ZodType<Provenance> = z.object({
  documentId: z.string(),
  pageOrSection: z.string(),
  quote: z.string(),
  url: z.string(),
});

export const DocumentSchema: z.ZodType<Document> = z.object({
  id: z.string().min(1),
  ticker: z.string().min(1),
  sourceType: z.enum(SOURCE_TYPES),
  retrievedAt: z.string(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  rawText: z.string(),
  url: z.string(),
});

export const MetricSchema: z.ZodType<Metric> = z.object({
  name: z.string().min(1),
  value: z.union([z.number(), z.string()]),
  unit: z.string(),
  period: z.string(),
  provenance: ProvenanceSchema,
  category: z.enum(["reported", "derived", "valuation-input"]),
  basis: z.enum(["reported", "adjusted"]).optional(),
  inputs: z.array(z.string()).optional(),
});

const RawLineSchema = z.union([
  z.number(),
  z.object({ value: z.number(), unit: z.string().optional(), scaleMarker: z.string().optional() }),
]);

const RawStatementSchema = z.object({
  periodEnd: isoDate,
  scaleMarker: z.string().optional(),
  currency: z.string().optional(),
  lines: z.record(z.string(), RawLineSchema),
});

export const RawQuarterSchema: z.ZodType<RawQuarter> = z.object({
  ticker: z.string().min(1),
  fiscalYear: z.number().int(),
  fiscalQuarter: z.number().int().min(1).max(4),
  currency: z.string().optional(),
  businessModel: z.enum(BUSINESS_MODELS).optional(),
  statements: z.object({ income: RawStatementSchema, balance: RawStatementSchema, cashflow: RawStatementSchema }),
  segments: z.record(z.string(), z.record(z.string(), RawLineSchema)).optional(),
  segmentScaleMarker: z.string().optional(),
  kpis: z.record(z.string(), RawLineSchema).optional(),
  footnotes: z
    .object({
      scaleMarker: z.string().optional(),
      debtDueWithin12m: RawLineSchema.optional(),
      debtDue12to24m: RawLineSchema.optional(),
    })
    .optional(),
});

export const EvidenceSpanSchema: z.ZodType<EvidenceSpan> = z.object({
  topic: z.enum(["industry", "moat", "management"]),
  documentId: z.string(),
  quote: z.string(),
  url: z.string(),
  score: z.number(),
});

const ProvenancedScalarSchema: z.ZodType<ProvenancedScalar> = z.object({
  value: z.number().finite(),
  provenance: ProvenanceSchema,
});

const growthSchedule = z.array(z.number().finite());

export const ValuationInputsSchema: z.ZodType<ValuationInputs> = z.object({
  price: ProvenancedScalarSchema,
  riskFreeRate: ProvenancedScalarSchema,
  equityRiskPremium: ProvenancedScalarSchema,
  beta: ProvenancedScalarSchema,
  preTaxCostOfDebt: ProvenancedScalarSchema,
  taxRate: ProvenancedScalarSchema,
  equityMarketValue: ProvenancedScalarSchema,
  debtMarketValue: ProvenancedScalarSchema,
  riskAdjustmentBps: z.number().finite().optional(),
  inflation: ProvenancedScalarSchema,
  realGrowth: ProvenancedScalarSchema,
  baseHurdle: ProvenancedScalarSchema,
  hurdleAdjustments: z.array(z.object({ name: z.string(), bps: z.number().finite() })),
  growthSchedules: z.object({ Bear: growthSchedule, Base: growthSchedule, Bull: growthSchedule }),
  dilutedShares: ProvenancedScalarSchema.optional(),
});

export const TriggerInputSchema = z.object({
  ticker: z.string().trim().min(1),
  metric: z.string().trim().min(1),
  threshold: z.number().finite(),
  comparison: z.enum(COMPARISONS),
  deadline: isoDate,
  source: z.string().optional(),
});

export type TriggerInput = z.infer<typeof TriggerInputSchema>;

export const AnalysisBundleSchema: z.ZodType<AnalysisBundle> = z.object({
  ticker: z.string().min(1),
  asOf: isoDate,
  businessModel: z.enum(BUSINESS_MODELS).optional(),
  documents: z.array(DocumentSchema),
  quarters: z.array(RawQuarterSchema).min(1),
  citations: z.record(z.string(), ProvenanceSchema),
  valuation: ValuationInputsSchema.optional(),
  evidence: z.array(EvidenceSpanSchema).optional(),
  fxRates: z.record(z.string(), z.number().positive()).optional(),
});

// ---------------------------------------------------------------------------
// Stored records
// ---------------------------------------------------------------------------

const comparison = z.enum(COMPARISONS);

export const TriggerSchema: z.ZodType<Trigger> = z.object({
  id: z.string(),
  ticker: z.string(),
  metric: z.string(),
  threshold: z.number(),
  comparison,
  deadline: isoDate,
  source: z.string().optional(),
});

export const MetricSnapshotSchema: z.ZodType<MetricSnapshot> = z.object({
  period: z.string(),
  values: z.record(z.string(), maybeNumber),
});

const GateRowSchema: z.ZodType<GateRow> = z.object({
  gateId: z.string(),
  label: z.string(),
  hardness: z.enum(["Hard", "Soft"]),
  result: z.enum(["Pass", "Soft-Pass", "Fail", "NA"]),
  rule: z.string(),
  metricIds: z.array(z.string()),
  flipTrigger: z
    .object({
      description: z.string(),
      deadline: z.string(),
      condition: z.object({ metric: z.string(), comparison, threshold: z.number() }).optional(),
    })
    .optional(),
  evidence: z.array(z.object({ documentId: z.string(), quote: z.string(), url: z.string() })),
});

const ProvenancedInputSchema = z.object({ name: z.string(), value: z.number(), provenance: ProvenanceSchema });

const ScenarioResultSchema = (name: (typeof SCENARIO_NAMES)[number]) =>
  z.object({
    name: z.literal(name),
    growthSchedule: z.array(z.number()),
    fcfPath: z.array(z.number()),
    terminalValue: maybeNumber,
    irr: maybeNumber,
  });

const ValuationBlockSchema: z.ZodType<ValuationBlock> = z.object({
  wacc: z.object({
    point: z.number(),
    band: z.object({ lower: z.number(), upper: z.number() }),
    costOfEquity: z.number(),
    afterTaxCostOfDebt: z.number(),
    weights: z.object({ equity: z.number(), debt: z.number() }),
    riskAdjustmentBps: z.number(),
    inputs: z.array(ProvenancedInputSchema),
  }),
  terminalGrowth: z.object({ value: z.number(), capped: z.boolean(), inputs: z.array(ProvenancedInputSchema) }),
  hurdle: z.object({
    base: z.number(),
    value: z.number(),
    adjustments: z.array(z.object({ name: z.string(), bps: z.number(), running: z.number() })),
  }),
  scenarios: z.object({ Bear: ScenarioResultSchema("Bear"), Base: ScenarioResultSchema("Base"), Bull: ScenarioResultSchema("Bull") }),
  sensitivity: z.object({
    "wacc+100bps": maybeNumber,
    "wacc-100bps": maybeNumber,
    "g+50bps": maybeNumber,
    "g-50bps": maybeNumber,
  }),
  inputs: z.object({ price: z.number(), dilutedShares: maybeNumber, netDebt: maybeNumber, startFcf: maybeNumber }),
});

const changeValue = z.object({ absolute: maybeNumber, percent: maybeNumber });

export const DossierReportSchema: z.ZodType<DossierReport> = z.object({
  ticker: z.string(),
  asOf: z.string(),
  generatedAt: z.string(),
  traceId: z.string(),
  analyst: z.object({
    path: z.enum(["Mature", "Emergent", "Fail"]),
    gateVersion: z.string(),
    pathReasons: z.array(z.string()),
    metrics: z.array(MetricSchema),
    gates: z.object({ hard: z.array(GateRowSchema), soft: z.array(GateRowSchema) }),
    valuation: z.union([ValuationBlockSchema, z.literal("NA")]),
    provenanceIssues: z.array(z.object({ metric: z.string(), reason: z.string() })),
  }),
  verifier: z.object({ status: z.enum(["PASS", "BLOCKER"]), reasons: z.array(z.string()) }),
  delta: z.record(
    z.string(),
    z.object({ metric: z.string(), current: maybeNumber, qoq: changeValue, yoy: changeValue }),
  ),
  triggers: z.array(
    z.object({
      triggerId: z.string(),
      metric: z.string(),
      status: z.enum(["BREACH", "PENDING", "EXPIRED"]),
      message: z.string(),
      daysRemaining: z.number(),
    }),
  ),
  contentHash: z.string(),
});
