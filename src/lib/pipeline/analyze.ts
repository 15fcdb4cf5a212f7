/**
 * Pipeline — Single-ticker Analysis
 *
 * Assembles one dossier from a collaborator bundle.
 *
 * Steps:
 * 1. Freeze the point-in-time documents
 * 2. Normalize the raw quarters and roll up TTM
 * 3. Run the calculator registry and attach citations
 * 4. Build the valuation block (when valuation inputs are supplied)
 * 5. Evaluate gates and select the path
 * 6. Validate provenance of every metric
 * 7. Verify independently
 * 8. Compute deltas over the stored history plus the bundle's quarters
 * 9. Evaluate stored triggers plus this run's flip-triggers
 * 10. Hash and freeze the report
 *
 * No I/O. Emits structured events only.
 */

import { randomUUID } from "node:crypto";

import { buildMetrics, contextFromHistory } from "@/lib/calculators/buildMetrics";
import { computeDeltas, mergeSnapshot } from "@/lib/delta/deltaEngine";
import { snapshotFromQuarter } from "@/lib/delta/snapshot";
import { freezeDocument } from "@/lib/dossier";
import { NA } from "@/lib/dossier/types";
import type { AnalystOutput, DossierReport, GateRow, Metric, MetricSnapshot, Trigger, ValuationBlock } from "@/lib/dossier/types";
import { NormalizationError } from "@/lib/errors";
import { evaluateGates } from "@/lib/gates/evaluator";
import { gatePolicy } from "@/lib/gates/policies";
import { gateVersionFor } from "@/lib/gates/version";
import { normalizeQuarters } from "@/lib/normalization/normalizer";
import { emitDossierEvent } from "@/lib/observability/emitEvent";
import { documentLookup, validateProvenance } from "@/lib/provenance/validator";
import { evaluateTriggers } from "@/lib/triggers/evaluate";
import { metricValues, upsertTrigger } from "@/lib/triggers/monitor";
import { gateTriggerId } from "@/lib/triggers/schema";
import { hashCanonical } from "@/lib/utils/canonicalHash";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import { buildValuationBlock } from "@/lib/valuation";
import { fundamentalsFromResults } from "@/lib/valuation/fundamentals";
import { verifyDossier } from "@/lib/verifier";
import type { AnalysisBundle, AnalyzeOptions } from "./types";

/** Keys excluded from the report's content hash. */
export const VOLATILE_REPORT_KEYS: ReadonlySet<string> = new Set(["generatedAt", "traceId", "contentHash"]);

export interface AnalysisResult {
  report: DossierReport;
  /** Tracked values of the latest quarter. */
  snapshot: MetricSnapshot;
  /** Stored snapshots merged with every normalized quarter of the bundle. */
  history: MetricSnapshot[];
  /** Metric-backed flip-triggers to register on commit. */
  flipTriggers: Trigger[];
}

export function reportContentHash(report: Omit<DossierReport, "contentHash">): string {
  return hashCanonical(report, VOLATILE_REPORT_KEYS);
}

/** Flip-triggers with a metric condition become registrable triggers. */
export function flipTriggersFrom(ticker: string, rows: readonly GateRow[]): Trigger[] {
  const out: Trigger[] = [];
  for (const row of rows) {
    const condition = row.flipTrigger?.condition;
    if (!row.flipTrigger || !condition) continue;
    out.push({
      id: gateTriggerId(ticker, condition.metric, row.gateId),
      ticker: ticker.toUpperCase(),
      metric: condition.metric,
      threshold: condition.threshold,
      comparison: condition.comparison,
      deadline: row.flipTrigger.deadline,
      source: `gate:${row.gateId}`,
    });
  }
  return out;
}

export function analyzeTicker(bundle: AnalysisBundle, options: AnalyzeOptions): AnalysisResult {
  const { config } = options;
  const ticker = bundle.ticker.toUpperCase();
  const traceId = options.traceId ?? randomUUID();
  const now = options.now ?? (() => new Date());
  const policy = options.policy ?? gatePolicy({ flipTriggerHorizonDays: config.flipTriggerHorizonDays });

  emitDossierEvent({
    event_type: "analysis.started",
    event_category: "flow",
    severity: "info",
    ticker,
    trace_id: traceId,
    payload: { asOf: bundle.asOf, quarters: bundle.quarters.length, documents: bundle.documents.length },
  });

  // Step 1: Documents
  const documents = documentLookup(bundle.documents.map(freezeDocument));

  // Step 2: Normalize
  const raws = bundle.businessModel ? bundle.quarters.map((q) => ({ ...q, businessModel: bundle.businessModel })) : bundle.quarters;
  const { quarters: history, dropped } = normalizeQuarters(raws, {
    baseCurrency: config.baseCurrency,
    toleranceDays: config.periodToleranceDays,
    ...(bundle.fxRates ? { fxRates: bundle.fxRates } : {}),
  });
  for (const period of dropped) {
    emitDossierEvent({
      event_type: "normalization.period_dropped",
      event_category: "signal",
      severity: "warning",
      ticker,
      trace_id: traceId,
      payload: { period: period.period, code: period.code, message: period.message },
    });
  }
  const ctx = contextFromHistory(history);
  if (!ctx) {
    throw new NormalizationError("INVALID_PERIOD", `${ticker}: no quarters to analyze`, { ticker });
  }

  // Step 3: Calculators
  const built = buildMetrics(ctx, bundle.citations);

  // Step 4: Valuation
  let valuation: ValuationBlock | typeof NA = NA;
  let metrics: Metric[] = built.metrics;
  if (bundle.valuation) {
    const output = buildValuationBlock(bundle.valuation, fundamentalsFromResults(built.results), {
      solver: config.solver,
      asOf: bundle.asOf,
    });
    valuation = output.block;
    metrics = [...built.metrics, ...output.metrics];
  }

  // Step 5: Gates
  const gates = evaluateGates({ metrics, evidence: bundle.evidence ?? [], asOf: bundle.asOf, policy });

  // Step 6: Provenance
  const provenanceIssues = [...built.issues, ...validateProvenance(metrics, documents)];

  const analyst: AnalystOutput = {
    path: gates.path,
    gateVersion: gateVersionFor(policy),
    pathReasons: gates.pathReasons,
    metrics,
    gates: { hard: gates.hard, soft: gates.soft },
    valuation,
    provenanceIssues,
  };

  // Step 7: Verifier
  const verifier = verifyDossier({
    history,
    ...(dropped.length > 0 ? { droppedPeriods: dropped } : {}),
    ...(bundle.businessModel ? { businessModel: bundle.businessModel } : {}),
    analyst,
    ...(bundle.valuation ? { valuationInputs: bundle.valuation } : {}),
    asOf: bundle.asOf,
    options: { ...config.verifier, solver: config.solver },
  });

  // Step 8: Deltas
  const snapshot = snapshotFromQuarter(ctx.current);
  const snapshots = history.map(snapshotFromQuarter).reduce(mergeSnapshot, [...(options.history ?? [])]);
  const delta = computeDeltas(snapshots);

  // Step 9: Triggers
  const flipTriggers = flipTriggersFrom(ticker, [...gates.hard, ...gates.soft]);
  const triggers = flipTriggers.reduce(upsertTrigger, [...(options.triggers ?? [])]);
  const alerts = evaluateTriggers(triggers, { ...snapshot.values, ...metricValues(metrics) }, bundle.asOf);

  // Step 10: Report
  const unhashed: Omit<DossierReport, "contentHash"> = {
    ticker,
    asOf: bundle.asOf,
    generatedAt: now().toISOString(),
    traceId,
    analyst,
    verifier,
    delta,
    triggers: alerts,
  };
  const report = deepFreeze({ ...unhashed, contentHash: reportContentHash(unhashed) });

  emitDossierEvent({
    event_type: verifier.status === "PASS" ? "analysis.completed" : "analysis.qa_blocked",
    event_category: verifier.status === "PASS" ? "flow" : "signal",
    severity: verifier.status === "PASS" ? "info" : "warning",
    ticker,
    trace_id: traceId,
    payload: {
      path: analyst.path,
      qa: verifier.status,
      reasons: verifier.reasons.length,
      alerts: alerts.length,
      contentHash: report.contentHash,
    },
  });

  return { report, snapshot, history: snapshots, flipTriggers };
}
