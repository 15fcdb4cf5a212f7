/**
 * Pipeline — Durable Commit
 *
 * Runs one analysis under the ticker's store lock: reads the stored delta
 * history and triggers, analyzes, then registers flip-triggers, merges the
 * bundle's snapshots and writes the report. An abort before the first write
 * leaves the store untouched.
 *
 * Each file is replaced atomically, the report last. Triggers upsert by id
 * and snapshots merge by period, so re-running the same bundle after a
 * crash between writes converges on the same store contents.
 */

import { emitDossierEvent, emitErrorEvent } from "@/lib/observability/emitEvent";
import type { FileDossierStore } from "@/lib/storage/fileStore";
import { upsertTrigger } from "@/lib/triggers/monitor";
import { analyzeTicker } from "./analyze";
import type { AnalysisResult } from "./analyze";
import type { AnalysisBundle, AnalyzeOptions } from "./types";

export interface CommitOptions extends Omit<AnalyzeOptions, "history" | "triggers"> {
  signal?: AbortSignal;
}

export async function commitAnalysis(
  store: FileDossierStore,
  bundle: AnalysisBundle,
  options: CommitOptions,
): Promise<AnalysisResult> {
  const { signal, ...analyzeOptions } = options;
  signal?.throwIfAborted();

  try {
    return await store.transaction(bundle.ticker, async (tx) => {
      const history = await tx.readHistory();
      const triggers = await tx.readTriggers();
      const result = analyzeTicker(bundle, { ...analyzeOptions, history, triggers });

      signal?.throwIfAborted();
      await tx.writeTriggers(result.flipTriggers.reduce(upsertTrigger, triggers));
      await tx.writeHistory(result.history);
      await tx.writeReport(result.report);

      emitDossierEvent({
        event_type: "store.committed",
        event_category: "flow",
        severity: "info",
        ticker: tx.ticker,
        trace_id: result.report.traceId,
        payload: { contentHash: result.report.contentHash, flipTriggers: result.flipTriggers.length },
      });
      return result;
    });
  } catch (err) {
    emitErrorEvent("analysis.failed", err, { ticker: bundle.ticker.toUpperCase(), trace_id: options.traceId });
    throw err;
  }
}
