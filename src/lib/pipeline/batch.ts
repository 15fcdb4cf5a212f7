/**
 * Pipeline — Batch Runner
 *
 * Commits many tickers with bounded concurrency. Tickers are independent:
 * one failure is reported in its own result and never aborts the others.
 */

import pLimit from "p-limit";

import type { DossierReport } from "@/lib/dossier/types";
import type { FileDossierStore } from "@/lib/storage/fileStore";
import { commitAnalysis } from "./commit";
import type { CommitOptions } from "./commit";
import type { AnalysisBundle } from "./types";

export type BatchResult =
  | { ticker: string; ok: true; report: DossierReport }
  | { ticker: string; ok: false; error: string };

export interface BatchOptions extends Omit<CommitOptions, "traceId"> {
  concurrency: number;
}

export async function analyzeMany(
  store: FileDossierStore,
  bundles: readonly AnalysisBundle[],
  options: BatchOptions,
): Promise<BatchResult[]> {
  const { concurrency, ...commitOptions } = options;
  const limit = pLimit(Math.max(1, concurrency));

  return Promise.all(
    bundles.map((bundle) =>
      limit(async (): Promise<BatchResult> => {
        const ticker = bundle.ticker.toUpperCase();
        try {
          const { report } = await commitAnalysis(store, bundle, commitOptions);
          return { ticker, ok: true, report };
        } catch (err) {
          return { ticker, ok: false, error: err instanceof Error ? err.message : String(err) };
        }
      }),
    ),
  );
}
