/**
 * Trigger Monitor
 *
 * Registration, listing and evaluation of per-ticker alert thresholds
 * over a TriggerRepository (the durable store in production, an
 * in-memory map in tests).
 */

import type { Maybe, Metric, Trigger, TriggerAlert } from "@/lib/dossier/types";
import { emitDossierEvent } from "@/lib/observability/emitEvent";
import { evaluateTriggers } from "./evaluate";
import { parseTriggerInput, triggerId } from "./schema";

export interface TriggerRepository {
  listTriggers(ticker: string): Promise<Trigger[]>;
  /** Read-modify-write of the ticker's full trigger list, atomic per ticker. */
  updateTriggers(ticker: string, update: (current: Trigger[]) => Trigger[]): Promise<Trigger[]>;
}

/** Latest numeric value per metric name; categorical values read as NA. */
export function metricValues(metrics: readonly Metric[]): Record<string, Maybe<number>> {
  const out: Record<string, Maybe<number>> = {};
  for (const m of metrics) out[m.name] = typeof m.value === "number" ? m.value : "NA";
  return out;
}

/** Insert or replace by trigger id, keeping deadline order. */
export function upsertTrigger(existing: readonly Trigger[], next: Trigger): Trigger[] {
  return sortTriggers([...existing.filter((t) => t.id !== next.id), next]);
}

export function sortTriggers(triggers: readonly Trigger[]): Trigger[] {
  return [...triggers].sort((a, b) =>
    a.deadline !== b.deadline ? (a.deadline < b.deadline ? -1 : 1) : a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
  );
}

export class TriggerMonitor {
  constructor(private readonly repo: TriggerRepository) {}

  /** Validates and upserts by (ticker, metric). Throws TriggerConfigError before persisting. */
  async register(input: unknown): Promise<Trigger> {
    let trigger: Trigger;
    try {
      trigger = parseTriggerInput(input);
    } catch (err) {
      emitDossierEvent({
        event_type: "trigger.rejected",
        event_category: "error",
        severity: "warning",
        payload: { message: err instanceof Error ? err.message : String(err) },
      });
      throw err;
    }
    await this.repo.updateTriggers(trigger.ticker, (existing) => upsertTrigger(existing, trigger));
    emitDossierEvent({
      event_type: "trigger.registered",
      event_category: "flow",
      severity: "info",
      ticker: trigger.ticker,
      payload: { id: trigger.id, comparison: trigger.comparison, threshold: trigger.threshold, deadline: trigger.deadline },
    });
    return trigger;
  }

  /** Removes the registered trigger on a metric; gate-sourced triggers stay. */
  async remove(ticker: string, metric: string): Promise<boolean> {
    const id = triggerId(ticker, metric);
    let removed = false;
    await this.repo.updateTriggers(ticker.toUpperCase(), (existing) => {
      const kept = existing.filter((t) => t.id !== id);
      removed = kept.length !== existing.length;
      return kept;
    });
    return removed;
  }

  async list(ticker: string): Promise<Trigger[]> {
    return sortTriggers(await this.repo.listTriggers(ticker.toUpperCase()));
  }

  async evaluate(ticker: string, latest: readonly Metric[], asOf: string): Promise<TriggerAlert[]> {
    return evaluateTriggers(await this.list(ticker), metricValues(latest), asOf);
  }
}
