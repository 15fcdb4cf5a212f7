/**
 * Durable Store — JSON files per ticker
 *
 *   <dir>/reports/<TICKER>.json   latest committed DossierReport
 *   <dir>/history/<TICKER>.json   MetricSnapshot[] for the Delta Engine
 *   <dir>/triggers/<TICKER>.json  registered Trigger[]
 *
 * Every write is atomic (temp file + rename) and every ticker is
 * serialized through one lock, so a commit never interleaves with a
 * trigger registration for the same ticker.
 */

import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

import { DossierReportSchema, MetricSnapshotSchema, TriggerSchema } from "@/lib/dossier/schemas";
import type { DossierReport, MetricSnapshot, Trigger } from "@/lib/dossier/types";
import { mergeSnapshot } from "@/lib/delta/deltaEngine";
import { StoreError } from "@/lib/errors";
import { emitDossierEvent } from "@/lib/observability/emitEvent";
import type { TriggerRepository } from "@/lib/triggers/monitor";
import { sortTriggers } from "@/lib/triggers/monitor";
import { readJsonFile, writeJsonAtomic } from "./atomicJson";
import { KeyedMutex } from "./keyedMutex";

const TICKER = /^[A-Z0-9][A-Z0-9.\-]{0,15}$/;

const HistorySchema = z.array(MetricSnapshotSchema);
const TriggerListSchema = z.array(TriggerSchema);

/** Reads and writes for one ticker, valid only inside `transaction`. */
export interface TickerTransaction {
  readonly ticker: string;
  readReport(): Promise<DossierReport | undefined>;
  writeReport(report: DossierReport): Promise<void>;
  readHistory(): Promise<MetricSnapshot[]>;
  writeHistory(history: MetricSnapshot[]): Promise<void>;
  readTriggers(): Promise<Trigger[]>;
  writeTriggers(triggers: Trigger[]): Promise<void>;
}

type StoreState = "new" | "open" | "closed";

export function normalizeTicker(ticker: string): string {
  const key = ticker.trim().toUpperCase();
  if (!TICKER.test(key)) {
    throw new StoreError("INVALID_TICKER", `Ticker ${JSON.stringify(ticker)} cannot be used as a store key`, { ticker });
  }
  return key;
}

export class FileDossierStore implements TriggerRepository {
  private readonly mutex = new KeyedMutex();
  private state: StoreState = "new";

  constructor(readonly dir: string) {}

  async init(): Promise<void> {
    if (this.state === "closed") throw new StoreError("CLOSED", "Store has been closed");
    for (const sub of ["reports", "history", "triggers"]) {
      await mkdir(join(this.dir, sub), { recursive: true });
    }
    this.state = "open";
    emitDossierEvent({ event_type: "store.opened", event_category: "system", severity: "debug", payload: { dir: this.dir } });
  }

  /** Waits for queued work, then rejects every later call. */
  async close(): Promise<void> {
    if (this.state === "closed") return;
    await this.mutex.idle();
    this.state = "closed";
  }

  private assertOpen(): void {
    if (this.state === "new") throw new StoreError("NOT_INITIALIZED", "Store used before init()");
    if (this.state === "closed") throw new StoreError("CLOSED", "Store has been closed");
  }

  private path(kind: "reports" | "history" | "triggers", ticker: string): string {
    return join(this.dir, kind, `${ticker}.json`);
  }

  /** Runs `fn` with exclusive access to one ticker's files. */
  async transaction<T>(ticker: string, fn: (tx: TickerTransaction) => Promise<T>): Promise<T> {
    this.assertOpen();
    const key = normalizeTicker(ticker);
    return this.mutex.runExclusive(key, () => {
      this.assertOpen();
      return fn(this.transactionFor(key));
    });
  }

  private transactionFor(ticker: string): TickerTransaction {
    return {
      ticker,
      readReport: () => readJsonFile(this.path("reports", ticker), DossierReportSchema),
      writeReport: (report) => writeJsonAtomic(this.path("reports", ticker), report),
      readHistory: async () => (await readJsonFile(this.path("history", ticker), HistorySchema)) ?? [],
      writeHistory: (history) => writeJsonAtomic(this.path("history", ticker), history),
      readTriggers: async () => sortTriggers((await readJsonFile(this.path("triggers", ticker), TriggerListSchema)) ?? []),
      writeTriggers: (triggers) => writeJsonAtomic(this.path("triggers", ticker), sortTriggers(triggers)),
    };
  }

  // -------------------------------------------------------------------------
  // Single-operation helpers, each its own transaction
  // -------------------------------------------------------------------------

  async getReport(ticker: string): Promise<DossierReport | undefined> {
    return this.transaction(ticker, (tx) => tx.readReport());
  }

  async commitReport(report: DossierReport): Promise<void> {
    await this.transaction(report.ticker, (tx) => tx.writeReport(report));
  }

  async getHistory(ticker: string): Promise<MetricSnapshot[]> {
    return this.transaction(ticker, (tx) => tx.readHistory());
  }

  /** One entry per period; a repeated period replaces the stored one. */
  async appendHistory(ticker: string, snapshot: MetricSnapshot): Promise<MetricSnapshot[]> {
    return this.transaction(ticker, async (tx) => {
      const next = mergeSnapshot(await tx.readHistory(), snapshot);
      await tx.writeHistory(next);
      return next;
    });
  }

  async listTriggers(ticker: string): Promise<Trigger[]> {
    return this.transaction(ticker, (tx) => tx.readTriggers());
  }

  async updateTriggers(ticker: string, update: (current: Trigger[]) => Trigger[]): Promise<Trigger[]> {
    return this.transaction(ticker, async (tx) => {
      const next = sortTriggers(update(await tx.readTriggers()));
      await tx.writeTriggers(next);
      return next;
    });
  }
}
