/**
 * Observability — structured dossier events
 *
 * One JSON line per event on the console stream matching its severity.
 * The deterministic engines never call this; only the pipeline, the store
 * and the scripts do.
 */

export type EventCategory = "system" | "flow" | "error" | "signal";
export type EventSeverity = "debug" | "info" | "warning" | "error" | "critical";

const MAX_PAYLOAD_BYTES = 8_000;
const MAX_STACK_CHARS = 800;

// Credentials that may reach a payload through config or error context.
const SECRET_KEYS = ["api_key", "token", "password", "secret"];

function redactSecrets(input: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    out[k] = SECRET_KEYS.includes(k.toLowerCase()) ? "[REDACTED]" : v;
  }
  return out;
}

function clampJson(input: Record<string, unknown>): Record<string, unknown> {
  const redacted = redactSecrets(input);
  const s = JSON.stringify(redacted);
  if (s.length <= MAX_PAYLOAD_BYTES) return redacted;
  return { truncated: true, bytes: s.length, note: "payload exceeded max; redacted summary only" };
}

function getEnv(): string {
  return process.env.NODE_ENV ?? "development";
}

function getRelease(): string | null {
  return process.env.DOSSIER_RELEASE?.slice(0, 7) ?? null;
}

export interface DossierEvent {
  event_type: string;
  event_category?: EventCategory;
  severity?: EventSeverity;
  ticker?: string;
  trace_id?: string;
  payload?: Record<string, unknown>;
}

export interface EventRow {
  source: "dossier";
  event_type: string;
  event_category: EventCategory;
  severity: EventSeverity;
  ticker: string | null;
  trace_id: string | null;
  payload: Record<string, unknown>;
  env: string;
  release: string | null;
  ts: string;
}

export type EventSink = (row: EventRow) => void;

function consoleSink(row: EventRow): void {
  const line = JSON.stringify(row);
  if (row.severity === "error" || row.severity === "critical") console.error(line);
  else if (row.severity === "warning") console.warn(line);
  else console.log(line);
}

let sink: EventSink = consoleSink;

/** Replace the event sink; returns a function restoring the previous one. */
export function setEventSink(next: EventSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

export function emitDossierEvent(e: DossierEvent): void {
  const env = getEnv();
  const severity = e.severity ?? "info";

  if (severity === "debug" && env === "production" && process.env.DOSSIER_DEBUG_EVENTS !== "true") {
    return;
  }

  sink({
    source: "dossier",
    event_type: e.event_type,
    event_category: e.event_category ?? "system",
    severity,
    ticker: e.ticker ?? null,
    trace_id: e.trace_id ?? null,
    payload: clampJson(e.payload ?? {}),
    env,
    release: getRelease(),
    ts: new Date().toISOString(),
  });
}

export function emitErrorEvent(
  event_type: string,
  err: unknown,
  ctx?: { ticker?: string; trace_id?: string; payload?: Record<string, unknown> },
): void {
  const e = err instanceof Error ? err : new Error(typeof err === "string" ? err : "unknown_error");
  emitDossierEvent({
    event_type,
    event_category: "error",
    severity: "error",
    ticker: ctx?.ticker,
    trace_id: ctx?.trace_id,
    payload: {
      error_name: e.name,
      error_message: e.message,
      stack_trace: e.stack?.slice(0, MAX_STACK_CHARS),
      ...ctx?.payload,
    },
  });
}
