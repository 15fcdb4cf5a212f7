/**
 * Trigger Monitor — Registration Validation
 *
 * Converts zod failures into TriggerConfigError before anything is
 * persisted. The first failing field decides the error code.
 */

import type { ZodIssue } from "zod";

import { TriggerInputSchema } from "@/lib/dossier/schemas";
import type { TriggerInput } from "@/lib/dossier/schemas";
import type { Trigger } from "@/lib/dossier/types";
import { TriggerConfigError } from "@/lib/errors";
import type { TriggerConfigErrorCode } from "@/lib/errors";

const CODE_BY_FIELD: Record<string, TriggerConfigErrorCode> = {
  comparison: "INVALID_OPERATOR",
  threshold: "INVALID_THRESHOLD",
  deadline: "INVALID_DEADLINE",
};

function codeFor(issue: ZodIssue | undefined): TriggerConfigErrorCode {
  const field = issue?.path[0];
  return (typeof field === "string" && CODE_BY_FIELD[field]) || "INVALID_TRIGGER";
}

export function triggerId(ticker: string, metric: string): string {
  return `${ticker.toUpperCase()}:${metric}`;
}

/** Gate-sourced triggers sit beside a user's trigger on the same metric. */
export function gateTriggerId(ticker: string, metric: string, gateId: string): string {
  return `${triggerId(ticker, metric)}:gate:${gateId}`;
}

export function parseTriggerInput(input: unknown): Trigger {
  const parsed = TriggerInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "trigger";
    throw new TriggerConfigError(codeFor(issue), `Invalid trigger ${field}: ${issue?.message ?? "invalid input"}`, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return toTrigger(parsed.data);
}

function toTrigger(input: TriggerInput): Trigger {
  const ticker = input.ticker.toUpperCase();
  return {
    id: triggerId(ticker, input.metric),
    ticker,
    metric: input.metric,
    threshold: input.threshold,
    comparison: input.comparison,
    deadline: input.deadline,
    ...(input.source ? { source: input.source } : {}),
  };
}
