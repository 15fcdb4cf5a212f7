/**
 * Typed fatal errors.
 *
 * Insufficient evidence, solver non-convergence, provenance issues and
 * verifier blockers are values, not exceptions. Only the conditions below
 * abort the operation that raised them.
 */

export type NormalizationErrorCode = "PERIOD_MISALIGNED" | "UNKNOWN_CURRENCY" | "INVALID_PERIOD";
export type TriggerConfigErrorCode =
  | "INVALID_OPERATOR"
  | "INVALID_THRESHOLD"
  | "INVALID_DEADLINE"
  | "INVALID_TRIGGER";
export type GateContractErrorCode = "SOFT_PASS_WITHOUT_TRIGGER" | "TRIGGER_ON_NON_SOFT_PASS";
export type ValuationContractErrorCode =
  | "SENSITIVITY_NOT_MONOTONIC"
  | "SCENARIOS_NOT_ORDERED"
  | "INVALID_INPUT";
export type StoreErrorCode = "NOT_INITIALIZED" | "CLOSED" | "CORRUPT_FILE" | "INVALID_TICKER";

abstract class DossierError<C extends string> extends Error {
  readonly code: C;
  readonly details: Record<string, unknown>;

  constructor(code: C, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.code = code;
    this.details = details;
  }
}

export class NormalizationError extends DossierError<NormalizationErrorCode> {
  readonly name = "NormalizationError";
}

export class TriggerConfigError extends DossierError<TriggerConfigErrorCode> {
  readonly name = "TriggerConfigError";
}

export class GateContractError extends DossierError<GateContractErrorCode> {
  readonly name = "GateContractError";
}

export class ValuationContractError extends DossierError<ValuationContractErrorCode> {
  readonly name = "ValuationContractError";
}

export class StoreError extends DossierError<StoreErrorCode> {
  readonly name = "StoreError";
}

export type AnyDossierError =
  | NormalizationError
  | TriggerConfigError
  | GateContractError
  | ValuationContractError
  | StoreError;

export function isDossierError(err: unknown): err is AnyDossierError {
  return (
    err instanceof NormalizationError ||
    err instanceof TriggerConfigError ||
    err instanceof GateContractError ||
    err instanceof ValuationContractError ||
    err instanceof StoreError
  );
}
