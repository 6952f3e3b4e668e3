/**
 * runnerkit Registrar — Error Types
 *
 * Store errors are raised by RunnerTypeStore implementations. Lookup,
 * validation and persistence errors are produced by the reconciler and
 * only ever surface inside a failed outcome, never as a rejection of
 * reconcile() itself.
 */

import type { ValidationIssue } from "@runnerkit/catalog";

export type RegistrarErrorCode =
  | "NOT_FOUND" // store has no record with that name
  | "STORE_ERROR" // store could not complete the call
  | "VALIDATION_FAILED" // definition shape is invalid
  | "LOOKUP_FAILED" // store could not be queried for the definition
  | "PERSISTENCE_FAILED"; // store could not create or update the record

export type StoreErrorReason =
  | "validation"
  | "connectivity"
  | "constraint"
  | "internal";

export class RegistrarError extends Error {
  constructor(
    public readonly code: RegistrarErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RegistrarError";
  }
}

// ─── Store Errors ────────────────────────────────────────────

export class NotFoundError extends RegistrarError {
  constructor(public readonly runnerType: string) {
    super("NOT_FOUND", `Runner type "${runnerType}" not found`);
    this.name = "NotFoundError";
  }
}

export class StoreError extends RegistrarError {
  constructor(
    message: string,
    public readonly reason: StoreErrorReason,
    options?: { cause?: unknown },
  ) {
    super("STORE_ERROR", message, options);
    this.name = "StoreError";
  }
}

// ─── Reconciliation Errors ───────────────────────────────────

export class ValidationError extends RegistrarError {
  constructor(
    public readonly runnerType: string,
    public readonly issues: ValidationIssue[],
    options?: { cause?: unknown },
  ) {
    super(
      "VALIDATION_FAILED",
      `Runner type "${runnerType}" is invalid: ${issues
        .map((i) => `[${i.rule}] ${i.path}: ${i.message}`)
        .join("; ")}`,
      options,
    );
    this.name = "ValidationError";
  }
}

export class LookupError extends RegistrarError {
  constructor(
    public readonly runnerType: string,
    cause: unknown,
  ) {
    super(
      "LOOKUP_FAILED",
      `Unable to look up runner type "${runnerType}": ${describeError(cause)}`,
      { cause },
    );
    this.name = "LookupError";
  }
}

export class PersistenceError extends RegistrarError {
  constructor(
    public readonly runnerType: string,
    cause: unknown,
  ) {
    super(
      "PERSISTENCE_FAILED",
      `Unable to register runner type "${runnerType}": ${describeError(cause)}`,
      { cause },
    );
    this.name = "PersistenceError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
