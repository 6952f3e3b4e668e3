/**
 * runnerkit Registrar — Public API
 *
 * This is the single entry point for the registrar package.
 * The CLI imports from here — never from internal modules.
 */

// Startup entry point and facade
export { registerRunnerTypes } from "./register";
export type { RegisterOptions } from "./register";
export { Registrar } from "./registrar";

// Reconciliation
export { reconcile, buildRecord, summarizeOutcomes } from "./reconciler";

// Store and audit
export { StateDB } from "./state-db";
export type { AuditLogEntry } from "./state-db";
export {
  createLoggerAuditSink,
  createStateDbAuditSink,
  combineAuditSinks,
} from "./audit";

// Errors
export {
  RegistrarError,
  NotFoundError,
  StoreError,
  ValidationError,
  LookupError,
  PersistenceError,
} from "./errors";
export type { RegistrarErrorCode, StoreErrorReason } from "./errors";

// All types
export type {
  RunnerTypeSpec,
  RecordedParameter,
  RunnerTypeRecord,
  RunnerTypeDraft,
  RunnerTypeStore,
  AuditOperation,
  AuditEvent,
  AuditSink,
  DefinitionSource,
  OutcomeStatus,
  ReconcileOutcome,
  ReconcileOptions,
  RegistrationSummary,
  RegistrationReport,
  RegistrarOptions,
} from "./types";

// Utilities
export { createLogger, LOG_LEVELS } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
