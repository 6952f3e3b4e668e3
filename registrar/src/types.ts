/**
 * runnerkit Registrar — Core Type Definitions
 *
 * Records, the store and audit capabilities the registrar depends on,
 * and the outcomes a reconciliation pass produces.
 */

import type {
  ParameterType,
  ParameterValue,
  RunnerTypeDefinition,
  ValidationResult,
} from "@runnerkit/catalog";
import type {
  LookupError,
  PersistenceError,
  ValidationError,
} from "./errors";
import type { Logger, LogLevel } from "./utils/logger";

// ─── Records ─────────────────────────────────────────────────────

/** A definition with the experimental selection flag removed */
export type RunnerTypeSpec = Omit<RunnerTypeDefinition, "experimental">;

/** Parameter spec as persisted: both flags always present */
export interface RecordedParameter {
  description: string;
  type: ParameterType;
  required: boolean;
  immutable: boolean;
  default?: ParameterValue;
}

export interface RunnerTypeRecord {
  /** Assigned by the store on creation, never changes afterwards */
  id: string;
  name: string;
  description: string;
  enabled: boolean;
  runner_module: string;
  query_module?: string;
  parameters: Record<string, RecordedParameter>;
}

/** A record about to be written; without an id it will be created */
export type RunnerTypeDraft = Omit<RunnerTypeRecord, "id"> & { id?: string };

// ─── Capabilities ────────────────────────────────────────────────

export interface RunnerTypeStore {
  /** Rejects with NotFoundError when no record has that name */
  findByName(name: string): Promise<RunnerTypeRecord>;
  /** Creates when draft.id is absent, updates in place otherwise. Rejects with StoreError. */
  upsert(draft: RunnerTypeDraft): Promise<RunnerTypeRecord>;
}

export type AuditOperation = "created" | "updated";

export interface AuditEvent {
  name: string;
  operation: AuditOperation;
  record: RunnerTypeRecord;
  /** The record found before an update */
  previous?: RunnerTypeRecord;
  timestamp: string;
}

export interface AuditSink {
  record(event: AuditEvent): void | Promise<void>;
}

/** Anything that can hand out catalog definitions in order */
export interface DefinitionSource {
  definitions(): readonly RunnerTypeDefinition[];
}

// ─── Outcomes ────────────────────────────────────────────────────

export type OutcomeStatus = "created" | "updated" | "skipped" | "failed";

export type ReconcileOutcome =
  | { status: "created"; name: string; record: RunnerTypeRecord }
  | {
      status: "updated";
      name: string;
      record: RunnerTypeRecord;
      previous: RunnerTypeRecord;
    }
  | { status: "skipped"; name: string; reason: "experimental" }
  | {
      status: "failed";
      name: string;
      error: ValidationError | LookupError | PersistenceError;
    };

export interface ReconcileOptions {
  includeExperimental: boolean;
  audit?: AuditSink;
  logger?: Logger;
  /** Replaces the catalog validator */
  validate?: (spec: RunnerTypeSpec) => ValidationResult;
}

export interface RegistrationSummary {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
  /** No definition failed */
  ok: boolean;
}

export interface RegistrationReport {
  outcomes: ReconcileOutcome[];
  summary: RegistrationSummary;
}

// ─── Registrar Options ───────────────────────────────────────────

export interface RegistrarOptions {
  /** Path to the registry database file (empty = in-memory) */
  state_db_path: string;
  /** Catalog YAML to register instead of the built-in catalog */
  catalog_path?: string;
  /** Log level for registrar logs */
  log_level: LogLevel;
}
