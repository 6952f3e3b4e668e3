/**
 * runnerkit Registrar — Reconciler
 *
 * Brings the store's runner type records into agreement with the catalog.
 *
 * For each definition, in catalog order and one at a time:
 * 1. Filter   experimental definitions are skipped unless included
 * 2. Lookup   find the existing record by name
 * 3. Validate check the definition's shape
 * 4. Build    turn the definition into a record, keeping the existing id
 * 5. Persist  upsert the record and emit an audit event
 *
 * A failure at any step fails that definition only. reconcile() always
 * attempts every definition in scope and resolves with one outcome each.
 */

import { validateDefinition } from "@runnerkit/catalog";
import type { RunnerTypeDefinition } from "@runnerkit/catalog";
import {
  AuditEvent,
  AuditSink,
  DefinitionSource,
  RecordedParameter,
  ReconcileOptions,
  ReconcileOutcome,
  RegistrationSummary,
  RunnerTypeDraft,
  RunnerTypeRecord,
  RunnerTypeSpec,
  RunnerTypeStore,
} from "./types";
import {
  LookupError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  describeError,
} from "./errors";
import { createLogger, Logger } from "./utils/logger";

export async function reconcile(
  catalog: DefinitionSource,
  store: RunnerTypeStore,
  options: ReconcileOptions,
): Promise<ReconcileOutcome[]> {
  const logger = options.logger ?? createLogger();
  const outcomes: ReconcileOutcome[] = [];

  logger.debug(
    { include_experimental: options.includeExperimental },
    "Start : reconcile runner types",
  );

  for (const definition of catalog.definitions()) {
    if (definition.experimental === true && !options.includeExperimental) {
      logger.debug(
        { runner_type: definition.name },
        "Skipping experimental runner type",
      );
      outcomes.push({
        status: "skipped",
        name: definition.name,
        reason: "experimental",
      });
      continue;
    }

    const outcome = await reconcileOne(
      withoutExperimental(definition),
      store,
      options,
      logger,
    );
    if (outcome.status === "failed") {
      logger.warn(
        { runner_type: outcome.name, code: outcome.error.code },
        outcome.error.message,
      );
    }
    outcomes.push(outcome);
  }

  logger.debug({ count: outcomes.length }, "End : reconcile runner types");
  return outcomes;
}

async function reconcileOne(
  spec: RunnerTypeSpec,
  store: RunnerTypeStore,
  options: ReconcileOptions,
  logger: Logger,
): Promise<ReconcileOutcome> {
  const name = spec.name;

  // Lookup
  let existing: RunnerTypeRecord | null;
  try {
    existing = await store.findByName(name);
  } catch (err) {
    if (!(err instanceof NotFoundError)) {
      return { status: "failed", name, error: new LookupError(name, err) };
    }
    existing = null;
  }

  // Validate
  const validate = options.validate ?? validateDefinition;
  try {
    const result = validate(spec);
    if (!result.valid) {
      return {
        status: "failed",
        name,
        error: new ValidationError(name, result.errors),
      };
    }
  } catch (err) {
    return {
      status: "failed",
      name,
      error: new ValidationError(
        name,
        [{ path: "/", message: describeError(err), rule: "validator:error" }],
        { cause: err },
      ),
    };
  }

  // Build + persist
  let record: RunnerTypeRecord;
  try {
    record = await store.upsert(buildRecord(spec, existing));
  } catch (err) {
    return { status: "failed", name, error: new PersistenceError(name, err) };
  }

  const timestamp = new Date().toISOString();
  if (existing) {
    await emitAudit(
      options.audit,
      { name, operation: "updated", record, previous: existing, timestamp },
      logger,
    );
    return { status: "updated", name, record, previous: existing };
  }

  await emitAudit(
    options.audit,
    { name, operation: "created", record, timestamp },
    logger,
  );
  return { status: "created", name, record };
}

/**
 * Copy of a definition without the experimental selection flag.
 * The catalog's own definition is left untouched.
 */
function withoutExperimental(definition: RunnerTypeDefinition): RunnerTypeSpec {
  const { experimental: _experimental, ...spec } = definition;
  return spec;
}

/**
 * Turn a validated definition into a record draft. With an existing
 * record the draft carries its id, so the store updates in place.
 */
export function buildRecord(
  spec: RunnerTypeSpec,
  existing: RunnerTypeRecord | null,
): RunnerTypeDraft {
  const parameters: Record<string, RecordedParameter> = {};
  for (const [name, param] of Object.entries(spec.parameters)) {
    parameters[name] = {
      description: param.description,
      type: param.type,
      required: param.required ?? false,
      immutable: param.immutable ?? false,
      ...(param.default !== undefined
        ? { default: structuredClone(param.default) }
        : {}),
    };
  }

  const draft: RunnerTypeDraft = {
    name: spec.name,
    description: spec.description,
    enabled: spec.enabled,
    runner_module: spec.runner_module,
    ...(spec.query_module !== undefined
      ? { query_module: spec.query_module }
      : {}),
    parameters,
  };

  if (existing) {
    draft.id = existing.id;
  }
  return draft;
}

async function emitAudit(
  sink: AuditSink | undefined,
  event: AuditEvent,
  logger: Logger,
): Promise<void> {
  if (!sink) return;
  try {
    await sink.record(event);
  } catch (err) {
    // The record is already stored; the outcome stands
    logger.warn(
      { runner_type: event.name, err },
      `Audit sink failed for ${event.operation} runner type ${event.name}`,
    );
  }
}

export function summarizeOutcomes(
  outcomes: readonly ReconcileOutcome[],
): RegistrationSummary {
  const summary = { created: 0, updated: 0, skipped: 0, failed: 0 };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return { ...summary, ok: summary.failed === 0 };
}
