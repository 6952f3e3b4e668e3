/**
 * runnerkit Registrar — Audit Sinks
 *
 * Every runner type the reconciler creates or updates produces one
 * AuditEvent. Sinks decide where it goes: the structured log, the
 * registry database's audit table, or both.
 */

import { AuditEvent, AuditSink } from "./types";
import { StateDB } from "./state-db";
import { Logger } from "./utils/logger";

/**
 * Write audit events to the log at info level, tagged with `audit: true`.
 */
export function createLoggerAuditSink(logger: Logger): AuditSink {
  return {
    record(event: AuditEvent): void {
      logger.info(
        {
          audit: true,
          operation: event.operation,
          runner_type: event.name,
          record: event.record,
        },
        event.operation === "created"
          ? `RunnerType created. RunnerType ${event.name}`
          : `RunnerType updated. RunnerType ${event.name}`,
      );
    },
  };
}

/**
 * Append audit events to the registry database's audit table.
 */
export function createStateDbAuditSink(db: StateDB): AuditSink {
  return {
    record(event: AuditEvent): void {
      db.recordAudit(event);
    },
  };
}

/**
 * Fan an event out to several sinks, in order. Every sink sees the event;
 * failures are rethrown once all sinks have run, as an AggregateError
 * when more than one sink failed.
 */
export function combineAuditSinks(...sinks: AuditSink[]): {
  record(event: AuditEvent): Promise<void>;
} {
  return {
    async record(event: AuditEvent): Promise<void> {
      const failures: unknown[] = [];
      for (const sink of sinks) {
        try {
          await sink.record(event);
        } catch (err) {
          failures.push(err);
        }
      }
      if (failures.length === 1) throw failures[0];
      if (failures.length > 1) {
        throw new AggregateError(
          failures,
          `${failures.length} audit sinks failed for runner type ${event.name}`,
        );
      }
    },
  };
}
