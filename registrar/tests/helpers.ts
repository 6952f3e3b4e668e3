/**
 * Test helpers: an in-memory store behind the RunnerTypeStore interface,
 * with hooks to make individual calls fail.
 */

import type { RunnerTypeDefinition } from "@runnerkit/catalog";
import {
  AuditEvent,
  AuditSink,
  NotFoundError,
  RunnerTypeDraft,
  RunnerTypeRecord,
  RunnerTypeStore,
  StoreError,
} from "../src";

export class MemoryStore implements RunnerTypeStore {
  readonly records = new Map<string, RunnerTypeRecord>();
  readonly calls: string[] = [];
  failLookupFor = new Set<string>();
  failUpsertFor = new Set<string>();
  private nextId = 1;

  async findByName(name: string): Promise<RunnerTypeRecord> {
    this.calls.push(`find:${name}`);
    if (this.failLookupFor.has(name)) {
      throw new StoreError("connection reset", "connectivity");
    }
    const record = this.records.get(name);
    if (!record) throw new NotFoundError(name);
    return structuredClone(record);
  }

  async upsert(draft: RunnerTypeDraft): Promise<RunnerTypeRecord> {
    this.calls.push(`upsert:${draft.name}`);
    if (this.failUpsertFor.has(draft.name)) {
      throw new StoreError("disk full", "internal");
    }
    const record: RunnerTypeRecord = {
      ...structuredClone(draft),
      id: draft.id ?? `rt-${this.nextId++}`,
    };
    this.records.set(record.name, record);
    return structuredClone(record);
  }

  /** Seed a record as if an earlier run had stored it */
  seed(record: RunnerTypeRecord): void {
    this.records.set(record.name, structuredClone(record));
  }
}

export class RecordingAuditSink implements AuditSink {
  readonly events: AuditEvent[] = [];

  record(event: AuditEvent): void {
    this.events.push(event);
  }
}

export function definition(
  name: string,
  overrides: Partial<RunnerTypeDefinition> = {},
): RunnerTypeDefinition {
  return {
    name,
    description: `${name} runner`,
    enabled: true,
    runner_module: `runners/${name}`,
    parameters: {},
    ...overrides,
  };
}

/** A catalog stand-in over a plain array */
export function catalogOf(...definitions: RunnerTypeDefinition[]) {
  return { definitions: () => definitions };
}
