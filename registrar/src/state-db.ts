/**
 * runnerkit Registrar — Registry Database
 *
 * Local SQLite database that holds:
 * - Registered runner types (one row per name)
 * - The audit trail of every create and update
 *
 * Uses sql.js (Emscripten-compiled SQLite) for zero-native-dependency operation.
 * With a file path the database is persisted to disk on every write;
 * with an empty path it lives in memory only.
 */

import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic } from "sql.js";
import * as path from "path";
import * as fs from "fs";
import { v4 as uuid } from "uuid";
import {
  AuditEvent,
  AuditOperation,
  RunnerTypeDraft,
  RunnerTypeRecord,
  RunnerTypeStore,
} from "./types";
import {
  NotFoundError,
  StoreError,
  StoreErrorReason,
  describeError,
} from "./errors";
import { Logger } from "./utils/logger";

export interface AuditLogEntry {
  runner_type_id: string;
  name: string;
  operation: AuditOperation;
  recorded_at: string;
  record: RunnerTypeRecord;
  previous: RunnerTypeRecord | null;
}

export class StateDB implements RunnerTypeStore {
  private SQL: SqlJsStatic | null = null;
  private db: SqlJsDatabase | null = null;
  private dbPath: string;
  private logger: Logger;
  private initialized = false;

  constructor(dbPath: string, logger: Logger) {
    this.dbPath = dbPath;
    this.logger = logger;
  }

  /**
   * Initialize the database. Must be called before any operations.
   * sql.js requires async initialization.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    const SQL = await initSqlJs();
    this.SQL = SQL;

    if (this.dbPath) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    if (this.dbPath && fs.existsSync(this.dbPath)) {
      const fileBuffer = fs.readFileSync(this.dbPath);
      this.db = new SQL.Database(fileBuffer);
    } else {
      this.db = new SQL.Database();
    }

    this.initialized = true;
    this.initSchema();
    this.logger.debug(
      { path: this.dbPath || ":memory:" },
      "Registry database initialized",
    );
  }

  private ensureInit(): SqlJsDatabase {
    if (!this.db || !this.initialized) {
      throw new StoreError(
        "Registry database not initialized. Call init() first.",
        "connectivity",
      );
    }
    return this.db;
  }

  /**
   * Persist database to disk. No-op for in-memory databases.
   */
  private persist(): void {
    if (!this.dbPath) return;
    const db = this.ensureInit();
    fs.writeFileSync(this.dbPath, Buffer.from(db.export()));
  }

  /**
   * Replace the in-memory database with an earlier export.
   */
  private restore(snapshot: Uint8Array): void {
    if (!this.SQL || !this.db) return;
    this.db.close();
    this.db = new this.SQL.Database(snapshot);
  }

  private initSchema(): void {
    const db = this.ensureInit();
    db.run(`
      CREATE TABLE IF NOT EXISTS runner_types (
        id             TEXT    PRIMARY KEY,
        name           TEXT    NOT NULL UNIQUE,
        description    TEXT    NOT NULL,
        enabled        INTEGER NOT NULL,
        runner_module  TEXT    NOT NULL,
        query_module   TEXT,
        parameters     TEXT    NOT NULL DEFAULT '{}'
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS runner_type_audit (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        runner_type_id  TEXT    NOT NULL,
        name            TEXT    NOT NULL,
        operation       TEXT    NOT NULL,
        recorded_at     TEXT    NOT NULL,
        snapshot        TEXT    NOT NULL,
        previous        TEXT
      )
    `);

    db.run(`
      CREATE INDEX IF NOT EXISTS idx_audit_name
        ON runner_type_audit (name)
    `);

    this.persist();
  }

  // ─── Runner Types ───────────────────────────────────────────

  async findByName(name: string): Promise<RunnerTypeRecord> {
    const db = this.ensureInit();
    const stmt = db.prepare("SELECT * FROM runner_types WHERE name = ?");
    try {
      stmt.bind([name]);
      if (!stmt.step()) {
        throw new NotFoundError(name);
      }
      return rowToRecord(stmt.getAsObject());
    } finally {
      stmt.free();
    }
  }

  async upsert(draft: RunnerTypeDraft): Promise<RunnerTypeRecord> {
    const db = this.ensureInit();

    if (!draft.name || !draft.runner_module) {
      throw new StoreError(
        "Runner type records need a name and a runner_module",
        "validation",
      );
    }

    const record: RunnerTypeRecord = { ...draft, id: draft.id ?? uuid() };
    const values = [
      record.name,
      record.description,
      record.enabled ? 1 : 0,
      record.runner_module,
      record.query_module ?? null,
      JSON.stringify(record.parameters),
      record.id,
    ];

    // A write that cannot reach disk is undone in memory as well
    const snapshot = this.dbPath ? db.export() : null;
    try {
      if (draft.id === undefined) {
        db.run(
          `INSERT INTO runner_types
             (name, description, enabled, runner_module, query_module, parameters, id)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
          values,
        );
      } else {
        db.run(
          `UPDATE runner_types
           SET name = ?, description = ?, enabled = ?, runner_module = ?,
               query_module = ?, parameters = ?
           WHERE id = ?`,
          values,
        );
        if (db.getRowsModified() === 0) {
          throw new StoreError(
            `No runner type with id ${draft.id} to update`,
            "constraint",
          );
        }
      }
      this.persist();
    } catch (err) {
      if (snapshot) this.restore(snapshot);
      if (err instanceof StoreError) throw err;
      throw new StoreError(describeError(err), failureReason(err), {
        cause: err,
      });
    }

    this.logger.debug(
      { runner_type: record.name, id: record.id },
      draft.id === undefined ? "Inserted runner type" : "Updated runner type",
    );
    return record;
  }

  /**
   * Get all registered runner types, ordered by name.
   */
  listRunnerTypes(): RunnerTypeRecord[] {
    const db = this.ensureInit();
    const results: RunnerTypeRecord[] = [];
    const stmt = db.prepare("SELECT * FROM runner_types ORDER BY name");

    while (stmt.step()) {
      results.push(rowToRecord(stmt.getAsObject()));
    }
    stmt.free();

    return results;
  }

  // ─── Audit Trail ────────────────────────────────────────────

  recordAudit(event: AuditEvent): void {
    const db = this.ensureInit();
    db.run(
      `INSERT INTO runner_type_audit
         (runner_type_id, name, operation, recorded_at, snapshot, previous)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [
        event.record.id,
        event.name,
        event.operation,
        event.timestamp,
        JSON.stringify(event.record),
        event.previous ? JSON.stringify(event.previous) : null,
      ],
    );
    this.persist();
  }

  /**
   * Get the most recent audit entries, newest first.
   */
  getAuditLog(name?: string, limit: number = 50): AuditLogEntry[] {
    const db = this.ensureInit();
    const results: AuditLogEntry[] = [];

    const stmt = name
      ? db.prepare(
          `SELECT * FROM runner_type_audit
           WHERE name = ?
           ORDER BY id DESC
           LIMIT ?`,
        )
      : db.prepare(
          `SELECT * FROM runner_type_audit
           ORDER BY id DESC
           LIMIT ?`,
        );
    stmt.bind(name ? [name, limit] : [limit]);

    while (stmt.step()) {
      const row = stmt.getAsObject();
      const previous = row.previous;
      results.push({
        runner_type_id: text(row, "runner_type_id"),
        name: text(row, "name"),
        operation: text(row, "operation") === "created" ? "created" : "updated",
        recorded_at: text(row, "recorded_at"),
        record: JSON.parse(text(row, "snapshot")),
        previous: typeof previous === "string" ? JSON.parse(previous) : null,
      });
    }
    stmt.free();

    return results;
  }

  /**
   * Close the database connection and persist final state.
   */
  close(): void {
    if (this.db) {
      if (this.initialized) {
        this.persist();
      }
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
    this.logger.debug("Registry database closed");
  }
}

// ─── Row Mapping ──────────────────────────────────────────────

type Row = Record<string, unknown>;

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== "string") {
    throw new StoreError(`Column ${column} does not hold text`, "internal");
  }
  return value;
}

function failureReason(err: unknown): StoreErrorReason {
  if (/constraint failed/i.test(describeError(err))) return "constraint";
  // fs errors (EISDIR, ENOSPC, EACCES, ...) mean the file is unreachable
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return "connectivity";
  }
  return "internal";
}

function rowToRecord(row: Row): RunnerTypeRecord {
  const queryModule = row.query_module;
  return {
    id: text(row, "id"),
    name: text(row, "name"),
    description: text(row, "description"),
    enabled: row.enabled === 1,
    runner_module: text(row, "runner_module"),
    ...(typeof queryModule === "string" ? { query_module: queryModule } : {}),
    parameters: JSON.parse(text(row, "parameters")),
  };
}
