/**
 * runnerkit Registrar — Registrar Class
 *
 * Ties the pieces together for callers that just want "register the
 * catalog into this database file": it owns the registry database, the
 * logger and the audit sinks.
 *
 * The registrar has NO UI logic. The CLI reads its return values.
 */

import { Catalog } from "@runnerkit/catalog";
import {
  RegistrarOptions,
  RegistrationReport,
  RunnerTypeRecord,
} from "./types";
import { AuditLogEntry, StateDB } from "./state-db";
import {
  combineAuditSinks,
  createLoggerAuditSink,
  createStateDbAuditSink,
} from "./audit";
import { registerRunnerTypes } from "./register";
import { NotFoundError } from "./errors";
import { createLogger, Logger } from "./utils/logger";

export class Registrar {
  private stateDb: StateDB;
  private logger: Logger;
  private options: RegistrarOptions;
  private initialized = false;

  constructor(options: RegistrarOptions, logger?: Logger) {
    this.options = options;
    this.logger = logger ?? createLogger({ level: options.log_level });
    this.stateDb = new StateDB(options.state_db_path, this.logger);
  }

  /**
   * Initialize the registrar (and underlying database).
   * Must be called once before any other operation.
   */
  async init(): Promise<void> {
    if (this.initialized) return;
    await this.stateDb.init();
    this.initialized = true;
  }

  private ensureInit(): void {
    if (!this.initialized) {
      throw new Error("Registrar not initialized. Call init() first.");
    }
  }

  /**
   * The catalog this registrar registers: the configured file, or the
   * built-in catalog.
   */
  getCatalog(): Catalog {
    return this.options.catalog_path
      ? Catalog.fromFile(this.options.catalog_path)
      : Catalog.builtin();
  }

  /**
   * Reconcile the catalog against the registry database.
   */
  async register(includeExperimental: boolean = false): Promise<RegistrationReport> {
    this.ensureInit();
    return registerRunnerTypes({
      store: this.stateDb,
      catalog: this.getCatalog(),
      includeExperimental,
      audit: combineAuditSinks(
        createStateDbAuditSink(this.stateDb),
        createLoggerAuditSink(this.logger),
      ),
      logger: this.logger,
    });
  }

  listRunnerTypes(): RunnerTypeRecord[] {
    this.ensureInit();
    return this.stateDb.listRunnerTypes();
  }

  /**
   * Get a registered runner type, or null if none has that name.
   */
  async getRunnerType(name: string): Promise<RunnerTypeRecord | null> {
    this.ensureInit();
    try {
      return await this.stateDb.findByName(name);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  getAuditLog(name?: string, limit?: number): AuditLogEntry[] {
    this.ensureInit();
    return this.stateDb.getAuditLog(name, limit);
  }

  close(): void {
    this.stateDb.close();
    this.initialized = false;
  }
}
