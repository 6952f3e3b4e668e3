/**
 * runnerkit Registrar — Registry Database Tests
 *
 * Uses real sql.js databases, both in memory and in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  createLogger,
  NotFoundError,
  RunnerTypeDraft,
  StateDB,
  StoreError,
} from "../src";

const TEST_DIR = path.join(os.tmpdir(), "runnerkit-state-db-test");
const DB_PATH = path.join(TEST_DIR, "registry.db");

function draft(overrides: Partial<RunnerTypeDraft> = {}): RunnerTypeDraft {
  return {
    name: "run-local",
    description: "Runs a local command",
    enabled: true,
    runner_module: "runners/local",
    parameters: {
      timeout: {
        description: "Timeout in seconds",
        type: "integer",
        required: false,
        immutable: false,
        default: 60,
      },
    },
    ...overrides,
  };
}

describe("StateDB", () => {
  let db: StateDB;

  beforeEach(async () => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
    db = new StateDB(DB_PATH, createLogger());
    await db.init();
  });

  afterEach(() => {
    db.close();
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  describe("findByName", () => {
    it("rejects with NotFoundError for an unknown name", async () => {
      await expect(db.findByName("missing")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });

    it("returns a stored record", async () => {
      const created = await db.upsert(draft({ query_module: "queriers/local" }));
      const found = await db.findByName("run-local");

      expect(found).toEqual(created);
      expect(found.query_module).toBe("queriers/local");
      expect(found.parameters.timeout.default).toBe(60);
    });

    it("omits query_module when none was stored", async () => {
      await db.upsert(draft());
      const found = await db.findByName("run-local");
      expect("query_module" in found).toBe(false);
    });
  });

  describe("upsert", () => {
    it("assigns a new id when creating", async () => {
      const record = await db.upsert(draft());
      expect(record.id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
      );
    });

    it("updates in place when the draft carries an id", async () => {
      const created = await db.upsert(draft());
      const updated = await db.upsert(
        draft({ id: created.id, description: "Changed", enabled: false }),
      );

      expect(updated.id).toBe(created.id);
      const stored = db.listRunnerTypes();
      expect(stored).toHaveLength(1);
      expect(stored[0].description).toBe("Changed");
      expect(stored[0].enabled).toBe(false);
    });

    it("rejects a second record with the same name", async () => {
      await db.upsert(draft());
      const error = await db.upsert(draft()).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreError);
      if (error instanceof StoreError) {
        expect(error.reason).toBe("constraint");
      }
      expect(db.listRunnerTypes()).toHaveLength(1);
    });

    it("rejects an update for an unknown id", async () => {
      const error = await db
        .upsert(draft({ id: "no-such-id" }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreError);
      if (error instanceof StoreError) {
        expect(error.reason).toBe("constraint");
        expect(error.message).toBe("No runner type with id no-such-id to update");
      }
    });

    describe("when the database file cannot be written", () => {
      // A directory in place of the file makes every write fail with EISDIR
      function blockDatabaseFile(): void {
        fs.rmSync(DB_PATH, { force: true });
        fs.mkdirSync(DB_PATH);
      }

      afterEach(() => {
        fs.rmSync(DB_PATH, { recursive: true, force: true });
      });

      it("rejects a create with a connectivity error and keeps nothing", async () => {
        blockDatabaseFile();

        const error = await db.upsert(draft()).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(StoreError);
        if (error instanceof StoreError) {
          expect(error.reason).toBe("connectivity");
        }
        expect(db.listRunnerTypes()).toEqual([]);
      });

      it("rejects an update and keeps the previous record", async () => {
        const created = await db.upsert(draft());
        blockDatabaseFile();

        const error = await db
          .upsert(draft({ id: created.id, description: "Changed" }))
          .catch((err: unknown) => err);

        expect(error).toBeInstanceOf(StoreError);
        expect(await db.findByName("run-local")).toEqual(created);
      });
    });

    it("rejects a record without a runner module", async () => {
      const error = await db
        .upsert(draft({ runner_module: "" }))
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreError);
      if (error instanceof StoreError) {
        expect(error.reason).toBe("validation");
      }
    });
  });

  it("lists runner types ordered by name", async () => {
    await db.upsert(draft({ name: "run-remote" }));
    await db.upsert(draft({ name: "action-chain", parameters: {} }));
    expect(db.listRunnerTypes().map((r) => r.name)).toEqual([
      "action-chain",
      "run-remote",
    ]);
  });

  it("persists records across reopen", async () => {
    const created = await db.upsert(draft());
    db.close();

    db = new StateDB(DB_PATH, createLogger());
    await db.init();

    expect(await db.findByName("run-local")).toEqual(created);
  });

  describe("audit trail", () => {
    it("returns audit entries newest first", async () => {
      const created = await db.upsert(draft());
      db.recordAudit({
        name: "run-local",
        operation: "created",
        record: created,
        timestamp: "2026-01-01T00:00:00.000Z",
      });
      const updated = await db.upsert(
        draft({ id: created.id, description: "Changed" }),
      );
      db.recordAudit({
        name: "run-local",
        operation: "updated",
        record: updated,
        previous: created,
        timestamp: "2026-01-02T00:00:00.000Z",
      });

      const log = db.getAuditLog("run-local");
      expect(log.map((e) => e.operation)).toEqual(["updated", "created"]);
      expect(log[0]).toEqual({
        runner_type_id: created.id,
        name: "run-local",
        operation: "updated",
        recorded_at: "2026-01-02T00:00:00.000Z",
        record: updated,
        previous: created,
      });
      expect(log[1].previous).toBeNull();
    });

    it("filters by name and honours the limit", async () => {
      for (const name of ["a-runner", "b-runner", "c-runner"]) {
        const record = await db.upsert(draft({ name }));
        db.recordAudit({
          name,
          operation: "created",
          record,
          timestamp: "2026-01-01T00:00:00.000Z",
        });
      }

      expect(db.getAuditLog("b-runner").map((e) => e.name)).toEqual([
        "b-runner",
      ]);
      expect(db.getAuditLog(undefined, 2).map((e) => e.name)).toEqual([
        "c-runner",
        "b-runner",
      ]);
    });
  });
});

describe("StateDB (in memory)", () => {
  it("works without a file path", async () => {
    const db = new StateDB("", createLogger());
    await db.init();
    try {
      const record = await db.upsert(draft());
      expect(await db.findByName("run-local")).toEqual(record);
    } finally {
      db.close();
    }
  });

  it("fails store calls before init with a connectivity error", async () => {
    const db = new StateDB("", createLogger());
    const error = await db.findByName("run-local").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StoreError);
    if (error instanceof StoreError) {
      expect(error.reason).toBe("connectivity");
    }
  });
});
