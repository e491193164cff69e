/**
 * DB Harness Smoke Test
 *
 * Verifies that the test database harness works correctly:
 * - Creates a fresh DB
 * - Runs real migrations
 * - Repos work with the test DB
 * - Cleanup removes the temp file
 */

import { describe, it, expect, afterEach } from "vitest";
import { existsSync } from "fs";
import { createTestDbSync, type TestDbHarness } from "../../helpers/testDb";
import { createRun, getDb, getRunById, migrateDb } from "@/db";

describe("Test DB Harness", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    // Ensure cleanup runs even if test fails
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should create a fresh database with migrations applied", () => {
    harness = createTestDbSync();

    expect(existsSync(harness.dbPath)).toBe(true);

    const rows = harness.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all() as { name: string }[];
    const tables = rows.map((row) => row.name);

    expect(tables).toContain("analysis_runs");
    expect(tables).toContain("document_scores");
    expect(tables).toContain("algorithm_stats");
  });

  it("should not re-apply migrations", () => {
    harness = createTestDbSync();
    expect(migrateDb(harness.db)).toEqual([]);
  });

  it("should allow repos to work with the test DB", () => {
    harness = createTestDbSync();

    const runId = createRun("Smoke");
    const run = getRunById(runId);

    expect(run?.profile_title).toBe("Smoke");
    expect(run?.status).toBe("running");
    expect(run?.finished_at).toBeNull();
  });

  it("should remove the database file on cleanup", () => {
    harness = createTestDbSync();
    const dbPath = harness.dbPath;

    harness.cleanup();
    harness = null;

    expect(existsSync(dbPath)).toBe(false);
  });

  it("should detach the handle on cleanup", () => {
    harness = createTestDbSync();
    expect(getDb()).toBe(harness.db);

    harness.cleanup();
    harness = null;

    expect(() => getDb()).toThrow(
      "Run history database is not open; call openDb() first",
    );
  });
});
