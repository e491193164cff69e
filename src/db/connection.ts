/**
 * Run history database handle
 *
 * Batches share one better-sqlite3 handle per process. Repositories reach
 * it through getDb(); the runner opens and closes it around a batch.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

const MEMORY_DB = ":memory:";

let db: Database.Database | null = null;

/**
 * DB_PATH, or data/app.db under the working directory. The parent
 * directory is created for file databases.
 */
function resolveDbPath(): string {
  const dbPath = process.env.DB_PATH || join(process.cwd(), "data", "app.db");

  if (dbPath !== MEMORY_DB) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  return dbPath;
}

/**
 * Opens the run history, or returns the handle already open.
 */
export function openDb(): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath());

  // document_scores and algorithm_stats cascade from analysis_runs
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * @throws {Error} If openDb() has not been called
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Run history database is not open; call openDb() first");
  }
  return db;
}

/**
 * Swaps in the handle the SQLite test harness created (null to detach).
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
