/**
 * Database migration runner
 *
 * Applies SQL migrations from the migrations/ directory in file-name order.
 */

import type Database from "better-sqlite3";
import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { closeDb, openDb } from "./connection";
import * as logger from "@/logger";

function getMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * Get pending migrations, sorted by file name
 */
function getPendingMigrations(appliedMigrations: Set<string>): string[] {
  const migrationsDir = getMigrationsDir();
  if (!existsSync(migrationsDir)) {
    return [];
  }

  return readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(getMigrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply all pending migrations to a connection
 *
 * @returns File names of the migrations applied
 */
export function migrateDb(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pending;
}

/**
 * Run all pending migrations on the process connection
 */
export function runMigrations(): void {
  try {
    const applied = migrateDb(openDb());

    if (applied.length === 0) {
      logger.info("No pending migrations");
    } else {
      logger.info("Migrations complete", { applied });
    }
  } finally {
    closeDb();
  }
}
