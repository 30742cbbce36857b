import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

import type { SqliteDatabase } from "./client.js"

type MigrationStatus = {
  applied: string[]
  pending: string[]
}

const MIGRATIONS_TABLE = "__unified_tts_migrations"
const STATEMENT_BREAKPOINT = "--> statement-breakpoint"
const MODULE_DIR = path.dirname(fileURLToPath(import.meta.url))

export const DEFAULT_MIGRATIONS_DIR = resolveExistingPath([
  path.resolve(MODULE_DIR, "../../migrations"),
  path.resolve(MODULE_DIR, "../../../../../packages/core/migrations"),
  path.resolve(process.cwd(), "packages/core/migrations"),
])

function resolveExistingPath(candidates: string[]): string {
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0]
}

function listMigrationFiles(migrationsDir: string): string[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((file) => file.endsWith(".sql"))
    .sort()
}

function ensureMigrationsTable(sqlite: SqliteDatabase): void {
  sqlite.exec(
    `CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
      name text PRIMARY KEY NOT NULL,
      applied_at integer NOT NULL
    )`,
  )
}

function appliedMigrations(sqlite: SqliteDatabase): Set<string> {
  const names = sqlite
    .prepare(`SELECT name FROM ${MIGRATIONS_TABLE} ORDER BY name ASC`)
    .pluck()
    .all()
  return new Set(names.filter((name): name is string => typeof name === "string"))
}

export function getMigrationStatus(sqlite: SqliteDatabase, migrationsDir = DEFAULT_MIGRATIONS_DIR): MigrationStatus {
  ensureMigrationsTable(sqlite)
  const applied = appliedMigrations(sqlite)
  const files = listMigrationFiles(migrationsDir)

  return {
    applied: files.filter((file) => applied.has(file)),
    pending: files.filter((file) => !applied.has(file)),
  }
}

/**
 * Applies pending `.sql` files in name order, each inside its own transaction.
 * Statements within a file are separated by `--> statement-breakpoint`.
 */
export function runMigrations(
  sqlite: SqliteDatabase,
  migrationsDir = DEFAULT_MIGRATIONS_DIR,
): { appliedCount: number; applied: string[] } {
  const { pending } = getMigrationStatus(sqlite, migrationsDir)
  const record = sqlite.prepare(`INSERT INTO ${MIGRATIONS_TABLE} (name, applied_at) VALUES (?, ?)`)

  for (const file of pending) {
    const statements = fs
      .readFileSync(path.join(migrationsDir, file), "utf8")
      .split(STATEMENT_BREAKPOINT)
      .map((statement) => statement.trim())
      .filter((statement) => statement.length > 0)

    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        sqlite.exec(statement)
      }
      record.run(file, Date.now())
    })
    apply()
  }

  return { appliedCount: pending.length, applied: pending }
}
