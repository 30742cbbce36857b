import fs from "node:fs"
import path from "node:path"

import Database from "better-sqlite3"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"

import * as schema from "./schema.js"

export const IN_MEMORY_DB = ":memory:"

export type SqliteDatabase = Database.Database
export type UnifiedTtsDb = BetterSQLite3Database<typeof schema>
export type OpenDbResult = {
  db: UnifiedTtsDb
  sqlite: SqliteDatabase
}

export function ensureDbDirectory(dbPath: string): void {
  if (dbPath === IN_MEMORY_DB) {
    return
  }
  fs.mkdirSync(path.dirname(dbPath), { recursive: true })
}

export function openSqlite(dbPath: string): SqliteDatabase {
  ensureDbDirectory(dbPath)
  const sqlite = new Database(dbPath)
  if (dbPath !== IN_MEMORY_DB) {
    sqlite.pragma("journal_mode = WAL")
  }
  sqlite.pragma("busy_timeout = 5000")
  return sqlite
}

export function openDb(dbPath: string): OpenDbResult {
  const sqlite = openSqlite(dbPath)
  const db: UnifiedTtsDb = drizzle(sqlite, { schema })
  return { db, sqlite }
}
