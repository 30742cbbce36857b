import { asc, eq } from "drizzle-orm"

import { openDb, type SqliteDatabase, type UnifiedTtsDb } from "../../db/client.js"
import { runMigrations } from "../../db/migrate.js"
import { voicePreferences } from "../../db/schema.js"
import { createChildLogger } from "../../logger.js"

const log = createChildLogger("voice-prefs")

/**
 * Per-voice backend routing preferences. Voice names are case-insensitive.
 */
export interface VoicePreferenceStore {
  get(voice: string): string | null
  set(voice: string, backend: string): void
  /** Returns false when the voice had no preference. */
  remove(voice: string): boolean
  listAll(): Record<string, string>
  close(): void
}

function normalizeVoice(voice: string): string {
  return voice.trim().toLowerCase()
}

export class SqliteVoicePreferenceStore implements VoicePreferenceStore {
  private constructor(
    private readonly db: UnifiedTtsDb,
    private readonly sqlite: SqliteDatabase,
  ) {}

  static open(dbPath: string, migrationsDir?: string): SqliteVoicePreferenceStore {
    const { db, sqlite } = openDb(dbPath)
    try {
      const { applied } = runMigrations(sqlite, migrationsDir)
      if (applied.length > 0) {
        log.info({ dbPath, applied }, "applied migrations")
      }
    } catch (error) {
      sqlite.close()
      throw error
    }
    return new SqliteVoicePreferenceStore(db, sqlite)
  }

  get(voice: string): string | null {
    const row = this.db
      .select({ backend: voicePreferences.backend })
      .from(voicePreferences)
      .where(eq(voicePreferences.voice, normalizeVoice(voice)))
      .get()
    return row?.backend ?? null
  }

  set(voice: string, backend: string): void {
    const updatedAt = new Date()
    this.db
      .insert(voicePreferences)
      .values({ voice: normalizeVoice(voice), backend, updatedAt })
      .onConflictDoUpdate({
        target: voicePreferences.voice,
        set: { backend, updatedAt },
      })
      .run()
    log.info({ voice: normalizeVoice(voice), backend }, "saved voice preference")
  }

  remove(voice: string): boolean {
    const result = this.db
      .delete(voicePreferences)
      .where(eq(voicePreferences.voice, normalizeVoice(voice)))
      .run()
    return result.changes > 0
  }

  listAll(): Record<string, string> {
    const rows = this.db
      .select({ voice: voicePreferences.voice, backend: voicePreferences.backend })
      .from(voicePreferences)
      .orderBy(asc(voicePreferences.voice))
      .all()
    return Object.fromEntries(rows.map((row) => [row.voice, row.backend]))
  }

  close(): void {
    this.sqlite.close()
  }
}

export class InMemoryVoicePreferenceStore implements VoicePreferenceStore {
  private readonly prefs = new Map<string, string>()

  constructor(initial: Record<string, string> = {}) {
    for (const [voice, backend] of Object.entries(initial)) {
      this.set(voice, backend)
    }
  }

  get(voice: string): string | null {
    return this.prefs.get(normalizeVoice(voice)) ?? null
  }

  set(voice: string, backend: string): void {
    this.prefs.set(normalizeVoice(voice), backend)
  }

  remove(voice: string): boolean {
    return this.prefs.delete(normalizeVoice(voice))
  }

  listAll(): Record<string, string> {
    return Object.fromEntries([...this.prefs.entries()].sort(([a], [b]) => a.localeCompare(b)))
  }

  close(): void {}
}
