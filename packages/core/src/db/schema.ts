import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core"

export const voicePreferences = sqliteTable(
  "voice_preferences",
  {
    // Lower-cased in the app so lookups are case-insensitive.
    voice: text("voice").primaryKey(),
    backend: text("backend").notNull(),
    updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => [index("idx_voice_preferences_backend").on(table.backend)],
)
