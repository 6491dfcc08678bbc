/**
 * SQLite schema for content metadata
 *
 * Records where each file in the content library came from, keyed by its
 * sha1, so a later update check knows which platform to ask.
 */

import { sqliteTable, text, index } from "drizzle-orm/sqlite-core"

export const contentSources = sqliteTable(
	"content_sources",
	{
		/** Lowercase hex sha1 of the stored file */
		sha1: text("sha1").primaryKey(),
		/** Platform the file was downloaded from (modrinth, curseforge, url) */
		source: text("source").notNull(),
		/** When the entry was first recorded (ISO 8601) */
		recordedAt: text("recorded_at").notNull(),
	},
	table => [index("idx_content_sources_source").on(table.source)],
)

export type ContentSourceRow = typeof contentSources.$inferSelect
export type NewContentSourceRow = typeof contentSources.$inferInsert

/** DDL applied when the database is opened */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS content_sources (
	sha1 TEXT PRIMARY KEY NOT NULL,
	source TEXT NOT NULL,
	recorded_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_content_sources_source ON content_sources (source);
`
