/**
 * Provenance database
 *
 * One better-sqlite3 connection per store, wrapped by drizzle. WAL mode keeps
 * a concurrent CLI reader from blocking the backend's writes.
 */

import Database from "better-sqlite3"
import { mkdirSync } from "node:fs"
import { dirname } from "node:path"
import { eq } from "drizzle-orm"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { log } from "../logger.js"
import type { ContentSource } from "../types.js"
import * as schema from "./schema.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export type DbClient = BetterSQLite3Database<typeof schema>

export interface ProvenanceEntry {
	sha1: string
	source: ContentSource
}

const RECORDED_SOURCES = new Set<string>(["modrinth", "curseforge", "url"])

function isRecordedSource(
	source: string,
): source is Exclude<ContentSource, "manual"> {
	return RECORDED_SOURCES.has(source)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════════════════

export class ProvenanceStore {
	private constructor(
		readonly path: string,
		private readonly sqlite: Database.Database,
		private readonly db: DbClient,
	) {}

	/**
	 * Open (creating if needed) the database at dbPath.
	 * Pass ":memory:" for a throwaway store.
	 */
	static open(dbPath: string): ProvenanceStore {
		if (dbPath !== ":memory:") {
			mkdirSync(dirname(dbPath), { recursive: true })
		}

		const sqlite = new Database(dbPath)
		sqlite.pragma("journal_mode = WAL")
		sqlite.pragma("synchronous = NORMAL")
		sqlite.exec(schema.SCHEMA_SQL)

		const db = drizzle(sqlite, { schema })
		log.db.debug({ dbPath }, "provenance database opened")
		return new ProvenanceStore(dbPath, sqlite, db)
	}

	/**
	 * Record sources for stored hashes. Manual sources are never recorded and
	 * the first source seen for a hash wins.
	 */
	record(entries: Iterable<ProvenanceEntry>): number {
		const seen = new Set<string>()
		const rows: schema.NewContentSourceRow[] = []
		const recordedAt = new Date().toISOString()

		for (const { sha1, source } of entries) {
			if (!isRecordedSource(source) || seen.has(sha1)) continue
			seen.add(sha1)
			rows.push({ sha1, source, recordedAt })
		}
		if (rows.length === 0) return 0

		const result = this.db
			.insert(schema.contentSources)
			.values(rows)
			.onConflictDoNothing()
			.run()
		log.db.debug({ inserted: result.changes }, "recorded content sources")
		return result.changes
	}

	/** Source recorded for sha1, or null */
	lookup(sha1: string): ContentSource | null {
		const row = this.db
			.select()
			.from(schema.contentSources)
			.where(eq(schema.contentSources.sha1, sha1))
			.get()
		if (!row || !isRecordedSource(row.source)) return null
		return row.source
	}

	count(): number {
		return this.db.select().from(schema.contentSources).all().length
	}

	close(): void {
		try {
			if (this.path !== ":memory:") {
				this.sqlite.pragma("wal_checkpoint(TRUNCATE)")
			}
			this.sqlite.close()
		} catch (err) {
			log.db.warn({ err }, "failed to close provenance database")
		}
	}
}

export * from "./schema.js"
