/**
 * Mod folder scanning
 */

import { readdir, stat } from "node:fs/promises"
import { basename, join } from "node:path"
import pLimit from "p-limit"
import { isNotFound } from "../errors.js"
import { log } from "../logger.js"
import type { ModMetadataReader } from "../mod-metadata.js"
import type { InstalledMod } from "../types.js"

/** An installed mod before it is given a ModId at publish time */
export type ModFile = Omit<InstalledMod, "modId">

const READ_CONCURRENCY = 8

export function isModFileName(fileName: string): boolean {
	return fileName.endsWith(".jar") || fileName.endsWith(".jar.disabled")
}

async function readAll(
	paths: readonly string[],
	reader: ModMetadataReader,
): Promise<ModFile[]> {
	const limit = pLimit(READ_CONCURRENCY)
	const results = await Promise.all(
		paths.map(path =>
			limit(async (): Promise<ModFile | null> => {
				const fileName = basename(path)
				if (!isModFileName(fileName)) return null
				const summary = await reader.read(path)
				if (summary === null) return null
				return {
					summary,
					fileName,
					path,
					enabled: fileName.endsWith(".jar"),
				}
			}),
		),
	)
	return results.filter((m): m is ModFile => m !== null)
}

function compare(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}

/** By mod id, then file name */
export function sortMods(mods: ModFile[]): ModFile[] {
	return mods.sort(
		(a, b) =>
			compare(a.summary.id, b.summary.id) || compare(a.fileName, b.fileName),
	)
}

/** Read every mod archive in the folder. A missing folder is an empty list. */
export async function loadModsInitial(
	modsPath: string,
	reader: ModMetadataReader,
): Promise<ModFile[]> {
	let names: string[]
	try {
		names = await readdir(modsPath)
	} catch (err) {
		if (isNotFound(err)) return []
		throw err
	}
	const mods = await readAll(
		names.map(name => join(modsPath, name)),
		reader,
	)
	return sortMods(mods)
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile()
	} catch (err) {
		if (isNotFound(err)) return false
		throw err
	}
}

/**
 * Re-read the dirty archives and carry over every other previous entry whose
 * file still exists.
 */
export async function loadModsDirty(
	previous: readonly ModFile[],
	dirty: ReadonlySet<string>,
	reader: ModMetadataReader,
): Promise<ModFile[]> {
	const updated = await readAll([...dirty], reader)

	const carried: ModFile[] = []
	for (const mod of previous) {
		if (dirty.has(mod.path)) continue
		try {
			if (await isFile(mod.path)) carried.push(mod)
			else reader.forget(mod.path)
		} catch (err) {
			// Kept until a rescan can tell whether it is gone
			log.loader.warn({ err, path: mod.path }, "cannot stat mod file")
			carried.push(mod)
		}
	}

	return sortMods([...updated, ...carried])
}
