/**
 * World scanning for an instance's saves folder
 */

import { readdir, readFile, stat } from "node:fs/promises"
import { basename, join } from "node:path"
import pLimit from "p-limit"
import * as nbt from "prismarine-nbt"
import { z } from "zod"
import { isNotFound } from "../errors.js"
import { log } from "../logger.js"
import type { WorldSummary } from "../types.js"

/** Most worlds kept in a snapshot */
export const MAX_WORLDS = 64

const PARSE_CONCURRENCY = 8

// prismarine-nbt simplifies TAG_Long to a [high, low] pair of int32
const NbtLong = z.union([
	z.number(),
	z.bigint().transform(v => Number(v)),
	z
		.tuple([z.number(), z.number()])
		.transform(([high, low]) => high * 2 ** 32 + (low >>> 0)),
])

const LevelDat = z.object({
	Data: z.object({
		LastPlayed: NbtLong,
		LevelName: z.string().optional(),
	}),
})

function pad(value: number): string {
	return String(value).padStart(2, "0")
}

/** `dd/mm/yyyy HH:MM` in local time */
export function formatLastPlayed(lastPlayed: number): string {
	const date = new Date(lastPlayed)
	return (
		`${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
		`${pad(date.getHours())}:${pad(date.getMinutes())}`
	)
}

/**
 * Read one world folder. Throws when the folder has no readable level.dat.
 */
export async function loadWorldSummary(levelPath: string): Promise<WorldSummary> {
	const raw = await readFile(join(levelPath, "level.dat"))
	const { parsed } = await nbt.parse(raw)
	const level = LevelDat.parse(nbt.simplify(parsed))

	const folder = basename(levelPath)
	const lastPlayed = level.Data.LastPlayed
	const levelName = level.Data.LevelName ?? ""

	const subtitle =
		lastPlayed > 0 ? `${folder} (${formatLastPlayed(lastPlayed)})` : folder

	let pngIcon: Buffer | null = null
	try {
		pngIcon = await readFile(join(levelPath, "icon.png"))
	} catch (err) {
		if (!isNotFound(err)) {
			log.loader.debug({ err, levelPath }, "unreadable world icon")
		}
	}

	return {
		title: levelName === "" ? folder : levelName,
		subtitle,
		levelPath,
		lastPlayed,
		pngIcon,
	}
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory()
	} catch (err) {
		if (isNotFound(err)) return false
		throw err
	}
}

async function parseAll(paths: readonly string[]): Promise<WorldSummary[]> {
	const limit = pLimit(PARSE_CONCURRENCY)
	const results = await Promise.all(
		paths.map(path =>
			limit(async () => {
				try {
					if (!(await isDirectory(path))) return null
					return await loadWorldSummary(path)
				} catch (err) {
					log.loader.warn({ err, path }, "skipping unreadable world")
					return null
				}
			}),
		),
	)
	return results.filter((s): s is WorldSummary => s !== null)
}

/** Most recently played first; ties by path so the order is stable */
export function sortWorlds(worlds: WorldSummary[]): WorldSummary[] {
	worlds.sort(
		(a, b) =>
			b.lastPlayed - a.lastPlayed ||
			(a.levelPath < b.levelPath ? -1 : a.levelPath > b.levelPath ? 1 : 0),
	)
	if (worlds.length > MAX_WORLDS) worlds.length = MAX_WORLDS
	return worlds
}

/**
 * Scan every world in the saves folder. A missing folder is an empty list.
 */
export async function loadWorldsInitial(
	savesPath: string,
): Promise<WorldSummary[]> {
	let names: string[]
	try {
		names = await readdir(savesPath)
	} catch (err) {
		if (isNotFound(err)) return []
		throw err
	}
	const worlds = await parseAll(names.map(name => join(savesPath, name)))
	return sortWorlds(worlds)
}

/**
 * Re-read the dirty world folders and carry over every other entry of the
 * previous snapshot that still exists on disk.
 */
export async function loadWorldsDirty(
	previous: readonly WorldSummary[],
	dirty: ReadonlySet<string>,
): Promise<WorldSummary[]> {
	const updated = await parseAll([...dirty])

	const carried: WorldSummary[] = []
	for (const world of previous) {
		if (dirty.has(world.levelPath)) continue
		try {
			if (await isDirectory(world.levelPath)) carried.push(world)
		} catch (err) {
			// Kept until a rescan can tell whether it is gone
			log.loader.warn({ err, path: world.levelPath }, "cannot stat world")
			carried.push(world)
		}
	}

	return sortWorlds([...updated, ...carried])
}
