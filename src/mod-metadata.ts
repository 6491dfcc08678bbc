/**
 * Mod metadata extraction
 *
 * Reads the loader-specific descriptor out of a mod archive and reduces it
 * to a ModSummary. Summaries are cached per path and reused while the file's
 * size and mtime are unchanged.
 */

import { stat } from "node:fs/promises"
import { basename } from "node:path"
import { parse as parseToml } from "smol-toml"
import { z } from "zod"
import { parseSha1 } from "./hash.js"
import { log } from "./logger.js"
import type { ModKind, ModpackFile, ModSummary } from "./types.js"
import { readZipEntries } from "./zip.js"

// ─────────────────────────────────────────────────────────────────────────────
// Descriptor files
// ─────────────────────────────────────────────────────────────────────────────

export const FABRIC_MOD_JSON = "fabric.mod.json"
export const NEOFORGE_MODS_TOML = "META-INF/neoforge.mods.toml"
export const FORGE_MODS_TOML = "META-INF/mods.toml"
export const MCMOD_INFO = "mcmod.info"
export const MODRINTH_INDEX = "modrinth.index.json"
const MANIFEST = "META-INF/MANIFEST.MF"

const DESCRIPTORS = new Set([
	FABRIC_MOD_JSON,
	NEOFORGE_MODS_TOML,
	FORGE_MODS_TOML,
	MCMOD_INFO,
	MODRINTH_INDEX,
	MANIFEST,
])

const Person = z.union([
	z.string(),
	z.object({ name: z.string() }).transform(p => p.name),
])

const FabricModJson = z.object({
	id: z.string().min(1),
	name: z.string().optional(),
	version: z.string().optional(),
	authors: z.array(Person).optional(),
	icon: z.union([z.string(), z.record(z.string())]).optional(),
})

const ModsToml = z.object({
	mods: z
		.array(
			z.object({
				modId: z.string().min(1),
				displayName: z.string().optional(),
				version: z.string().optional(),
				authors: z.string().optional(),
				logoFile: z.string().optional(),
			}),
		)
		.min(1),
})

const McModInfoMod = z.object({
	modid: z.string().min(1),
	name: z.string(),
	version: z.string().optional(),
	authorList: z.array(Person).optional(),
	logoFile: z.string().optional(),
})

const McModInfo = z.union([
	z.array(McModInfoMod).min(1),
	z.object({ modList: z.array(McModInfoMod).min(1) }).transform(v => v.modList),
])

const ModrinthIndex = z.object({
	formatVersion: z.number(),
	game: z.string(),
	versionId: z.string(),
	name: z.string(),
	files: z.array(
		z.object({
			path: z.string(),
			hashes: z.object({ sha1: z.string() }).passthrough(),
			downloads: z.array(z.string()),
			fileSize: z.number().int().nonnegative(),
		}),
	),
})

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

interface Descriptor {
	id: string
	name: string
	version: string | null
	authors: string[]
	kind: ModKind
	/** Archive entry holding the icon */
	iconPath: string | null
	packFiles: ModpackFile[]
}

function parseJson(data: Buffer): unknown {
	return JSON.parse(data.toString("utf-8"))
}

/** Implementation-Version from a jar manifest */
export function manifestVersion(manifest: Buffer | undefined): string | null {
	if (!manifest) return null
	for (const line of manifest.toString("utf-8").split(/\r?\n/)) {
		const match = /^Implementation-Version:\s*(.+)$/.exec(line)
		if (match?.[1]) return match[1].trim()
	}
	return null
}

function fabricDescriptor(data: Buffer): Descriptor {
	const mod = FabricModJson.parse(parseJson(data))
	let iconPath: string | null = null
	if (typeof mod.icon === "string") {
		iconPath = mod.icon
	} else if (mod.icon) {
		// Sized icons keyed by pixel width; take the largest
		const sizes = Object.keys(mod.icon).sort((a, b) => Number(b) - Number(a))
		const largest = sizes[0]
		iconPath = largest === undefined ? null : (mod.icon[largest] ?? null)
	}
	return {
		id: mod.id,
		name: mod.name ?? mod.id,
		version: mod.version ?? null,
		authors: mod.authors ?? [],
		kind: "fabric",
		iconPath,
		packFiles: [],
	}
}

function modsTomlDescriptor(
	data: Buffer,
	kind: "forge" | "neoforge",
	manifest: Buffer | undefined,
): Descriptor {
	const toml = ModsToml.parse(parseToml(data.toString("utf-8")))
	const [mod] = toml.mods
	if (!mod) throw new Error("mods.toml lists no mods")

	// ${file.jarVersion} and friends are filled from the manifest at runtime
	let version = mod.version ?? null
	if (version?.includes("${")) version = manifestVersion(manifest)

	return {
		id: mod.modId,
		name: mod.displayName ?? mod.modId,
		version,
		authors: mod.authors
			? mod.authors
					.split(",")
					.map(a => a.trim())
					.filter(a => a !== "")
			: [],
		kind,
		iconPath: mod.logoFile ?? null,
		packFiles: [],
	}
}

function mcmodDescriptor(data: Buffer): Descriptor {
	const [mod] = McModInfo.parse(parseJson(data))
	if (!mod) throw new Error("mcmod.info lists no mods")
	return {
		id: mod.modid,
		name: mod.name,
		version: mod.version ?? null,
		authors: mod.authorList ?? [],
		kind: "legacy-forge",
		iconPath: mod.logoFile ? mod.logoFile.replace(/^\//, "") : null,
		packFiles: [],
	}
}

function modrinthDescriptor(data: Buffer): Descriptor {
	const index = ModrinthIndex.parse(parseJson(data))
	const packFiles: ModpackFile[] = []
	for (const file of index.files) {
		const sha1 = parseSha1(file.hashes.sha1)
		if (sha1 === null) {
			log.install.warn({ path: file.path }, "modpack file has an invalid sha1")
			continue
		}
		packFiles.push({
			path: file.path,
			sha1,
			size: file.fileSize,
			downloads: file.downloads,
		})
	}
	return {
		id: index.name,
		name: index.name,
		version: index.versionId,
		authors: [],
		kind: "modrinth-modpack",
		iconPath: null,
		packFiles,
	}
}

/** Identity for an archive without any descriptor: its file name */
export function fileNameModId(path: string): string {
	return basename(path)
		.replace(/\.disabled$/, "")
		.replace(/\.(jar|zip|mrpack)$/i, "")
}

function fallbackDescriptor(path: string): Descriptor {
	const id = fileNameModId(path)
	return {
		id,
		name: id,
		version: null,
		authors: [],
		kind: "unknown",
		iconPath: null,
		packFiles: [],
	}
}

/**
 * Pick the descriptor by priority: fabric, neoforge, forge, legacy forge,
 * then modrinth modpack index.
 */
function describe(path: string, entries: Map<string, Buffer>): Descriptor {
	const manifest = entries.get(MANIFEST)

	const fabric = entries.get(FABRIC_MOD_JSON)
	if (fabric) return fabricDescriptor(fabric)

	const neoforge = entries.get(NEOFORGE_MODS_TOML)
	if (neoforge) return modsTomlDescriptor(neoforge, "neoforge", manifest)

	const forge = entries.get(FORGE_MODS_TOML)
	if (forge) return modsTomlDescriptor(forge, "forge", manifest)

	const mcmod = entries.get(MCMOD_INFO)
	if (mcmod) return mcmodDescriptor(mcmod)

	const modrinth = entries.get(MODRINTH_INDEX)
	if (modrinth) return modrinthDescriptor(modrinth)

	return fallbackDescriptor(path)
}

/**
 * Read the summary of one archive. Throws when the file is not a readable
 * zip or its descriptor is malformed.
 */
export async function readModSummary(path: string): Promise<ModSummary> {
	const entries = await readZipEntries(path, DESCRIPTORS)
	const descriptor = describe(path, entries)

	let pngIcon: Buffer | null = null
	if (descriptor.iconPath !== null) {
		const icons = await readZipEntries(path, new Set([descriptor.iconPath]))
		pngIcon = icons.get(descriptor.iconPath) ?? null
	}

	return {
		id: descriptor.id,
		name: descriptor.name,
		version: descriptor.version,
		authors: descriptor.authors,
		pngIcon,
		kind: descriptor.kind,
		packFiles: descriptor.packFiles,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Cache
// ─────────────────────────────────────────────────────────────────────────────

interface CacheEntry {
	size: number
	mtimeMs: number
	summary: ModSummary
}

export class ModMetadataReader {
	private readonly cache = new Map<string, CacheEntry>()

	/**
	 * Summary of the archive at path, or null when it cannot be read.
	 */
	async read(path: string): Promise<ModSummary | null> {
		let size: number
		let mtimeMs: number
		try {
			const stats = await stat(path)
			if (!stats.isFile()) {
				this.cache.delete(path)
				return null
			}
			size = stats.size
			mtimeMs = stats.mtimeMs
		} catch (err) {
			this.cache.delete(path)
			log.loader.debug({ err, path }, "mod file vanished")
			return null
		}

		const cached = this.cache.get(path)
		if (cached && cached.size === size && cached.mtimeMs === mtimeMs) {
			return cached.summary
		}

		try {
			const summary = await readModSummary(path)
			this.cache.set(path, { size, mtimeMs, summary })
			return summary
		} catch (err) {
			this.cache.delete(path)
			log.loader.warn({ err, path }, "failed to read mod metadata")
			return null
		}
	}

	/** Drop the cached summary of a file that is gone */
	forget(path: string): void {
		this.cache.delete(path)
	}

	get cacheSize(): number {
		return this.cache.size
	}
}
