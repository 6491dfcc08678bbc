/**
 * Shared type definitions for the launcher backend
 */

import type { InstanceId, ModId } from "./arena.js"

export type { InstanceId, ModId } from "./arena.js"

// ─────────────────────────────────────────────────────────────────────────────
// Instances
// ─────────────────────────────────────────────────────────────────────────────

export const LOADERS = ["vanilla", "fabric", "forge", "neoforge"] as const

export type Loader = (typeof LOADERS)[number]

/**
 * Load state of one instance resource pipeline.
 * - unloaded: never requested
 * - loading / loaded: a scan is in flight / the snapshot is current
 * - loading-dirty / loaded-dirty: change hints arrived that the snapshot does
 *   not reflect yet, so another reload is owed
 */
export type LoadState =
	| "unloaded"
	| "loading"
	| "loaded"
	| "loading-dirty"
	| "loaded-dirty"

export type StartLoadResult = "initial" | "reload" | "none"

export type InstanceResource = "worlds" | "servers" | "mods"

// ─────────────────────────────────────────────────────────────────────────────
// Summaries
// ─────────────────────────────────────────────────────────────────────────────

export interface WorldSummary {
	/** Level name from level.dat, or the folder name */
	title: string
	/** Folder name plus the formatted last-played time when known */
	subtitle: string
	/** Absolute path of the world folder */
	levelPath: string
	/** Milliseconds since the epoch, 0 when never played */
	lastPlayed: number
	pngIcon: Buffer | null
}

export interface ServerSummary {
	name: string
	address: string
	pngIcon: Buffer | null
}

export type ModKind =
	| "fabric"
	| "forge"
	| "neoforge"
	| "legacy-forge"
	| "modrinth-modpack"
	| "unknown"

/** A file listed inside a Modrinth modpack index */
export interface ModpackFile {
	path: string
	sha1: string
	size: number
	downloads: string[]
}

export interface ModSummary {
	/** Stable identity key used for sorting */
	id: string
	name: string
	version: string | null
	authors: string[]
	pngIcon: Buffer | null
	kind: ModKind
	/** Files to fetch when the archive is a modpack, empty otherwise */
	packFiles: ModpackFile[]
}

export interface InstalledMod {
	modId: ModId
	summary: ModSummary
	fileName: string
	path: string
	enabled: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Content installation
// ─────────────────────────────────────────────────────────────────────────────

export const CONTENT_SOURCES = [
	"manual",
	"modrinth",
	"curseforge",
	"url",
] as const

export type ContentSource = (typeof CONTENT_SOURCES)[number]

export type InstallTarget =
	| { type: "instance"; id: InstanceId }
	| { type: "library" }
	| { type: "new-instance"; name: string; version: string; loader: Loader }

export type ContentDownload =
	| { type: "url"; url: string; sha1: string; size: number }
	| { type: "file"; path: string }

export interface ContentInstallFile {
	/** Destination relative to the instance's .minecraft folder */
	path: string
	download: ContentDownload
	/** Absolute path of a prior file to delete when this one is installed */
	replaceOld?: string | undefined
	source: ContentSource
}

export interface ContentInstall {
	target: InstallTarget
	files: ContentInstallFile[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Progress
// ─────────────────────────────────────────────────────────────────────────────

export type ProgressFinishType = "fast" | "slow"

export interface ProgressSnapshot {
	id: number
	title: string
	count: number
	total: number
	finished: ProgressFinishType | null
	error: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Outbound messages
// ─────────────────────────────────────────────────────────────────────────────

export interface InstanceDescription {
	id: InstanceId
	name: string
	version: string
	loader: Loader
	rootPath: string
}

export type BackendMessage =
	| ({ type: "instance-added" } & InstanceDescription)
	| ({ type: "instance-modified" } & InstanceDescription)
	| { type: "instance-removed"; id: InstanceId }
	| {
			type: "load-state"
			id: InstanceId
			resource: InstanceResource
			state: LoadState
	  }
	| { type: "worlds-updated"; id: InstanceId; worlds: readonly WorldSummary[] }
	| {
			type: "servers-updated"
			id: InstanceId
			servers: readonly ServerSummary[]
	  }
	| { type: "mods-updated"; id: InstanceId; mods: readonly InstalledMod[] }
	| { type: "progress"; tracker: ProgressSnapshot }
	| { type: "info"; message: string }
	| { type: "error"; message: string }

export type MessageSink = (message: BackendMessage) => void
