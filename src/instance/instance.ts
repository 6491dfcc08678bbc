/**
 * In-memory model of one instance
 */

import { join } from "node:path"
import { DANGLING_ID, type InstanceId, type ModId } from "../arena.js"
import type { ModMetadataReader } from "../mod-metadata.js"
import type {
	InstalledMod,
	InstanceDescription,
	Loader,
	ServerSummary,
	StartLoadResult,
	WorldSummary,
} from "../types.js"
import type { WakeSignal } from "../wake.js"
import type { InstanceAttributes } from "./info.js"
import { loadModsDirty, loadModsInitial, type ModFile } from "./mods.js"
import { LoadPipeline } from "./pipeline.js"
import { loadServers } from "./servers.js"
import { loadWorldsDirty, loadWorldsInitial } from "./worlds.js"

export interface InstancePaths {
	root: string
	dotMinecraft: string
	saves: string
	mods: string
	serversDat: string
}

export function instancePaths(root: string): InstancePaths {
	const dotMinecraft = join(root, ".minecraft")
	return {
		root,
		dotMinecraft,
		saves: join(dotMinecraft, "saves"),
		mods: join(dotMinecraft, "mods"),
		serversDat: join(dotMinecraft, "servers.dat"),
	}
}

export class Instance {
	id: InstanceId = DANGLING_ID
	name: string
	version: string
	loader: Loader
	paths: InstancePaths

	readonly worlds = new LoadPipeline<WorldSummary[]>("worlds", () => [])
	readonly servers = new LoadPipeline<ServerSummary[]>("servers", () => [])
	readonly mods = new LoadPipeline<ModFile[]>("mods", () => [])

	private modsGeneration = 0
	private publishedMods: InstalledMod[] = []
	private reloadModsImmediately = false

	constructor(attributes: InstanceAttributes) {
		this.name = attributes.name
		this.version = attributes.version
		this.loader = attributes.loader
		this.paths = instancePaths(attributes.rootPath)
	}

	get rootPath(): string {
		return this.paths.root
	}

	describe(): InstanceDescription {
		return {
			id: this.id,
			name: this.name,
			version: this.version,
			loader: this.loader,
			rootPath: this.paths.root,
		}
	}

	/** Take name, version and loader from a freshly loaded copy */
	copyBasicAttributes(attributes: InstanceAttributes): void {
		this.name = attributes.name
		this.version = attributes.version
		this.loader = attributes.loader
		if (attributes.rootPath !== this.paths.root) {
			this.relocate(attributes.rootPath)
		}
	}

	/**
	 * Move the instance to a new root. Snapshots describe the old location,
	 * so every pipeline starts over.
	 */
	relocate(rootPath: string): void {
		this.paths = instancePaths(rootPath)
		// Published mods carry paths under the old root
		this.publishedMods = []
		this.worlds.invalidate()
		this.servers.invalidate()
		this.mods.invalidate()
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Change hints
	// ─────────────────────────────────────────────────────────────────────────

	markWorldsDirty(path?: string): boolean {
		return this.worlds.markDirty(path)
	}

	/** Mark every world of the current snapshot dirty */
	markAllWorldsDirty(): boolean {
		const current = this.worlds.current ?? []
		const inserted = this.worlds.markManyDirty(current.map(w => w.levelPath))
		return this.worlds.markDirty() || inserted
	}

	markServersDirty(): boolean {
		return this.servers.markDirty()
	}

	markModsDirty(path?: string): boolean {
		return this.mods.markDirty(path)
	}

	/** Mark every mod of the current snapshot dirty */
	markAllModsDirty(): boolean {
		const current = this.mods.current ?? []
		const inserted = this.mods.markManyDirty(current.map(m => m.path))
		return this.mods.markDirty() || inserted
	}

	/** Request a mods reload on the next router batch, ahead of autoReload */
	setReloadModsImmediately(): void {
		this.reloadModsImmediately = true
	}

	/** Consume the one-shot reload marker */
	takeReloadModsImmediately(): boolean {
		const pending = this.reloadModsImmediately
		this.reloadModsImmediately = false
		return pending
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Loads
	// ─────────────────────────────────────────────────────────────────────────

	startLoadWorlds(wake: WakeSignal): StartLoadResult {
		const saves = this.paths.saves
		return this.worlds.startLoad(
			(previous, dirty) =>
				previous === null
					? loadWorldsInitial(saves)
					: loadWorldsDirty(previous, dirty),
			wake,
		)
	}

	finishLoadWorlds(): WorldSummary[] | null {
		return this.worlds.finishLoad()
	}

	startLoadServers(wake: WakeSignal): StartLoadResult {
		const serversDat = this.paths.serversDat
		return this.servers.startLoad(() => loadServers(serversDat), wake)
	}

	finishLoadServers(): ServerSummary[] | null {
		return this.servers.finishLoad()
	}

	startLoadMods(wake: WakeSignal, reader: ModMetadataReader): StartLoadResult {
		const modsPath = this.paths.mods
		return this.mods.startLoad(
			(previous, dirty) =>
				previous === null
					? loadModsInitial(modsPath, reader)
					: loadModsDirty(previous, dirty, reader),
			wake,
		)
	}

	/**
	 * Publish a finished mods load. Every publish starts a new generation, so
	 * ModIds handed out earlier stop resolving.
	 */
	finishLoadMods(): InstalledMod[] | null {
		const files = this.mods.finishLoad()
		if (files === null) return null

		this.modsGeneration++
		const generation = this.modsGeneration
		this.publishedMods = files.map((file, index) => ({
			...file,
			modId: { index, generation },
		}))
		return [...this.publishedMods]
	}

	get currentModsGeneration(): number {
		return this.modsGeneration
	}

	getMod(modId: ModId): InstalledMod | null {
		if (modId.generation !== this.modsGeneration) return null
		return this.publishedMods[modId.index] ?? null
	}
}
