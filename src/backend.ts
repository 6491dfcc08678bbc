/**
 * Launcher backend
 *
 * Owns the instance store, the watch registry and router, the mod metadata
 * cache and the content installer, and runs the control loop that publishes
 * finished background loads.
 *
 * Filesystem batches are applied one at a time on a promise chain, so the
 * router is the only writer of instance state while a batch runs. The loop
 * sleeps on a wake signal that loaders poke when they finish.
 */

import { mkdir, readdir, stat } from "node:fs/promises"
import { join } from "node:path"
import type { Dispatcher } from "undici"
import { idKey, type InstanceId, type ModId } from "./arena.js"
import { BackpressureController } from "./backpressure.js"
import type { Config } from "./config.js"
import { ProvenanceStore } from "./db/index.js"
import { launcherDirectories, type LauncherDirectories } from "./directories.js"
import { InstanceLoadError, errorMessage, isNotFound } from "./errors.js"
import { loadInstanceFromFolder, writeInstanceInfo } from "./instance/info.js"
import { Instance } from "./instance/instance.js"
import { InstanceStore } from "./instance/store.js"
import { ContentLibrary } from "./install/content-library.js"
import {
	ContentInstaller,
	type InstallHost,
	type InstallResult,
} from "./install/installer.js"
import { SafePath } from "./install/safe-path.js"
import { log } from "./logger.js"
import { ModMetadataReader } from "./mod-metadata.js"
import { ProgressReporter } from "./progress.js"
import type {
	ContentInstall,
	InstalledMod,
	InstanceDescription,
	InstanceResource,
	LoadState,
	Loader,
	MessageSink,
	StartLoadResult,
} from "./types.js"
import { WakeSignal } from "./wake.js"
import { coalesceEvents, type RawFsEvent } from "./watch/classifier.js"
import { WatchRegistry, type WatchSubscriber } from "./watch/registry.js"
import { FilesystemEventRouter, type RouterContext } from "./watch/router.js"
import { WatchTargets, type WatchTarget } from "./watch/targets.js"
import { ChokidarWatcher } from "./watch/watcher.js"

export interface BackendOptions {
	config: Config
	send: MessageSink
	/**
	 * Subscription backend. Defaults to chokidar; tests pass a recorder and
	 * feed raw batches through handleRawBatch().
	 */
	subscriber?: WatchSubscriber | undefined
	/** HTTP dispatcher for content downloads */
	dispatcher?: Dispatcher | undefined
	/** Record provenance in contentmeta/provenance.db (default true) */
	provenance?: boolean | undefined
}

const RESOURCES: readonly InstanceResource[] = ["worlds", "servers", "mods"]

export class Backend implements RouterContext, InstallHost {
	readonly directories: LauncherDirectories
	readonly store = new InstanceStore()
	readonly registry: WatchRegistry
	readonly router: FilesystemEventRouter
	readonly metadata = new ModMetadataReader()
	readonly installer: ContentInstaller
	readonly send: MessageSink

	private readonly config: Config
	private readonly wake = new WakeSignal()
	private readonly watcher: ChokidarWatcher | null
	private readonly provenance: ProvenanceStore | null
	private readonly gate: BackpressureController
	private readonly sentStates = new Map<string, LoadState>()
	private batchChain: Promise<void> = Promise.resolve()
	private loop: Promise<void> | null = null
	private closed = false

	private constructor(options: BackendOptions) {
		this.config = options.config
		this.send = options.send
		this.directories = launcherDirectories(options.config.launcherDir)

		if (options.subscriber) {
			this.watcher = null
			this.registry = new WatchRegistry(options.subscriber)
		} else {
			this.watcher = new ChokidarWatcher({
				debounceMs: options.config.debounceMs,
				onBatch: batch => {
					this.handleRawBatch(batch).catch((err: unknown) => {
						log.backend.error({ err }, "failed to apply filesystem batch")
					})
				},
				onError: err => this.handleWatchError(err),
			})
			this.registry = new WatchRegistry(this.watcher)
		}
		this.router = new FilesystemEventRouter(this)

		this.provenance =
			options.provenance === false
				? null
				: ProvenanceStore.open(this.directories.provenanceDbPath)

		this.gate = new BackpressureController({
			maxConcurrent: options.config.maxConcurrentDownloads,
			maxBytesInFlight: options.config.maxBytesInFlight,
		})

		this.installer = new ContentInstaller({
			library: new ContentLibrary(this.directories.contentLibraryDir),
			gate: this.gate,
			metadata: this.metadata,
			progress: new ProgressReporter(tracker =>
				this.send({ type: "progress", tracker }),
			),
			userAgent: options.config.userAgent,
			provenance: this.provenance,
			dispatcher: options.dispatcher,
		})
	}

	/**
	 * Create the launcher layout, discover existing instances and start the
	 * control loop.
	 */
	static async start(options: BackendOptions): Promise<Backend> {
		const backend = new Backend(options)
		await backend.discover()
		backend.loop = backend.runLoop()
		return backend
	}

	private async discover(): Promise<void> {
		const { instancesDir, contentLibraryDir } = this.directories
		await mkdir(instancesDir, { recursive: true })
		await mkdir(contentLibraryDir, { recursive: true })

		this.registry.watch(instancesDir, WatchTargets.instancesRoot())

		const entries = await readdir(instancesDir, { withFileTypes: true })
		for (const entry of entries) {
			if (!entry.isDirectory()) continue
			await this.loadInstance(join(instancesDir, entry.name))
		}
		log.backend.info(
			{
				instances: this.store.size,
				watched: this.registry.size,
				dir: instancesDir,
			},
			"instances discovered",
		)
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Control loop
	// ─────────────────────────────────────────────────────────────────────────

	private async runLoop(): Promise<void> {
		while (!this.closed) {
			await this.wake.wait(this.config.tickIntervalMs)
			if (this.closed) break
			try {
				this.tick()
			} catch (err) {
				log.backend.error({ err }, "tick failed")
			}
		}
	}

	/**
	 * Publish every finished load, then start reloads owed to dirty
	 * resources when autoReload is on.
	 */
	tick(): void {
		for (const instance of this.store.values()) {
			const worlds = instance.finishLoadWorlds()
			if (worlds !== null) {
				this.syncLevelWatches(instance)
				this.send({ type: "worlds-updated", id: instance.id, worlds })
			}

			const servers = instance.finishLoadServers()
			if (servers !== null) {
				this.send({ type: "servers-updated", id: instance.id, servers })
			}

			const mods = instance.finishLoadMods()
			if (mods !== null) {
				log.loader.debug(
					{
						id: idKey(instance.id),
						mods: mods.length,
						generation: instance.currentModsGeneration,
						cached: this.metadata.cacheSize,
					},
					"mods published",
				)
				this.send({ type: "mods-updated", id: instance.id, mods })
			}

			if (this.config.autoReload) {
				if (instance.worlds.state === "loaded-dirty") {
					this.startLoadWorlds(instance.id)
				}
				if (instance.servers.state === "loaded-dirty") {
					this.startLoadServers(instance.id)
				}
				if (instance.mods.state === "loaded-dirty") {
					this.startLoadMods(instance.id)
				}
			}
		}
		this.sendLoadStates()
	}

	/** Send load-state messages for every pipeline whose state changed */
	private sendLoadStates(): void {
		for (const instance of this.store.values()) {
			for (const resource of RESOURCES) {
				const state = instance[resource].state
				const key = `${idKey(instance.id)}:${resource}`
				if (this.sentStates.get(key) === state) continue
				this.sentStates.set(key, state)
				this.send({ type: "load-state", id: instance.id, resource, state })
			}
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Filesystem events
	// ─────────────────────────────────────────────────────────────────────────

	/** Queue a raw batch behind any batch still being applied */
	handleRawBatch(batch: readonly RawFsEvent[]): Promise<void> {
		const run = async (): Promise<void> => {
			const events = coalesceEvents(batch)
			if (events.length === 0) return
			log.watch.debug({ raw: batch.length, events: events.length }, "batch")
			await this.router.handleBatch(events)
			this.sendLoadStates()
		}
		const next = this.batchChain.then(run)
		this.batchChain = next.catch((err: unknown) => {
			log.backend.error({ err }, "filesystem batch failed")
		})
		return next
	}

	private handleWatchError(err: unknown): void {
		this.send({
			type: "error",
			message: `Filesystem watcher error, instances may be out of sync: ${errorMessage(err)}`,
		})
	}

	// ─────────────────────────────────────────────────────────────────────────
	// RouterContext
	// ─────────────────────────────────────────────────────────────────────────

	async loadInstance(path: string): Promise<void> {
		if (this.store.findByRoot(path)) {
			await this.reloadInstance(path)
			return
		}

		try {
			const attributes = await loadInstanceFromFolder(path)
			const instance = new Instance(attributes)
			const id = this.store.insert(instance)
			this.registry.watch(path, WatchTargets.instanceDir(id))
			log.instance.info({ path, id: idKey(id) }, "instance loaded")
			this.send({ type: "instance-added", ...instance.describe() })
		} catch (err) {
			const notDir =
				err instanceof InstanceLoadError && err.kind === "not-a-directory"
			if (notDir) return
			log.instance.warn({ err, path }, "invalid instance folder")
			this.registry.watch(path, WatchTargets.invalidInstanceDir())
		}
	}

	async reloadInstance(path: string): Promise<void> {
		const target = this.registry.get(path)
		if (target?.kind !== "instance-dir") {
			// An invalid folder may have become a valid one
			if (target) this.registry.remove(path)
			const existing = this.store.findByRoot(path)
			if (existing) this.removeInstance(existing.id)
			await this.loadInstance(path)
			return
		}

		const instance = this.store.get(target.id)
		if (!instance) return
		try {
			const attributes = await loadInstanceFromFolder(path)
			instance.copyBasicAttributes(attributes)
			this.send({ type: "instance-modified", ...instance.describe() })
		} catch (err) {
			log.instance.warn({ err, path }, "instance became invalid")
			this.removeInstance(target.id)
			this.registry.watch(path, WatchTargets.invalidInstanceDir())
		}
	}

	removeInstance(id: InstanceId): void {
		const instance = this.store.remove(id)
		this.registry.removeInstance(id)
		if (!instance) return
		for (const resource of RESOURCES) {
			this.sentStates.delete(`${idKey(id)}:${resource}`)
		}
		log.instance.info(
			{ path: instance.rootPath, id: idKey(id) },
			"instance removed",
		)
		this.send({ type: "instance-removed", id })
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Loads
	// ─────────────────────────────────────────────────────────────────────────

	startLoadWorlds(id: InstanceId): StartLoadResult {
		const instance = this.store.get(id)
		if (!instance) return "none"
		const result = instance.startLoadWorlds(this.wake)
		if (result !== "none") {
			this.ensureWatch(instance.paths.saves, WatchTargets.savesDir(id))
		}
		return result
	}

	startLoadServers(id: InstanceId): StartLoadResult {
		const instance = this.store.get(id)
		if (!instance) return "none"
		const result = instance.startLoadServers(this.wake)
		if (result !== "none") {
			const target = WatchTargets.serversFile(id)
			this.ensureWatch(instance.paths.serversDat, target)
		}
		return result
	}

	startLoadMods(id: InstanceId): StartLoadResult {
		const instance = this.store.get(id)
		if (!instance) return "none"
		const result = instance.startLoadMods(this.wake, this.metadata)
		if (result !== "none") {
			this.ensureWatch(instance.paths.mods, WatchTargets.modsDir(id))
		}
		return result
	}

	/** Request a load of one resource and report the new states */
	requestLoad(id: InstanceId, resource: InstanceResource): StartLoadResult {
		let result: StartLoadResult
		switch (resource) {
			case "worlds":
				result = this.startLoadWorlds(id)
				break
			case "servers":
				result = this.startLoadServers(id)
				break
			case "mods":
				result = this.startLoadMods(id)
				break
		}
		this.sendLoadStates()
		return result
	}

	private ensureWatch(path: string, target: WatchTarget): void {
		if (!this.registry.has(path)) this.registry.watch(path, target)
	}

	/** Watch every world folder of the snapshot and drop vanished ones */
	private syncLevelWatches(instance: Instance): void {
		const worlds = instance.worlds.current ?? []
		const wanted = new Set(worlds.map(w => w.levelPath))
		const watched = this.registry.pathsFor(instance.id, "instance-level-dir")
		for (const path of watched) {
			if (!wanted.has(path)) this.registry.remove(path)
		}
		for (const path of wanted) {
			this.ensureWatch(path, WatchTargets.levelDir(instance.id))
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Commands
	// ─────────────────────────────────────────────────────────────────────────

	listInstances(): InstanceDescription[] {
		return this.store.sorted().map(instance => instance.describe())
	}

	getMod(id: InstanceId, modId: ModId): InstalledMod | null {
		return this.store.get(id)?.getMod(modId) ?? null
	}

	/**
	 * Create an instance folder with its info file and load it right away.
	 * A taken folder name gets a numeric suffix.
	 */
	async createInstance(
		name: string,
		version: string,
		loader: Loader,
	): Promise<InstanceId> {
		const safe = SafePath.parse(name.trim())
		if (safe === null || safe.toString().includes("/")) {
			throw new InstanceLoadError(
				"invalid-info",
				name,
				`Invalid instance name: ${name}`,
			)
		}

		const base = safe.fileName
		let folder = base
		const { instancesDir } = this.directories
		for (let n = 2; await exists(join(instancesDir, folder)); n++) {
			folder = `${base} (${n})`
		}

		const root = join(instancesDir, folder)
		await writeInstanceInfo(root, { name: base, version, loader })
		await this.loadInstance(root)

		const instance = this.store.findByRoot(root)
		if (!instance) {
			throw new InstanceLoadError(
				"io",
				root,
				`Failed to load new instance at ${root}`,
			)
		}
		return instance.id
	}

	instanceDotMinecraft(id: InstanceId): string | null {
		return this.store.get(id)?.paths.dotMinecraft ?? null
	}

	setReloadModsImmediately(id: InstanceId): void {
		this.store.get(id)?.setReloadModsImmediately()
	}

	/** Run an install; failures are reported as an error message and rethrown */
	async install(request: ContentInstall): Promise<InstallResult> {
		try {
			return await this.installer.install(request, this)
		} catch (err) {
			log.install.error({ err }, "install failed")
			this.send({ type: "error", message: errorMessage(err) })
			throw err
		}
	}

	async close(): Promise<void> {
		if (this.closed) return
		this.closed = true
		this.wake.notify()
		await this.loop
		await this.batchChain
		await this.gate.drain()
		await this.watcher?.close()
		this.provenance?.close()
	}
}

async function exists(path: string): Promise<boolean> {
	try {
		await stat(path)
		return true
	} catch (err) {
		if (isNotFound(err)) return false
		throw err
	}
}
