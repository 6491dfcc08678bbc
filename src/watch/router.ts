/**
 * Filesystem event router
 *
 * Applies classified events to the instance model. What an event means
 * depends on the watch target registered on its path or, failing that, on
 * its parent directory: a new folder under the instances root is a new
 * instance, a file appearing in a mods folder dirties that instance's mods,
 * and so on.
 *
 * The router never scans anything itself. It only marks pipelines dirty,
 * registers or drops watches, and asks its context to (re)load instances.
 */

import { basename, dirname, resolve } from "node:path"
import { idKey, type InstanceId } from "../arena.js"
import { INSTANCE_INFO_FILE } from "../directories.js"
import type { Instance } from "../instance/instance.js"
import type { InstanceStore } from "../instance/store.js"
import { log } from "../logger.js"
import type { MessageSink, StartLoadResult } from "../types.js"
import type { FilesystemEvent } from "./classifier.js"
import type { WatchRegistry } from "./registry.js"
import { WatchTargets } from "./targets.js"

export interface RouterContext {
	readonly registry: WatchRegistry
	readonly store: InstanceStore
	readonly send: MessageSink
	/** Load path as a new instance, or register it as an invalid instance dir */
	loadInstance(path: string): Promise<void>
	/** Re-read info.json of an instance (or invalid) dir, keeping its id */
	reloadInstance(path: string): Promise<void>
	/** Forget an instance and every watch belonging to it */
	removeInstance(id: InstanceId): void
	startLoadMods(id: InstanceId): StartLoadResult
}

export class FilesystemEventRouter {
	constructor(private readonly ctx: RouterContext) {}

	/**
	 * Apply a coalesced batch in order, then start the mod reloads that were
	 * requested for immediate pickup.
	 */
	async handleBatch(events: readonly FilesystemEvent[]): Promise<void> {
		const reloadMods = new Map<string, InstanceId>()
		for (const event of events) {
			await this.handleEvent(event, reloadMods)
		}
		for (const id of reloadMods.values()) {
			this.ctx.startLoadMods(id)
		}
	}

	async handleEvent(
		event: FilesystemEvent,
		reloadMods: Map<string, InstanceId>,
	): Promise<void> {
		log.router.trace({ event }, "filesystem event")
		switch (event.type) {
			case "changed":
				return this.handleChanged(
					resolve(event.path),
					event.maybeFile,
					event.maybeFolder,
					reloadMods,
				)
			case "remove":
				return this.handleRemove(resolve(event.path))
			case "rename":
				return this.handleRename(
					resolve(event.from),
					resolve(event.to),
					reloadMods,
				)
		}
	}

	private instance(id: InstanceId): Instance | null {
		const instance = this.ctx.store.get(id)
		if (!instance) {
			log.router.debug(
				{ id: idKey(id) },
				"watch target for a missing instance",
			)
		}
		return instance
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Changed
	// ─────────────────────────────────────────────────────────────────────────

	private async handleChanged(
		path: string,
		maybeFile: boolean,
		maybeFolder: boolean,
		reloadMods: Map<string, InstanceId>,
	): Promise<void> {
		const { registry } = this.ctx

		const self = registry.get(path)
		if (self?.kind === "servers-file") {
			this.instance(self.id)?.markServersDirty()
			return
		}

		const parent = registry.getParent(path)
		if (!parent) {
			log.router.trace({ path }, "no watch target for path or parent")
			return
		}

		switch (parent.kind) {
			case "instances-root":
				if (!maybeFolder) return
				if (
					self?.kind === "instance-dir" ||
					self?.kind === "invalid-instance-dir"
				) {
					await this.ctx.reloadInstance(path)
				} else {
					await this.ctx.loadInstance(path)
				}
				return
			case "instance-dir":
			case "invalid-instance-dir":
				if (maybeFile && basename(path) === INSTANCE_INFO_FILE) {
					await this.ctx.reloadInstance(dirname(path))
				}
				return
			case "instance-level-dir":
				this.instance(parent.id)?.markWorldsDirty(dirname(path))
				return
			case "instance-saves-dir":
				this.instance(parent.id)?.markWorldsDirty(path)
				return
			case "instance-mods-dir": {
				const instance = this.instance(parent.id)
				if (!instance) return
				instance.markModsDirty(path)
				if (instance.takeReloadModsImmediately()) {
					reloadMods.set(idKey(parent.id), parent.id)
				}
				return
			}
			case "servers-file":
				return
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Remove
	// ─────────────────────────────────────────────────────────────────────────

	private async handleRemove(path: string): Promise<void> {
		const { registry } = this.ctx

		const self = registry.get(path)
		if (self) {
			switch (self.kind) {
				case "instances-root":
					log.router.error({ path }, "instances folder removed")
					this.ctx.send({
						type: "error",
						message: `The instances folder was removed: ${path}`,
					})
					return
				case "instance-dir":
					this.ctx.removeInstance(self.id)
					return
				case "invalid-instance-dir":
					registry.remove(path)
					return
				case "instance-level-dir":
					registry.remove(path)
					this.instance(self.id)?.markWorldsDirty(path)
					return
				case "instance-saves-dir":
					registry.remove(path)
					this.instance(self.id)?.markAllWorldsDirty()
					return
				case "instance-mods-dir":
					registry.remove(path)
					this.instance(self.id)?.markAllModsDirty()
					return
				case "servers-file":
					// The game replaces servers.dat on save; keep watching the path
					registry.remove(path)
					registry.watch(path, WatchTargets.serversFile(self.id))
					this.instance(self.id)?.markServersDirty()
					return
			}
		}

		const parent = registry.getParent(path)
		if (!parent) return

		switch (parent.kind) {
			case "instance-dir":
				if (basename(path) === INSTANCE_INFO_FILE) {
					const root = dirname(path)
					this.ctx.removeInstance(parent.id)
					registry.watch(root, WatchTargets.invalidInstanceDir())
				}
				return
			case "instance-level-dir":
				this.instance(parent.id)?.markWorldsDirty(dirname(path))
				return
			case "instance-saves-dir":
				this.instance(parent.id)?.markWorldsDirty(path)
				return
			case "instance-mods-dir":
				this.instance(parent.id)?.markModsDirty(path)
				return
			case "instances-root":
			case "invalid-instance-dir":
			case "servers-file":
				return
		}
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Rename
	// ─────────────────────────────────────────────────────────────────────────

	private async handleRename(
		from: string,
		to: string,
		reloadMods: Map<string, InstanceId>,
	): Promise<void> {
		const { registry } = this.ctx

		const self = registry.get(from)
		if (!self) {
			await this.handleRemove(from)
			await this.handleChanged(to, true, true, reloadMods)
			return
		}

		switch (self.kind) {
			case "instance-dir": {
				if (!registry.parentIsInstancesRoot(to)) {
					this.ctx.removeInstance(self.id)
					return
				}
				const instance = this.instance(self.id)
				if (!instance) return
				const oldName = instance.name
				registry.removeInstance(self.id)
				instance.name = basename(to)
				instance.relocate(to)
				registry.watch(to, WatchTargets.instanceDir(self.id))
				this.ctx.send({
					type: "info",
					message: `Instance '${oldName}' renamed to '${instance.name}'`,
				})
				this.ctx.send({ type: "instance-modified", ...instance.describe() })
				return
			}
			case "invalid-instance-dir":
				registry.remove(from)
				if (registry.parentIsInstancesRoot(to) && !registry.has(to)) {
					registry.watch(to, WatchTargets.invalidInstanceDir())
				}
				return
			case "instance-level-dir": {
				registry.remove(from)
				const instance = this.instance(self.id)
				if (!instance) return
				instance.markWorldsDirty(from)
				if (dirname(from) === dirname(to)) instance.markWorldsDirty(to)
				return
			}
			case "servers-file":
			case "instances-root":
			case "instance-saves-dir":
			case "instance-mods-dir":
				await this.handleRemove(from)
				return
		}
	}
}
