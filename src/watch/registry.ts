/**
 * Watch registry
 *
 * Maps every watched absolute path to the one WatchTarget it stands for and
 * keeps the OS subscription for that path alive. Paths are stored resolved, so
 * `a/b/` and `a/b` are the same key.
 */

import { dirname, resolve } from "node:path"
import type { InstanceId } from "../arena.js"
import { sameId } from "../arena.js"
import { log } from "../logger.js"
import { isInstanceTarget, type WatchTarget } from "./targets.js"

/**
 * Something that can subscribe to OS notifications for one path.
 * The chokidar adapter implements it; tests use an in-memory recorder.
 */
export interface WatchSubscriber {
	watch(path: string, recursive: boolean): void
	unwatch(path: string): void
}

export class WatchRegistry {
	private readonly targets = new Map<string, WatchTarget>()

	constructor(private readonly subscriber: WatchSubscriber) {}

	get size(): number {
		return this.targets.size
	}

	/**
	 * Register (or relabel) a path. A path already subscribed keeps its
	 * subscription and only changes meaning.
	 */
	watch(path: string, target: WatchTarget): void {
		const key = resolve(path)
		const existing = this.targets.has(key)
		this.targets.set(key, target)
		if (!existing) {
			this.subscriber.watch(key, false)
		}
		log.watch.debug({ path: key, target: target.kind }, "watching")
	}

	get(path: string): WatchTarget | undefined {
		return this.targets.get(resolve(path))
	}

	has(path: string): boolean {
		return this.targets.has(resolve(path))
	}

	/** Target registered on the parent directory of path */
	getParent(path: string): WatchTarget | undefined {
		const key = resolve(path)
		const parent = dirname(key)
		if (parent === key) return undefined
		return this.targets.get(parent)
	}

	remove(path: string): WatchTarget | undefined {
		const key = resolve(path)
		const target = this.targets.get(key)
		if (target === undefined) return undefined
		this.targets.delete(key)
		this.subscriber.unwatch(key)
		log.watch.debug({ path: key, target: target.kind }, "unwatched")
		return target
	}

	/**
	 * Drop every path belonging to the instance. With keepRoot, the
	 * instance-dir entry itself survives (used when relocating).
	 */
	removeInstance(id: InstanceId, options: { keepRoot?: boolean } = {}): void {
		for (const [path, target] of [...this.targets]) {
			if (!isInstanceTarget(target) || !sameId(target.id, id)) continue
			if (options.keepRoot && target.kind === "instance-dir") continue
			this.remove(path)
		}
	}

	/** Paths currently registered with the given kind for an instance */
	pathsFor(id: InstanceId, kind: WatchTarget["kind"]): string[] {
		const paths: string[] = []
		for (const [path, target] of this.targets) {
			if (
				target.kind === kind &&
				isInstanceTarget(target) &&
				sameId(target.id, id)
			) {
				paths.push(path)
			}
		}
		return paths
	}

	/** True when the parent directory of path is the instances root */
	parentIsInstancesRoot(path: string): boolean {
		return this.getParent(path)?.kind === "instances-root"
	}
}
