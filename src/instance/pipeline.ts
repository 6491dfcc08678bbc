/**
 * Background load pipeline for one instance resource
 *
 * A pipeline owns the current snapshot, the change hints that arrived since
 * it was taken, and at most one in-flight loader task. Loads are started
 * explicitly and observed by polling: the task only sets a finished slot and
 * pokes the wake signal, and finishLoad() publishes from the control loop.
 *
 * Every publish is tagged with the epoch it was started in. invalidate()
 * bumps the epoch, so a task started before a relocation can finish but its
 * result is dropped.
 */

import { errorMessage } from "../errors.js"
import { log } from "../logger.js"
import type { LoadState, StartLoadResult } from "../types.js"
import type { WakeSignal } from "../wake.js"

/**
 * Produces a snapshot. `previous` is null for an initial load; `dirty` holds
 * the change hints drained for this load.
 */
export type Loader<T> = (
	previous: T | null,
	dirty: ReadonlySet<string>,
) => Promise<T>

/** Change hints a load consumed, handed back if it fails */
interface Drained {
	paths: ReadonlySet<string>
	flag: boolean
}

type Outcome<T> =
	| { ok: true; epoch: number; value: T }
	| { ok: false; epoch: number; error: unknown; drained: Drained }

export class LoadPipeline<T> {
	private _state: LoadState = "unloaded"
	private snapshot: T | null = null
	private readonly dirtyPaths = new Set<string>()
	private dirtyFlag = false
	private inFlight = false
	private outcome: Outcome<T> | null = null
	private epoch = 0

	constructor(
		private readonly name: string,
		private readonly empty: () => T,
	) {}

	get state(): LoadState {
		return this._state
	}

	get current(): T | null {
		return this.snapshot
	}

	get loading(): boolean {
		return this.inFlight
	}

	/** Pending change hints not yet handed to a loader */
	get dirty(): ReadonlySet<string> {
		return this.dirtyPaths
	}

	/**
	 * Record a change hint. Without a path the whole resource is dirty.
	 * Returns true when the hint was new.
	 */
	markDirty(path?: string): boolean {
		if (path === undefined) {
			if (this.dirtyFlag) return false
			this.dirtyFlag = true
		} else {
			if (this.dirtyPaths.has(path)) return false
			this.dirtyPaths.add(path)
		}
		this.transitionDirty()
		return true
	}

	markManyDirty(paths: Iterable<string>): boolean {
		let inserted = false
		for (const path of paths) {
			if (!this.dirtyPaths.has(path)) {
				this.dirtyPaths.add(path)
				inserted = true
			}
		}
		if (inserted) this.transitionDirty()
		return inserted
	}

	startLoad(loader: Loader<T>, wake: WakeSignal): StartLoadResult {
		if (this.inFlight) return "none"

		let result: StartLoadResult
		if (this.snapshot === null) {
			result = "initial"
		} else if (this.dirtyFlag || this.dirtyPaths.size > 0) {
			result = "reload"
		} else {
			return "none"
		}

		const previous = this.snapshot
		const dirty = new Set(this.dirtyPaths)
		const drained: Drained = { paths: dirty, flag: this.dirtyFlag }
		this.dirtyPaths.clear()
		this.dirtyFlag = false
		this.inFlight = true
		this.outcome = null
		this._state = "loading"

		const epoch = this.epoch
		log.loader.debug(
			{ resource: this.name, kind: result, dirty: dirty.size },
			"load started",
		)

		loader(previous, dirty)
			.then(
				value => {
					this.outcome = { ok: true, epoch, value }
				},
				(error: unknown) => {
					this.outcome = { ok: false, epoch, error, drained }
				},
			)
			.finally(() => wake.notify())
			.catch((err: unknown) => {
				log.loader.error({ err, resource: this.name }, "wake failed")
			})

		return result
	}

	/**
	 * Publish a finished load. Returns the new snapshot, or null when nothing
	 * was published (still running, idle, or the result was stale).
	 */
	finishLoad(): T | null {
		if (!this.inFlight || this.outcome === null) return null

		const outcome = this.outcome
		this.outcome = null
		this.inFlight = false
		const stillDirty = this._state === "loading-dirty"
		this._state = stillDirty ? "loaded-dirty" : "loaded"

		if (outcome.epoch !== this.epoch) {
			log.loader.debug({ resource: this.name }, "discarding stale load")
			this._state = "loaded-dirty"
			return null
		}

		if (!outcome.ok) {
			log.loader.error(
				{ err: outcome.error, resource: this.name },
				`load failed: ${errorMessage(outcome.error)}`,
			)
			// With no snapshot, publish an empty one and leave the next start
			// an initial load
			if (this.snapshot === null) return this.empty()

			// Keep the previous snapshot and owe another reload for the hints
			// this one consumed
			for (const path of outcome.drained.paths) this.dirtyPaths.add(path)
			if (outcome.drained.flag) this.dirtyFlag = true
			this._state = "loaded-dirty"
			return null
		}

		this.snapshot = outcome.value
		return this.snapshot
	}

	/**
	 * Forget the snapshot and any pending hints; an in-flight result will be
	 * dropped when it lands. The next start is an initial load.
	 */
	invalidate(): void {
		this.epoch++
		this.snapshot = null
		this.dirtyPaths.clear()
		this.dirtyFlag = false
		if (this.inFlight) {
			this._state = "loading-dirty"
		} else if (this._state !== "unloaded") {
			this._state = "loaded-dirty"
		}
	}

	private transitionDirty(): void {
		if (this._state === "loading") this._state = "loading-dirty"
		else if (this._state === "loaded") this._state = "loaded-dirty"
	}
}
