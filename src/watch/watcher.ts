/**
 * chokidar watch adapter
 *
 * One chokidar watcher per registered path, translated into raw events and
 * delivered in debounced batches: a batch is flushed once no new event has
 * arrived for `debounceMs`.
 */

import { watch as watchPath, type FSWatcher, type WatchOptions } from "chokidar"
import { log } from "../logger.js"
import type { RawEventKind, RawFsEvent } from "./classifier.js"
import type { WatchSubscriber } from "./registry.js"

export type ChokidarEventName =
	| "add"
	| "addDir"
	| "change"
	| "unlink"
	| "unlinkDir"

export interface ChokidarWatcherOptions {
	debounceMs: number
	onBatch: (batch: RawFsEvent[]) => void
	onError: (err: unknown) => void
}

const WATCHER_OPTIONS: WatchOptions = {
	ignoreInitial: true,
	persistent: true,
	followSymlinks: false,
	ignorePermissionErrors: true,
	awaitWriteFinish: false,
}

export function rawEventFromChokidar(
	eventName: ChokidarEventName,
	path: string,
): RawFsEvent {
	let kind: RawEventKind
	switch (eventName) {
		case "add":
			kind = { type: "create", subtype: "file" }
			break
		case "addDir":
			kind = { type: "create", subtype: "folder" }
			break
		case "change":
			kind = { type: "modify-data", subtype: "content" }
			break
		case "unlink":
			kind = { type: "remove", subtype: "file" }
			break
		case "unlinkDir":
			kind = { type: "remove", subtype: "folder" }
			break
	}
	return { kind, paths: [path] }
}

export class ChokidarWatcher implements WatchSubscriber {
	private readonly watchers = new Map<string, FSWatcher>()
	private pending: RawFsEvent[] = []
	private timer: ReturnType<typeof setTimeout> | null = null
	private closed = false

	constructor(private readonly options: ChokidarWatcherOptions) {}

	watch(path: string, recursive: boolean): void {
		if (this.closed || this.watchers.has(path)) return

		const watcher = watchPath(path, {
			...WATCHER_OPTIONS,
			...(recursive ? {} : { depth: 0 }),
		})
		watcher.on("all", (eventName, eventPath) => {
			this.push(rawEventFromChokidar(eventName, eventPath))
		})
		watcher.on("error", err => {
			log.watch.error({ err, path }, "watcher error")
			this.options.onError(err)
		})
		this.watchers.set(path, watcher)
	}

	unwatch(path: string): void {
		const watcher = this.watchers.get(path)
		if (!watcher) return
		this.watchers.delete(path)
		watcher.close().catch((err: unknown) => {
			log.watch.warn({ err, path }, "failed to close watcher")
		})
	}

	/** Deliver whatever is buffered right away */
	flush(): void {
		if (this.timer) {
			clearTimeout(this.timer)
			this.timer = null
		}
		if (this.pending.length === 0) return
		const batch = this.pending
		this.pending = []
		this.options.onBatch(batch)
	}

	async close(): Promise<void> {
		this.closed = true
		if (this.timer) {
			clearTimeout(this.timer)
			this.timer = null
		}
		this.pending = []
		const watchers = [...this.watchers.values()]
		this.watchers.clear()
		await Promise.all(watchers.map(w => w.close()))
	}

	private push(event: RawFsEvent): void {
		if (this.closed) return
		this.pending.push(event)
		if (this.timer) clearTimeout(this.timer)
		this.timer = setTimeout(() => {
			this.timer = null
			this.flush()
		}, this.options.debounceMs)
	}
}
