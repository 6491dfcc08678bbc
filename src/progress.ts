/**
 * Progress trackers for long-running backend work
 *
 * A tracker is a title plus count/total, a finish type and an error flag.
 * Changes are forwarded to the reporter's sink at most once every
 * `throttleMs`; terminal updates (finish, failure) are always forwarded.
 */

import type { ProgressFinishType, ProgressSnapshot } from "./types.js"

export type ProgressSink = (snapshot: ProgressSnapshot) => void

export class ProgressTracker {
	private count = 0
	private total: number
	private finished: ProgressFinishType | null = null
	private error = false
	private lastEmit = 0

	constructor(
		readonly id: number,
		private title: string,
		total: number,
		private readonly reporter: ProgressReporter,
	) {
		this.total = total
	}

	addCount(delta: number): void {
		this.count += delta
		this.changed(false)
	}

	finish(type: ProgressFinishType): void {
		if (this.finished !== null) return
		this.finished = type
		this.count = this.total
		this.changed(true)
	}

	fail(): void {
		this.error = true
		this.finished ??= "slow"
		this.changed(true)
	}

	snapshot(): ProgressSnapshot {
		return {
			id: this.id,
			title: this.title,
			count: this.count,
			total: this.total,
			finished: this.finished,
			error: this.error,
		}
	}

	private changed(terminal: boolean): void {
		const now = this.reporter.now()
		if (!terminal && now - this.lastEmit < this.reporter.throttleMs) return
		this.lastEmit = now
		this.reporter.emit(this.snapshot())
	}
}

export interface ProgressReporterOptions {
	throttleMs?: number | undefined
	/** Clock override for tests */
	now?: (() => number) | undefined
}

export class ProgressReporter {
	readonly throttleMs: number
	readonly now: () => number
	private nextId = 1

	constructor(
		private readonly sink: ProgressSink,
		options: ProgressReporterOptions = {},
	) {
		this.throttleMs = options.throttleMs ?? 100
		this.now = options.now ?? Date.now
	}

	create(title: string, total = 0): ProgressTracker {
		const tracker = new ProgressTracker(this.nextId++, title, total, this)
		this.emit(tracker.snapshot())
		return tracker
	}

	emit(snapshot: ProgressSnapshot): void {
		this.sink(snapshot)
	}
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
	if (bytes === 0) return "0 B"
	const k = 1024
	const sizes = ["B", "KB", "MB", "GB"]
	const i = Math.min(
		Math.floor(Math.log(bytes) / Math.log(k)),
		sizes.length - 1,
	)
	return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i] ?? "B"}`
}
