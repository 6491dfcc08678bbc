/**
 * Backpressure controller for download concurrency
 *
 * Limits both the number of concurrent transfers and the total bytes in
 * flight, so a fast network cannot outrun the disk. One controller is shared
 * by every install the backend runs.
 */

export interface BackpressureOptions {
	/** Maximum bytes allowed in flight across all downloads */
	maxBytesInFlight: number
	/** Maximum concurrent download operations */
	maxConcurrent: number
	/** Callback for monitoring (optional) */
	onStateChange?: ((state: BackpressureState) => void) | undefined
}

export interface BackpressureState {
	bytesInFlight: number
	activeTasks: number
	queuedTasks: number
	maxBytesInFlight: number
	maxConcurrent: number
}

interface QueuedTask {
	resolve: () => void
	estimatedBytes: number
}

/**
 * Controls download concurrency based on both file count and byte limits.
 *
 * Usage:
 * ```ts
 * const controller = new BackpressureController({
 *   maxBytesInFlight: 256 * 1024 * 1024,
 *   maxConcurrent: 8,
 * })
 *
 * await controller.run(file.size, () => download(file))
 * ```
 */
export class BackpressureController {
	private bytesInFlight = 0
	private activeTasks = 0
	private readonly queue: QueuedTask[] = []
	private readonly maxBytesInFlight: number
	private readonly maxConcurrent: number
	private readonly onStateChange:
		| ((state: BackpressureState) => void)
		| undefined

	constructor(options: BackpressureOptions) {
		this.maxBytesInFlight = options.maxBytesInFlight
		this.maxConcurrent = options.maxConcurrent
		this.onStateChange = options.onStateChange
	}

	getState(): BackpressureState {
		return {
			bytesInFlight: this.bytesInFlight,
			activeTasks: this.activeTasks,
			queuedTasks: this.queue.length,
			maxBytesInFlight: this.maxBytesInFlight,
			maxConcurrent: this.maxConcurrent,
		}
	}

	private canAcquire(estimatedBytes: number): boolean {
		// Always allow at least one task even if it exceeds byte limit
		// (handles case where single file > maxBytesInFlight)
		if (this.activeTasks === 0) {
			return true
		}

		return (
			this.activeTasks < this.maxConcurrent &&
			this.bytesInFlight + estimatedBytes <= this.maxBytesInFlight
		)
	}

	/**
	 * Acquire a slot for downloading. Resolves when it's safe to proceed.
	 *
	 * @param estimatedBytes - Expected size of the download (use 0 if unknown)
	 */
	async acquire(estimatedBytes: number): Promise<void> {
		if (this.queue.length === 0 && this.canAcquire(estimatedBytes)) {
			this.bytesInFlight += estimatedBytes
			this.activeTasks++
			this.notifyStateChange()
			return
		}

		return new Promise<void>(resolve => {
			this.queue.push({ resolve, estimatedBytes })
			this.notifyStateChange()
		})
	}

	/**
	 * Release a slot after download completes (success or failure).
	 *
	 * @param estimatedBytes - Original estimate passed to acquire()
	 */
	release(estimatedBytes: number): void {
		this.bytesInFlight -= estimatedBytes
		this.activeTasks--

		this.processQueue()
		this.notifyStateChange()
	}

	/**
	 * Hold a slot for the lifetime of fn
	 */
	async run<T>(estimatedBytes: number, fn: () => Promise<T>): Promise<T> {
		await this.acquire(estimatedBytes)
		try {
			return await fn()
		} finally {
			this.release(estimatedBytes)
		}
	}

	private processQueue(): void {
		let next = this.queue[0]
		while (next && this.canAcquire(next.estimatedBytes)) {
			this.queue.shift()
			this.bytesInFlight += next.estimatedBytes
			this.activeTasks++
			next.resolve()
			next = this.queue[0]
		}
	}

	private notifyStateChange(): void {
		if (this.onStateChange) {
			this.onStateChange(this.getState())
		}
	}

	/**
	 * Wait for all active downloads to complete
	 */
	async drain(): Promise<void> {
		while (this.activeTasks > 0 || this.queue.length > 0) {
			await new Promise(resolve => setTimeout(resolve, 50))
		}
	}
}
