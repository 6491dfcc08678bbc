/**
 * Wake signal for the backend control loop.
 *
 * Background loaders call notify() when they finish; the loop awaits wait()
 * between ticks. A notify() with no waiter is remembered as a single permit so
 * a completion that lands between two ticks is never lost.
 */
export class WakeSignal {
	private permit = false
	private waiter: (() => void) | null = null

	notify(): void {
		if (this.waiter) {
			const resolve = this.waiter
			this.waiter = null
			resolve()
		} else {
			this.permit = true
		}
	}

	/** Resolves on the next notify() or after timeoutMs, whichever comes first */
	wait(timeoutMs: number): Promise<void> {
		if (this.permit) {
			this.permit = false
			return Promise.resolve()
		}

		return new Promise<void>(resolve => {
			const timer = setTimeout(() => {
				if (this.waiter === done) this.waiter = null
				resolve()
			}, timeoutMs)
			const done = (): void => {
				clearTimeout(timer)
				resolve()
			}
			this.waiter = done
		})
	}
}
