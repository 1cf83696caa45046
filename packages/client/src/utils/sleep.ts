/**
 * Timer helpers for the read paths
 */

export interface SleepOptions {
	/**
	 * Ends the sleep early. The in-memory reader uses this to wake up as soon
	 * as an event is appended or the reader is closed.
	 */
	signal?: AbortSignal
	/**
	 * Resolve instead of rejecting when aborted
	 * @default false
	 */
	resolveOnAbort?: boolean
}

/**
 * Sleep for `ms` milliseconds, or until the signal aborts.
 *
 * @throws Error with message "Aborted" if the signal aborts and resolveOnAbort is false
 *
 * @example
 * // Wait up to 500 ms for a wake-up
 * const wake = new AbortController()
 * await sleep(500, { signal: wake.signal, resolveOnAbort: true })
 */
export function sleep(ms: number, options: SleepOptions = {}): Promise<void> {
	const { signal, resolveOnAbort = false } = options

	return new Promise((resolve, reject) => {
		const settleAborted = () => {
			if (resolveOnAbort) {
				resolve()
			} else {
				reject(new Error('Aborted'))
			}
		}

		if (!signal) {
			setTimeout(resolve, ms)
			return
		}
		if (signal.aborted) {
			settleAborted()
			return
		}

		const onAbort = () => {
			clearTimeout(timeout)
			settleAborted()
		}
		const timeout = setTimeout(() => {
			signal.removeEventListener('abort', onAbort)
			resolve()
		}, ms)

		signal.addEventListener('abort', onAbort, { once: true })
	})
}

/**
 * Let queued timers and I/O callbacks run before continuing.
 *
 * A poll whose readers answer from memory never leaves the microtask queue;
 * the poll engine calls this once per pass so that a close() scheduled on a
 * timer still gets its turn.
 */
export function yieldToEventLoop(): Promise<void> {
	return new Promise(resolve => setImmediate(resolve))
}
