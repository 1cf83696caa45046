/**
 * Interceptor chain shared by the consumer and producer
 *
 * Interceptors run in registration order. Each stage is isolated: when an
 * interceptor throws, the failure is logged, that interceptor is skipped and
 * the value produced by the previous stage flows on. Nothing an interceptor
 * does can abort the surrounding poll or send.
 */

import { toError } from '@/client/errors.js'
import type { Logger } from '@/logger.js'

/**
 * Hooks every interceptor may implement
 */
export interface Interceptor {
	/** Name used in log entries; defaults to the constructor name */
	readonly name?: string
	/** Called once when the owning consumer or producer closes */
	close?(): void | Promise<void>
}

export function interceptorName(interceptor: Interceptor): string {
	return interceptor.name ?? interceptor.constructor.name
}

export class InterceptorChain<I extends Interceptor> {
	private readonly interceptors: readonly I[]
	private readonly logger: Logger

	constructor(interceptors: readonly I[], logger: Logger) {
		this.interceptors = [...interceptors]
		this.logger = logger
	}

	get size(): number {
		return this.interceptors.length
	}

	/**
	 * Thread a value through one stage of every interceptor
	 *
	 * @param stage - Hook name, for logging
	 * @param apply - Runs the hook of one interceptor on the current value
	 */
	transform<T>(value: T, stage: string, apply: (interceptor: I, current: T) => T): T {
		let current = value
		for (const interceptor of this.interceptors) {
			try {
				current = apply(interceptor, current)
			} catch (error) {
				this.logFailure(interceptor, stage, error)
			}
		}
		return current
	}

	/**
	 * Run a side-effect hook of every interceptor
	 */
	notify(stage: string, call: (interceptor: I) => void): void {
		for (const interceptor of this.interceptors) {
			try {
				call(interceptor)
			} catch (error) {
				this.logFailure(interceptor, stage, error)
			}
		}
	}

	async close(): Promise<void> {
		for (const interceptor of this.interceptors) {
			if (!interceptor.close) {
				continue
			}
			try {
				await interceptor.close()
			} catch (error) {
				this.logFailure(interceptor, 'close', error)
			}
		}
	}

	private logFailure(interceptor: I, stage: string, error: unknown): void {
		this.logger.warn('interceptor failed, skipping it', {
			interceptor: interceptorName(interceptor),
			stage,
			error: toError(error).message,
		})
	}
}
