/**
 * Structured JSON logging for logshim
 *
 * Every adapter component logs through a child of one root logger, tagged
 * with its `component` and identity fields (group, stream, client id).
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging, 'trace' covers per-event detail
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
	trace: 4,
}

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Per-event detail (every read, every write). Optional so that host
	 * loggers without a trace level can be passed in as they are.
	 */
	trace?(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

class JsonLogger implements Logger {
	private readonly level: LogLevel
	private readonly defaultContext: Record<string, unknown>

	constructor(level: LogLevel = 'info', defaultContext: Record<string, unknown> = {}) {
		this.level = level
		this.defaultContext = defaultContext
	}

	private shouldLog(level: LogLevel): boolean {
		return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[this.level]
	}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (!this.shouldLog(level)) {
			return
		}

		const entry = {
			level,
			message,
			timestamp: new Date().toISOString(),
			...this.defaultContext,
			...context,
		}

		const output = JSON.stringify(entry, jsonReplacer)

		if (level === 'error' || level === 'warn') {
			console.error(output)
		} else {
			console.log(output)
		}
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context)
	}

	trace(message: string, context?: Record<string, unknown>): void {
		this.log('trace', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext })
	}
}

// bigint offsets and Error causes show up in log context
function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === 'bigint') {
		return value.toString()
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message }
	}
	return value
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	trace(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON console logger
 *
 * Errors and warnings go to stderr, everything else to stdout.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { app: 'billing' })
 * logger.info('subscribed', { topics: ['orders'] })
 * // {"level":"info","message":"subscribed","timestamp":"...","app":"billing","topics":["orders"]}
 * ```
 */
export function createLogger(level: LogLevel = 'info', defaultContext: Record<string, unknown> = {}): Logger {
	return new JsonLogger(level, defaultContext)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()

/**
 * Log at trace level when the logger has one
 */
export function trace(logger: Logger, message: string, context?: Record<string, unknown>): void {
	logger.trace?.(message, context)
}
