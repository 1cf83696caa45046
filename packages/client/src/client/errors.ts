/**
 * Adapter error hierarchy
 *
 * Usage errors (illegal argument/state, unsupported operation) are raised to
 * the caller and never retried. Stream faults come from the backing store.
 */

/**
 * Base class for all adapter errors
 */
export class AdapterError extends Error {
	/** Whether retrying the same call can succeed */
	readonly retriable: boolean

	constructor(message: string, options: { retriable?: boolean; cause?: unknown } = {}) {
		super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
		this.name = 'AdapterError'
		this.retriable = options.retriable ?? false

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * An argument is outside the accepted range (e.g. a negative poll timeout)
 */
export class IllegalArgumentError extends AdapterError {
	constructor(message: string) {
		super(message)
		this.name = 'IllegalArgumentError'
	}
}

/**
 * The instance is in a state that does not allow the call
 * (closed, or polling without a subscription)
 */
export class IllegalStateError extends AdapterError {
	constructor(message: string) {
		super(message)
		this.name = 'IllegalStateError'
	}
}

/**
 * The emulated API offers the operation but the backing store has no
 * counterpart for it
 */
export class UnsupportedOperationError extends AdapterError {
	readonly operation: string

	constructor(operation: string, reason = 'is not supported') {
		super(`${operation} ${reason}`)
		this.name = 'UnsupportedOperationError'
		this.operation = operation
	}
}

/**
 * A reader lost its place in the reader group and must be recreated.
 * Raised by the stream backend; the consumer propagates it out of poll()
 * and the caller is expected to subscribe again.
 */
export class ReinitializationRequiredError extends AdapterError {
	readonly stream: string
	readonly readerGroup: string

	constructor(stream: string, readerGroup: string) {
		super(`Reader for stream ${stream} in group ${readerGroup} requires reinitialization`)
		this.name = 'ReinitializationRequiredError'
		this.stream = stream
		this.readerGroup = readerGroup
	}
}

/**
 * A write failed. This is the uniform error shape handed to send callbacks;
 * the underlying fault is kept as `cause`.
 */
export class SendError extends AdapterError {
	readonly topic: string

	constructor(topic: string, cause: unknown) {
		const causeStr = cause instanceof Error ? `: ${cause.message}` : ''
		super(`Writing event to ${topic} failed${causeStr}`, { cause, retriable: true })
		this.name = 'SendError'
		this.topic = topic
	}
}

/**
 * Invalid or missing configuration
 */
export class ConfigError extends AdapterError {
	readonly field: string

	constructor(field: string, message: string) {
		super(`Invalid configuration for ${field}: ${message}`)
		this.name = 'ConfigError'
		this.field = field
	}
}

/**
 * A value could not be encoded or decoded
 */
export class CodecError extends AdapterError {
	constructor(message: string, cause?: unknown) {
		super(message, { cause })
		this.name = 'CodecError'
	}
}

/**
 * Check if an error is an AdapterError
 */
export function isAdapterError(error: unknown): error is AdapterError {
	return error instanceof AdapterError
}

/**
 * Check if an error is retriable
 */
export function isRetriable(error: unknown): boolean {
	if (isAdapterError(error)) {
		return error.retriable
	}
	return false
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error))
}
