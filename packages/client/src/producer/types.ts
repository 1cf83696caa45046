/**
 * Producer type definitions
 */

import type { SendError } from '@/client/errors.js'
import type { Interceptor } from '@/interceptors.js'
import type { Logger } from '@/logger.js'

// ==================== Message Types ====================

/**
 * Record to be produced
 *
 * Only `topic` and `value` reach the stream store. Key, headers, partition
 * and timestamp are accepted for compatibility and otherwise ignored.
 */
export interface ProducerRecord<V> {
	topic: string
	value: V
	key?: string | Buffer | null
	headers?: Record<string, string | Buffer>
	partition?: number
	timestamp?: Date
}

/**
 * Completion metadata of a send
 *
 * The stream store does not report positions on write, so partition and
 * offset are placeholders; `timestamp` is the time the send completed.
 */
export interface RecordMetadata {
	topic: string
	partition: number
	offset: bigint
	timestamp: Date
	serializedKeySize: number
	serializedValueSize: number
}

/**
 * Called exactly once per send, after the write settles
 */
export type SendCallback = (metadata: RecordMetadata | null, error: SendError | null) => void

// ==================== Interceptors ====================

/**
 * Producer interceptor
 *
 * `onSend` may rewrite the record before it is written, including its
 * topic. `onAcknowledgement` observes every completion. A throwing hook is
 * skipped for that record.
 */
export interface ProducerInterceptor<V> extends Interceptor {
	onSend(record: ProducerRecord<V>): ProducerRecord<V>
	onAcknowledgement?(metadata: RecordMetadata | null, error: Error | null): void
}

// ==================== Producer Configuration ====================

export interface ProducerConfig<V> {
	/** Interceptors applied to every record, in order */
	interceptors?: readonly ProducerInterceptor<V>[]
	/**
	 * Reject the promise returned by send() with SendError when the write
	 * fails (default: false, the promise resolves with null metadata and only
	 * the callback sees the error)
	 */
	propagateWriteErrors?: boolean
	/** Logger override for this producer */
	logger?: Logger
}

/**
 * Internal resolved producer configuration with all defaults applied
 */
export interface ResolvedProducerConfig<V> {
	scope: string
	clientId: string
	interceptors: readonly ProducerInterceptor<V>[]
	propagateWriteErrors: boolean
}

/**
 * Outcome of one write, observed by both the returned promise and the callback
 */
export type SendCompletion =
	| { ok: true; metadata: RecordMetadata }
	| { ok: false; error: SendError }
