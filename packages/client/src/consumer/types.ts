/**
 * Consumer types and interfaces
 */

import type { Interceptor } from '@/interceptors.js'
import type { Logger } from '@/logger.js'
import type { ConsumerRecords } from './records.js'

export type { TopicPartition, PartitionInfo } from '@/utils/topic-partition.js'

// ==================== Record Types ====================

/**
 * The stream store has no event timestamps
 */
export type TimestampType = 'NoTimestampType'

/**
 * A consumed event with its synthesized identity
 *
 * Only `topic` and `value` carry information; partition, offset and
 * timestamp are fixed placeholders because the stream store has no
 * equivalent addressing.
 */
export interface ConsumerRecord<V> {
	readonly topic: string
	readonly partition: number
	readonly offset: bigint
	readonly timestamp: bigint | null
	readonly timestampType: TimestampType
	readonly key: null
	readonly value: V
	readonly headers: Readonly<Record<string, Buffer>>
}

/**
 * Offset to commit for a topic-partition
 */
export interface OffsetAndMetadata {
	offset: bigint
	metadata?: string
}

export type OffsetMap = ReadonlyMap<string, OffsetAndMetadata>

/**
 * Completion callback of commitAsync()
 */
export type OffsetCommitCallback = (offsets: OffsetMap, error: Error | null) => void

// ==================== Interceptors ====================

/**
 * Consumer interceptor
 *
 * `onConsume` sees every batch returned by poll() and may return a modified
 * batch. A throwing interceptor is skipped for that batch.
 */
export interface ConsumerInterceptor<V> extends Interceptor {
	onConsume(records: ConsumerRecords<V>): ConsumerRecords<V>
	onCommit?(offsets: OffsetMap): void
}

// ==================== Poll Options ====================

/**
 * Per-call overrides of the poll caps
 */
export interface PollOptions {
	/** Most events read from one stream in one pass over the readers */
	maxRecordsPerStreamPerPass?: number
	/** Most events returned by the whole poll */
	maxRecords?: number
}

// ==================== Consumer Configuration ====================

/**
 * Consumer configuration
 */
export interface ConsumerConfig<V> {
	/** Reader group identity (default: a random UUID) */
	groupId?: string
	/** Reader identity within the group (default: 'default-reader') */
	clientId?: string
	/** Timeout of a single event read in ms (default: 500) */
	readTimeoutMs?: number
	/** Most events returned by one poll (default: 500) */
	maxPollRecords?: number
	/** Most events read from one stream per pass (default: 10) */
	maxRecordsPerStreamPerPass?: number
	/** Interceptors applied to every polled batch, in order */
	interceptors?: readonly ConsumerInterceptor<V>[]
	/** Logger override for this consumer */
	logger?: Logger
}

/**
 * Internal resolved consumer configuration with all defaults applied
 */
export interface ResolvedConsumerConfig<V> {
	scope: string
	groupId: string
	clientId: string
	readTimeoutMs: number
	maxPollRecords: number
	maxRecordsPerStreamPerPass: number
	interceptors: readonly ConsumerInterceptor<V>[]
}

export const DEFAULT_CONSUMER_CONFIG = {
	clientId: 'default-reader',
	readTimeoutMs: 500,
	maxPollRecords: 500,
	maxRecordsPerStreamPerPass: 10,
} as const

/**
 * Timeout used by poll(0); the readers always get a non-zero budget
 */
export const DEFAULT_POLL_TIMEOUT_MS = 500
