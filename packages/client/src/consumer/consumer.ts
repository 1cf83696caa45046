/**
 * Partitioned-log style consumer over stream readers
 *
 * subscribe() creates one reader per stream, poll() drains them within a time
 * budget and returns the events as records of a single synthetic partition.
 *
 * A consumer supports one poll at a time. close() may be called while a poll
 * is running; the poll then fails with IllegalStateError at its next check.
 */

import { IllegalArgumentError, IllegalStateError, UnsupportedOperationError, toError } from '@/client/errors.js'
import type { Codec } from '@/codec.js'
import { InterceptorChain } from '@/interceptors.js'
import { noopLogger, type Logger } from '@/logger.js'
import type { StreamClient } from '@/streams/types.js'
import { syntheticPartitionInfo, type PartitionInfo, type TopicPartition } from '@/utils/topic-partition.js'
import { drainReaders } from './poll-engine.js'
import { ReaderRegistry } from './reader-registry.js'
import type { ConsumerRecords } from './records.js'
import type {
	ConsumerInterceptor,
	OffsetCommitCallback,
	OffsetMap,
	PollOptions,
	ResolvedConsumerConfig,
} from './types.js'
import { DEFAULT_POLL_TIMEOUT_MS } from './types.js'

const EMPTY_OFFSETS: OffsetMap = new Map()

export class Consumer<V> {
	private readonly config: ResolvedConsumerConfig<V>
	private readonly logger: Logger
	private readonly registry: ReaderRegistry<V>
	private readonly interceptors: InterceptorChain<ConsumerInterceptor<V>>
	private readonly onClose?: () => void
	private closed = false

	/**
	 * @param onClose - Called once the consumer has closed
	 */
	constructor(
		streams: StreamClient,
		config: ResolvedConsumerConfig<V>,
		valueCodec: Codec<V>,
		logger?: Logger,
		onClose?: () => void
	) {
		this.config = config
		this.onClose = onClose
		this.logger = (logger ?? noopLogger).child({
			component: 'consumer',
			groupId: config.groupId,
			clientId: config.clientId,
		})
		this.registry = new ReaderRegistry(
			streams,
			{ scope: config.scope, groupId: config.groupId, readerId: config.clientId, codec: valueCodec },
			this.logger
		)
		this.interceptors = new InterceptorChain(config.interceptors, this.logger)
	}

	get groupId(): string {
		return this.config.groupId
	}

	get isClosed(): boolean {
		return this.closed
	}

	// ==================== Subscription ====================

	/**
	 * Replace the subscription with `topics`
	 *
	 * Every current reader is closed and a new one is created for each topic,
	 * including topics that were already subscribed. With more than one topic
	 * each reader group is named `<groupId>-<position>` (1-based).
	 *
	 * @throws IllegalStateError if the consumer is closed
	 * @throws UnsupportedOperationError for a pattern subscription
	 */
	async subscribe(topics: readonly string[] | RegExp): Promise<void> {
		this.ensureOpen()
		if (topics instanceof RegExp) {
			throw new UnsupportedOperationError('Subscribing to topics matching a pattern')
		}
		for (const topic of topics) {
			if (topic.trim() === '') {
				throw new IllegalArgumentError('Topic names must not be blank')
			}
		}

		this.logger.debug('subscribing', { topics })
		await this.registry.replace(topics)
	}

	/**
	 * Close every reader and clear the subscription
	 *
	 * @throws IllegalStateError if the consumer is closed
	 */
	async unsubscribe(): Promise<void> {
		this.ensureOpen()
		this.logger.debug('unsubscribing from all topics')
		await this.registry.replace([])
	}

	subscription(): Set<string> {
		return this.registry.topics()
	}

	// ==================== Poll ====================

	/**
	 * Read events from every subscribed stream for up to `timeoutMs`
	 *
	 * A timeout of 0 is replaced by DEFAULT_POLL_TIMEOUT_MS, so poll(0) waits
	 * for events instead of returning at once.
	 *
	 * Reads stop once `maxRecords` events are collected, so the call can
	 * return before the timeout has passed. It does not keep reading until
	 * the deadline.
	 *
	 * @throws IllegalStateError if the consumer is closed (also mid-poll) or has no subscription
	 * @throws IllegalArgumentError for a negative timeout or non-positive caps
	 * @throws ReinitializationRequiredError when a reader must be recreated; subscribe again
	 */
	async poll(timeoutMs: number, options: PollOptions = {}): Promise<ConsumerRecords<V>> {
		this.ensureOpen()
		if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
			throw new IllegalArgumentError('Poll timeout must be a non-negative number of milliseconds')
		}
		if (this.registry.size === 0) {
			throw new IllegalStateError('This consumer is not subscribed to any topics')
		}
		const maxRecordsPerStreamPerPass = positiveInteger(
			'maxRecordsPerStreamPerPass',
			options.maxRecordsPerStreamPerPass ?? this.config.maxRecordsPerStreamPerPass
		)
		const maxRecords = positiveInteger('maxRecords', options.maxRecords ?? this.config.maxPollRecords)

		const records = await drainReaders(
			this.registry.snapshot(),
			{
				timeoutMs: timeoutMs > 0 ? timeoutMs : DEFAULT_POLL_TIMEOUT_MS,
				readTimeoutMs: this.config.readTimeoutMs,
				maxRecordsPerStreamPerPass,
				maxRecords,
			},
			{ ensureOpen: () => this.ensureOpen(), logger: this.logger }
		)

		return this.interceptors.transform(records, 'onConsume', (interceptor, current) =>
			interceptor.onConsume(current)
		)
	}

	// ==================== Commits ====================

	/**
	 * Positions are tracked by the stream store, so there is nothing to
	 * commit. Always succeeds.
	 */
	async commitSync(offsets: OffsetMap = EMPTY_OFFSETS): Promise<void> {
		this.notifyCommit(offsets)
	}

	/**
	 * Always succeeds; `callback` is invoked with the given offsets and no error
	 */
	commitAsync(offsets: OffsetMap = EMPTY_OFFSETS, callback?: OffsetCommitCallback): void {
		this.notifyCommit(offsets)
		if (callback) {
			try {
				callback(offsets, null)
			} catch (error) {
				this.logger.warn('commit callback failed', { error: toError(error).message })
			}
		}
	}

	private notifyCommit(offsets: OffsetMap): void {
		this.interceptors.notify('onCommit', interceptor => interceptor.onCommit?.(offsets))
	}

	// ==================== Metadata ====================

	/**
	 * Partitions are never assigned manually
	 */
	assignment(): Set<TopicPartition> {
		return new Set()
	}

	/**
	 * Positions inside a stream are not addressable
	 */
	position(_partition: TopicPartition): bigint {
		return -1n
	}

	partitionsFor(topic: string): PartitionInfo[] {
		return [syntheticPartitionInfo(topic)]
	}

	listTopics(): Map<string, PartitionInfo[]> {
		const result = new Map<string, PartitionInfo[]>()
		for (const topic of this.registry.topics()) {
			result.set(topic, [syntheticPartitionInfo(topic)])
		}
		return result
	}

	metrics(): Map<string, number> {
		return new Map()
	}

	/**
	 * Polls cannot be interrupted; this is a no-op
	 */
	wakeup(): void {
		this.logger.debug('wakeup ignored')
	}

	// ==================== Unsupported ====================

	assign(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('Manual partition assignment')
	}

	seek(_partition: TopicPartition, _offset: bigint): never {
		throw new UnsupportedOperationError('seek()')
	}

	seekToBeginning(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('seekToBeginning()')
	}

	seekToEnd(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('seekToEnd()')
	}

	committed(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('committed()')
	}

	pause(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('pause()')
	}

	resume(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('resume()')
	}

	paused(): never {
		throw new UnsupportedOperationError('paused()')
	}

	offsetsForTimes(_timestamps: ReadonlyMap<string, bigint>): never {
		throw new UnsupportedOperationError('offsetsForTimes()')
	}

	beginningOffsets(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('beginningOffsets()')
	}

	endOffsets(_partitions: readonly TopicPartition[]): never {
		throw new UnsupportedOperationError('endOffsets()')
	}

	// ==================== Lifecycle ====================

	/**
	 * Close the consumer. Safe to call more than once.
	 */
	async close(): Promise<void> {
		if (this.closed) {
			return
		}
		this.closed = true
		this.logger.debug('closing consumer')
		try {
			await this.registry.closeAll()
			await this.interceptors.close()
		} finally {
			this.onClose?.()
		}
		this.logger.info('consumer closed')
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new IllegalStateError('This consumer is closed')
		}
	}
}

function positiveInteger(name: string, value: number): number {
	if (!Number.isInteger(value) || value <= 0) {
		throw new IllegalArgumentError(`${name} must be a positive integer, got ${value}`)
	}
	return value
}
